import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { NodeFileSystem } from "../adapters/node/node-filesystem.js";
import { DEFAULT_TEMPLATES_DIR } from "../config/server-config.js";
import { KeyedLock } from "../files/keyed-lock.js";
import type { HttpMethod, HttpRequest, RequestBody } from "../http/types.js";
import { fromString } from "../utils/buffer.js";
import { escapeHtml, type HandlerContext, requestPathname } from "./handlers.js";
import { matchRoute, routeRequest } from "./router.js";
import { type TemplateName, TemplateStore } from "./templates.js";

const fileSystem = new NodeFileSystem();
let tmpDir = "";
let ctx: HandlerContext;

function request(
  method: HttpMethod,
  target: string,
  body: RequestBody = { kind: "empty" },
): HttpRequest {
  return { method, path: target, version: "HTTP/1.1", headers: new Map(), body };
}

function upload(name: string, text: string): RequestBody {
  return { kind: "multipart", file: { name, content: fromString(text) } };
}

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "uploadbox-router-"));
  const uploadsRoot = path.join(tmpDir, "uploads");
  await fs.mkdir(uploadsRoot);
  await fs.writeFile(path.join(uploadsRoot, "a&b.txt"), "amp");
  ctx = {
    fs: fileSystem,
    templates: new TemplateStore(fileSystem, DEFAULT_TEMPLATES_DIR),
    state: { uploadsRoot, writeLocks: new KeyedLock() },
    allowedExtensions: ["txt", "png", "jpg", "pdf"],
  };
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("matchRoute", () => {
  it("matches exact paths and the uploads prefix", () => {
    expect(matchRoute("GET", "/")).not.toBeNull();
    expect(matchRoute("GET", "/upload")).not.toBeNull();
    expect(matchRoute("POST", "/upload")).not.toBeNull();
    expect(matchRoute("GET", "/uploads/x.txt")).not.toBeNull();
  });

  it("does not match other methods or paths", () => {
    expect(matchRoute("DELETE", "/")).toBeNull();
    expect(matchRoute("POST", "/")).toBeNull();
    expect(matchRoute("GET", "/uploadsx")).toBeNull();
    expect(matchRoute("GET", "/index.html")).toBeNull();
  });
});

describe("requestPathname", () => {
  it("drops the query string and fragment", () => {
    expect(requestPathname("/upload?x=1")).toBe("/upload");
    expect(requestPathname("/#top")).toBe("/");
    expect(requestPathname("/uploads/a.txt")).toBe("/uploads/a.txt");
  });
});

describe("routeRequest", () => {
  it("lists files as escaped links", async () => {
    const result = await routeRequest(request("GET", "/?sort=name"), ctx);
    expect(result.ok).toBe(true);
    if (!result.ok || result.value.body.kind !== "text") {
      throw new Error("expected a text body");
    }
    expect(result.value.body.text).toContain(
      '<li><a href="/uploads/a%26b.txt">a&amp;b.txt</a></li>',
    );
  });

  it("serves the upload form from the templates directory", async () => {
    const result = await routeRequest(request("GET", "/upload"), ctx);
    expect(result.ok && result.value.body).toEqual({
      kind: "file",
      path: path.join(DEFAULT_TEMPLATES_DIR, "upload.html"),
    });
  });

  it("saves an upload and redirects home", async () => {
    const result = await routeRequest(
      request("POST", "/upload", upload("saved.txt", "data")),
      ctx,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe(303);
    expect(result.value.headers.get("Location")).toBe("/");
    expect(
      await fs.readFile(path.join(ctx.state.uploadsRoot, "saved.txt"), "utf8"),
    ).toBe("data");
  });

  it("requires a multipart body for uploads", async () => {
    const result = await routeRequest(request("POST", "/upload"), ctx);
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "Invalid",
        message: "Upload requires a multipart/form-data body",
      },
    });
  });

  it("views an uploaded file", async () => {
    const result = await routeRequest(request("GET", "/uploads/a%26b.txt"), ctx);
    expect(result.ok && result.value.body).toEqual({
      kind: "file",
      path: await fs.realpath(path.join(ctx.state.uploadsRoot, "a&b.txt")),
    });
  });

  it("returns NotFound for unknown pages", async () => {
    const result = await routeRequest(request("PUT", "/upload"), ctx);
    expect(result).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "No page for PUT /upload", missing: "page" },
    });
  });

  it("reports a missing upload as a missing file, not a missing page", async () => {
    const result = await routeRequest(request("GET", "/uploads/absent.txt"), ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("NotFound");
      expect(result.error.missing).toBeUndefined();
    }
  });

  it("turns a throwing handler into an error result", async () => {
    class BrokenTemplates extends TemplateStore {
      path(_name: TemplateName): string {
        throw new TypeError("template path exploded");
      }
    }

    const result = await routeRequest(request("GET", "/upload"), {
      ...ctx,
      templates: new BrokenTemplates(fileSystem, DEFAULT_TEMPLATES_DIR),
    });
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "Unknown",
        message: "Handler for GET /upload failed: template path exploded",
        cause: expect.any(TypeError),
      },
    });
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});
