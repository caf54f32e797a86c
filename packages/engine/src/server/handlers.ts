import { fail, ok, type Result } from "../errors/app-error.js";
import type { KeyedLock } from "../files/keyed-lock.js";
import { listFiles, saveFile } from "../files/file-store.js";
import { resolveUploadPath, resolveViewPath } from "../files/path-safety.js";
import { createResponse } from "../http/response.js";
import { HttpHeader, type HttpRequest, type HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { TemplateStore } from "./templates.js";

/** Shared by every connection of one server instance. */
export interface AppState {
  uploadsRoot: string;
  writeLocks: KeyedLock;
}

export interface HandlerContext {
  fs: IFileSystem;
  templates: TemplateStore;
  state: AppState;
  allowedExtensions: readonly string[];
}

export type Handler = (
  request: HttpRequest,
  ctx: HandlerContext,
) => Promise<Result<HttpResponse>>;

export const listFilesHandler: Handler = async (_request, ctx) => {
  const files = await listFiles(ctx.fs, ctx.state.uploadsRoot);
  if (!files.ok) return files;

  const items = files.value
    .map(
      (file) =>
        `<li><a href="${escapeHtml(uploadHref(file.path))}">${escapeHtml(file.name)}</a></li>`,
    )
    .join("\n");

  const html = await ctx.templates.render("index.html", { FILES_LIST: items });
  if (!html.ok) return html;
  return ok(createResponse({ body: { kind: "text", text: html.value } }));
};

export const viewFileHandler: Handler = async (request, ctx) => {
  const resolved = await resolveViewPath(
    requestPathname(request.path),
    ctx.state.uploadsRoot,
    ctx.fs,
    ctx.allowedExtensions,
  );
  if (!resolved.ok) return resolved;
  return ok(createResponse({ body: { kind: "file", path: resolved.value } }));
};

export const uploadFormHandler: Handler = async (_request, ctx) =>
  ok(
    createResponse({
      body: { kind: "file", path: ctx.templates.path("upload.html") },
    }),
  );

export const uploadFileHandler: Handler = async (request, ctx) => {
  if (request.body.kind !== "multipart") {
    return fail("Invalid", "Upload requires a multipart/form-data body");
  }
  const { file } = request.body;

  const target = resolveUploadPath(
    file.name,
    ctx.state.uploadsRoot,
    ctx.allowedExtensions,
  );
  if (!target.ok) return target;

  const saved = await saveFile(ctx.fs, target.value, file, ctx.state.writeLocks);
  if (!saved.ok) return saved;

  return ok(
    createResponse({
      status: 303,
      headers: { [HttpHeader.LOCATION]: "/" },
    }),
  );
};

/** The path without its query string or fragment. */
export function requestPathname(target: string): string {
  const end = target.search(/[?#]/);
  return end === -1 ? target : target.slice(0, end);
}

function uploadHref(relativePath: string): string {
  return `/uploads/${relativePath.split("/").map(encodeURIComponent).join("/")}`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
