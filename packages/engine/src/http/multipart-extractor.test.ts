import { describe, expect, it, vi } from "vitest";
import { ok } from "../errors/app-error.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import {
  MultipartFormExtractor,
  parseBoundary,
  parseSingleFilePart,
} from "./multipart-extractor.js";
import type { ByteSource } from "./socket-reader.js";

function sourceOf(bytes: Uint8Array): ByteSource {
  return { readExact: async (length) => ok(bytes.subarray(0, length)) };
}

describe("parseBoundary", () => {
  it("reads a bare boundary", () => {
    expect(parseBoundary("multipart/form-data; boundary=----abc123")).toBe(
      "----abc123",
    );
  });

  it("unquotes and stops at the next parameter", () => {
    expect(
      parseBoundary('multipart/form-data; boundary="abc def"; charset=utf-8'),
    ).toBe("abc def");
  });

  it("returns null when absent or empty", () => {
    expect(parseBoundary("multipart/form-data")).toBeNull();
    expect(parseBoundary("multipart/form-data; boundary=")).toBeNull();
  });
});

describe("parseSingleFilePart", () => {
  it("extracts the file name and trimmed data", () => {
    const body =
      "\r\n--b\r\n" +
      'Content-Disposition: form-data; name="file"; filename="notes.txt"\r\n' +
      "Content-Type: text/plain\r\n" +
      "\r\n" +
      "  line one\nline two  \r\n" +
      "--b--\r\n";

    const result = parseSingleFilePart(body, "b");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe("notes.txt");
    expect(decodeToString(result.value.content)).toBe("line one\nline two");
  });

  it("requires both boundaries", () => {
    expect(parseSingleFilePart("--b\r\nContent-Disposition: x", "b")).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "Form body not surrounded with boundary" },
    });
    expect(parseSingleFilePart("hello --b--", "b").ok).toBe(false);
  });

  it("requires a filename parameter", () => {
    expect(parseSingleFilePart("--b\r\nno disposition here\r\n--b--", "b")).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "Invalid content disposition" },
    });
  });

  it("requires the content type line", () => {
    const body = '--b\r\nContent-Disposition: form-data; filename="a.txt"\r\n--b--';
    expect(parseSingleFilePart(body, "b")).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "Content type missing from form body" },
    });
  });

  it("requires the data line", () => {
    const body =
      '--b\r\nContent-Disposition: form-data; filename="a.txt"\r\nContent-Type: text/plain\r\n--b--';
    expect(parseSingleFilePart(body, "b")).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "File data missing from form body" },
    });
  });
});

describe("MultipartFormExtractor", () => {
  it("matches multipart/form-data case-insensitively", () => {
    const extractor = new MultipartFormExtractor();
    expect(extractor.matches("Multipart/Form-Data; boundary=x")).toBe(true);
    expect(extractor.matches("text/plain")).toBe(false);
  });

  it("rejects an oversized body before reading it", async () => {
    const readExact = vi.fn(async (_length: number) => ok(new Uint8Array(0)));
    const extractor = new MultipartFormExtractor(10);

    const result = await extractor.extract(
      { readExact },
      "multipart/form-data; boundary=b",
      11,
    );

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "Invalid",
        message: "File size of 11 bytes exceeds the 10 byte limit",
      },
    });
    expect(readExact).not.toHaveBeenCalled();
  });

  it("rejects a content type without a boundary", async () => {
    const result = await new MultipartFormExtractor().extract(
      sourceOf(new Uint8Array(4)),
      "multipart/form-data",
      4,
    );
    expect(result).toEqual({
      ok: false,
      error: { kind: "Invalid", message: "Boundary missing in Content-Type header" },
    });
  });

  it("rejects a body that is not UTF-8", async () => {
    const result = await new MultipartFormExtractor().extract(
      sourceOf(new Uint8Array([0xff, 0xfe, 0xfd])),
      "multipart/form-data; boundary=b",
      3,
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("Invalid");
      expect(result.error.message).toBe("Failed to parse form data as UTF-8");
    }
  });

  it("returns a multipart body", async () => {
    const body = fromString(
      '--b\r\nContent-Disposition: form-data; filename="x.txt"\r\nContent-Type: text/plain\r\n\r\nhey\r\n--b--\r\n',
    );
    const result = await new MultipartFormExtractor().extract(
      sourceOf(body),
      "multipart/form-data; boundary=b",
      body.length,
    );

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.kind !== "multipart") return;
    expect(result.value.file.name).toBe("x.txt");
    expect(decodeToString(result.value.file.content)).toBe("hey");
  });
});
