import { describe, expect, it } from "vitest";
import { DEFAULT_MIME_TYPE, getMimeType, isHtmlMimeType } from "./mime-types.js";

describe("getMimeType", () => {
  it("looks up the extension case-insensitively", () => {
    expect(getMimeType("uploads/page.HTML")).toBe("text/html; charset=UTF-8");
    expect(getMimeType("photo.jpeg")).toBe("image/jpeg");
    expect(getMimeType("notes.txt")).toBe("text/plain");
  });

  it("falls back to a binary type", () => {
    expect(getMimeType("archive.tar.zst")).toBe(DEFAULT_MIME_TYPE);
    expect(getMimeType("README")).toBe("application/octet-stream");
  });
});

describe("isHtmlMimeType", () => {
  it("matches html with or without a charset", () => {
    expect(isHtmlMimeType("text/html; charset=UTF-8")).toBe(true);
    expect(isHtmlMimeType("text/html")).toBe(true);
    expect(isHtmlMimeType("text/plain")).toBe(false);
  });
});
