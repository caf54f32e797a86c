import * as path from "node:path";

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html; charset=UTF-8",
  ".css": "text/css",
  ".js": "application/javascript",
  ".json": "application/json",
  ".txt": "text/plain",

  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",

  ".pdf": "application/pdf",
};

export const DEFAULT_MIME_TYPE = "application/octet-stream";

export function getMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return MIME_TYPES[ext] ?? DEFAULT_MIME_TYPE;
}

export function isHtmlMimeType(mimeType: string): boolean {
  return mimeType.startsWith("text/html");
}
