import { fail, ok, type Result } from "../errors/app-error.js";
import { readBufferedFile } from "../files/file-store.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { getMimeType, isHtmlMimeType } from "./mime-types.js";
import { normalizeHeaders, textFile } from "./response.js";
import {
  type BufferedFile,
  HttpHeader,
  type HttpResponse,
  type ResponseBody,
  STATUS_TEXT,
} from "./types.js";

/**
 * Turn a body description into bytes: files are read from disk, text becomes
 * an HTML document, and an empty body yields `null`.
 */
export async function resolveResponseBody(
  body: ResponseBody,
  fs: IFileSystem,
): Promise<Result<BufferedFile | null>> {
  switch (body.kind) {
    case "file":
      return readBufferedFile(fs, body.path);
    case "text":
      return ok(textFile(body.text));
    case "empty":
      return ok(null);
  }
}

/**
 * Wire bytes for a response whose body is already in memory. Computed headers
 * replace any caller header of the same name.
 */
export function encodeResponse(
  response: HttpResponse,
  file: BufferedFile | null,
): Uint8Array {
  const headers = normalizeHeaders(response.headers);

  if (file) {
    const mimeType = getMimeType(file.name);
    headers.set(HttpHeader.CONTENT_LENGTH, String(file.content.length));
    headers.set(HttpHeader.CONTENT_TYPE, mimeType);
    if (!isHtmlMimeType(mimeType)) {
      headers.set(
        HttpHeader.CONTENT_DISPOSITION,
        `inline; filename="${quoteFileName(file.name)}"`,
      );
    }
  } else {
    headers.set(HttpHeader.CONTENT_LENGTH, "0");
  }
  headers.set(HttpHeader.CONNECTION, "close");

  const lines: string[] = [
    `${response.version} ${response.status} ${STATUS_TEXT[response.status]}`,
  ];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n

  const head = fromString(lines.join("\r\n"));
  return file ? concat([head, file.content]) : head;
}

export async function serializeResponse(
  response: HttpResponse,
  fs: IFileSystem,
): Promise<Result<Uint8Array>> {
  const file = await resolveResponseBody(response.body, fs);
  if (!file.ok) return file;
  return ok(encodeResponse(response, file.value));
}

/** Write serialized bytes, waiting for the socket to drain when it can tell us. */
export async function writeResponse(
  socket: ITcpSocket,
  bytes: Uint8Array,
): Promise<Result<void>> {
  try {
    if (socket.sendAndWait) {
      await socket.sendAndWait(bytes);
    } else {
      socket.send(bytes);
    }
    return ok(undefined);
  } catch (err) {
    return fail("IO", "Failed to write response", err);
  }
}

function quoteFileName(name: string): string {
  return name.replace(/[\r\n]/g, "").replace(/(["\\])/g, "\\$1");
}
