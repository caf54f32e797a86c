import {
  type BufferedFile,
  EMPTY_BODY,
  type HttpResponse,
  type HttpResponseOptions,
  toHeaderCase,
} from "./types.js";
import { fromString } from "../utils/buffer.js";

/** Name given to synthesized text bodies; its extension makes them HTML. */
export const TEXT_BODY_NAME = "response.html";

export function createResponse(options: HttpResponseOptions = {}): HttpResponse {
  return {
    version: "HTTP/1.1",
    status: options.status ?? 200,
    headers: normalizeHeaders(options.headers),
    body: options.body ?? EMPTY_BODY,
  };
}

export function textFile(text: string): BufferedFile {
  return { name: TEXT_BODY_NAME, content: fromString(text) };
}

export function normalizeHeaders(
  headers?: Map<string, string> | Record<string, string>,
): Map<string, string> {
  const map = new Map<string, string>();
  if (!headers) return map;
  const entries = headers instanceof Map ? headers.entries() : Object.entries(headers);
  for (const [key, value] of entries) {
    map.set(toHeaderCase(key), value);
  }
  return map;
}
