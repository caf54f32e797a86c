import { fail, ok, type Result } from "../errors/app-error.js";

export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "TRACE",
  "CONNECT",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function parseHttpMethod(token: string): Result<HttpMethod> {
  const upper = token.toUpperCase();
  const method = HTTP_METHODS.find((m) => m === upper);
  return method ? ok(method) : fail("Invalid", `Unknown method: ${token}`);
}

export type HttpStatus = 200 | 303 | 400 | 403 | 404 | 500;

export const STATUS_TEXT: Record<HttpStatus, string> = {
  200: "OK",
  303: "See Other",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  500: "Internal Server Error",
};

export const HttpHeader = {
  CONTENT_LENGTH: "Content-Length",
  CONTENT_TYPE: "Content-Type",
  CONTENT_DISPOSITION: "Content-Disposition",
  CONNECTION: "Connection",
  LOCATION: "Location",
} as const;

/**
 * Canonical header name: "content-length" and "CONTENT-LENGTH" both become
 * "Content-Length".
 */
export function toHeaderCase(name: string): string {
  return name
    .split("-")
    .map((segment) =>
      segment.length === 0
        ? segment
        : segment[0].toUpperCase() + segment.slice(1).toLowerCase(),
    )
    .join("-");
}

/** A file held in memory: an upload, a file read from disk, or rendered text. */
export interface BufferedFile {
  name: string;
  content: Uint8Array;
}

export type RequestBody =
  | { kind: "multipart"; file: BufferedFile }
  | { kind: "empty" };

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  version: string;
  headers: Map<string, string>;
  body: RequestBody;
}

/** Describes where response bytes come from; resolved at serialization time. */
export type ResponseBody =
  | { kind: "file"; path: string }
  | { kind: "text"; text: string }
  | { kind: "empty" };

export interface HttpResponse {
  version: "HTTP/1.1";
  status: HttpStatus;
  headers: Map<string, string>;
  body: ResponseBody;
}

export interface HttpResponseOptions {
  status?: HttpStatus;
  headers?: Map<string, string> | Record<string, string>;
  body?: ResponseBody;
}

export const EMPTY_BODY: ResponseBody = { kind: "empty" };
