import { fail, ok, type Result } from "../errors/app-error.js";
import type { BodyExtractor } from "./body-extractor.js";
import { MultipartFormExtractor } from "./multipart-extractor.js";
import type { SocketReader } from "./socket-reader.js";
import {
  type HttpMethod,
  HttpHeader,
  type HttpRequest,
  parseHttpMethod,
  type RequestBody,
  toHeaderCase,
} from "./types.js";

export interface RequestLine {
  method: HttpMethod;
  path: string;
  version: string;
}

export function defaultBodyExtractors(maxUploadSize?: number): BodyExtractor[] {
  return [new MultipartFormExtractor(maxUploadSize)];
}

/** `METHOD SP PATH SP VERSION`, tokens separated by any run of whitespace. */
export function parseRequestLine(line: string): Result<RequestLine> {
  const parts = line.trim().split(/\s+/).filter(Boolean);
  if (parts.length !== 3) {
    return fail("Invalid", `Malformed request line: ${JSON.stringify(line)}`);
  }

  const [methodToken, path, version] = parts;
  const method = parseHttpMethod(methodToken);
  if (!method.ok) return method;

  return ok({ method: method.value, path, version });
}

/** `Name: value`, split at the first colon. */
export function parseHeaderLine(line: string): Result<[string, string]> {
  const colon = line.indexOf(":");
  const name = colon === -1 ? "" : line.slice(0, colon).trim();
  if (!name) {
    return fail("Invalid", `Malformed header line: ${JSON.stringify(line)}`);
  }
  const header: [string, string] = [
    toHeaderCase(name),
    line.slice(colon + 1).trim(),
  ];
  return ok(header);
}

/**
 * Read one full request from the connection. Either the whole request is
 * returned or an error is; nothing partial escapes.
 */
export async function parseRequest(
  reader: SocketReader,
  extractors: readonly BodyExtractor[] = defaultBodyExtractors(),
): Promise<Result<HttpRequest>> {
  const firstLine = await reader.readLine();
  if (!firstLine.ok) return firstLine;

  const requestLine = parseRequestLine(firstLine.value);
  if (!requestLine.ok) return requestLine;

  const headers = new Map<string, string>();
  while (true) {
    const line = await reader.readLine();
    if (!line.ok) return line;
    if (line.value === "") break;

    const header = parseHeaderLine(line.value);
    if (!header.ok) return header;
    headers.set(header.value[0], header.value[1]);
  }

  const body = await extractBody(reader, headers, extractors);
  if (!body.ok) return body;

  return ok({
    method: requestLine.value.method,
    path: requestLine.value.path,
    version: requestLine.value.version,
    headers,
    body: body.value,
  });
}

async function extractBody(
  reader: SocketReader,
  headers: Map<string, string>,
  extractors: readonly BodyExtractor[],
): Promise<Result<RequestBody>> {
  const rawLength = headers.get(HttpHeader.CONTENT_LENGTH);
  const contentType = headers.get(HttpHeader.CONTENT_TYPE);

  let contentLength = 0;
  if (rawLength !== undefined) {
    if (!/^\d+$/.test(rawLength)) {
      return fail(
        "Invalid",
        `${HttpHeader.CONTENT_LENGTH} request header is not a number`,
      );
    }
    contentLength = Number(rawLength);
  }

  if (contentLength === 0 || contentType === undefined) {
    return ok<RequestBody>({ kind: "empty" });
  }

  const extractor = extractors.find((e) => e.matches(contentType));
  if (!extractor) {
    return fail("Invalid", `Unsupported content type: ${contentType}`);
  }
  return extractor.extract(reader, contentType, contentLength);
}
