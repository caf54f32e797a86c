import { DEFAULT_MAX_UPLOAD_SIZE } from "../config/server-config.js";
import { fail, ok, type Result } from "../errors/app-error.js";
import { fromString } from "../utils/buffer.js";
import type { BodyExtractor } from "./body-extractor.js";
import type { ByteSource } from "./socket-reader.js";
import type { BufferedFile, RequestBody } from "./types.js";

const MULTIPART_FORM_DATA = "multipart/form-data";

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Single-file `multipart/form-data` decoder.
 *
 * Supports exactly one part: the body is cut at the outer boundaries and the
 * first two newlines, so additional fields or boundary-like text inside the
 * file will not parse correctly.
 */
export class MultipartFormExtractor implements BodyExtractor {
  constructor(private readonly maxSize: number = DEFAULT_MAX_UPLOAD_SIZE) {}

  matches(contentType: string): boolean {
    return contentType.toLowerCase().startsWith(MULTIPART_FORM_DATA);
  }

  async extract(
    source: ByteSource,
    contentType: string,
    contentLength: number,
  ): Promise<Result<RequestBody>> {
    if (contentLength > this.maxSize) {
      return fail(
        "Invalid",
        `File size of ${contentLength} bytes exceeds the ${this.maxSize} byte limit`,
      );
    }

    const boundary = parseBoundary(contentType);
    if (!boundary) {
      return fail("Invalid", "Boundary missing in Content-Type header");
    }

    const raw = await source.readExact(contentLength);
    if (!raw.ok) return raw;

    let text: string;
    try {
      text = strictUtf8.decode(raw.value);
    } catch (err) {
      return fail("Invalid", "Failed to parse form data as UTF-8", err);
    }

    const file = parseSingleFilePart(text, boundary);
    if (!file.ok) return file;
    return ok<RequestBody>({ kind: "multipart", file: file.value });
  }
}

/** The `boundary=` parameter of a Content-Type value, unquoted. */
export function parseBoundary(contentType: string): string | null {
  const at = contentType.indexOf("boundary=");
  if (at === -1) return null;

  let value = contentType.slice(at + "boundary=".length);
  const semicolon = value.indexOf(";");
  if (semicolon !== -1) value = value.slice(0, semicolon);
  value = stripQuotes(value.trim());
  return value || null;
}

export function parseSingleFilePart(
  body: string,
  boundary: string,
): Result<BufferedFile> {
  const opening = `--${boundary}`;
  const closing = `--${boundary}--`;
  const trimmed = body.trim();

  if (
    trimmed.length < opening.length + closing.length ||
    !trimmed.startsWith(opening) ||
    !trimmed.endsWith(closing)
  ) {
    return fail("Invalid", "Form body not surrounded with boundary");
  }

  const part = trimmed
    .slice(opening.length, trimmed.length - closing.length)
    .trim();

  const firstBreak = part.indexOf("\n");
  const disposition = firstBreak === -1 ? part : part.slice(0, firstBreak);
  const name = fileNameFromDisposition(disposition);
  if (name === null) {
    return fail("Invalid", "Invalid content disposition");
  }

  // The part's own Content-Type line sits between the two breaks and is not used.
  if (firstBreak === -1) {
    return fail("Invalid", "Content type missing from form body");
  }
  const secondBreak = part.indexOf("\n", firstBreak + 1);
  if (secondBreak === -1) {
    return fail("Invalid", "File data missing from form body");
  }

  const data = part.slice(secondBreak + 1).trim();
  return ok({ name, content: fromString(data) });
}

function fileNameFromDisposition(line: string): string | null {
  const semicolon = line.lastIndexOf(";");
  if (semicolon === -1) return null;

  const param = line.slice(semicolon + 1);
  const equals = param.indexOf("=");
  if (equals === -1) return null;

  return stripQuotes(param.slice(equals + 1).trim());
}

function stripQuotes(value: string): string {
  return value.replace(/^"+|"+$/g, "");
}
