import type { Result } from "../errors/app-error.js";
import type { ByteSource } from "./socket-reader.js";
import type { RequestBody } from "./types.js";

/**
 * Decodes one family of request bodies. The parser asks each registered
 * extractor in turn and uses the first whose `matches` accepts the
 * Content-Type value.
 */
export interface BodyExtractor {
  matches(contentType: string): boolean;
  extract(
    source: ByteSource,
    contentType: string,
    contentLength: number,
  ): Promise<Result<RequestBody>>;
}
