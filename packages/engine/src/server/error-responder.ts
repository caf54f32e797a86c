import type { AppError, AppErrorKind } from "../errors/app-error.js";
import { describeError } from "../errors/app-error.js";
import { createResponse } from "../http/response.js";
import { encodeResponse, serializeResponse } from "../http/response-writer.js";
import { type HttpResponse, type HttpStatus, STATUS_TEXT } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import type { TemplateName, TemplateStore } from "./templates.js";

const PLAIN_TEXT_NAME = "error.txt";

interface ErrorMapping {
  status: HttpStatus;
  severity: "warn" | "error";
  template: TemplateName;
}

export const ERROR_MAPPINGS: Record<AppErrorKind, ErrorMapping> = {
  IO: { status: 500, severity: "error", template: "server-error.html" },
  Invalid: { status: 400, severity: "warn", template: "bad-request.html" },
  NotFound: { status: 404, severity: "warn", template: "file-not-found.html" },
  NotPermitted: { status: 403, severity: "warn", template: "access-denied.html" },
  Unknown: { status: 500, severity: "error", template: "server-error.html" },
};

/**
 * Log an error and pick the page the client sees for it. Nothing else in the
 * engine logs AppErrors.
 */
export function errorToResponse(
  error: AppError,
  templates: TemplateStore,
  logger: Logger,
): HttpResponse {
  const mapping = ERROR_MAPPINGS[error.kind];
  if (mapping.severity === "error") {
    const details = error.cause === undefined ? [] : [error.cause];
    logger.error(describeError(error), ...details);
  } else {
    logger.warn(describeError(error));
  }

  return createResponse({
    status: mapping.status,
    body: { kind: "file", path: templates.path(templateFor(error, mapping)) },
  });
}

function templateFor(error: AppError, mapping: ErrorMapping): TemplateName {
  if (error.kind === "NotFound" && error.missing === "page") {
    return "page-not-found.html";
  }
  return mapping.template;
}

/**
 * Serialized error page. When the page itself cannot be loaded the client
 * gets a plain-text body with the same status.
 */
export async function renderErrorResponse(
  error: AppError,
  templates: TemplateStore,
  fs: IFileSystem,
  logger: Logger,
): Promise<Uint8Array> {
  const response = errorToResponse(error, templates, logger);
  const bytes = await serializeResponse(response, fs);
  if (bytes.ok) return bytes.value;

  logger.error(`Error page unavailable: ${describeError(bytes.error)}`);
  return plainTextResponse(response.status);
}

export function plainTextResponse(status: HttpStatus): Uint8Array {
  return encodeResponse(createResponse({ status }), {
    name: PLAIN_TEXT_NAME,
    content: fromString(`${status} ${STATUS_TEXT[status]}\n`),
  });
}
