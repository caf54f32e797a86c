import { fromUnknown, type Result } from "../errors/app-error.js";
import type { HttpMethod, HttpRequest, HttpResponse } from "../http/types.js";
import {
  type Handler,
  type HandlerContext,
  listFilesHandler,
  requestPathname,
  uploadFileHandler,
  uploadFormHandler,
  viewFileHandler,
} from "./handlers.js";

export interface Route {
  method: HttpMethod;
  /** Exact path, or a prefix when it ends in `*`. */
  pattern: string;
  handler: Handler;
}

export const ROUTES: readonly Route[] = [
  { method: "GET", pattern: "/", handler: listFilesHandler },
  { method: "GET", pattern: "/upload", handler: uploadFormHandler },
  { method: "POST", pattern: "/upload", handler: uploadFileHandler },
  { method: "GET", pattern: "/uploads/*", handler: viewFileHandler },
];

export function matchRoute(
  method: HttpMethod,
  pathname: string,
): Handler | null {
  for (const route of ROUTES) {
    if (route.method !== method) continue;
    if (route.pattern.endsWith("*")) {
      if (pathname.startsWith(route.pattern.slice(0, -1))) return route.handler;
    } else if (pathname === route.pattern) {
      return route.handler;
    }
  }
  return null;
}

/**
 * Dispatch a parsed request. A handler that throws is a bug; it still ends up
 * as an `Unknown` error rather than a dropped connection.
 */
export async function routeRequest(
  request: HttpRequest,
  ctx: HandlerContext,
): Promise<Result<HttpResponse>> {
  const handler = matchRoute(request.method, requestPathname(request.path));
  if (!handler) {
    return {
      ok: false,
      error: {
        kind: "NotFound",
        message: `No page for ${request.method} ${request.path}`,
        missing: "page",
      },
    };
  }

  try {
    return await handler(request, ctx);
  } catch (err) {
    return fromUnknown(err, `Handler for ${request.method} ${request.path} failed`);
  }
}
