// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
} from "./adapters/node/node-filesystem.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export {
  DEFAULT_MAX_UPLOAD_SIZE,
  DEFAULT_TEMPLATES_DIR,
  defaultConfig,
} from "./config/server-config.js";
// Errors
export type {
  AppError,
  AppErrorKind,
  Failure,
  Result,
  Success,
} from "./errors/app-error.js";
export { describeError, fail, fromUnknown, ok } from "./errors/app-error.js";
// Files
export type { FileEntry } from "./files/file-store.js";
export { listFiles, readBufferedFile, saveFile } from "./files/file-store.js";
export { KeyedLock } from "./files/keyed-lock.js";
export {
  isWithin,
  resolveUploadPath,
  resolveViewPath,
  validateFileName,
} from "./files/path-safety.js";
// HTTP
export type { BodyExtractor } from "./http/body-extractor.js";
export { getMimeType } from "./http/mime-types.js";
export { MultipartFormExtractor } from "./http/multipart-extractor.js";
export {
  defaultBodyExtractors,
  parseRequest,
} from "./http/request-parser.js";
export { createResponse } from "./http/response.js";
export {
  encodeResponse,
  resolveResponseBody,
  serializeResponse,
  writeResponse,
} from "./http/response-writer.js";
export type { ByteSource, SocketReaderOptions } from "./http/socket-reader.js";
export { SocketReader } from "./http/socket-reader.js";
export type {
  BufferedFile,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpResponseOptions,
  HttpStatus,
  RequestBody,
  ResponseBody,
} from "./http/types.js";
export { parseHttpMethod, STATUS_TEXT, toHeaderCase } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export { errorToResponse } from "./server/error-responder.js";
export type { AppState, HandlerContext } from "./server/handlers.js";
export { routeRequest } from "./server/router.js";
export type { TemplateName } from "./server/templates.js";
export { TemplateStore } from "./server/templates.js";
export type { WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
export type { Job } from "./server/worker-pool.js";
export { JobQueue, WorkerPool } from "./server/worker-pool.js";
// Testing
export type { InMemoryConnection } from "./testing/in-memory-socket-factory.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
