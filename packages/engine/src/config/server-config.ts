import { fileURLToPath } from "node:url";

export interface ServerConfig {
  /** Port to listen on. Default: 7878 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Directory holding uploaded files; created at startup when missing. */
  uploadsDir: string;
  /** Directory holding the HTML templates. Default: the engine's bundled set */
  templatesDir: string;
  /** Number of connection workers, at least 1. Default: 4 */
  workers: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time a read may wait for request bytes; 0 waits forever. Default: 0 */
  requestTimeoutMs: number;
  /** Max declared Content-Length of a multipart upload. Default: 50MB */
  maxUploadSize: number;
  /** Extensions (without the dot) accepted for viewing and uploading. */
  allowedExtensions: string[];
}

export const DEFAULT_MAX_UPLOAD_SIZE = 50 * 1024 * 1024;

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(
  new URL("../../templates", import.meta.url),
);

export function defaultConfig(uploadsDir: string): ServerConfig {
  return {
    port: 7878,
    host: "127.0.0.1",
    uploadsDir,
    templatesDir: DEFAULT_TEMPLATES_DIR,
    workers: 4,
    quiet: false,
    requestTimeoutMs: 0,
    maxUploadSize: DEFAULT_MAX_UPLOAD_SIZE,
    allowedExtensions: ["txt", "png", "jpg", "pdf"],
  };
}
