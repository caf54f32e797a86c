import * as path from "node:path";
import { defaultConfig, type ServerConfig } from "@uploadbox/engine";
import type { CliOptions } from "./args.js";

/** Server settings for parsed options; relative paths resolve against the cwd. */
export function buildConfig(options: CliOptions): ServerConfig {
  const base = defaultConfig(path.resolve(options.uploadsDir));
  return {
    ...base,
    port: options.port,
    host: options.host,
    workers: options.workers,
    templatesDir: options.templatesDir
      ? path.resolve(options.templatesDir)
      : base.templatesDir,
    requestTimeoutMs: options.timeoutMs,
    quiet: options.quiet,
  };
}
