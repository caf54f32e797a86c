import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
  type WebServer,
} from "@uploadbox/engine";
import type { CliOptions } from "./args.js";
import { buildConfig } from "./config.js";

export interface RunningServer {
  server: WebServer;
  config: ServerConfig;
  port: number;
}

/** Prefixed console logger; quiet keeps only warnings and errors. */
export function cliLogger(quiet: boolean): Logger {
  const base = prefixedLogger("uploadbox", basicLogger());
  return quiet ? filteredLogger("warn", base) : base;
}

export async function startServer(
  options: CliOptions,
  logger: Logger = cliLogger(options.quiet),
): Promise<RunningServer> {
  const config = buildConfig(options);
  const server = createNodeServer({ config, logger });
  const port = await server.start();
  return { server, config, port };
}

export function bannerLines(config: ServerConfig, port: number): string[] {
  const wildcard = config.host === "0.0.0.0";
  const lines = [
    "",
    `  uploadbox serving ${config.uploadsDir}`,
    "",
    `  Local:   http://${wildcard ? "localhost" : config.host}:${port}`,
  ];
  if (wildcard) {
    lines.push(`  Network: http://0.0.0.0:${port}`);
  }
  lines.push(`  Workers: ${config.workers}`, "");
  return lines;
}
