export interface CliOptions {
  uploadsDir: string;
  port: number;
  host: string;
  workers: number;
  templatesDir?: string;
  timeoutMs: number;
  quiet: boolean;
}

export type CliCommand =
  | { kind: "serve"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const DEFAULT_OPTIONS: CliOptions = {
  uploadsDir: "uploads",
  port: 7878,
  host: "127.0.0.1",
  workers: 4,
  timeoutMs: 0,
  quiet: false,
};

export const HELP_TEXT = `
uploadbox - share files through a tiny upload server

Usage: uploadbox [uploads-dir] [options]

Options:
  --port, -p <port>     Port to listen on (default: 7878)
  --host, -H <host>     Host to bind (default: 127.0.0.1)
  --workers, -w <n>     Connections handled at once (default: 4)
  --templates <dir>     Directory with the HTML templates
  --timeout <ms>        Give up on a request after this long (default: 0, never)
  --quiet, -q           Suppress request logging
  --version, -v         Show version
  --help, -h            Show this help
`;

function parseInteger(
  flag: string,
  value: string | undefined,
  min: number,
  max: number,
): number | string {
  if (value === undefined || !/^\d+$/.test(value)) {
    return `${flag} expects a number`;
  }
  const n = Number(value);
  if (n < min || n > max) {
    return `${flag} must be between ${min} and ${max}`;
  }
  return n;
}

export function parseArgs(args: readonly string[]): CliCommand {
  const options: CliOptions = { ...DEFAULT_OPTIONS };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const port = parseInteger("--port", args[++i], 0, 65535);
      if (typeof port === "string") return { kind: "error", message: port };
      options.port = port;
    } else if (arg === "--host" || arg === "-H") {
      const host = args[++i];
      if (!host) return { kind: "error", message: "--host expects a value" };
      options.host = host;
    } else if (arg === "--workers" || arg === "-w") {
      const workers = parseInteger("--workers", args[++i], 1, 1024);
      if (typeof workers === "string") return { kind: "error", message: workers };
      options.workers = workers;
    } else if (arg === "--templates") {
      const dir = args[++i];
      if (!dir) return { kind: "error", message: "--templates expects a directory" };
      options.templatesDir = dir;
    } else if (arg === "--timeout") {
      const timeout = parseInteger("--timeout", args[++i], 0, Number.MAX_SAFE_INTEGER);
      if (typeof timeout === "string") return { kind: "error", message: timeout };
      options.timeoutMs = timeout;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      options.uploadsDir = arg;
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "serve", options };
}
