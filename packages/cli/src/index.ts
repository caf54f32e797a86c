#!/usr/bin/env -S node --import tsx
import * as fs from "node:fs/promises";
import { HELP_TEXT, parseArgs } from "./args.js";
import { bannerLines, startServer } from "./serve.js";

async function readVersion(): Promise<string> {
  const raw = await fs.readFile(new URL("../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(await readVersion());
      return;
    case "error":
      console.error(command.message);
      console.log(HELP_TEXT);
      process.exitCode = 1;
      return;
    case "serve":
      break;
  }

  const { server, config, port } = await startServer(command.options);
  console.log(bannerLines(config, port).join("\n"));

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
