import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
} from "@plainget/engine";
import { DOCUMENT_ROOT_DIR, HELP_TEXT, parseArgs } from "./args.js";

async function readVersion(): Promise<string> {
  const raw = await fs.readFile(
    new URL("../package.json", import.meta.url),
    "utf8",
  );
  const pkg: unknown = JSON.parse(raw);
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
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

  const { options } = command;
  const root = path.resolve(DOCUMENT_ROOT_DIR);

  const base = prefixedLogger("plainget", basicLogger());
  const logger = options.quiet ? filteredLogger("warn", base) : base;

  const config = {
    ...defaultConfig(root),
    port: options.port,
    host: options.host,
    quiet: options.quiet,
  };

  const server = createNodeServer({ config, logger });
  server.on("error", (err) => logger.error("Server error:", err));

  const port = await server.start();

  console.log(`\n  plainget serving ${root}\n`);
  console.log(`  Local:   http://${config.host}:${port}\n`);

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
