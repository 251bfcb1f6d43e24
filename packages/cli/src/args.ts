export interface CliOptions {
  port: number;
  host: string;
  quiet: boolean;
}

export type CliCommand =
  | { kind: "serve"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export const DOCUMENT_ROOT_DIR = "www";

export function parseArgs(args: string[]): CliCommand {
  let port = 8080;
  let host = "127.0.0.1";
  let quiet = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const value = args[++i];
      port = value === undefined ? Number.NaN : Number(value);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        return { kind: "error", message: "Invalid port number" };
      }
    } else if (arg === "--host" || arg === "-H") {
      const value = args[++i];
      if (!value) {
        return { kind: "error", message: "--host needs a value" };
      }
      host = value;
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "serve", options: { port, host, quiet } };
}

export const HELP_TEXT = `
plainget - serve ./${DOCUMENT_ROOT_DIR} over HTTP (GET only)

Usage: plainget [options]

Options:
  --port, -p <port>    Port to listen on (default: 8080)
  --host, -H <host>    Host to bind (default: 127.0.0.1)
  --quiet, -q          Suppress request logging
  --version, -v        Show version
  --help, -h           Show this help
`;
