import * as path from "node:path";
import type { ITcpSocket, ServerAddress } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponseMessage, ResponseOutcome, StatusCode } from "./types.js";
import { STATUS_TEXT, SUPPORTED_METHODS } from "./types.js";

const CRLF = "\r\n";
const HTTP_VERSION = "1.1";

export interface ResponseContext {
  /** Timestamp for the Date header. */
  date: Date;
  /** Address the listener is bound to, used to build redirect URLs. */
  server: ServerAddress;
  /** Loads the body of a file outcome. */
  readFile(path: string): Promise<Uint8Array>;
}

export interface SendResponseOptions {
  /** Reject if the write has not been flushed within this many ms. */
  timeoutMs?: number;
}

/** Format a date as an HTTP-date, e.g. "Sun, 06 Nov 1994 08:49:37 GMT". */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * The literal text after the last "." of a path's file name; "" when the
 * name has none. Directory names above the file never contribute.
 */
export function extensionOf(filePath: string): string {
  const name = path.basename(filePath);
  const dotIdx = name.lastIndexOf(".");
  return dotIdx === -1 ? "" : name.slice(dotIdx + 1);
}

export function statusLine(statusCode: StatusCode): string {
  return `HTTP/${HTTP_VERSION} ${statusCode} ${STATUS_TEXT[statusCode]}`;
}

/**
 * Turn a decided outcome into a response message. File outcomes read their
 * body through the context; a read failure rejects.
 */
export async function buildResponse(
  outcome: ResponseOutcome,
  context: ResponseContext,
): Promise<HttpResponseMessage> {
  const date = `Date: ${formatHttpDate(context.date)}`;

  switch (outcome.kind) {
    case "ok": {
      const body = await context.readFile(outcome.filePath);
      return {
        statusCode: 200,
        headerLines: [
          `Content-Length: ${body.length}`,
          `Content-Type: text/${extensionOf(outcome.filePath)}`,
          date,
          "Connection: close",
        ],
        body,
      };
    }
    case "redirect": {
      const { address, port } = context.server;
      return {
        statusCode: 301,
        headerLines: [
          `Location: http://${address}:${port}${outcome.target}/`,
          date,
          "Connection: close",
        ],
        body: new Uint8Array(0),
      };
    }
    case "notFound":
      return emptyResponse(404, [date, "Connection: close"]);
    case "methodNotAllowed":
      return emptyResponse(405, [date, `Allow: ${SUPPORTED_METHODS.join(", ")}`]);
    case "badRequest":
      return emptyResponse(400, [date, "Connection: close"]);
  }
}

function emptyResponse(
  statusCode: StatusCode,
  headerLines: string[],
): HttpResponseMessage {
  return { statusCode, headerLines, body: new Uint8Array(0) };
}

/**
 * Wire format: status line and header lines joined by CRLF, a blank line,
 * then the body bytes as they are.
 */
export function serializeResponse(message: HttpResponseMessage): Uint8Array {
  const lines = [statusLine(message.statusCode), ...message.headerLines, "", ""];
  return concat([fromString(lines.join(CRLF)), message.body]);
}

/**
 * Write a complete response in a single send.
 */
export async function sendResponse(
  socket: ITcpSocket,
  message: HttpResponseMessage,
  options?: SendResponseOptions,
): Promise<void> {
  const data = serializeResponse(message);
  if (!socket.sendAndWait) {
    socket.send(data);
    return;
  }

  const write = socket.sendAndWait(data);
  const timeoutMs = options?.timeoutMs;
  if (timeoutMs === undefined) {
    await write;
    return;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Response write timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    await Promise.race([write, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
