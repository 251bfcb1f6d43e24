import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import type { ParsedRequest } from "./types.js";

const CRLF = "\r\n";
const HEAD_TERMINATOR = "\r\n\r\n";
const HEADER_SEPARATOR = ": ";
const DEFAULT_READ_BUFFER_SIZE = 4096;
const DEFAULT_READ_TIMEOUT_MS = 5000;

export interface ReadRequestOptions {
  /** Bytes beyond this many in the first read are dropped. */
  maxBytes?: number;
  timeoutMs?: number;
}

export type RequestReadErrorCode = "IDLE_TIMEOUT" | "CONNECTION_CLOSED";

export class RequestReadError extends Error {
  constructor(
    readonly code: RequestReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RequestReadError";
  }
}

export type MalformedRequestCode =
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_TARGET"
  | "MALFORMED_HEADER_LINE";

export class MalformedRequestError extends Error {
  constructor(
    readonly code: MalformedRequestCode,
    message: string,
  ) {
    super(message);
    this.name = "MalformedRequestError";
  }
}

/**
 * Parse the bytes of one request read into a ParsedRequest.
 *
 * Everything after the first blank line is ignored. A buffer without a blank
 * line (a truncated read) is parsed as far as it goes.
 */
export function parseRequest(data: Uint8Array): ParsedRequest {
  const text = decodeToString(data).replace(/^(?:\r\n)+/, "");
  const headEnd = text.indexOf(HEAD_TERMINATOR);
  const head = headEnd === -1 ? text : text.slice(0, headEnd);
  const [requestLine, ...headerLines] = head.split(CRLF);

  const parts = requestLine.trim().split(/\s+/);
  if (parts.length !== 3) {
    throw new MalformedRequestError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: ${JSON.stringify(requestLine)}`,
    );
  }

  const [method, target, version] = parts;
  if (!target.startsWith("/")) {
    throw new MalformedRequestError(
      "MALFORMED_TARGET",
      `Request target must begin with "/": ${JSON.stringify(target)}`,
    );
  }

  const headers = new Map<string, string>();
  for (const line of headerLines) {
    if (line === "") continue;
    const separatorIdx = line.indexOf(HEADER_SEPARATOR);
    if (separatorIdx === -1) {
      throw new MalformedRequestError(
        "MALFORMED_HEADER_LINE",
        `Malformed header line: ${JSON.stringify(line)}`,
      );
    }
    const name = line.substring(0, separatorIdx).toLowerCase();
    const value = line.substring(separatorIdx + HEADER_SEPARATOR.length);
    headers.set(name, value);
  }

  return { method, target, version, headers };
}

/**
 * Collects the bytes of a connection's single read.
 *
 * Only the first chunk the socket delivers is used; anything that arrives
 * later is dropped, and a chunk larger than `maxBytes` is truncated.
 */
export class RequestReader {
  private firstChunk: Uint8Array | null = null;
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      if (this.firstChunk === null) {
        this.firstChunk = data;
      }
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  async read(options?: ReadRequestOptions): Promise<Uint8Array> {
    const maxBytes = options?.maxBytes ?? DEFAULT_READ_BUFFER_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

    if (this.firstChunk === null && !this.closed) {
      await this.waitForActivity(timeoutMs);
    }

    if (this.firstChunk !== null) {
      return this.firstChunk.subarray(0, maxBytes);
    }

    if (this.socketError) {
      throw this.socketError;
    }

    if (this.closed) {
      throw new RequestReadError("CONNECTION_CLOSED", "Connection closed");
    }

    throw new RequestReadError("IDLE_TIMEOUT", "Connection idle timed out");
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/**
 * Read the request bytes of one connection.
 */
export function readRequestBytes(
  socket: ITcpSocket,
  options?: ReadRequestOptions,
): Promise<Uint8Array> {
  return new RequestReader(socket).read(options);
}
