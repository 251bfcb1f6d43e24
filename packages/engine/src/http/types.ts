export interface ParsedRequest {
  readonly method: string;
  /** Raw request-target, always beginning with "/". */
  readonly target: string;
  /** Literal protocol token, e.g. "HTTP/1.1". */
  readonly version: string;
  /** Lower-cased header names; a repeated header keeps its last value. */
  readonly headers: ReadonlyMap<string, string>;
}

export interface ResolvedPath {
  absolutePath: string;
  existsAsFile: boolean;
  isWithinRoot: boolean;
}

/**
 * The decided response category for one request, before serialization.
 */
export type ResponseOutcome =
  | { kind: "ok"; filePath: string }
  | { kind: "redirect"; target: string }
  | { kind: "notFound" }
  | { kind: "methodNotAllowed" }
  | { kind: "badRequest" };

export interface HttpResponseMessage {
  statusCode: StatusCode;
  headerLines: string[];
  body: Uint8Array;
}

export const SUPPORTED_METHODS = ["GET"] as const;

export const STATUS_TEXT = {
  200: "OK",
  301: "Moved Permanently",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
} as const;

export type StatusCode = keyof typeof STATUS_TEXT;
