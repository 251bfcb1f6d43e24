// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  MalformedRequestCode,
  ReadRequestOptions,
  RequestReadErrorCode,
} from "./http/request-parser.js";
export {
  MalformedRequestError,
  parseRequest,
  RequestReadError,
  readRequestBytes,
} from "./http/request-parser.js";
export type {
  ResponseContext,
  SendResponseOptions,
} from "./http/response-writer.js";
export {
  buildResponse,
  extensionOf,
  formatHttpDate,
  sendResponse,
  serializeResponse,
  statusLine,
} from "./http/response-writer.js";
export type {
  HttpResponseMessage,
  ParsedRequest,
  ResolvedPath,
  ResponseOutcome,
  StatusCode,
} from "./http/types.js";
export { STATUS_TEXT, SUPPORTED_METHODS } from "./http/types.js";
// Interfaces
export type { IFileStat, IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ServerAddress,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export { decideOutcome } from "./server/decision-engine.js";
export type { PathResolverOptions } from "./server/path-resolver.js";
export {
  DEFAULT_DOCUMENT,
  endsInDotSegment,
  isDirectoryLike,
  isWithinRoot,
  PathResolver,
} from "./server/path-resolver.js";
export type {
  HandledRequest,
  StaticServerOptions,
} from "./server/static-server.js";
export { StaticServer } from "./server/static-server.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export type { InMemoryClient } from "./testing/in-memory-socket-factory.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
