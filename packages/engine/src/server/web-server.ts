import type { ServerConfig } from "../config/server-config.js";
import {
  RequestReadError,
  readRequestBytes,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ServerAddress,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { StaticServer } from "./static-server.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Clock for the Date header. Defaults to the system clock. */
  now?: () => Date;
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
};

/**
 * Accepts connections and answers exactly one request on each before
 * closing it.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private boundAddress: ServerAddress | null = null;
  private staticServer: StaticServer;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.staticServer = new StaticServer({
      root: this.config.root,
      fs: options.fileSystem,
      logger: this.logger,
      now: options.now,
    });
  }

  /** Absolute document root every response is served from. */
  get root(): string {
    return this.staticServer.root;
  }

  /** Address the server is listening on, or null when stopped. */
  address(): ServerAddress | null {
    return this.boundAddress;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        void this.handleConnection(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        this.boundAddress = server.address() ?? {
          address: this.config.host,
          port: this.config.port,
        };
        const { port } = this.boundAddress;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;
      this.boundAddress = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const reading = readRequestBytes(socket, {
      maxBytes: this.config.readBufferSize,
      timeoutMs: this.config.socketTimeoutMs,
    });

    try {
      let data: Uint8Array;
      try {
        data = await reading;
      } catch (err) {
        if (err instanceof RequestReadError) {
          this.logger.debug(`Closing connection without a request: ${err.code}`);
        } else {
          this.logger.warn("Socket error before request:", err);
        }
        return;
      }

      const server = this.boundAddress ?? {
        address: this.config.host,
        port: this.config.port,
      };
      const { request, response } = await this.staticServer.handleRequest(
        data,
        server,
      );

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        const line = request ? `${request.method} ${request.target}` : "-";
        this.logger.info(`${line} - ${addr} ${response.statusCode}`);
      }

      await sendResponse(socket, response, {
        timeoutMs: this.config.socketTimeoutMs,
      });
    } catch (err) {
      this.logger.error("Connection error:", err);
    } finally {
      socket.close();
    }
  }
}
