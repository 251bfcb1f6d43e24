import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ServerAddress,
} from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";

const DEFAULT_RESPONSE_TIMEOUT_MS = 1000;

class InMemoryTcpSocket implements ITcpSocket {
  remoteAddress?: string;

  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  static createPair(): [InMemoryTcpSocket, InMemoryTcpSocket] {
    const a = new InMemoryTcpSocket();
    const b = new InMemoryTcpSocket();
    a.peer = b;
    b.peer = a;
    a.remoteAddress = "in-memory";
    b.remoteAddress = "in-memory";
    return [a, b];
  }

  send(data: Uint8Array): void {
    if (this.closed || !this.peer || this.peer.closed) {
      return;
    }

    const copy = data.slice();
    queueMicrotask(() => {
      this.peer?.emitData(copy);
    });
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    return new Promise((resolve) => {
      this.send(data);
      // Queued behind the delivery above.
      queueMicrotask(resolve);
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
  }

  close(): void {
    this.closeInternal(false);
  }

  fail(err: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(err);
    }
    this.closeInternal(false);
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private closeInternal(fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(false);
    }

    if (!fromPeer && this.peer) {
      this.peer.closeInternal(true);
    }
  }
}

class InMemoryTcpServer implements ITcpServer {
  private listening = false;
  private host = "127.0.0.1";
  private port: number | null = null;
  private connectionCallbacks: Array<(socket: unknown) => void> = [];

  constructor(private readonly allocatePort: () => number) {}

  listen(port: number, host?: string, callback?: () => void): void {
    this.port = port === 0 ? this.allocatePort() : port;
    this.host = host ?? this.host;
    this.listening = true;
    queueMicrotask(() => callback?.());
  }

  address(): ServerAddress | null {
    if (!this.listening || this.port === null) {
      return null;
    }
    return { address: this.host, port: this.port };
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.connectionCallbacks.push(cb as (socket: unknown) => void);
    }
  }

  close(callback?: () => void): void {
    this.listening = false;
    this.port = null;
    queueMicrotask(() => callback?.());
  }

  isListening(): boolean {
    return this.listening;
  }

  accept(socket: InMemoryTcpSocket): void {
    if (!this.listening) {
      throw new Error("In-memory server is not listening");
    }
    for (const cb of this.connectionCallbacks) {
      cb(socket);
    }
  }
}

export interface InMemoryClient {
  /** Send bytes to the server side of the connection. */
  send(data: string | Uint8Array): void;
  /** Make the server side of the connection report a socket error. */
  fail(err: Error): void;
  /** Everything received, once the server closes the connection. */
  response: Promise<Uint8Array>;
}

export class InMemorySocketFactory implements ISocketFactory {
  private nextPort = 41000;
  private server: InMemoryTcpServer | null = null;

  createTcpServer(): ITcpServer {
    const server = new InMemoryTcpServer(() => this.nextPort++);
    this.server = server;
    return server;
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof InMemoryTcpSocket)) {
      throw new Error("Expected an InMemoryTcpSocket instance");
    }
    return socket;
  }

  /**
   * Open a connection to the listening server without sending anything yet.
   */
  connect(timeoutMs = DEFAULT_RESPONSE_TIMEOUT_MS): InMemoryClient {
    const server = this.server;
    if (!server || !server.isListening()) {
      throw new Error("In-memory server is not listening");
    }

    const [clientSocket, serverSocket] = InMemoryTcpSocket.createPair();

    const response = new Promise<Uint8Array>((resolve, reject) => {
      const chunks: Uint8Array[] = [];
      let done = false;

      const timeout = setTimeout(() => {
        if (done) return;
        done = true;
        reject(new Error("Timed out waiting for in-memory response"));
      }, timeoutMs);

      clientSocket.onData((data) => {
        chunks.push(data.slice());
      });
      clientSocket.onClose(() => {
        if (done) return;
        done = true;
        clearTimeout(timeout);
        resolve(concat(chunks));
      });
    });

    server.accept(serverSocket);

    return {
      send: (data) => {
        clientSocket.send(typeof data === "string" ? fromString(data) : data);
      },
      fail: (err) => serverSocket.fail(err),
      response,
    };
  }

  /** Send a raw request on a fresh connection and collect the response. */
  async request(rawHttp: string | Uint8Array): Promise<Uint8Array> {
    const client = this.connect();
    client.send(rawHttp);
    return client.response;
  }
}
