import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ServerAddress,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  constructor(private socket: net.Socket) {}

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      // The callback fires once the data has been handed to the kernel.
      this.socket.write(data, (err) => {
        if (err) {
          fail(err);
          return;
        }
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      });
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    });
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    if (this.socket.destroyed) return;
    // Queued writes flush before the socket is torn down.
    this.socket.end(() => this.socket.destroy());
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server = net.createServer();

  listen(port: number, host?: string, callback?: () => void): void {
    this.server.listen(port, host, callback);
  }

  address(): ServerAddress | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object") {
      return { address: addr.address, port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    this.server.on(event, cb);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
