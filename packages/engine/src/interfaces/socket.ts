/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the server from the runtime's networking so the
 * connection handling can be driven by real Node sockets or in-memory pairs.
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve once it has been flushed to the runtime.
   * Rejects if the socket closes or errors before that happens.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;
}

export interface ServerAddress {
  address: string;
  port: number;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is bound to. */
  address(): ServerAddress | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  on(event: "error", cb: (err: Error) => void): void;

  /** Close the server. */
  close(callback?: () => void): void;
}

export interface ISocketFactory {
  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
