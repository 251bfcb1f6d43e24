export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Document root. Every served file must resolve inside it. */
  root: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max wait for the request bytes, and for the response write. Default: 5000ms */
  socketTimeoutMs: number;
  /** Size of the single request read; longer requests are truncated. Default: 4096 */
  readBufferSize: number;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    root,
    quiet: false,
    socketTimeoutMs: 5000,
    readBufferSize: 4096,
  };
}
