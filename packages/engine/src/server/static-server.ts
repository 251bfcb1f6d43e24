import {
  MalformedRequestError,
  parseRequest,
} from '../http/request-parser.js'
import { buildResponse, type ResponseContext } from '../http/response-writer.js'
import type { HttpResponseMessage, ParsedRequest, ResponseOutcome } from '../http/types.js'
import type { IFileSystem } from '../interfaces/filesystem.js'
import type { ServerAddress } from '../interfaces/socket.js'
import type { Logger } from '../logging/logger.js'
import { decideOutcome } from './decision-engine.js'
import { PathResolver } from './path-resolver.js'

export interface StaticServerOptions {
  root: string
  fs: IFileSystem
  logger?: Logger
  /** Clock for the Date header. Defaults to the system clock. */
  now?: () => Date
}

export interface HandledRequest {
  /** Absent when the bytes did not parse as a request. */
  request?: ParsedRequest
  outcome: ResponseOutcome
  response: HttpResponseMessage
}

export class StaticServer {
  readonly resolver: PathResolver
  private fs: IFileSystem
  private logger?: Logger
  private now: () => Date

  constructor(options: StaticServerOptions) {
    this.fs = options.fs
    this.resolver = new PathResolver({ root: options.root, fs: options.fs })
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
  }

  get root(): string {
    return this.resolver.root
  }

  /**
   * Turn the raw bytes of one request into the response to send back.
   */
  async handleRequest(data: Uint8Array, server: ServerAddress): Promise<HandledRequest> {
    const context: ResponseContext = {
      date: this.now(),
      server,
      readFile: (filePath) => this.fs.readFile(filePath),
    }

    let request: ParsedRequest
    try {
      request = parseRequest(data)
    } catch (err) {
      if (!(err instanceof MalformedRequestError)) throw err
      this.logger?.warn(`Rejecting malformed request (${err.code}): ${err.message}`)
      const outcome: ResponseOutcome = { kind: 'badRequest' }
      return { outcome, response: await buildResponse(outcome, context) }
    }

    let outcome: ResponseOutcome
    try {
      outcome = await decideOutcome(request, this.resolver)
    } catch (err) {
      this.logger?.error(`Error resolving ${request.target}:`, err)
      outcome = { kind: 'notFound' }
    }

    try {
      return { request, outcome, response: await buildResponse(outcome, context) }
    } catch (err) {
      // The file passed the existence check but could not be read.
      this.logger?.error(`Error reading ${request.target}:`, err)
      const notFound: ResponseOutcome = { kind: 'notFound' }
      return { request, outcome: notFound, response: await buildResponse(notFound, context) }
    }
  }
}
