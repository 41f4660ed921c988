import http from 'node:http';

import { RequestMethod } from '../common/consts.js';

export type RequestState = 'open' | 'body_consumed' | 'header_written' | 'closed';

/**
 * One in-flight HTTP exchange as the dispatcher sees it.
 */
export interface HttpExchange {
  readonly method: RequestMethod;
  readonly uri: string;
  readonly peer: string;
  readonly replySent: boolean;
  /**
   * Case-insensitive lookup. Absence is `[false, '']`, not an error.
   */
  getHeader(name: string): [present: boolean, value: string];
  /**
   * Resolves the body on the first call and `''` on every later call.
   */
  readBody(): Promise<string>;
  writeHeader(name: string, value: string): void;
  /**
   * Sends the reply. Callable once; the exchange must not be touched afterwards.
   */
  writeReply(status: number, body?: string): void;
}

export interface RequestFacadeOptions {
  maxRequestBytes?: number;
}

export class RequestStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestStateError';
  }
}

export class RequestBodyTooLargeError extends Error {
  public readonly maxRequestBytes: number;

  constructor(maxRequestBytes: number) {
    super(`request body too large (limit ${maxRequestBytes} bytes)`);
    this.name = 'RequestBodyTooLargeError';
    this.maxRequestBytes = maxRequestBytes;
  }
}

export function parseRequestMethod(method: string | undefined): RequestMethod {
  switch (method?.toUpperCase()) {
    case 'GET':
      return RequestMethod.Get;
    case 'POST':
      return RequestMethod.Post;
    case 'HEAD':
      return RequestMethod.Head;
    case 'PUT':
      return RequestMethod.Put;
    default:
      return RequestMethod.Unknown;
  }
}

export function formatPeer(req: http.IncomingMessage): string {
  const address = req.socket.remoteAddress ?? 'unknown';
  const port = req.socket.remotePort ?? 0;
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

/**
 * Wraps a node request/response pair so that the body is consumed once and the reply is written once.
 */
export class RequestFacade implements HttpExchange {
  public readonly method: RequestMethod;

  public readonly uri: string;

  public readonly peer: string;

  private readonly maxRequestBytes: number;

  private currentState: RequestState = 'open';

  private bodyConsumed = false;

  constructor(
    private readonly req: http.IncomingMessage,
    private readonly res: http.ServerResponse,
    options: RequestFacadeOptions = {},
  ) {
    this.method = parseRequestMethod(req.method);
    this.uri = req.url ?? '/';
    this.peer = formatPeer(req);
    this.maxRequestBytes = options.maxRequestBytes ?? Number.POSITIVE_INFINITY;
  }

  get state(): RequestState {
    return this.currentState;
  }

  get replySent(): boolean {
    return this.currentState === 'closed';
  }

  getHeader(name: string): [present: boolean, value: string] {
    this.assertOpen('getHeader');

    const value = this.req.headers[name.toLowerCase()];
    if (value === undefined) {
      return [false, ''];
    }

    return [true, Array.isArray(value) ? value.join(', ') : value];
  }

  async readBody(): Promise<string> {
    this.assertOpen('readBody');

    if (this.bodyConsumed) {
      return '';
    }

    this.bodyConsumed = true;
    this.currentState = 'body_consumed';

    const body = await this.collectBody();
    return body.toString('utf8');
  }

  writeHeader(name: string, value: string): void {
    this.assertOpen('writeHeader');

    this.res.setHeader(name, value);
    this.currentState = 'header_written';
  }

  /**
   * An empty body is replaced by the standard status text.
   */
  writeReply(status: number, body = ''): void {
    this.assertOpen('writeReply');

    this.currentState = 'closed';
    this.res.statusCode = status;
    this.res.end(body === '' ? (http.STATUS_CODES[status] ?? '') : body);
  }

  private assertOpen(operation: string): void {
    if (this.currentState === 'closed') {
      throw new RequestStateError(`${operation} called after the reply was sent`);
    }
  }

  /**
   * Buffers the body. Past the size limit the rest is drained and discarded so a reply can still be sent.
   */
  private collectBody(): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalBytes = 0;
      let overflow = false;
      let ended = false;

      const declaredBytes = Number.parseInt(this.req.headers['content-length'] ?? '', 10);
      if (Number.isFinite(declaredBytes) && declaredBytes > this.maxRequestBytes) {
        overflow = true;
        reject(new RequestBodyTooLargeError(this.maxRequestBytes));
      }

      this.req.on('data', (chunk: Buffer) => {
        if (overflow) {
          return;
        }

        totalBytes += chunk.length;
        if (totalBytes > this.maxRequestBytes) {
          overflow = true;
          chunks.length = 0;
          reject(new RequestBodyTooLargeError(this.maxRequestBytes));
          return;
        }

        chunks.push(chunk);
      });

      this.req.once('end', () => {
        ended = true;
        if (!overflow) {
          resolve(Buffer.concat(chunks));
        }
      });

      this.req.once('error', reject);

      this.req.once('close', () => {
        if (!ended) {
          reject(new Error('request aborted before the body was read'));
        }
      });
    });
  }
}
