import ky, { type KyInstance } from 'ky';
import { Agent, type Dispatcher } from 'undici';
import type { ResolvedConnectorOptions } from '../config.js';
import { SessionClosedError } from '../errors/index.js';
import type { HttpMethod, RequestBody } from '../types/index.js';
import { createLogger } from '../utils/index.js';
import { createCachedLookup } from './dns.js';

const log = createLogger('http-session');

/**
 * Open/close surface of a transport session, as seen by a client
 */
export interface TransportSession {
  readonly closed: boolean;
  open(): void;
  close(): Promise<void>;
}

export interface HttpSessionOptions {
  connectorOptions: ResolvedConnectorOptions;
  /**
   * Connect timeout in milliseconds
   */
  connectTimeout: number;
  /**
   * Longest wait for response headers, and between body chunks, in milliseconds
   */
  readTimeout: number;
  /**
   * Verify the server's TLS certificate
   * @default true
   */
  verify?: boolean;
}

export interface SendOptions {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: RequestBody;
  /**
   * Time allowed for the whole request, in milliseconds
   */
  timeout: number;
  signal?: AbortSignal;
}

/**
 * Connection pool plus HTTP client for one service client.
 *
 * The session is open when created. After `close()` every request fails
 * with `SessionClosedError` until `open()` is called again.
 */
export class HttpSession implements TransportSession {
  private dispatcher?: Dispatcher;
  private http?: KyInstance;

  constructor(private readonly options: HttpSessionOptions) {
    this.open();
  }

  get closed(): boolean {
    return this.http === undefined;
  }

  open(): void {
    if (this.http) {
      return;
    }

    const { connectorOptions, connectTimeout, readTimeout, verify = true } = this.options;
    const dispatcher = new Agent({
      keepAliveTimeout: connectorOptions.keepAliveTimeout * 1000,
      headersTimeout: readTimeout,
      bodyTimeout: readTimeout,
      connections: connectorOptions.limit,
      // No pipelining also means no keep-alive: one request per connection
      pipelining: connectorOptions.forceClose ? 0 : 1,
      connect: {
        timeout: connectTimeout,
        rejectUnauthorized: verify,
        secureContext: connectorOptions.tlsContext,
        lookup: connectorOptions.useDnsCache ? createCachedLookup() : undefined,
      },
    });

    this.dispatcher = dispatcher;
    this.http = ky.create({
      retry: 0,
      throwHttpErrors: false,
      fetch: (input, init) => fetch(input, { ...init, dispatcher }),
      hooks: {
        afterResponse: [
          (request, _options, response) => {
            log.debug(
              { method: request.method, url: request.url, status: response.status },
              'Received response',
            );
          },
        ],
      },
    });
    log.debug({ connectorOptions: { ...connectorOptions, tlsContext: undefined } }, 'Session opened');
  }

  /**
   * Close the connection pool. Closing a closed session does nothing.
   */
  async close(): Promise<void> {
    const { dispatcher } = this;
    if (!dispatcher) {
      return;
    }

    this.http = undefined;
    this.dispatcher = undefined;
    await dispatcher.close();
    log.debug('Session closed');
  }

  /**
   * Send one request. Redirects are not followed: a 3xx response is
   * returned as it is.
   *
   * @throws {SessionClosedError} if the session was closed
   */
  async send(url: string, options: SendOptions): Promise<Response> {
    if (!this.http) {
      throw new SessionClosedError();
    }

    return this.http(url, {
      method: options.method,
      headers: options.headers,
      body: options.body,
      timeout: options.timeout,
      signal: options.signal,
      redirect: 'manual',
    });
  }
}
