import { TimeoutError } from 'ky';
import {
  EndpointConnectionError,
  NimbusError,
  ReadTimeoutError,
} from '../errors/index.js';
import type { HookEmitter } from '../hooks/index.js';
import type { OperationModel, ServiceModel } from '../model/index.js';
import {
  type ResponseParser,
  type ResponseParserFactory,
  requestUrl,
} from '../protocols/index.js';
import { HttpSession, type TransportSession } from '../transport/index.js';
import type {
  CallOptions,
  HttpResponseMeta,
  ParsedResponse,
  RequestRecord,
} from '../types/index.js';
import type { ResolvedConnectorOptions } from '../config.js';
import { createLogger } from '../utils/index.js';

const log = createLogger('endpoint');

/**
 * Read the whole response body, failing with `ReadTimeoutError` once
 * `timeout` milliseconds have passed
 */
async function readBody(response: Response, timeout: number, url: string): Promise<string> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new ReadTimeoutError(url)), Math.max(timeout, 0));
  });

  try {
    return await Promise.race([response.text(), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * What a client needs from an endpoint: a host to build URLs against, a
 * session to open and close, and a way to send a request.
 */
export interface EndpointHandle {
  readonly host: string;
  readonly session: TransportSession;

  /**
   * Sign, send and parse one request
   */
  makeRequest(
    operationModel: OperationModel,
    request: RequestRecord,
    options?: CallOptions,
  ): Promise<[HttpResponseMeta, ParsedResponse]>;
}

export interface EndpointOptions {
  events: HookEmitter;
  parser: ResponseParser;
  /**
   * [connect, read] timeouts in milliseconds
   */
  timeout: readonly [number, number];
}

export class Endpoint implements EndpointHandle {
  constructor(
    public readonly host: string,
    public readonly session: HttpSession,
    private readonly options: EndpointOptions,
  ) {}

  get timeout(): readonly [number, number] {
    return this.options.timeout;
  }

  async makeRequest(
    operationModel: OperationModel,
    request: RequestRecord,
    options: CallOptions = {},
  ): Promise<[HttpResponseMeta, ParsedResponse]> {
    options.signal?.throwIfAborted();

    const serviceName = operationModel.serviceModel.serviceName;
    this.options.events.emit(
      'request-created',
      { serviceName, operationName: operationModel.name, request },
      { service: serviceName, operation: operationModel.name },
    );

    const url = requestUrl(request);
    log.debug({ operation: operationModel.name, method: request.method, url }, 'Sending request');

    const readTimeout = this.options.timeout[1];
    const deadline = Date.now() + readTimeout;
    let response: Response;
    let body: string;
    try {
      response = await this.session.send(url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        timeout: readTimeout,
        signal: options.signal,
      });
      body = await readBody(response, deadline - Date.now(), url);
    } catch (error) {
      throw this.transportFault(error, url, options.signal);
    }

    const headers = Object.fromEntries(response.headers.entries());
    const httpResponse: HttpResponseMeta = { statusCode: response.status, headers, url };
    const parsed = this.options.parser.parse(
      { statusCode: response.status, headers, body },
      operationModel,
    );
    return [httpResponse, parsed];
  }

  private transportFault(error: unknown, url: string, signal?: AbortSignal): unknown {
    if (signal?.aborted || error instanceof NimbusError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new ReadTimeoutError(url, error);
    }
    if (error instanceof Error) {
      return new EndpointConnectionError(url, error);
    }
    return error;
  }
}

export interface CreateEndpointOptions {
  regionName: string | undefined;
  endpointUrl: string;
  verify?: boolean;
  responseParserFactory: ResponseParserFactory;
  timeout: readonly [number, number];
  connectorOptions: ResolvedConnectorOptions;
}

/**
 * Builds endpoints, each with its own HTTP session
 */
export class EndpointCreator {
  constructor(private readonly events: HookEmitter) {}

  createEndpoint(serviceModel: ServiceModel, options: CreateEndpointOptions): Endpoint {
    const session = new HttpSession({
      connectorOptions: options.connectorOptions,
      connectTimeout: options.timeout[0],
      readTimeout: options.timeout[1],
      verify: options.verify,
    });

    log.debug(
      { service: serviceModel.serviceName, endpointUrl: options.endpointUrl },
      'Creating endpoint',
    );
    return new Endpoint(options.endpointUrl, session, {
      events: this.events,
      parser: options.responseParserFactory(serviceModel.protocol),
      timeout: options.timeout,
    });
  }
}
