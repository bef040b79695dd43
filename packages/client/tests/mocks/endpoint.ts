import type { EndpointHandle } from '../../src/endpoint/index.js';
import type { HookEmitter } from '../../src/hooks/index.js';
import type { OperationModel } from '../../src/model/index.js';
import {
  createParser,
  type RawHttpResponse,
  type ResponseParser,
  requestUrl,
} from '../../src/protocols/index.js';
import type { TransportSession } from '../../src/transport/index.js';
import type {
  CallOptions,
  HttpResponseMeta,
  ParsedResponse,
  RequestRecord,
} from '../../src/types/index.js';

export type Responder = (
  request: RequestRecord,
  options: CallOptions,
) => RawHttpResponse | Promise<RawHttpResponse>;

export class FakeSession implements TransportSession {
  closed = false;
  closeCount = 0;

  open(): void {
    this.closed = false;
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.closeCount++;
    }
  }
}

/**
 * In-process endpoint: answers with `respond` instead of the network
 */
export class FakeEndpoint implements EndpointHandle {
  readonly session = new FakeSession();
  readonly requests: RequestRecord[] = [];

  constructor(
    public readonly host: string,
    private readonly events: HookEmitter,
    private readonly respond: Responder,
    private readonly parser: ResponseParser = createParser('rest-json'),
  ) {}

  async makeRequest(
    operationModel: OperationModel,
    request: RequestRecord,
    options: CallOptions = {},
  ): Promise<[HttpResponseMeta, ParsedResponse]> {
    const serviceName = operationModel.serviceModel.serviceName;
    this.events.emit(
      'request-created',
      { serviceName, operationName: operationModel.name, request },
      { service: serviceName, operation: operationModel.name },
    );
    this.requests.push(request);

    const raw = await this.respond(request, options);
    const httpResponse: HttpResponseMeta = {
      statusCode: raw.statusCode,
      headers: raw.headers,
      url: requestUrl(request),
    };
    return [httpResponse, this.parser.parse(raw, operationModel)];
  }
}

export function jsonResponse(
  body: unknown,
  statusCode = 200,
  headers: Record<string, string> = {},
): RawHttpResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}
