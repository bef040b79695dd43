import type { ClientArgs } from './args.js';
import type { ClientConfig } from './config.js';
import type { EndpointHandle } from './endpoint/index.js';
import {
  ClientCreationError,
  OperationNotPageableError,
  ServiceError,
  SessionClosedError,
} from './errors/index.js';
import type { HookEmitter } from './hooks/index.js';
import type { OperationModel, ServiceModel } from './model/index.js';
import { Paginator, type PaginatorOptions } from './paginate/index.js';
import { prepareRequestRecord, type Serializer } from './protocols/index.js';
import type { RequestSigner } from './signing/index.js';
import type { TransportSession } from './transport/index.js';
import type {
  CallOptions,
  ClientMethod,
  MethodName,
  ParsedResponse,
  RequestContext,
  RequestRecord,
  ServiceDescription,
} from './types/index.js';
import { createLogger, type Logger } from './utils/index.js';

/**
 * Everything generated once per service and shared by its client instances
 */
export interface ClientBlueprint {
  serviceModel: ServiceModel;
  methods: Readonly<Record<string, ClientMethod>>;
  /**
   * Generated method name -> operation name
   */
  methodToOperation: ReadonlyMap<string, string>;
  baseClass: BaseClientConstructor;
}

export type BaseClientConstructor = new <D extends ServiceDescription = ServiceDescription>(
  args: ClientArgs,
  blueprint: ClientBlueprint,
) => BaseClient<D>;

export interface ClientMeta {
  serviceModel: ServiceModel;
  regionName: string | undefined;
  endpointUrl: string;
  config: ClientConfig;
  events: HookEmitter;
  methodToOperation: ReadonlyMap<string, string>;
}

/**
 * Runtime client for one service.
 *
 * Generated operation methods all go through {@link BaseClient.invoke}.
 * The transport session is open once the client is created; `close()`
 * (or leaving `use()`) closes it and `open()` reopens it.
 *
 * @example
 * ```typescript
 * const client = creator.createClient({ service: storageService, regionName: 'us-east-1' });
 * await client.use(async (storage) => {
 *   const { Buckets } = await storage.listBuckets();
 * });
 * ```
 */
export class BaseClient<D extends ServiceDescription = ServiceDescription> {
  public readonly meta: ClientMeta;

  protected readonly serializer: Serializer;
  protected readonly endpoint: EndpointHandle;
  protected readonly requestSigner: RequestSigner;
  protected readonly serviceModel: ServiceModel;
  protected readonly log: Logger;

  constructor(args: ClientArgs, blueprint: ClientBlueprint) {
    this.serializer = args.serializer;
    this.endpoint = args.endpoint;
    this.requestSigner = args.requestSigner;
    this.serviceModel = args.serviceModel;
    this.log = createLogger('client').child({ service: args.serviceModel.serviceName });
    this.meta = {
      serviceModel: args.serviceModel,
      regionName: args.clientConfig.regionName,
      endpointUrl: args.endpoint.host,
      config: args.clientConfig,
      events: args.events,
      methodToOperation: blueprint.methodToOperation,
    };

    for (const [name, method] of Object.entries(blueprint.methods)) {
      if (name in this) {
        throw new ClientCreationError(
          `Method "${name}" of service "${this.serviceModel.serviceName}" would shadow a client member`,
        );
      }
      Object.defineProperty(this, name, {
        value: method.bind(this),
        enumerable: true,
        configurable: true,
        writable: false,
      });
    }

    this.registerHandlers();
  }

  get httpSession(): TransportSession {
    return this.endpoint.session;
  }

  /**
   * Call an operation by its description name.
   *
   * @throws {SessionClosedError} if the transport session is closed
   * @throws {UnknownOperationError} if the service has no such operation
   * @throws {ParamValidationError} if the params fail validation
   * @throws {ServiceError} if the service answers with a status of 300 or above
   */
  async invoke(
    operationName: string,
    params: Record<string, unknown> = {},
    options: CallOptions = {},
  ): Promise<ParsedResponse> {
    if (this.httpSession.closed) {
      throw new SessionClosedError(
        `Cannot call ${operationName}: the client's transport session is closed`,
      );
    }

    const operationModel = this.serviceModel.operationModel(operationName);
    if (operationModel.deprecated) {
      this.log.warn({ operation: operationName }, 'Calling a deprecated operation');
    }

    const context: RequestContext = {
      clientRegion: this.meta.regionName,
      clientConfig: this.meta.config,
      hasStreamingInput: operationModel.hasStreamingInput,
    };
    const request = this.convertToRequestRecord(params, operationModel, context);

    const serviceName = this.serviceModel.endpointPrefix;
    const scope = { service: serviceName, operation: operationName };
    this.meta.events.emit(
      'before-call',
      {
        serviceName,
        operationName,
        model: operationModel,
        params: request,
        requestSigner: this.requestSigner,
        context,
      },
      scope,
    );

    this.log.debug({ operation: operationName }, 'Dispatching request');
    const [httpResponse, parsed] = await this.endpoint.makeRequest(
      operationModel,
      request,
      options,
    );

    this.meta.events.emit(
      'after-call',
      {
        serviceName,
        operationName,
        httpResponse,
        parsed,
        model: operationModel,
        context,
      },
      scope,
    );

    if (httpResponse.statusCode >= 300) {
      throw new ServiceError(parsed, operationName);
    }
    return parsed;
  }

  /**
   * Whether a generated method's operation has a paginator
   */
  canPaginate(methodName: string): boolean {
    const operationName = this.meta.methodToOperation.get(methodName);
    return operationName !== undefined && this.serviceModel.paginatorFor(operationName) !== undefined;
  }

  /**
   * Create a paginator for a generated method, e.g. `getPaginator('listBuckets')`.
   *
   * @throws {OperationNotPageableError} if the operation is not pageable
   */
  getPaginator(methodName: MethodName<D>, options: PaginatorOptions = {}): Paginator {
    const operationName = this.meta.methodToOperation.get(methodName);
    const definition =
      operationName === undefined ? undefined : this.serviceModel.paginatorFor(operationName);
    if (operationName === undefined || definition === undefined) {
      throw new OperationNotPageableError(methodName);
    }

    return new Paginator(
      (params, callOptions) => this.invoke(operationName, params, callOptions),
      definition,
      options,
    );
  }

  /**
   * Open the transport session if it is not open
   */
  async open(): Promise<this> {
    this.httpSession.open();
    return this;
  }

  /**
   * Close the transport session. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    await this.httpSession.close();
  }

  /**
   * Run `fn` with the session open and close it afterwards, even if `fn` throws
   */
  async use<T>(fn: (client: this) => Promise<T>): Promise<T> {
    await this.open();
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  protected convertToRequestRecord(
    params: Record<string, unknown>,
    operationModel: OperationModel,
    context: RequestContext,
  ): RequestRecord {
    const serialized = this.serializer.build(params, operationModel, context);
    return prepareRequestRecord(serialized, {
      endpointUrl: this.endpoint.host,
      userAgent: this.meta.config.userAgent,
      context,
    });
  }

  private registerHandlers(): void {
    this.meta.events.on(
      'request-created',
      ({ operationName, request }) => this.requestSigner.sign(operationName, request),
      { service: this.serviceModel.serviceName },
    );
  }
}
