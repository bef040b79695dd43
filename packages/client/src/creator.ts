import { ClientArgsCreator } from './args.js';
import { BaseClient, type ClientBlueprint } from './client.js';
import type { ClientConfig } from './config.js';
import {
  createDefaultEndpointRules,
  type EndpointResolver,
  type EndpointRuleRegistry,
  TemplateEndpointResolver,
} from './endpoint/index.js';
import { ClientCreationError, InvalidServiceDescriptionError } from './errors/index.js';
import { HookEmitter } from './hooks/index.js';
import type { CreatingClientClassPayload } from './hooks/index.js';
import { type Loader, ServiceModel, ServiceRegistry } from './model/index.js';
import type { ResponseParserFactory } from './protocols/index.js';
import { serviceDescriptionSchema } from './schemas/service.js';
import type { SigningAlgorithm } from './signing/index.js';
import type {
  Client,
  ClientMethod,
  Credentials,
  ScopedConfig,
  ServiceDescription,
} from './types/index.js';
import { createLogger, methodNameFor } from './utils/index.js';
import { VERSION } from './version.js';

const log = createLogger('creator');

export const DEFAULT_USER_AGENT = `nimbus-sdk/${VERSION} node/${process.versions.node}`;

export interface ClientCreatorOptions {
  /**
   * Where service names passed to `createClient` are looked up
   */
  loader?: Loader;
  endpointResolver?: EndpointResolver;
  /**
   * Hooks shared by every client; each client gets its own copy
   */
  events?: HookEmitter;
  userAgent?: string;
  endpointRules?: EndpointRuleRegistry;
  responseParserFactory?: ResponseParserFactory;
  signingAlgorithms?: ReadonlyMap<string, SigningAlgorithm>;
  /**
   * Base config; a config given to `createClient` is merged over it
   */
  defaultConfig?: ClientConfig;
}

export interface CreateClientOptions<D extends ServiceDescription> {
  /**
   * Service description, or the name of one known to the loader
   */
  service: D | string;
  apiVersion?: string;
  regionName?: string;
  /**
   * @default true
   */
  isSecure?: boolean;
  endpointUrl?: string;
  /**
   * Verify TLS certificates
   * @default true
   */
  verify?: boolean;
  credentials?: Credentials;
  /**
   * Loosely typed profile-style settings, e.g. `{ parameter_validation: 'false' }`
   */
  scopedConfig?: ScopedConfig;
  config?: ClientConfig;
}

function createApiMethod(operationName: string, methodName: string): ClientMethod {
  const method: ClientMethod = function (this: BaseClient, params = {}, options = {}) {
    return this.invoke(operationName, params, options);
  };
  Object.defineProperty(method, 'name', { value: methodName });
  return method;
}

function hasOperationMethods<D extends ServiceDescription>(
  client: BaseClient<D>,
  serviceModel: ServiceModel,
): client is Client<D> {
  return serviceModel.operationNames.every(
    (operationName) => typeof Reflect.get(client, methodNameFor(operationName)) === 'function',
  );
}

/**
 * Creates service clients.
 *
 * Method tables are generated once per service description and reused by
 * every client created from the same description.
 *
 * @example
 * ```typescript
 * const creator = new ClientCreator();
 * const storage = creator.createClient({
 *   service: storageService,
 *   regionName: 'us-east-1',
 *   credentials: { token: process.env.STORAGE_TOKEN },
 * });
 * const { Buckets } = await storage.listBuckets();
 * ```
 */
export class ClientCreator {
  public readonly events: HookEmitter;

  private readonly loader: Loader;
  private readonly endpointResolver: EndpointResolver;
  private readonly argsCreator: ClientArgsCreator;
  private readonly defaultConfig?: ClientConfig;
  private readonly blueprints = new WeakMap<ServiceDescription, ClientBlueprint>();

  constructor(options: ClientCreatorOptions = {}) {
    this.events = options.events ?? new HookEmitter();
    this.loader = options.loader ?? new ServiceRegistry();
    this.endpointResolver = options.endpointResolver ?? new TemplateEndpointResolver();
    this.defaultConfig = options.defaultConfig;
    this.argsCreator = new ClientArgsCreator({
      events: this.events,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      loader: this.loader,
      endpointRules: options.endpointRules ?? createDefaultEndpointRules(),
      responseParserFactory: options.responseParserFactory,
      signingAlgorithms: options.signingAlgorithms,
    });
  }

  /**
   * @throws {UnknownServiceError} if `service` is a name the loader does not know
   * @throws {InvalidServiceDescriptionError} if the description is malformed
   * @throws {NoRegionError} if neither a region nor an endpoint URL is available
   * @throws {ClientCreationError} if a generated method cannot be installed
   */
  createClient<D extends ServiceDescription>(options: CreateClientOptions<D>): Client<D> {
    const description =
      typeof options.service === 'string'
        ? this.loader.loadServiceModel(options.service, options.apiVersion)
        : options.service;
    const blueprint = this.getBlueprint(description);

    let config = options.config;
    if (this.defaultConfig) {
      config = config ? this.defaultConfig.merge(config) : this.defaultConfig;
    }

    const args = this.argsCreator.getClientArgs({
      serviceModel: blueprint.serviceModel,
      endpointResolver: this.endpointResolver,
      regionName: options.regionName,
      isSecure: options.isSecure ?? true,
      endpointUrl: options.endpointUrl,
      verify: options.verify,
      credentials: options.credentials,
      scopedConfig: options.scopedConfig,
      clientConfig: config,
    });

    const client = new blueprint.baseClass<D>(args, blueprint);
    if (!hasOperationMethods(client, blueprint.serviceModel)) {
      throw new ClientCreationError(
        `Client for "${blueprint.serviceModel.serviceName}" is missing generated operation methods`,
      );
    }

    log.debug(
      { service: blueprint.serviceModel.serviceName, endpointUrl: client.meta.endpointUrl },
      'Client created',
    );
    return client;
  }

  private getBlueprint(description: ServiceDescription): ClientBlueprint {
    const cached = this.blueprints.get(description);
    if (cached) {
      return cached;
    }

    const result = serviceDescriptionSchema.safeParse(description);
    if (!result.success) {
      throw new InvalidServiceDescriptionError(description.metadata.endpointPrefix, result.error);
    }

    const serviceModel = new ServiceModel(description);
    const serviceName = serviceModel.serviceName;
    const methods: Record<string, ClientMethod> = {};
    const methodToOperation = new Map<string, string>();
    for (const operationName of serviceModel.operationNames) {
      const methodName = methodNameFor(operationName);
      methods[methodName] = createApiMethod(operationName, methodName);
      methodToOperation.set(methodName, operationName);
    }

    const payload: CreatingClientClassPayload = { serviceName, methods, baseClass: BaseClient };
    this.events.emit('creating-client-class', payload, { service: serviceName });

    const blueprint: ClientBlueprint = {
      serviceModel,
      methods: Object.freeze({ ...payload.methods }),
      methodToOperation,
      baseClass: payload.baseClass,
    };
    this.blueprints.set(description, blueprint);
    return blueprint;
  }
}
