import { ClientConfig, type ClientConfigOptions } from './config.js';
import {
  type EndpointHandle,
  EndpointCreator,
  type EndpointResolver,
  type EndpointRuleRegistry,
} from './endpoint/index.js';
import type { HookEmitter } from './hooks/index.js';
import type { Loader, ServiceModel } from './model/index.js';
import {
  createParser,
  createSerializer,
  type ResponseParser,
  type ResponseParserFactory,
  type Serializer,
} from './protocols/index.js';
import { RequestSigner, type SigningAlgorithm } from './signing/index.js';
import type { Credentials, ScopedConfig } from './types/index.js';

/**
 * Collaborators a client is constructed from
 */
export interface ClientArgs {
  serializer: Serializer;
  endpoint: EndpointHandle;
  responseParser: ResponseParser;
  events: HookEmitter;
  requestSigner: RequestSigner;
  serviceModel: ServiceModel;
  loader: Loader;
  clientConfig: ClientConfig;
}

export interface ClientArgsInput {
  serviceModel: ServiceModel;
  endpointResolver: EndpointResolver;
  regionName?: string;
  isSecure: boolean;
  endpointUrl?: string;
  verify?: boolean;
  credentials?: Credentials;
  scopedConfig?: ScopedConfig;
  clientConfig?: ClientConfig;
}

export interface ClientArgsCreatorOptions {
  events: HookEmitter;
  userAgent: string;
  loader: Loader;
  endpointRules?: EndpointRuleRegistry;
  responseParserFactory?: ResponseParserFactory;
  signingAlgorithms?: ReadonlyMap<string, SigningAlgorithm>;
}

/**
 * Whether call parameters are validated. Either a client config with
 * `parameterValidation: false` or a scoped `parameter_validation` of
 * "false" (any case) turns validation off.
 */
export function resolveParameterValidation(
  clientConfig?: ClientConfig,
  scopedConfig?: ScopedConfig,
): boolean {
  if (clientConfig && !clientConfig.parameterValidation) {
    return false;
  }
  if (scopedConfig) {
    const raw = String(scopedConfig.parameter_validation ?? '');
    if (raw.toLowerCase() === 'false') {
      return false;
    }
  }
  return true;
}

/**
 * Assembles the collaborators of a client from the caller's options
 */
export class ClientArgsCreator {
  private readonly responseParserFactory: ResponseParserFactory;

  constructor(private readonly options: ClientArgsCreatorOptions) {
    this.responseParserFactory = options.responseParserFactory ?? createParser;
  }

  computeUserAgent(clientConfig?: ClientConfig): string {
    let userAgent = clientConfig?.userAgent ?? this.options.userAgent;
    if (clientConfig?.userAgentExtra !== undefined) {
      userAgent += ` ${clientConfig.userAgentExtra}`;
    }
    return userAgent;
  }

  /**
   * @throws {NoRegionError} if neither a region nor an endpoint URL is available
   * @throws {InvalidEndpointError} if the endpoint URL override is malformed
   * @throws {ConfigValidationError} if an endpoint rule produced an invalid option
   */
  getClientArgs(input: ClientArgsInput): ClientArgs {
    const { serviceModel, clientConfig, scopedConfig } = input;
    const serviceName = serviceModel.endpointPrefix;
    const protocol = serviceModel.protocol;

    const parameterValidation = resolveParameterValidation(clientConfig, scopedConfig);
    const serializer = createSerializer(protocol, parameterValidation);
    const events = this.options.events.copy();
    const responseParser = this.responseParserFactory(protocol);

    const endpointConfig = input.endpointResolver.resolve(
      serviceName,
      input.regionName,
      input.endpointUrl,
      input.isSecure,
    );
    const signingName = serviceModel.signingName ?? endpointConfig.signingName;
    const signatureVersion =
      clientConfig?.signatureVersion ??
      serviceModel.signatureVersion ??
      endpointConfig.signatureVersion;

    const requestSigner = new RequestSigner(
      serviceName,
      endpointConfig.signingRegion,
      signingName,
      signatureVersion,
      input.credentials,
      events,
      this.options.signingAlgorithms,
    );

    const configOptions: ClientConfigOptions = {
      regionName: endpointConfig.regionName,
      signatureVersion,
      userAgent: this.computeUserAgent(clientConfig),
      parameterValidation,
    };
    if (clientConfig) {
      configOptions.connectTimeout = clientConfig.connectTimeout;
      configOptions.readTimeout = clientConfig.readTimeout;
      configOptions.connectorOptions = clientConfig.connectorOptions;
    }

    this.options.endpointRules?.apply({
      serviceName,
      configOptions,
      scopedConfig,
      clientConfig,
      endpointUrl: input.endpointUrl,
      events,
    });

    const newConfig = new ClientConfig(configOptions);
    const endpoint = new EndpointCreator(events).createEndpoint(serviceModel, {
      regionName: endpointConfig.regionName,
      endpointUrl: endpointConfig.endpointUrl,
      verify: input.verify,
      responseParserFactory: this.responseParserFactory,
      timeout: [newConfig.connectTimeout, newConfig.readTimeout],
      connectorOptions: newConfig.connectorOptions,
    });

    return {
      serializer,
      endpoint,
      responseParser,
      events,
      requestSigner,
      serviceModel,
      loader: this.options.loader,
      clientConfig: newConfig,
    };
  }
}
