/**
 * @nimbus-sdk/client - async clients for data-driven cloud service descriptions
 *
 * Describe a service once (operations, HTTP bindings, zod shapes, paginators)
 * and get a typed client whose generated methods are awaited, paginated with
 * `for await` and closed when done.
 *
 * @packageDocumentation
 */

// Client creation
export { ClientCreator, DEFAULT_USER_AGENT } from './creator.js';
export type { ClientCreatorOptions, CreateClientOptions } from './creator.js';
export { ClientArgsCreator, resolveParameterValidation } from './args.js';
export type { ClientArgs, ClientArgsCreatorOptions, ClientArgsInput } from './args.js';

// Execution engine
export { BaseClient } from './client.js';
export type { BaseClientConstructor, ClientBlueprint, ClientMeta } from './client.js';

// Configuration
export {
  ClientConfig,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_KEEPALIVE_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  validateConnectorOptions,
} from './config.js';
export type {
  AddressingStyle,
  ClientConfigOptions,
  ConnectorOptions,
  ResolvedConnectorOptions,
} from './config.js';

// Service models
export { OperationModel, ServiceModel, ServiceRegistry } from './model/index.js';
export type { Loader } from './model/index.js';

// Hooks
export { HookEmitter, HookKind } from './hooks/index.js';
export type {
  AfterCallPayload,
  BeforeCallPayload,
  BeforeSignPayload,
  CreatingClientClassPayload,
  HookHandler,
  HookPayloads,
  HookScope,
  RequestCreatedPayload,
} from './hooks/index.js';

// Endpoints and transport
export {
  createDefaultEndpointRules,
  Endpoint,
  EndpointCreator,
  EndpointRuleRegistry,
  isDnsCompatibleBucket,
  storageAddressingRule,
  TemplateEndpointResolver,
} from './endpoint/index.js';
export type {
  EndpointHandle,
  EndpointResolver,
  EndpointRule,
  EndpointRuleContext,
  ResolvedEndpoint,
  TemplateEndpointResolverOptions,
} from './endpoint/index.js';
export { createCachedLookup, HttpSession } from './transport/index.js';
export type { TransportSession } from './transport/index.js';

// Protocols and signing
export {
  createParser,
  createSerializer,
  JsonParser,
  JsonSerializer,
  RestJsonParser,
  RestJsonSerializer,
} from './protocols/index.js';
export type {
  RawHttpResponse,
  ResponseParser,
  ResponseParserFactory,
  Serializer,
} from './protocols/index.js';
export { DEFAULT_SIGNING_ALGORITHMS, RequestSigner, UNSIGNED } from './signing/index.js';
export type { SigningAlgorithm, SigningContext } from './signing/index.js';

// Pagination
export { decodeResumeToken, encodeResumeToken, PageIterator, Paginator } from './paginate/index.js';
export type {
  PageIteratorClass,
  PageIteratorInit,
  PageMethod,
  PaginationOptions,
  PaginatorOptions,
} from './paginate/index.js';

// Errors
export {
  ClientCreationError,
  ConfigValidationError,
  EndpointConnectionError,
  InvalidEndpointError,
  InvalidServiceDescriptionError,
  NimbusError,
  NoCredentialsError,
  NoRegionError,
  OperationNotPageableError,
  PaginationError,
  ParamValidationError,
  ReadTimeoutError,
  ResponseParserError,
  ResponseValidationError,
  ServiceError,
  SessionClosedError,
  UnknownOperationError,
  UnknownServiceError,
  UnknownSignatureVersionError,
} from './errors/index.js';

// Types
export { defineService } from './types/index.js';
export type {
  CallOptions,
  Client,
  ClientMethod,
  Credentials,
  ErrorDetails,
  HttpBinding,
  HttpMethod,
  HttpResponseMeta,
  MethodName,
  OperationDefinition,
  OperationMethod,
  OperationMethods,
  OperationParams,
  OperationResult,
  PaginatorDefinition,
  ParsedResponse,
  Protocol,
  RequestBody,
  RequestContext,
  RequestRecord,
  ResponseMetadata,
  ScopedConfig,
  SerializedRequest,
  ServiceDescription,
  ServiceMetadata,
} from './types/index.js';
