export type {
  CallOptions,
  Client,
  ClientMethod,
  MethodName,
  OperationMethod,
  OperationMethods,
  OperationParams,
  OperationResult,
} from './client.js';
export type { Credentials, ScopedConfig } from './credentials.js';
export type {
  ErrorDetails,
  HttpResponseMeta,
  ParsedResponse,
  RequestBody,
  RequestContext,
  RequestRecord,
  ResponseMetadata,
  SerializedRequest,
} from './request.js';
export type {
  HttpBinding,
  HttpMethod,
  OperationDefinition,
  PaginatorDefinition,
  Protocol,
  ServiceDescription,
  ServiceMetadata,
} from './service.js';
export { defineService } from './service.js';
