export { NimbusError } from './base.js';
export type { NimbusErrorOptions } from './base.js';
export {
  ClientCreationError,
  InvalidEndpointError,
  NoCredentialsError,
  NoRegionError,
  OperationNotPageableError,
  PaginationError,
  ResponseParserError,
  UnknownOperationError,
  UnknownServiceError,
  UnknownSignatureVersionError,
} from './client.js';
export {
  EndpointConnectionError,
  ReadTimeoutError,
  SessionClosedError,
} from './http.js';
export { ServiceError } from './service.js';
export {
  ConfigValidationError,
  InvalidServiceDescriptionError,
  ParamValidationError,
  ResponseValidationError,
} from './validation.js';
