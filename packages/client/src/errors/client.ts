import { NimbusError } from './base.js';

export class UnknownOperationError extends NimbusError {
  public readonly operationName: string;

  constructor(operationName: string, serviceName: string) {
    super(`Operation "${operationName}" is not defined for service "${serviceName}"`);
    this.operationName = operationName;
  }
}

export class OperationNotPageableError extends NimbusError {
  public readonly operationName: string;

  constructor(operationName: string) {
    super(`Operation cannot be paginated: ${operationName}`);
    this.operationName = operationName;
  }
}

export class UnknownServiceError extends NimbusError {
  public readonly serviceName: string;

  constructor(serviceName: string, knownServices: string[]) {
    super(
      `Unknown service: "${serviceName}". Valid service names are: ${knownServices.join(', ') || '(none)'}`,
    );
    this.serviceName = serviceName;
  }
}

/**
 * The generated client could not be assembled from its blueprint
 */
export class ClientCreationError extends NimbusError {}

export class NoRegionError extends NimbusError {
  constructor() {
    super('You must specify a region.');
  }
}

export class InvalidEndpointError extends NimbusError {
  constructor(endpointUrl: string) {
    super(`Invalid endpoint: ${endpointUrl}`);
  }
}

export class NoCredentialsError extends NimbusError {
  constructor() {
    super('Unable to locate credentials');
  }
}

export class UnknownSignatureVersionError extends NimbusError {
  public readonly signatureVersion: string;

  constructor(signatureVersion: string) {
    super(`Unknown signature version: ${signatureVersion}`);
    this.signatureVersion = signatureVersion;
  }
}

export class PaginationError extends NimbusError {}

/**
 * The response body could not be decoded for the service's protocol
 */
export class ResponseParserError extends NimbusError {}
