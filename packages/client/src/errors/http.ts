import { NimbusError } from './base.js';

/**
 * Connection could not be established or was dropped mid-request
 * Retryable by default
 */
export class EndpointConnectionError extends NimbusError {
  public readonly endpointUrl: string;

  constructor(endpointUrl: string, cause?: Error) {
    super(`Could not connect to the endpoint URL: "${endpointUrl}"`, {
      retryable: true,
      cause,
    });
    this.endpointUrl = endpointUrl;
  }
}

/**
 * No complete response arrived within the read timeout
 * Retryable by default
 */
export class ReadTimeoutError extends NimbusError {
  public readonly endpointUrl: string;

  constructor(endpointUrl: string, cause?: Error) {
    super(`Read timeout on endpoint URL: "${endpointUrl}"`, {
      retryable: true,
      cause,
    });
    this.endpointUrl = endpointUrl;
  }
}

/**
 * The client's transport session was closed
 * Not retryable - the session has to be reopened first
 */
export class SessionClosedError extends NimbusError {
  constructor(message = 'The transport session is closed') {
    super(message, { retryable: false });
  }
}
