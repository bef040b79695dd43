export interface NimbusErrorOptions {
  retryable?: boolean;
  statusCode?: number;
  cause?: Error;
}

/**
 * Root of every error the client raises.
 *
 * Service errors (`ServiceError`) carry the HTTP status of the failed call.
 * Transport errors (`EndpointConnectionError`, `ReadTimeoutError`) keep the
 * underlying fault as `cause` and are marked retryable. Validation and
 * client-side errors are raised before anything is sent and are never
 * retryable.
 */
export class NimbusError extends Error {
  /** Set when sending the same request again may succeed */
  public readonly retryable: boolean;

  /** Status of the response that failed, when one arrived */
  public readonly statusCode?: number;

  public readonly cause?: Error;

  constructor(message: string, options: NimbusErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
    this.cause = options.cause;
    Error.captureStackTrace?.(this, new.target);
  }
}
