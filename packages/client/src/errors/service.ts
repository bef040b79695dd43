import type { ParsedResponse } from '../types/index.js';
import { NimbusError } from './base.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/**
 * The service answered with a status code of 300 or above.
 *
 * `retryable` is a hint for callers; this layer never retries.
 */
export class ServiceError extends NimbusError {
  /**
   * Parsed error body, including `Error` and `ResponseMetadata`
   */
  public readonly response: ParsedResponse;

  public readonly operationName: string;

  /**
   * Service error code, e.g. "NoSuchBucket"
   */
  public readonly code: string;

  constructor(response: ParsedResponse, operationName: string) {
    const code = response.Error?.Code ?? 'Unknown';
    const detail = response.Error?.Message || 'Unknown';
    const statusCode = response.ResponseMetadata?.HTTPStatusCode;

    super(
      `An error occurred (${code}) when calling the ${operationName} operation: ${detail}`,
      {
        retryable: statusCode !== undefined && RETRYABLE_STATUS_CODES.has(statusCode),
        statusCode,
      },
    );
    this.response = response;
    this.operationName = operationName;
    this.code = code;
  }
}
