import type { ZodError } from 'zod';
import { NimbusError } from './base.js';

function formatIssues(validationErrors: ZodError): string {
  return validationErrors.issues
    .map((err) => {
      const path = err.path.map(String).join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join(', ');
}

/**
 * Call parameters did not match the operation's input shape.
 * Raised before anything is sent over the wire.
 */
export class ParamValidationError extends NimbusError {
  /**
   * Zod validation errors, when the failure came from the input schema
   */
  public readonly validationErrors?: ZodError;

  /**
   * Human readable summary of every problem found
   */
  public readonly report: string;

  constructor(report: string | ZodError) {
    const text = typeof report === 'string' ? report : formatIssues(report);
    super(`Parameter validation failed: ${text}`, { retryable: false });
    this.report = text;
    if (typeof report !== 'string') {
      this.validationErrors = report;
    }
  }
}

/**
 * Validation error when a service response doesn't match the operation's output shape
 * Not retryable - indicates API contract mismatch
 */
export class ResponseValidationError extends NimbusError {
  /**
   * Zod validation errors
   */
  public readonly validationErrors?: ZodError;

  constructor(message: string, validationErrors?: ZodError) {
    super(message, { retryable: false });
    this.validationErrors = validationErrors;
  }

  /**
   * Get a formatted string of validation errors
   */
  public getValidationDetails(): string {
    if (!this.validationErrors) {
      return this.message;
    }

    return `${this.message} - ${formatIssues(this.validationErrors)}`;
  }
}

/**
 * A connector option or client config value was rejected
 */
export class ConfigValidationError extends NimbusError {
  /**
   * Offending option name
   */
  public readonly key: string;

  /**
   * What the option should have been, e.g. "a boolean"
   */
  public readonly expectedType?: string;

  constructor(key: string, message: string, expectedType?: string) {
    super(message, { retryable: false });
    this.key = key;
    this.expectedType = expectedType;
  }
}

/**
 * A service description failed its structural checks
 */
export class InvalidServiceDescriptionError extends NimbusError {
  public readonly validationErrors?: ZodError;

  constructor(serviceName: string, validationErrors?: ZodError) {
    const details = validationErrors ? `: ${formatIssues(validationErrors)}` : '';
    super(`Invalid service description for "${serviceName}"${details}`);
    this.validationErrors = validationErrors;
  }
}
