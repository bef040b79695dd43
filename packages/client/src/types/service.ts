import type { z } from 'zod';

/**
 * Wire protocol family of a service
 */
export type Protocol = 'json' | 'rest-json';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Where an operation's parameters go on the wire.
 *
 * `requestUri` may contain `{Label}` and greedy `{Label+}` placeholders.
 * `headers` and `query` map parameter names to header / query-string names.
 */
export interface HttpBinding {
  method: HttpMethod;
  requestUri: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
}

export interface OperationDefinition {
  http: HttpBinding;
  input?: z.ZodTypeAny;
  output?: z.ZodTypeAny;
  /**
   * Parameter whose value is sent as the raw request body
   */
  streamingInput?: string;
  deprecated?: boolean;
  documentation?: string;
}

/**
 * Token and result locations are dotted paths into the input/output objects.
 */
export interface PaginatorDefinition {
  inputToken: string | readonly string[];
  outputToken: string | readonly string[];
  resultKey?: string | readonly string[];
  limitKey?: string;
  moreResults?: string;
}

export interface ServiceMetadata {
  serviceId: string;
  endpointPrefix: string;
  protocol: Protocol;
  apiVersion: string;
  signingName?: string;
  signatureVersion?: string;
  /**
   * `json` protocol only: prefix of the target header value
   */
  targetPrefix?: string;
  jsonVersion?: string;
}

export interface ServiceDescription {
  metadata: ServiceMetadata;
  operations: Record<string, OperationDefinition>;
  paginators?: Record<string, PaginatorDefinition>;
}

/**
 * Identity helper that keeps the literal operation names and schemas of a
 * description, so that clients created from it are fully typed.
 */
export function defineService<D extends ServiceDescription>(description: D): D {
  return description;
}
