import type { z } from 'zod';
import type { BaseClient } from '../client.js';
import type { ParsedResponse, ResponseMetadata } from './request.js';
import type { OperationDefinition, ServiceDescription } from './service.js';

export interface CallOptions {
  /**
   * Aborts the in-flight request; the call rejects with the abort reason
   */
  signal?: AbortSignal;
}

export type OperationParams<Op> = Op extends { input: infer S extends z.ZodTypeAny }
  ? z.input<S>
  : Record<string, unknown>;

export type OperationResult<Op> = (Op extends { output: infer S extends z.ZodTypeAny }
  ? z.output<S>
  : Record<string, unknown>) & { ResponseMetadata: ResponseMetadata };

export type OperationMethod<Op extends OperationDefinition> = (
  params?: OperationParams<Op>,
  options?: CallOptions,
) => Promise<OperationResult<Op>>;

export type MethodName<D extends ServiceDescription> = Uncapitalize<
  keyof D['operations'] & string
>;

/**
 * One generated method per operation, named by uncapitalizing the operation
 * name (`ListBuckets` becomes `listBuckets`).
 */
export type OperationMethods<D extends ServiceDescription> = {
  [K in keyof D['operations'] & string as Uncapitalize<K>]: OperationMethod<
    D['operations'][K]
  >;
};

export type Client<D extends ServiceDescription = ServiceDescription> = BaseClient<D> &
  OperationMethods<D>;

/**
 * Untyped call wrapper stored in a client blueprint
 */
export type ClientMethod = (
  this: BaseClient,
  params?: Record<string, unknown>,
  options?: CallOptions,
) => Promise<ParsedResponse>;
