import type { ClientConfig } from '../config.js';
import type { HttpMethod } from './service.js';

/**
 * Per-call state shared by serialization, hooks and dispatch
 */
export interface RequestContext {
  clientRegion: string | undefined;
  clientConfig: ClientConfig;
  hasStreamingInput: boolean;
}

export type RequestBody = string | Uint8Array;

/**
 * Transport-ready request produced by a serializer
 */
export interface SerializedRequest {
  urlPath: string;
  queryString: Record<string, string>;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: RequestBody;
}

/**
 * Serialized request bound to an endpoint host and a call context.
 * Hook handlers may mutate it in place.
 */
export interface RequestRecord extends SerializedRequest {
  url: string;
  context: RequestContext;
}

export interface HttpResponseMeta {
  statusCode: number;
  headers: Record<string, string>;
  url: string;
}

export interface ResponseMetadata {
  RequestId?: string;
  HTTPStatusCode: number;
  HTTPHeaders: Record<string, string>;
}

export interface ErrorDetails {
  Code: string;
  Message: string;
}

export type ParsedResponse = Record<string, unknown> & {
  ResponseMetadata?: ResponseMetadata;
  Error?: ErrorDetails;
};
