import type { BaseClientConstructor } from '../client.js';
import type { OperationModel } from '../model/index.js';
import type { RequestSigner } from '../signing/index.js';
import type {
  ClientMethod,
  HttpResponseMeta,
  ParsedResponse,
  RequestContext,
  RequestRecord,
} from '../types/index.js';

/**
 * Hook kinds, in the order they fire during client creation and a call
 */
export const HookKind = {
  CreatingClientClass: 'creating-client-class',
  BeforeCall: 'before-call',
  RequestCreated: 'request-created',
  BeforeSign: 'before-sign',
  AfterCall: 'after-call',
} as const;

export type HookKind = (typeof HookKind)[keyof typeof HookKind];

export interface CreatingClientClassPayload {
  serviceName: string;
  /**
   * Generated methods keyed by method name; handlers may add or replace entries
   */
  methods: Record<string, ClientMethod>;
  /**
   * Class the client is instantiated from; handlers may substitute a subclass
   */
  baseClass: BaseClientConstructor;
}

export interface BeforeCallPayload {
  serviceName: string;
  operationName: string;
  model: OperationModel;
  params: RequestRecord;
  requestSigner: RequestSigner;
  context: RequestContext;
}

export interface RequestCreatedPayload {
  serviceName: string;
  operationName: string;
  request: RequestRecord;
}

export interface BeforeSignPayload {
  serviceName: string;
  operationName: string;
  request: RequestRecord;
  signatureVersion: string;
}

export interface AfterCallPayload {
  serviceName: string;
  operationName: string;
  httpResponse: HttpResponseMeta;
  parsed: ParsedResponse;
  model: OperationModel;
  context: RequestContext;
}

export interface HookPayloads {
  'creating-client-class': CreatingClientClassPayload;
  'before-call': BeforeCallPayload;
  'request-created': RequestCreatedPayload;
  'before-sign': BeforeSignPayload;
  'after-call': AfterCallPayload;
}

export type HookHandler<K extends HookKind> = (payload: HookPayloads[K]) => void;

/**
 * Restricts a handler to one service and, optionally, one operation.
 * Omitted fields match everything.
 */
export interface HookScope {
  service?: string;
  operation?: string;
}
