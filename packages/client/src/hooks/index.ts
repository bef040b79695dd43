export { HookEmitter } from './emitter.js';
export { HookKind } from './types.js';
export type {
  AfterCallPayload,
  BeforeCallPayload,
  BeforeSignPayload,
  CreatingClientClassPayload,
  HookHandler,
  HookPayloads,
  HookScope,
  RequestCreatedPayload,
} from './types.js';
