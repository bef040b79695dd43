import type { HookHandler, HookKind, HookPayloads, HookScope } from './types.js';

interface Registration<K extends HookKind> {
  handler: HookHandler<K>;
  scope: HookScope;
}

type RegistrationTable = {
  [K in HookKind]: Registration<K>[];
};

function emptyTable(): RegistrationTable {
  return {
    'creating-client-class': [],
    'before-call': [],
    'request-created': [],
    'before-sign': [],
    'after-call': [],
  };
}

function matches(registered: HookScope, emitted: HookScope): boolean {
  if (registered.service !== undefined && registered.service !== emitted.service) {
    return false;
  }
  if (registered.operation !== undefined && registered.operation !== emitted.operation) {
    return false;
  }
  return true;
}

/**
 * Typed publish/subscribe hub for client hooks.
 *
 * Handlers run synchronously, in registration order, and may mutate the
 * payload. An exception thrown by a handler propagates to the emitter.
 *
 * @example
 * ```typescript
 * events.on('before-call', ({ params }) => {
 *   params.headers['x-trace-id'] = traceId;
 * }, { service: 's3', operation: 'PutObject' });
 * ```
 */
export class HookEmitter {
  private readonly registrations: RegistrationTable;

  constructor(registrations: RegistrationTable = emptyTable()) {
    this.registrations = registrations;
  }

  /**
   * Register a handler. Returns a function that unregisters it.
   */
  on<K extends HookKind>(kind: K, handler: HookHandler<K>, scope: HookScope = {}): () => void {
    const list: Registration<K>[] = this.registrations[kind];
    list.push({ handler, scope });
    return () => this.off(kind, handler);
  }

  /**
   * Remove every registration of `handler` for `kind`
   */
  off<K extends HookKind>(kind: K, handler: HookHandler<K>): void {
    const list: Registration<K>[] = this.registrations[kind];
    for (let i = list.length - 1; i >= 0; i--) {
      if (list[i]?.handler === handler) {
        list.splice(i, 1);
      }
    }
  }

  /**
   * Run every handler of `kind` whose scope matches
   *
   * @returns number of handlers invoked
   */
  emit<K extends HookKind>(kind: K, payload: HookPayloads[K], scope: HookScope = {}): number {
    // Snapshot, so handlers registered while emitting wait for the next emit
    const list: Registration<K>[] = [...this.registrations[kind]];
    let invoked = 0;
    for (const { handler, scope: registered } of list) {
      if (matches(registered, scope)) {
        handler(payload);
        invoked++;
      }
    }
    return invoked;
  }

  /**
   * Independent copy: later registrations on either side are not shared
   */
  copy(): HookEmitter {
    return new HookEmitter({
      'creating-client-class': [...this.registrations['creating-client-class']],
      'before-call': [...this.registrations['before-call']],
      'request-created': [...this.registrations['request-created']],
      'before-sign': [...this.registrations['before-sign']],
      'after-call': [...this.registrations['after-call']],
    });
  }
}
