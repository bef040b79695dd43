import { describe, expect, it, vi } from 'vitest';
import { ClientConfig } from '../../src/config.js';
import { HookEmitter } from '../../src/hooks/index.js';
import type { RequestCreatedPayload } from '../../src/hooks/index.js';

function requestCreated(operationName = 'ListBuckets'): RequestCreatedPayload {
  return {
    serviceName: 's3',
    operationName,
    request: {
      urlPath: '/',
      queryString: {},
      method: 'GET',
      headers: {},
      url: 'https://storage.test/',
      context: { clientRegion: 'us-east-1', clientConfig: new ClientConfig(), hasStreamingInput: false },
    },
  };
}

describe('HookEmitter', () => {
  it('should run handlers in registration order', () => {
    const events = new HookEmitter();
    const calls: string[] = [];
    events.on('request-created', () => calls.push('first'));
    events.on('request-created', () => calls.push('second'));

    const invoked = events.emit('request-created', requestCreated());

    expect(invoked).toBe(2);
    expect(calls).toEqual(['first', 'second']);
  });

  it('should let handlers mutate the payload', () => {
    const events = new HookEmitter();
    events.on('request-created', ({ request }) => {
      request.headers['x-trace-id'] = 'trace-1';
    });

    const payload = requestCreated();
    events.emit('request-created', payload);

    expect(payload.request.headers).toEqual({ 'x-trace-id': 'trace-1' });
  });

  it('should only run handlers whose scope matches', () => {
    const events = new HookEmitter();
    const anyService = vi.fn();
    const storage = vi.fn();
    const listBuckets = vi.fn();
    events.on('request-created', anyService);
    events.on('request-created', storage, { service: 's3' });
    events.on('request-created', listBuckets, { service: 's3', operation: 'ListBuckets' });

    expect(events.emit('request-created', requestCreated(), { service: 'queue' })).toBe(1);
    expect(
      events.emit('request-created', requestCreated('GetObject'), {
        service: 's3',
        operation: 'GetObject',
      }),
    ).toBe(2);
    expect(
      events.emit('request-created', requestCreated(), { service: 's3', operation: 'ListBuckets' }),
    ).toBe(3);

    expect(anyService).toHaveBeenCalledTimes(3);
    expect(storage).toHaveBeenCalledTimes(2);
    expect(listBuckets).toHaveBeenCalledTimes(1);
  });

  it('should keep hook kinds apart', () => {
    const events = new HookEmitter();
    const handler = vi.fn();
    events.on('before-sign', handler);

    expect(events.emit('request-created', requestCreated())).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should unregister through the returned function', () => {
    const events = new HookEmitter();
    const handler = vi.fn();
    const unsubscribe = events.on('request-created', handler);

    unsubscribe();
    events.emit('request-created', requestCreated());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should unregister with off', () => {
    const events = new HookEmitter();
    const handler = vi.fn();
    events.on('request-created', handler);
    events.on('request-created', handler, { service: 's3' });

    events.off('request-created', handler);

    expect(events.emit('request-created', requestCreated(), { service: 's3' })).toBe(0);
  });

  it('should propagate handler errors', () => {
    const events = new HookEmitter();
    events.on('request-created', () => {
      throw new Error('handler failed');
    });

    expect(() => events.emit('request-created', requestCreated())).toThrow('handler failed');
  });

  it('should not run handlers registered during the same emit', () => {
    const events = new HookEmitter();
    const late = vi.fn();
    events.on('request-created', () => {
      events.on('request-created', late);
    });

    events.emit('request-created', requestCreated());
    expect(late).not.toHaveBeenCalled();

    events.emit('request-created', requestCreated());
    expect(late).toHaveBeenCalledTimes(1);
  });

  describe('copy', () => {
    it('should carry existing handlers into the copy', () => {
      const events = new HookEmitter();
      const handler = vi.fn();
      events.on('request-created', handler);

      events.copy().emit('request-created', requestCreated());

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should not share later registrations', () => {
      const events = new HookEmitter();
      const copy = events.copy();
      const onOriginal = vi.fn();
      const onCopy = vi.fn();
      events.on('request-created', onOriginal);
      copy.on('request-created', onCopy);

      expect(copy.emit('request-created', requestCreated())).toBe(1);
      expect(events.emit('request-created', requestCreated())).toBe(1);
      expect(onOriginal).toHaveBeenCalledTimes(1);
      expect(onCopy).toHaveBeenCalledTimes(1);
    });
  });
});
