import { afterEach, describe, expect, it, vi } from 'vitest';
import { BaseClient } from '../../src/client.js';
import { ClientConfig } from '../../src/config.js';
import { ClientCreator, DEFAULT_USER_AGENT } from '../../src/creator.js';
import { TemplateEndpointResolver } from '../../src/endpoint/index.js';
import {
  ClientCreationError,
  InvalidServiceDescriptionError,
  NoRegionError,
  UnknownServiceError,
} from '../../src/errors/index.js';
import { HookEmitter } from '../../src/hooks/index.js';
import { ServiceRegistry } from '../../src/model/index.js';
import type { ServiceDescription } from '../../src/types/index.js';
import { queueService, storageService } from '../mocks/services.js';

class TracingClient<D extends ServiceDescription = ServiceDescription> extends BaseClient<D> {
  traced = true;
}

describe('ClientCreator', () => {
  const clients: BaseClient[] = [];

  function createCreator(events = new HookEmitter(), defaultConfig?: ClientConfig): ClientCreator {
    return new ClientCreator({
      events,
      defaultConfig,
      userAgent: 'nimbus-test/1.0',
      loader: new ServiceRegistry([storageService, queueService]),
      endpointResolver: new TemplateEndpointResolver({
        hostnameTemplate: '{service}.{region}.nimbus.test',
      }),
    });
  }

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.close()));
    clients.length = 0;
  });

  it('should generate one method per operation', () => {
    const client = createCreator().createClient({ service: storageService, regionName: 'us-east-1' });
    clients.push(client);

    expect(typeof client.listBuckets).toBe('function');
    expect(typeof client.listObjects).toBe('function');
    expect(typeof client.getObject).toBe('function');
    expect(typeof client.putObject).toBe('function');
    expect(typeof client.deleteBucket).toBe('function');
    expect(client.listBuckets.name).toBe('listBuckets');
    expect(client).toBeInstanceOf(BaseClient);
  });

  it('should resolve the endpoint and region', () => {
    const client = createCreator().createClient({ service: storageService, regionName: 'eu-west-1' });
    clients.push(client);

    expect(client.meta.endpointUrl).toBe('https://s3.eu-west-1.nimbus.test');
    expect(client.meta.regionName).toBe('eu-west-1');
    expect(client.meta.config.userAgent).toBe('nimbus-test/1.0');
  });

  it('should load a service by name', () => {
    const client = createCreator().createClient({ service: 'queue', regionName: 'us-east-1' });
    clients.push(client);

    expect(client.meta.serviceModel.serviceName).toBe('queue');
    expect(typeof Reflect.get(client, 'sendMessage')).toBe('function');
  });

  it('should reject an unknown service name', () => {
    expect(() => createCreator().createClient({ service: 'blob', regionName: 'us-east-1' })).toThrow(
      UnknownServiceError,
    );
  });

  it('should reject a malformed description', () => {
    const broken: ServiceDescription = {
      ...queueService,
      paginators: { ListTopics: { inputToken: 'NextToken', outputToken: 'NextToken' } },
    };

    expect(() => createCreator().createClient({ service: broken, regionName: 'us-east-1' })).toThrow(
      InvalidServiceDescriptionError,
    );
  });

  it('should require a region or an endpoint URL', () => {
    expect(() => createCreator().createClient({ service: storageService })).toThrow(NoRegionError);
  });

  it('should merge the client config over the default config', () => {
    const creator = createCreator(
      new HookEmitter(),
      new ClientConfig({ userAgentExtra: 'suite/1', readTimeout: 1000 }),
    );

    const client = creator.createClient({
      service: storageService,
      regionName: 'us-east-1',
      config: new ClientConfig({ readTimeout: 5000 }),
    });
    clients.push(client);

    expect(client.meta.config.readTimeout).toBe(5000);
    expect(client.meta.config.userAgent).toBe('nimbus-test/1.0 suite/1');
  });

  it('should create clients with independent sessions', async () => {
    const creator = createCreator();
    const first = creator.createClient({ service: storageService, regionName: 'us-east-1' });
    const second = creator.createClient({ service: storageService, regionName: 'us-east-1' });
    clients.push(first, second);

    await first.close();

    expect(first.httpSession.closed).toBe(true);
    expect(second.httpSession.closed).toBe(false);
  });

  describe('creating-client-class hook', () => {
    it('should fire once per service description', () => {
      const events = new HookEmitter();
      const handler = vi.fn();
      events.on('creating-client-class', handler, { service: 's3' });
      const creator = createCreator(events);

      clients.push(
        creator.createClient({ service: storageService, regionName: 'us-east-1' }),
        creator.createClient({ service: storageService, regionName: 'eu-west-1' }),
        creator.createClient({ service: queueService, regionName: 'us-east-1' }),
      );

      expect(handler).toHaveBeenCalledTimes(1);
      expect(Object.keys(handler.mock.calls[0]?.[0].methods)).toEqual([
        'listBuckets',
        'listObjects',
        'getObject',
        'putObject',
        'deleteBucket',
      ]);
    });

    it('should let handlers add methods', () => {
      const events = new HookEmitter();
      events.on('creating-client-class', ({ methods }) => {
        methods.ping = function () {
          return this.invoke('ListBuckets');
        };
      });

      const client = createCreator(events).createClient({
        service: storageService,
        regionName: 'us-east-1',
      });
      clients.push(client);

      expect(typeof Reflect.get(client, 'ping')).toBe('function');
    });

    it('should let handlers substitute the client class', () => {
      const events = new HookEmitter();
      events.on('creating-client-class', (payload) => {
        payload.baseClass = TracingClient;
      });

      const client = createCreator(events).createClient({
        service: storageService,
        regionName: 'us-east-1',
      });
      clients.push(client);

      expect(client).toBeInstanceOf(TracingClient);
      expect(typeof client.listBuckets).toBe('function');
    });

    it('should fail when a handler removes an operation method', () => {
      const events = new HookEmitter();
      events.on('creating-client-class', ({ methods }) => {
        delete methods.listBuckets;
      });

      expect(() =>
        createCreator(events).createClient({ service: storageService, regionName: 'us-east-1' }),
      ).toThrow(ClientCreationError);
    });
  });

  it('should identify itself in the default user agent', () => {
    expect(DEFAULT_USER_AGENT).toBe(`nimbus-sdk/0.1.0 node/${process.versions.node}`);
  });
});
