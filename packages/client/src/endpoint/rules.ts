import type { AddressingStyle, ClientConfig, ClientConfigOptions } from '../config.js';
import { addressingStyleSchema } from '../schemas/config.js';
import type { HookEmitter } from '../hooks/index.js';
import type { ScopedConfig } from '../types/index.js';
import { isRecord } from '../utils/index.js';

export interface EndpointRuleContext {
  serviceName: string;
  /**
   * Options the client's final config is built from; rules may add to them
   */
  configOptions: ClientConfigOptions;
  scopedConfig?: ScopedConfig;
  clientConfig?: ClientConfig;
  /**
   * Endpoint URL override given by the caller, if any
   */
  endpointUrl?: string;
  /**
   * The client's own emitter copy
   */
  events: HookEmitter;
}

/**
 * Service-specific adjustment applied before the endpoint is built
 */
export type EndpointRule = (context: EndpointRuleContext) => void;

export class EndpointRuleRegistry {
  private readonly rules = new Map<string, EndpointRule[]>();

  register(serviceName: string, rule: EndpointRule): this {
    const list = this.rules.get(serviceName) ?? [];
    list.push(rule);
    this.rules.set(serviceName, list);
    return this;
  }

  apply(context: EndpointRuleContext): void {
    for (const rule of this.rules.get(context.serviceName) ?? []) {
      rule(context);
    }
  }
}

const DNS_COMPATIBLE_BUCKET = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const IP_ADDRESS = /^\d+\.\d+\.\d+\.\d+$/;

/**
 * Whether a bucket name can be used as a hostname label
 */
export function isDnsCompatibleBucket(bucket: string, secure: boolean): boolean {
  if (!DNS_COMPATIBLE_BUCKET.test(bucket) || IP_ADDRESS.test(bucket) || bucket.includes('..')) {
    return false;
  }
  // Dotted names would not match a wildcard TLS certificate
  return !(secure && bucket.includes('.'));
}

function scopedAddressingStyle(scopedConfig?: ScopedConfig): AddressingStyle | undefined {
  const section = scopedConfig?.s3;
  if (!isRecord(section)) {
    return undefined;
  }
  const result = addressingStyleSchema.safeParse(section.addressing_style);
  return result.success ? result.data : undefined;
}

/**
 * Storage-service addressing: merges the addressing style from the scoped
 * config and the client config (the client config wins), and for virtual
 * addressing moves the bucket from the path into the hostname.
 *
 * `auto` means virtual addressing unless the caller gave an endpoint URL.
 */
export const storageAddressingRule: EndpointRule = (context) => {
  const style =
    context.clientConfig?.s3?.addressingStyle ??
    scopedAddressingStyle(context.scopedConfig) ??
    'auto';
  context.configOptions.s3 = { ...context.configOptions.s3, addressingStyle: style };

  const virtual = style === 'virtual' || (style === 'auto' && context.endpointUrl === undefined);
  if (!virtual) {
    return;
  }

  context.events.on(
    'before-call',
    ({ model, params }) => {
      if (!model.http.requestUri.startsWith('/{Bucket}')) {
        return;
      }

      const url = new URL(params.url);
      const [, encodedBucket = '', ...rest] = url.pathname.split('/');
      const bucket = decodeURIComponent(encodedBucket);
      if (!isDnsCompatibleBucket(bucket, url.protocol === 'https:')) {
        return;
      }

      url.hostname = `${bucket}.${url.hostname}`;
      url.pathname = `/${rest.join('/')}`;
      params.urlPath = url.pathname;
      params.url = url.toString();
    },
    { service: context.serviceName },
  );
};

/**
 * Registry with the built-in service rules
 */
export function createDefaultEndpointRules(): EndpointRuleRegistry {
  return new EndpointRuleRegistry().register('s3', storageAddressingRule);
}
