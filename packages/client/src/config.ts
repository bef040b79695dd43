import type { SecureContext } from 'node:tls';
import type { ZodError } from 'zod';
import { ConfigValidationError } from './errors/index.js';
import {
  CLIENT_CONFIG_TYPES,
  CONNECTOR_OPTION_TYPES,
  clientConfigSchema,
  connectorOptionsSchema,
} from './schemas/config.js';

/**
 * Idle keep-alive applied when none is given, in seconds.
 * Services drop idle connections after about 20 seconds, so the
 * transport's longer default would hand out dead sockets.
 */
export const DEFAULT_KEEPALIVE_TIMEOUT = 12;

export const DEFAULT_CONNECT_TIMEOUT = 60_000;
export const DEFAULT_READ_TIMEOUT = 60_000;

/**
 * Transport tuning options passed to the HTTP session
 */
export interface ConnectorOptions {
  /**
   * Seconds an idle keep-alive connection stays open
   * @default 12
   */
  keepAliveTimeout?: number;

  /**
   * Maximum number of connections per origin
   */
  limit?: number;

  /**
   * Close the connection after every response instead of reusing it
   */
  forceClose?: boolean;

  /**
   * Cache DNS lookups in process
   */
  useDnsCache?: boolean;

  /**
   * TLS context from `tls.createSecureContext()`
   */
  tlsContext?: SecureContext;
}

export type ResolvedConnectorOptions = ConnectorOptions & { keepAliveTimeout: number };

export type AddressingStyle = 'auto' | 'virtual' | 'path';

/**
 * Configuration options for a service client
 */
export interface ClientConfigOptions {
  regionName?: string;

  /**
   * Overrides the signature version chosen by the endpoint resolver
   */
  signatureVersion?: string;

  /**
   * Replaces the default User-Agent header
   */
  userAgent?: string;

  /**
   * Appended to the User-Agent header after a single space
   */
  userAgentExtra?: string;

  /**
   * Connect timeout in milliseconds
   * @default 60000
   */
  connectTimeout?: number;

  /**
   * Read timeout in milliseconds
   * @default 60000
   */
  readTimeout?: number;

  /**
   * Validate call parameters against the operation input shape
   * @default true
   */
  parameterValidation?: boolean;

  s3?: {
    addressingStyle?: AddressingStyle;
  };

  connectorOptions?: ConnectorOptions;
}

function toConfigValidationError(
  error: ZodError,
  expectedTypes: Record<string, string>,
  kind: string,
): ConfigValidationError {
  const [issue] = error.issues;
  if (issue?.code === 'unrecognized_keys') {
    const key = issue.keys[0] ?? '';
    return new ConfigValidationError(key, `invalid ${kind}: ${key}`);
  }

  const key = String(issue?.path[0] ?? '');
  const expected = expectedTypes[key];
  return new ConfigValidationError(
    key,
    expected ? `${key} value must be ${expected}` : `invalid ${kind}: ${key}`,
    expected,
  );
}

/**
 * Validate and normalize connector options.
 *
 * @throws {ConfigValidationError} on an unknown key or a wrongly typed value
 */
export function validateConnectorOptions(
  options?: ConnectorOptions,
): ResolvedConnectorOptions {
  const result = connectorOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw toConfigValidationError(result.error, CONNECTOR_OPTION_TYPES, 'connector option');
  }

  return {
    ...result.data,
    keepAliveTimeout: result.data.keepAliveTimeout ?? DEFAULT_KEEPALIVE_TIMEOUT,
  };
}

function withoutUndefined(options: ClientConfigOptions): ClientConfigOptions {
  const provided = { ...options };
  for (const key of Object.keys(provided)) {
    if (Reflect.get(provided, key) === undefined) {
      Reflect.deleteProperty(provided, key);
    }
  }
  return provided;
}

/**
 * Immutable client configuration.
 *
 * @example
 * ```typescript
 * const config = new ClientConfig({
 *   regionName: 'eu-west-1',
 *   readTimeout: 5000,
 *   connectorOptions: { limit: 50 },
 * });
 * ```
 */
export class ClientConfig {
  public readonly regionName?: string;
  public readonly signatureVersion?: string;
  public readonly userAgent?: string;
  public readonly userAgentExtra?: string;
  public readonly connectTimeout: number;
  public readonly readTimeout: number;
  public readonly parameterValidation: boolean;
  public readonly s3?: Readonly<{ addressingStyle?: AddressingStyle }>;
  public readonly connectorOptions: Readonly<ResolvedConnectorOptions>;

  private readonly userProvidedOptions: Readonly<ClientConfigOptions>;

  /**
   * @throws {ConfigValidationError} if any option is unknown or has the wrong type
   */
  constructor(options: ClientConfigOptions = {}) {
    const provided = withoutUndefined(options);
    const { connectorOptions, ...rest } = provided;

    const result = clientConfigSchema.safeParse(rest);
    if (!result.success) {
      throw toConfigValidationError(result.error, CLIENT_CONFIG_TYPES, 'config option');
    }

    this.userProvidedOptions = Object.freeze(provided);
    this.regionName = result.data.regionName;
    this.signatureVersion = result.data.signatureVersion;
    this.userAgent = result.data.userAgent;
    this.userAgentExtra = result.data.userAgentExtra;
    this.connectTimeout = result.data.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.readTimeout = result.data.readTimeout ?? DEFAULT_READ_TIMEOUT;
    this.parameterValidation = result.data.parameterValidation ?? true;
    this.s3 = result.data.s3 ? Object.freeze({ ...result.data.s3 }) : undefined;
    this.connectorOptions = Object.freeze(validateConnectorOptions(connectorOptions));

    Object.freeze(this);
  }

  /**
   * Options that were explicitly set when this config was created
   */
  get explicitOptions(): Readonly<ClientConfigOptions> {
    return this.userProvidedOptions;
  }

  /**
   * Create a new config where options explicitly set on `other` override
   * the ones of this config. Connector options are kept from this config
   * unless `other` sets its own.
   */
  merge(other: ClientConfig): ClientConfig {
    return new ClientConfig({
      ...this.userProvidedOptions,
      ...other.userProvidedOptions,
    });
  }
}
