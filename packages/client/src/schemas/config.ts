import type { SecureContext } from 'node:tls';
import { z } from 'zod';

function isSecureContext(value: unknown): value is SecureContext {
  return typeof value === 'object' && value !== null && 'context' in value;
}

/**
 * Transport tuning options. The key set is closed.
 */
export const connectorOptionsSchema = z
  .object({
    keepAliveTimeout: z.number().positive().finite(),
    limit: z.number().int().positive(),
    forceClose: z.boolean(),
    useDnsCache: z.boolean(),
    tlsContext: z.custom<SecureContext>(isSecureContext),
  })
  .partial()
  .strict();

/**
 * Expected type of each connector option, as reported in validation errors
 */
export const CONNECTOR_OPTION_TYPES: Record<string, string> = {
  keepAliveTimeout: 'a positive number',
  limit: 'a positive integer',
  forceClose: 'a boolean',
  useDnsCache: 'a boolean',
  tlsContext: 'a tls.SecureContext instance',
};

/**
 * Storage-service addressing style
 */
export const addressingStyleSchema = z.enum(['auto', 'virtual', 'path']);

/**
 * Client config options other than the connector options
 */
export const clientConfigSchema = z
  .object({
    regionName: z.string().min(1),
    signatureVersion: z.string().min(1),
    userAgent: z.string(),
    userAgentExtra: z.string(),
    connectTimeout: z.number().int().positive(),
    readTimeout: z.number().int().positive(),
    parameterValidation: z.boolean(),
    s3: z
      .object({
        addressingStyle: addressingStyleSchema,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export const CLIENT_CONFIG_TYPES: Record<string, string> = {
  regionName: 'a non-empty string',
  signatureVersion: 'a non-empty string',
  userAgent: 'a string',
  userAgentExtra: 'a string',
  connectTimeout: 'a positive integer (milliseconds)',
  readTimeout: 'a positive integer (milliseconds)',
  parameterValidation: 'a boolean',
  s3: 'an object with an optional addressingStyle of auto, virtual or path',
};
