import { PaginationError } from '../errors/index.js';
import { resumeTokenSchema } from '../schemas/pagination.js';

export interface DecodedToken {
  tokens: Record<string, unknown>;
  truncateAmount?: number;
}

/**
 * Opaque, URL-safe token a later `paginate` call can start from
 */
export function encodeResumeToken(tokens: Record<string, unknown>, truncateAmount?: number): string {
  const payload: DecodedToken = truncateAmount ? { tokens, truncateAmount } : { tokens };
  return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
}

/**
 * @throws {PaginationError} if the token was not produced by `encodeResumeToken`
 */
export function decodeResumeToken(token: string): DecodedToken {
  let value: unknown;
  try {
    value = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch (error) {
    throw new PaginationError(`Invalid starting token: ${token}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = resumeTokenSchema.safeParse(value);
  if (!result.success) {
    throw new PaginationError(`Invalid starting token: ${token}`);
  }
  return result.data;
}
