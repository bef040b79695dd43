import { z } from 'zod';

/**
 * Decoded form of a pagination resume token
 */
export const resumeTokenSchema = z.object({
  tokens: z.record(z.unknown()),
  truncateAmount: z.number().int().nonnegative().optional(),
});
