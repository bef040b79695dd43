import { z } from 'zod';

const pathListSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const zodSchema = z.custom<z.ZodTypeAny>((value) => value instanceof z.ZodType, {
  message: 'Expected a zod schema',
});

export const serviceMetadataSchema = z.object({
  serviceId: z.string().min(1),
  endpointPrefix: z.string().min(1),
  protocol: z.enum(['json', 'rest-json']),
  apiVersion: z.string().min(1),
  signingName: z.string().min(1).optional(),
  signatureVersion: z.string().min(1).optional(),
  targetPrefix: z.string().min(1).optional(),
  jsonVersion: z.string().min(1).optional(),
});

export const operationDefinitionSchema = z.object({
  http: z.object({
    method: z.enum(['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE']),
    requestUri: z.string().startsWith('/'),
    headers: z.record(z.string()).optional(),
    query: z.record(z.string()).optional(),
  }),
  input: zodSchema.optional(),
  output: zodSchema.optional(),
  streamingInput: z.string().min(1).optional(),
  deprecated: z.boolean().optional(),
  documentation: z.string().optional(),
});

export const paginatorDefinitionSchema = z.object({
  inputToken: pathListSchema,
  outputToken: pathListSchema,
  resultKey: pathListSchema.optional(),
  limitKey: z.string().min(1).optional(),
  moreResults: z.string().min(1).optional(),
});

/**
 * Structural check of a service description before it is registered
 */
export const serviceDescriptionSchema = z
  .object({
    metadata: serviceMetadataSchema,
    operations: z.record(operationDefinitionSchema),
    paginators: z.record(paginatorDefinitionSchema).optional(),
  })
  .superRefine((description, ctx) => {
    for (const name of Object.keys(description.paginators ?? {})) {
      if (!(name in description.operations)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['paginators', name],
          message: `Paginator refers to unknown operation "${name}"`,
        });
      }
    }
  });
