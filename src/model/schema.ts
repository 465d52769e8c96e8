/**
 * Schemas for the declarative inputs the framework consumes: service
 * descriptions, pagination configs and waiter configs.
 *
 * @module model/schema
 */

import { z } from 'zod';

/**
 * Reference from a member, list element, map key or operation to a named shape.
 */
export const ShapeRefSchema = z
  .object({
    shape: z.string().min(1),
    location: z.enum(['uri', 'querystring', 'header', 'headers', 'statusCode']).optional(),
    locationName: z.string().min(1).optional(),
    flattened: z.boolean().optional(),
    resultWrapper: z.string().min(1).optional(),
    documentation: z.string().optional(),
  })
  .passthrough();

export type ShapeRef = z.infer<typeof ShapeRefSchema>;

export const SHAPE_TYPES = [
  'structure',
  'list',
  'map',
  'string',
  'integer',
  'long',
  'float',
  'double',
  'boolean',
  'timestamp',
  'blob',
] as const;

export type ShapeType = (typeof SHAPE_TYPES)[number];

export const ShapeDefinitionSchema = z
  .object({
    type: z.enum(SHAPE_TYPES),
    members: z.record(ShapeRefSchema).optional(),
    required: z.array(z.string()).optional(),
    member: ShapeRefSchema.optional(),
    key: ShapeRefSchema.optional(),
    value: ShapeRefSchema.optional(),
    flattened: z.boolean().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    enum: z.array(z.string()).optional(),
    pattern: z.string().optional(),
    payload: z.string().optional(),
    exception: z.boolean().optional(),
    error: z
      .object({
        code: z.string().optional(),
        httpStatusCode: z.number().int().optional(),
        senderFault: z.boolean().optional(),
      })
      .optional(),
    timestampFormat: z.enum(['iso8601', 'unixTimestamp', 'rfc822']).optional(),
    documentation: z.string().optional(),
  })
  .passthrough()
  .superRefine((shape, ctx) => {
    if (shape.type === 'list' && !shape.member) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'list shapes require "member"' });
    }
    if (shape.type === 'map' && (!shape.key || !shape.value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'map shapes require "key" and "value"' });
    }
  });

export type ShapeDefinition = z.infer<typeof ShapeDefinitionSchema>;

export const PROTOCOLS = ['json', 'rest-json', 'query'] as const;

export type Protocol = (typeof PROTOCOLS)[number];

export const OperationDefinitionSchema = z
  .object({
    name: z.string().min(1),
    http: z
      .object({
        method: z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD']).default('POST'),
        requestUri: z.string().default('/'),
        responseCode: z.number().int().optional(),
      })
      .default({}),
    input: ShapeRefSchema.optional(),
    output: ShapeRefSchema.optional(),
    errors: z.array(ShapeRefSchema).optional(),
    deprecated: z.boolean().optional(),
    documentation: z.string().optional(),
  })
  .passthrough();

export type OperationDefinition = z.infer<typeof OperationDefinitionSchema>;

export const ServiceMetadataSchema = z
  .object({
    apiVersion: z.string().min(1),
    endpointPrefix: z.string().min(1),
    protocol: z.string().min(1),
    signatureVersion: z.string().min(1).default('v4'),
    signingName: z.string().min(1).optional(),
    serviceFullName: z.string().optional(),
    serviceId: z.string().optional(),
    targetPrefix: z.string().optional(),
    jsonVersion: z.string().optional(),
    xmlNamespace: z.string().optional(),
  })
  .passthrough();

export type ServiceMetadata = z.infer<typeof ServiceMetadataSchema>;

export const ServiceDescriptionSchema = z.object({
  version: z.string().optional(),
  metadata: ServiceMetadataSchema,
  operations: z.record(OperationDefinitionSchema),
  shapes: z.record(ShapeDefinitionSchema).default({}),
  documentation: z.string().optional(),
});

export type ServiceDescription = z.infer<typeof ServiceDescriptionSchema>;

/**
 * Input form of a service description (before defaults are applied).
 */
export type ServiceDescriptionInput = z.input<typeof ServiceDescriptionSchema>;

const TokenSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const PaginatorDefinitionSchema = z.object({
  inputToken: TokenSchema,
  outputToken: TokenSchema,
  resultKey: TokenSchema.optional(),
  limitKey: z.string().min(1).optional(),
  moreResults: z.string().min(1).optional(),
});

export type PaginatorDefinition = z.infer<typeof PaginatorDefinitionSchema>;

export const PaginationConfigSchema = z.object({
  pagination: z.record(PaginatorDefinitionSchema),
});

export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;

export const AcceptorSchema = z.object({
  state: z.enum(['success', 'failure', 'retry']),
  matcher: z.string().min(1),
  expected: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  argument: z.string().optional(),
});

export type AcceptorDefinition = z.infer<typeof AcceptorSchema>;

export const WaiterDefinitionSchema = z.object({
  operation: z.string().min(1),
  delay: z.number().nonnegative(),
  maxAttempts: z.number().int().positive(),
  description: z.string().optional(),
  acceptors: z.array(AcceptorSchema).min(1),
});

export type WaiterDefinition = z.infer<typeof WaiterDefinitionSchema>;

export const WaiterConfigSchema = z.object({
  version: z.literal(2),
  waiters: z.record(WaiterDefinitionSchema),
});

export type WaiterConfig = z.infer<typeof WaiterConfigSchema>;

/**
 * Render zod issues as one line per issue.
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
