/**
 * Schema of a resolved step configuration document.
 *
 * Keys follow the on-disk layout written by the graph builder
 * (`edges_i`, `edges_o`); the loader maps them onto {@link TStepRecord}.
 * Keys the renderer has no use for (`commands`, `preconditions`, ...) are
 * dropped during parsing.
 */

import { z } from 'zod';

// YAML reads a bare `1` or `2.5` as a number; names are always text
const nameSchema = z.union([z.string(), z.number()]).transform(String);

// Port names become header fields, so they cannot be blank or contain the field separator
const portListSchema = z.array(nameSchema).superRefine((ports, ctx) => {
  const seen = new Set<string>();
  ports.forEach((port, index) => {
    if (port.trim() === '' || port.includes('|')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid port name "${port}"`, path: [index] });
    } else if (seen.has(port)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate port "${port}"`, path: [index] });
    }
    seen.add(port);
  });
});

const edgeRefSchema = z.object({
  step: nameSchema.describe('Remote step identifier'),
  f: nameSchema.describe('Remote port name'),
});

// `port:` with nothing under it loads as null
const edgeMapSchema = z.record(
  z
    .array(edgeRefSchema)
    .nullable()
    .transform((refs) => refs ?? [])
);

const parameterScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const parameterValueSchema = z.union([parameterScalarSchema, z.array(parameterScalarSchema)]);

export const parameterMapSchema = z.record(parameterValueSchema);

export const stepConfigSchema = z.object({
  name: nameSchema,
  source: z.string(),
  inputs: portListSchema.nullish(),
  outputs: portListSchema.nullish(),
  edges_i: edgeMapSchema.nullish(),
  edges_o: edgeMapSchema.nullish(),
  parameters: parameterMapSchema.nullish(),
  sandbox: z.boolean().nullish(),
});

export type StepConfigDocument = z.infer<typeof stepConfigSchema>;

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
