import { z } from 'zod';
import { MalformedInputError } from '../errors';

// ─── FHIR datatypes (only the parts the renderer reads) ───

export const CodingSchema = z.object({
  system: z.string().optional(),
  code: z.string().optional(),
  display: z.string().optional(),
});

export const CodeableConceptSchema = z.object({
  coding: z.array(CodingSchema).optional(),
  text: z.string().optional(),
});

export const QuantitySchema = z.object({
  value: z.number().optional(),
  unit: z.string().optional(),
  code: z.string().optional(),
});

export const PeriodSchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
});

export const ReferenceSchema = z.object({
  reference: z.string().optional(),
  display: z.string().optional(),
});

export const HumanNameSchema = z.object({
  use: z.string().optional(),
  text: z.string().optional(),
  family: z.string().optional(),
  given: z.array(z.string()).optional(),
  prefix: z.array(z.string()).optional(),
});

export type ExtensionValue = {
  url: string;
  valueString?: string;
  valueCoding?: z.infer<typeof CodingSchema>;
  extension?: ExtensionValue[];
};

export const ExtensionSchema: z.ZodType<ExtensionValue> = z.lazy(() =>
  z.object({
    url: z.string(),
    valueString: z.string().optional(),
    valueCoding: CodingSchema.optional(),
    extension: z.array(ExtensionSchema).optional(),
  }),
);

// ─── Bundle boundary ───

export const ResourceSchema = z
  .object({
    resourceType: z.string().min(1),
    id: z.string().optional(),
  })
  .passthrough();

export const BundleEntrySchema = z
  .object({
    fullUrl: z.string().optional(),
    resource: ResourceSchema.optional(),
  })
  .passthrough();

export const BundleSchema = z
  .object({
    resourceType: z.literal('Bundle'),
    id: z.string().optional(),
    type: z.string().optional(),
    entry: z.array(BundleEntrySchema).default([]),
  })
  .passthrough();

export type Coding = z.infer<typeof CodingSchema>;
export type CodeableConcept = z.infer<typeof CodeableConceptSchema>;
export type Quantity = z.infer<typeof QuantitySchema>;
export type Period = z.infer<typeof PeriodSchema>;
export type Reference = z.infer<typeof ReferenceSchema>;
export type HumanName = z.infer<typeof HumanNameSchema>;
export type Resource = z.infer<typeof ResourceSchema>;

export interface Entry {
  fullUrl?: string;
  resource: Resource;
}

export interface Bundle {
  id?: string;
  type?: string;
  entries: Entry[];
}

/**
 * Validate the outer shape of a parsed bundle document and flatten it into
 * the entry list the core works on. Entries that carry no resource (e.g.
 * transaction-response rows) are dropped; everything inside a resource
 * beyond `resourceType`/`id` is kept untouched.
 */
export function parseBundle(input: unknown): Bundle {
  const result = BundleSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new MalformedInputError(`Invalid bundle${where}: ${issue?.message ?? 'unknown error'}`);
  }

  const entries: Entry[] = [];
  for (const raw of result.data.entry) {
    if (!raw.resource) continue;
    entries.push(raw.fullUrl ? { fullUrl: raw.fullUrl, resource: raw.resource } : { resource: raw.resource });
  }

  return {
    id: result.data.id,
    type: result.data.type,
    entries,
  };
}

/** Read a field of a resource by dotted path; numeric segments index arrays. */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else {
      current = Reflect.get(current, segment);
    }
  }
  return current;
}
