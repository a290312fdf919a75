import { z } from 'zod';
import { InvalidConfigurationError } from './errors';
import type { AttributeType, EnumLike, ModelDescription, NestedMap } from './types';

/**
 * Builders for the closed set of attribute type tags.
 *
 * @example
 * const Formula = defineModel({
 *   name: 'Formula',
 *   attributes: [
 *     { name: 'id', type: types.integer(), nullable: false, primaryKey: true },
 *     { name: 'title', type: types.string() },
 *   ],
 *   create: (init) => new FormulaRow(init),
 * });
 */
export const types = {
  string: () => ({ kind: 'string' }) as const,
  integer: () => ({ kind: 'integer' }) as const,
  longInteger: () => ({ kind: 'long-integer' }) as const,
  timestamp: () => ({ kind: 'timestamp' }) as const,
  date: () => ({ kind: 'date' }) as const,
  boolean: () => ({ kind: 'boolean' }) as const,
  uuid: () => ({ kind: 'uuid' }) as const,
  json: () => ({ kind: 'json' }) as const,
  enumeration: (members: EnumLike) => ({ kind: 'enumeration', members }) as const,
  array: (of: AttributeType) => ({ kind: 'array', of }) as const,
  nested: () => ({ kind: 'nested' }) as const,
} satisfies Record<string, (...args: never[]) => AttributeType>;

/** Create a model description with strong typing. */
export function defineModel<T>(description: ModelDescription<T>): ModelDescription<T> {
  return description;
}

/**
 * Loose runtime shape of an attribute type. Model descriptions may come from
 * untyped code, so `kind` is checked against the codec table separately.
 */
export interface RawAttributeType {
  kind: string;
  members?: Record<string, string | number>;
  of?: RawAttributeType;
}

const attributeTypeSchema: z.ZodType<RawAttributeType> = z.lazy(() =>
  z.object({
    kind: z.string(),
    members: z.record(z.union([z.string(), z.number()])).optional(),
    of: attributeTypeSchema.optional(),
  }),
);

const attributeSchema = z.object({
  name: z.string().min(1),
  type: attributeTypeSchema,
  nullable: z.boolean().default(true),
  primaryKey: z.boolean().default(false),
});

export type NormalizedAttribute = z.output<typeof attributeSchema>;

const descriptionSchema = z.object({
  name: z.string().min(1),
  attributes: z.array(attributeSchema),
  identity: z.string().min(1).default('id'),
  create: z.function(),
});

export interface NormalizedDescription {
  name: string;
  identity: string;
  attributes: NormalizedAttribute[];
}

/** Validate a model description and fill in defaults. */
export function normalizeDescription(description: ModelDescription): NormalizedDescription {
  const parsed = descriptionSchema.safeParse(description);
  if (!parsed.success) {
    const label = typeof description?.name === 'string' ? description.name : 'model';
    throw new InvalidConfigurationError(`Invalid description for ${label}: ${parsed.error.issues[0]?.message ?? 'unknown problem'}`, {
      issues: parsed.error.issues,
    });
  }
  const { name, identity, attributes } = parsed.data;
  const seen = new Set<string>();
  for (const attr of attributes) {
    if (seen.has(attr.name)) throw new InvalidConfigurationError(`Duplicate attribute "${attr.name}" in ${name}`);
    seen.add(attr.name);
  }
  return { name, identity, attributes };
}

const nestedEntrySchema = z.object({
  model: z.object({ name: z.string() }).passthrough(),
  many: z.boolean(),
  nested: z.record(z.unknown()).optional(),
});

/** Check the shape of each entry of one level of a nested map. */
export function checkNestedMap(nested: NestedMap, path: string): void {
  for (const [key, entry] of Object.entries(nested)) {
    const parsed = nestedEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new InvalidConfigurationError(`Invalid nested relation "${key}" on ${path}`, { issues: parsed.error.issues });
    }
  }
}
