import { z } from 'zod';
import type { FieldIssue } from './errors';
import type { Codec, DecodeResult, EnumLike, JsonObject, JsonValue, PrimitiveKind, SafeDecodeResult } from './types';

/**
 * Value codecs. Wire values are checked with zod on decode; encode trusts the
 * model but throws a TypeError when a value has the wrong runtime type.
 */

const INTEGER_PATTERN = /^-?\d+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function zodCodec<S extends z.ZodTypeAny, TWire extends JsonValue>(
  name: string,
  schema: S,
  encode: (value: unknown) => TWire,
): Codec<z.output<S>, TWire> {
  return {
    name,
    encode,
    decode(wire) {
      const parsed = schema.safeParse(wire);
      if (parsed.success) return { success: true, data: parsed.data };
      return { success: false, issues: parsed.error.issues.map((i) => ({ path: i.path, message: i.message })) };
    },
  };
}

/** A wire schema backed by a conversion that returns undefined for bad input. */
function convertWith<T>(message: string, convert: (value: unknown) => T | undefined) {
  return z.unknown().transform((value, ctx): T => {
    const out = convert(value);
    if (out === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
    return out;
  });
}

function cannotEncode(codec: string, value: unknown): never {
  const got = value instanceof Date ? 'Date' : Array.isArray(value) ? 'array' : typeof value;
  return fail(`${codec} codec cannot encode a value of type ${got}`);
}

function fail(message: string): never {
  throw new TypeError(message);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  if (isPlainObject(value)) return Object.values(value).every(isJsonValue);
  return false;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export const string = zodCodec('string', z.string({ invalid_type_error: 'Not a valid string.' }), (value) =>
  typeof value === 'string' ? value : cannotEncode('string', value),
);

export const integer = zodCodec(
  'integer',
  convertWith('Not a valid integer.', (value) => {
    const n = typeof value === 'string' && INTEGER_PATTERN.test(value) ? Number(value) : value;
    return typeof n === 'number' && Number.isSafeInteger(n) ? n : undefined;
  }),
  (value) => (typeof value === 'number' && Number.isInteger(value) ? value : cannotEncode('integer', value)),
);

/** bigint in memory, decimal string on the wire. */
export const longInteger = zodCodec(
  'long-integer',
  convertWith('Not a valid integer.', (value) => {
    if (typeof value === 'string' && INTEGER_PATTERN.test(value)) return BigInt(value);
    if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
    return undefined;
  }),
  (value) => {
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value).toString();
    return cannotEncode('long-integer', value);
  },
);

const isoDateTime = z.string().datetime({ offset: true });

/** Date in memory, ISO-8601 on the wire. A date-time without an offset is read as UTC. */
export const timestamp = zodCodec(
  'timestamp',
  convertWith('Not a valid datetime.', (value) => {
    if (typeof value !== 'string') return undefined;
    const text = isoDateTime.safeParse(value).success ? value : `${value}Z`;
    return isoDateTime.safeParse(text).success ? new Date(text) : undefined;
  }),
  (value) => (isValidDate(value) ? value.toISOString() : cannotEncode('timestamp', value)),
);

export const date = zodCodec(
  'date',
  z
    .string({ invalid_type_error: 'Not a valid date.' })
    .regex(DATE_PATTERN, 'Not a valid date.')
    .transform((s, ctx) => {
      const d = new Date(`${s}T00:00:00.000Z`);
      // rejects calendar overflow such as 2021-02-30
      if (!isValidDate(d) || d.toISOString().slice(0, 10) !== s) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Not a valid date.' });
        return z.NEVER;
      }
      return d;
    }),
  (value) => (isValidDate(value) ? value.toISOString().slice(0, 10) : cannotEncode('date', value)),
);

export const boolean = zodCodec(
  'boolean',
  convertWith('Not a valid boolean.', (value) => {
    if (typeof value === 'boolean') return value;
    if (value === 'true') return true;
    if (value === 'false') return false;
    return undefined;
  }),
  (value) => (typeof value === 'boolean' ? value : cannotEncode('boolean', value)),
);

export const uuid = zodCodec(
  'uuid',
  z.string({ invalid_type_error: 'Not a valid UUID.' }).uuid({ message: 'Not a valid UUID.' }),
  (value) => (typeof value === 'string' ? value : cannotEncode('uuid', value)),
);

/** Raw JSON passthrough. */
export const json = zodCodec('json', z.custom<JsonValue>(isJsonValue, { message: 'Not valid JSON data.' }), (value) =>
  isJsonValue(value) ? value : cannotEncode('json', value),
);

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

export const PRIMITIVE_CODECS: Readonly<Record<PrimitiveKind, Codec>> = {
  string,
  integer,
  'long-integer': longInteger,
  timestamp,
  date,
  boolean,
  uuid,
  json,
};

export function isPrimitiveKind(kind: string): kind is PrimitiveKind {
  return Object.prototype.hasOwnProperty.call(PRIMITIVE_CODECS, kind);
}

/** Symbolic member names of an enum object, skipping numeric reverse mappings. */
export function enumNames(members: EnumLike): string[] {
  return Object.keys(members).filter((key) => Number.isNaN(Number(key)));
}

/** Encodes a member value as its name (`Policy.NoUpdates` → 'NoUpdates'), decodes a name back. */
export function enumeration(members: EnumLike): Codec<string | number, string> {
  const names = enumNames(members);
  return zodCodec(
    'enumeration',
    convertWith(`Must be one of: ${names.join(', ')}.`, (value) =>
      typeof value === 'string' && names.includes(value) ? members[value] : undefined,
    ),
    (value) => names.find((name) => members[name] === value) ?? fail(`enumeration codec has no member with value ${String(value)}`),
  );
}

export function list<T>(element: Codec<T>): Codec<T[], JsonValue[]> {
  return {
    name: `list<${element.name}>`,
    encode(value) {
      if (!Array.isArray(value)) return cannotEncode(this.name, value);
      return value.map((item) => element.encode(item));
    },
    decode(wire) {
      if (!Array.isArray(wire)) return { success: false, issues: [{ path: [], message: 'Not a valid list.' }] };
      return collect(wire, (item) => element.decode(item));
    },
  };
}

/** The part of a serializer a nested field needs. */
export interface NestedSerializer<T> {
  readonly name: string;
  encode(source: unknown): JsonObject;
  safeDecode(input: unknown): SafeDecodeResult<T>;
}

export function nested<T>(serializer: NestedSerializer<T>, many: true): Codec<T[], JsonObject[]>;
export function nested<T>(serializer: NestedSerializer<T>, many?: false): Codec<T, JsonObject>;
export function nested<T>(serializer: NestedSerializer<T>, many?: boolean): Codec<T | T[], JsonObject | JsonObject[]>;
export function nested<T>(serializer: NestedSerializer<T>, many = false): Codec<T | T[], JsonObject | JsonObject[]> {
  const decodeOne = (input: unknown): DecodeResult<T> => {
    const r = serializer.safeDecode(input);
    return r.success ? r : { success: false, issues: r.error.issues };
  };
  return {
    name: many ? `nested<${serializer.name}>[]` : `nested<${serializer.name}>`,
    encode(value) {
      if (!many) return serializer.encode(value);
      if (!Array.isArray(value)) return cannotEncode(this.name, value);
      return value.map((item) => serializer.encode(item));
    },
    decode(wire) {
      if (!many) return decodeOne(wire);
      if (!Array.isArray(wire)) return { success: false, issues: [{ path: [], message: 'Not a valid list.' }] };
      return collect(wire, decodeOne);
    },
  };
}

/** Decode every item, prefixing issue paths with the item index. */
export function collect<T>(items: readonly unknown[], decodeItem: (item: unknown) => DecodeResult<T>): DecodeResult<T[]> {
  const out: T[] = [];
  const issues: FieldIssue[] = [];
  items.forEach((item, index) => {
    const r = decodeItem(item);
    if (r.success) out.push(r.data);
    else for (const issue of r.issues) issues.push({ path: [index, ...issue.path], message: issue.message });
  });
  return issues.length ? { success: false, issues } : { success: true, data: out };
}
