import { z } from 'zod';
import { externalName, resolveCasing } from './case';
import { InvalidConfigurationError, ValidationError, isMappingError } from './errors';
import type { FieldIssue } from './errors';
import type { NestedSerializer } from './codecs';
import type {
  CaseDirection,
  Codec,
  DecodedRecord,
  FieldDefinition,
  FieldSpec,
  JsonObject,
  SafeDecodeResult,
  SerializerOptions,
} from './types';

const codecSchema = z.custom<Codec>(
  (v) => isRecord(v) && typeof v.name === 'string' && typeof v.encode === 'function' && typeof v.decode === 'function',
  { message: 'Expected a codec with name, encode and decode' },
);

const fieldDefinitionSchema = z.object({
  codec: codecSchema,
  nullable: z.boolean().optional(),
  required: z.boolean().optional(),
  attribute: z.string().min(1).optional(),
  many: z.boolean().optional(),
  encodeNull: z.boolean().optional(),
});

export const serializerOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  snakeToCamel: z.boolean().default(false),
  camelToSnake: z.boolean().default(false),
  debug: z.boolean().default(false),
  fields: z.record(fieldDefinitionSchema).default(() => ({})),
});

export type ParsedSerializerOptions = z.output<typeof serializerOptionsSchema>;

/** Parse an options object, turning schema failures into InvalidConfigurationError. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, options: unknown, label: string): z.output<S> {
  const parsed = schema.safeParse(options ?? {});
  if (parsed.success) return parsed.data;
  const first = parsed.error.issues[0];
  const where = first && first.path.length ? ` at ${first.path.join('.')}` : '';
  throw new InvalidConfigurationError(`Invalid options for ${label}${where}: ${first?.message ?? 'unknown problem'}`, {
    issues: parsed.error.issues,
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shared encode/decode engine. Fields are keyed by internal name and exposed
 * under their cased external key; the first field registered under a name
 * wins, so subclasses register manual fields before generated ones.
 */
export abstract class FieldSerializer<TOut, TIn = unknown> implements NestedSerializer<TOut> {
  readonly name: string;
  readonly casing: CaseDirection;
  readonly debug: boolean;
  private readonly specs = new Map<string, FieldSpec>();
  private readonly byKey = new Map<string, FieldSpec>();

  protected constructor(name: string, options: ParsedSerializerOptions) {
    this.name = name;
    this.casing = resolveCasing(options);
    this.debug = options.debug;
    for (const [fieldName, def] of Object.entries(options.fields)) this.addField(fieldName, def, 'manual');
  }

  /** Fields in encode order. */
  get fields(): readonly FieldSpec[] {
    return [...this.specs.values()];
  }

  /** Look up a field by its external key. */
  fieldFor(key: string): FieldSpec | undefined {
    return this.byKey.get(key);
  }

  hasField(name: string): boolean {
    return this.specs.has(name);
  }

  /** Register a field unless one with the same name exists. Returns whether it was added. */
  protected addField(name: string, def: FieldDefinition, origin: FieldSpec['origin']): boolean {
    if (this.specs.has(name)) return false;
    const key = externalName(name, this.casing);
    const clash = this.byKey.get(key);
    if (clash) {
      throw new InvalidConfigurationError(`Fields "${clash.name}" and "${name}" of ${this.name} both map to key "${key}"`);
    }
    const nullable = def.nullable ?? true;
    const spec: FieldSpec = Object.freeze({
      name,
      key,
      attribute: def.attribute ?? name,
      codec: def.codec,
      nullable,
      required: def.required ?? !nullable,
      many: def.many ?? false,
      encodeNull: def.encodeNull ?? nullable,
      origin,
    });
    this.specs.set(name, spec);
    this.byKey.set(key, spec);
    return true;
  }

  protected logFields(): void {
    if (!this.debug) return;
    const summary = this.fields.map((f) => (f.key === f.attribute ? f.key : `${f.key}<-${f.attribute}`));
    console.debug('[fieldcase] fields', this.name, summary.join(', '));
  }

  protected abstract construct(data: DecodedRecord): TOut;

  /**
   * Encode an object to a record keyed by external names. Each value is read
   * from the field's attribute, or from its external key when the object uses
   * that naming instead.
   */
  encode(source: TIn): JsonObject {
    if (typeof source !== 'object' || source === null) {
      throw new InvalidConfigurationError(`${this.name} can only encode objects, received ${source === null ? 'null' : typeof source}`);
    }
    const out: JsonObject = {};
    for (const spec of this.specs.values()) {
      const value = readAttribute(source, spec);
      if (value === null || value === undefined) {
        if (spec.encodeNull) out[spec.key] = null;
        continue;
      }
      try {
        out[spec.key] = spec.codec.encode(value);
      } catch (e) {
        if (isMappingError(e)) throw e;
        const reason = e instanceof Error ? e.message : String(e);
        throw new InvalidConfigurationError(`Cannot encode field "${spec.key}" of ${this.name}: ${reason}`, { field: spec.key }, { cause: e });
      }
    }
    return out;
  }

  encodeMany(sources: readonly TIn[]): JsonObject[] {
    return sources.map((source) => this.encode(source));
  }

  /** Decode without throwing on bad data; every field-level problem is collected. */
  safeDecode(input: unknown): SafeDecodeResult<TOut> {
    const decoded = this.decodeFields(input);
    if (!decoded.ok) return { success: false, error: new ValidationError(decoded.issues) };
    try {
      return { success: true, data: this.construct(decoded.data) };
    } catch (e) {
      if (isMappingError(e)) throw e;
      const reason = e instanceof Error ? e.message : String(e);
      throw new InvalidConfigurationError(`Cannot construct ${this.name} from decoded data: ${reason}`, { name: this.name }, { cause: e });
    }
  }

  decode(input: unknown): TOut {
    const result = this.safeDecode(input);
    if (!result.success) throw result.error;
    return result.data;
  }

  decodeMany(inputs: unknown): TOut[] {
    if (!Array.isArray(inputs)) throw new ValidationError([{ path: [], message: 'Not a valid list.' }]);
    const out: TOut[] = [];
    const issues: FieldIssue[] = [];
    inputs.forEach((input, index) => {
      const r = this.safeDecode(input);
      if (r.success) out.push(r.data);
      else for (const issue of r.error.issues) issues.push({ path: [index, ...issue.path], message: issue.message });
    });
    if (issues.length) throw new ValidationError(issues);
    return out;
  }

  private decodeFields(input: unknown): { ok: true; data: DecodedRecord } | { ok: false; issues: FieldIssue[] } {
    if (!isRecord(input)) return { ok: false, issues: [{ path: [], message: 'Invalid input type.' }] };
    const data: DecodedRecord = {};
    const issues: FieldIssue[] = [];
    for (const spec of this.specs.values()) {
      const raw = Object.prototype.hasOwnProperty.call(input, spec.key) ? input[spec.key] : undefined;
      if (raw === undefined) {
        if (spec.required) issues.push({ path: [spec.key], message: 'Missing data for required field.' });
        continue;
      }
      if (raw === null) {
        if (spec.nullable) data[spec.attribute] = null;
        else issues.push({ path: [spec.key], message: 'Field may not be null.' });
        continue;
      }
      const r = spec.codec.decode(raw);
      if (r.success) data[spec.attribute] = r.data;
      else for (const issue of r.issues) issues.push({ path: [spec.key, ...issue.path], message: issue.message });
    }
    return issues.length ? { ok: false, issues } : { ok: true, data };
  }
}

function readAttribute(source: object, spec: FieldSpec): unknown {
  if (exposes(source, spec.attribute)) return Reflect.get(source, spec.attribute);
  if (exposes(source, spec.key)) return Reflect.get(source, spec.key);
  return undefined;
}

/** Own or class-defined properties; members of Object.prototype and inherited `constructor` do not count. */
function exposes(source: object, name: string): boolean {
  if (Object.prototype.hasOwnProperty.call(source, name)) return true;
  if (name === 'constructor') return false;
  let proto: object | null = Object.getPrototypeOf(source);
  while (proto !== null && proto !== Object.prototype) {
    if (Object.prototype.hasOwnProperty.call(proto, name)) return true;
    proto = Object.getPrototypeOf(proto);
  }
  return false;
}

/**
 * Serializer over manually declared fields only; decodes to a plain record
 * keyed by internal names.
 *
 * @example
 * const s = new CaseSerializer({ snakeToCamel: true, fields: { attr_one: fields.string() } });
 * s.encode({ attr_one: 'x' }); // { attrOne: 'x' }
 */
export class CaseSerializer extends FieldSerializer<DecodedRecord, object> {
  constructor(options: SerializerOptions = {}) {
    const parsed = parseOptions(serializerOptionsSchema, options, 'CaseSerializer');
    super(parsed.name ?? 'record', parsed);
    this.logFields();
  }

  protected construct(data: DecodedRecord): DecodedRecord {
    return data;
  }
}
