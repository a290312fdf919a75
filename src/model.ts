import { z } from 'zod';
import { casingOptionsFor } from './case';
import { PRIMITIVE_CODECS, enumeration, isPrimitiveKind, list, nested } from './codecs';
import { checkNestedMap, normalizeDescription } from './attributes';
import type { RawAttributeType } from './attributes';
import { InvalidConfigurationError, UnsupportedTypeError } from './errors';
import { FieldSerializer, isRecord, parseOptions, serializerOptionsSchema } from './serializer';
import type { Codec, DecodedRecord, FieldDefinition, ModelDescription, ModelSerializerOptions, NestedMap } from './types';

const DEFAULT_MAX_DEPTH = 32;

const modelOptionsSchema = serializerOptionsSchema.extend({
  nested: z.custom<NestedMap>(isRecord, { message: 'Expected a nested relation map' }).default(() => ({})),
  newObject: z.boolean().default(false),
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
});

/** Where a serializer sits in a tree of nested serializers. */
export interface NestedTrail {
  readonly path: readonly string[];
  readonly maps: readonly NestedMap[];
}

const ROOT: NestedTrail = { path: [], maps: [] };

/**
 * Resolve the codec of an attribute type once, at construction. Primitive kinds
 * go through the static table; enumerations and arrays are parameterized.
 */
export function resolveCodec(type: RawAttributeType, where: string): Codec {
  if (type.kind === 'enumeration') {
    if (!type.members) throw new InvalidConfigurationError(`Enumeration ${where} declares no members`);
    return enumeration(type.members);
  }
  if (type.kind === 'array') {
    if (!type.of) throw new InvalidConfigurationError(`Array ${where} declares no element type`);
    if (type.of.kind === 'array' || type.of.kind === 'nested') throw new UnsupportedTypeError(`array<${type.of.kind}>`, where);
    return list(resolveCodec(type.of, where));
  }
  if (isPrimitiveKind(type.kind)) return PRIMITIVE_CODECS[type.kind];
  throw new UnsupportedTypeError(type.kind, where);
}

/**
 * Serializer generated from a model description.
 *
 * Every attribute becomes a field bound to the codec of its type, every entry of
 * the `nested` map becomes a field backed by a child ModelSerializer built with
 * the same casing, new-object and debug settings, and manually declared
 * `fields` override generated ones of the same name. Decoding hands the record
 * of internal attribute names to `model.create`. Encoding takes any object that
 * exposes the model's attributes, not only instances built by `create`.
 *
 * @example
 * const colleges = new ModelSerializer(WizardCollege, {
 *   snakeToCamel: true,
 *   nested: { alchemists: { model: Alchemist, many: true } },
 * });
 * colleges.encode(college); // { id: 1, name: 'Bogwarts', alchemists: [{ schoolId: 1, ... }] }
 */
export class ModelSerializer<T> extends FieldSerializer<T, object> {
  readonly model: ModelDescription<T>;
  readonly identity: string;
  readonly newObject: boolean;
  /** Child serializers of the nested map, by attribute name. */
  readonly relations: ReadonlyMap<string, ModelSerializer<unknown>>;

  /** @param trail internal: position in a nested serializer tree */
  constructor(model: ModelDescription<T>, options: ModelSerializerOptions = {}, trail: NestedTrail = ROOT) {
    const description = normalizeDescription(model);
    const parsed = parseOptions(modelOptionsSchema, options, description.name);
    super(parsed.name ?? description.name, parsed);
    this.model = model;
    this.identity = description.identity;
    this.newObject = parsed.newObject;

    const path = trail.path.length ? [...trail.path] : [description.name];
    if (path.length > parsed.maxDepth) {
      throw new InvalidConfigurationError(`Nested relations deeper than ${parsed.maxDepth} levels at ${path.join('.')}`);
    }

    const generated = new Map<string, FieldDefinition>();
    for (const attr of description.attributes) {
      if (attr.type.kind === 'nested') continue;
      generated.set(attr.name, { codec: resolveCodec(attr.type, `${description.name}.${attr.name}`), nullable: attr.nullable });
    }

    checkNestedMap(parsed.nested, path.join('.'));
    const relations = new Map<string, ModelSerializer<unknown>>();
    const maps = [...trail.maps, parsed.nested];
    for (const [key, relation] of Object.entries(parsed.nested)) {
      const sub = relation.nested ?? {};
      if (maps.includes(sub)) throw new InvalidConfigurationError(`Cyclic nested map at ${[...path, key].join('.')}`);
      const child = new ModelSerializer(
        relation.model,
        {
          ...casingOptionsFor(this.casing),
          newObject: this.newObject,
          debug: this.debug,
          maxDepth: parsed.maxDepth,
          nested: sub,
        },
        { path: [...path, key], maps },
      );
      relations.set(key, child);
      generated.set(key, { codec: nested(child, relation.many), nullable: false, required: false, encodeNull: true, many: relation.many });
    }
    this.relations = relations;

    for (const [name, def] of generated) {
      if (this.newObject && name === this.identity) continue;
      this.addField(name, def, 'auto');
    }
    this.logFields();
  }

  protected construct(data: DecodedRecord): T {
    return this.model.create(data);
  }
}
