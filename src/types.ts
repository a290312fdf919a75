import type { FieldIssue, ValidationError } from './errors';

/**
 * Public types for model descriptions, codecs and generated fields.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Record keyed by internal attribute names, produced by a decode pass. */
export type DecodedRecord = Record<string, unknown>;

export type DecodeResult<T> = { success: true; data: T } | { success: false; issues: FieldIssue[] };
export type SafeDecodeResult<T> = { success: true; data: T } | { success: false; error: ValidationError };

/**
 * Converts one value between its in-memory form and its JSON-safe wire form.
 * `encode` throws a TypeError for a value of the wrong runtime type; `decode`
 * reports problems as issues instead of throwing.
 */
export interface Codec<TValue = unknown, TWire extends JsonValue = JsonValue> {
  readonly name: string;
  encode(value: TValue): TWire;
  decode(wire: unknown): DecodeResult<TValue>;
}

/** A TypeScript enum object or any name → value map. */
export type EnumLike = Readonly<Record<string, string | number>>;

export type PrimitiveKind = 'string' | 'integer' | 'long-integer' | 'timestamp' | 'date' | 'boolean' | 'uuid' | 'json';

export type AttributeType =
  | { readonly kind: PrimitiveKind }
  | { readonly kind: 'enumeration'; readonly members: EnumLike }
  | { readonly kind: 'array'; readonly of: AttributeType }
  | { readonly kind: 'nested' };

export interface AttributeDescriptor {
  readonly name: string;
  readonly type: AttributeType;
  /** Defaults to true, as ORM columns do. */
  readonly nullable?: boolean;
  readonly primaryKey?: boolean;
}

/**
 * What the serializer needs to know about a model class: its attributes in
 * declaration order, and a factory taking every decoded attribute by name.
 */
export interface ModelDescription<T = unknown> {
  readonly name: string;
  readonly attributes: readonly AttributeDescriptor[];
  /** Attribute dropped in new-object mode. Defaults to 'id'. */
  readonly identity?: string;
  create(init: DecodedRecord): T;
}

export interface NestedRelation {
  readonly model: ModelDescription;
  readonly many: boolean;
  readonly nested?: NestedMap;
}

export type NestedMap = Readonly<Record<string, NestedRelation>>;

export type CaseDirection = 'none' | 'snake-to-camel' | 'camel-to-snake';

export interface CasingOptions {
  snakeToCamel?: boolean;
  camelToSnake?: boolean;
}

/** A manually declared field, before casing is applied. */
export interface FieldDefinition {
  readonly codec: Codec;
  readonly nullable?: boolean;
  readonly required?: boolean;
  /** Attribute read on encode and written on decode. Defaults to the field name. */
  readonly attribute?: string;
  readonly many?: boolean;
  /** Write `null` on encode when the value is missing. Defaults to `nullable`. */
  readonly encodeNull?: boolean;
}

export type FieldDefinitions = Readonly<Record<string, FieldDefinition>>;

/** A generated, cased, codec-bound field. */
export interface FieldSpec {
  readonly name: string;
  readonly key: string;
  readonly attribute: string;
  readonly codec: Codec;
  readonly nullable: boolean;
  readonly required: boolean;
  readonly many: boolean;
  readonly encodeNull: boolean;
  readonly origin: 'manual' | 'auto';
}

export interface SerializerOptions extends CasingOptions {
  /** Label used in error messages and debug output. */
  name?: string;
  fields?: FieldDefinitions;
  debug?: boolean;
}

export interface ModelSerializerOptions extends SerializerOptions {
  nested?: NestedMap;
  newObject?: boolean;
  maxDepth?: number;
}
