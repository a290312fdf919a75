import * as codecs from './codecs';
import type { NestedSerializer } from './codecs';
import type { Codec, EnumLike, FieldDefinition } from './types';

export interface FieldOptions {
  /** Defaults to true. */
  nullable?: boolean;
  /** Defaults to `!nullable`. */
  required?: boolean;
  /** Attribute read on encode and written on decode, when it differs from the field name. */
  attribute?: string;
  /** Defaults to `nullable`. */
  encodeNull?: boolean;
}

const define = (codec: Codec, options: FieldOptions = {}, many = false): FieldDefinition => ({ codec, many, ...options });

/**
 * Builders for manually declared fields. A declared field always takes
 * precedence over a generated field of the same name.
 *
 * @example
 * new ModelSerializer(Alchemist, {
 *   fields: { name: fields.string({ nullable: false }) },
 * });
 */
export const fields = {
  string: (options?: FieldOptions) => define(codecs.string, options),
  integer: (options?: FieldOptions) => define(codecs.integer, options),
  longInteger: (options?: FieldOptions) => define(codecs.longInteger, options),
  timestamp: (options?: FieldOptions) => define(codecs.timestamp, options),
  date: (options?: FieldOptions) => define(codecs.date, options),
  boolean: (options?: FieldOptions) => define(codecs.boolean, options),
  uuid: (options?: FieldOptions) => define(codecs.uuid, options),
  json: (options?: FieldOptions) => define(codecs.json, options),
  enumeration: (members: EnumLike, options?: FieldOptions) => define(codecs.enumeration(members), options),
  list: (element: Codec, options?: FieldOptions) => define(codecs.list(element), options),
  nested: <T>(serializer: NestedSerializer<T>, options: FieldOptions & { many?: boolean } = {}) => {
    const { many = false, ...rest } = options;
    return define(codecs.nested(serializer, many), { required: false, nullable: false, encodeNull: true, ...rest }, many);
  },
  custom: (codec: Codec, options?: FieldOptions) => define(codec, options),
};
