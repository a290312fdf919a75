export { toCamel, toSnake, resolveCasing, externalName } from './case';
export { types, defineModel } from './attributes';
export type { RawAttributeType } from './attributes';
export { fields } from './fields';
export type { FieldOptions } from './fields';
export * as codecs from './codecs';
export { FieldSerializer, CaseSerializer } from './serializer';
export { ModelSerializer, resolveCodec } from './model';
export {
  MappingError,
  InvalidConfigurationError,
  UnsupportedTypeError,
  ValidationError,
  isMappingError,
  toMappingError,
} from './errors';
export type { FieldIssue, MappingErrorCode } from './errors';
export type * from './types';
