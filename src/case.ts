import { InvalidConfigurationError } from './errors';
import type { CaseDirection, CasingOptions } from './types';

/**
 * Convert a snake_case identifier to camelCase.
 *
 * Names without an underscore are returned as-is. Empty segments (leading,
 * trailing or doubled underscores) contribute nothing.
 *
 * @example toCamel('school_id') // 'schoolId'
 */
export function toCamel(name: string): string {
  if (!name.includes('_')) return name;
  return name
    .split('_')
    .map((segment, i) => (i > 0 ? capitalize(segment) : segment))
    .join('');
}

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1);
}

/**
 * Convert a camelCase identifier to snake_case.
 *
 * An underscore goes before each capital that follows a run of non-capitals and
 * is itself followed by another character, then everything is lower-cased.
 * Acronyms and a trailing single capital are not split, so this only inverts
 * {@link toCamel} for names whose segments are words of two or more letters.
 *
 * @example toSnake('authorId') // 'author_id'
 * @example toSnake('getHTTPResponse') // 'get_httpresponse'
 */
export function toSnake(name: string): string {
  return name.replace(/([^A-Z]+?)([A-Z])(.)/g, '$1_$2$3').toLowerCase();
}

export function resolveCasing(options: CasingOptions = {}): CaseDirection {
  const { snakeToCamel = false, camelToSnake = false } = options;
  if (snakeToCamel && camelToSnake) {
    throw new InvalidConfigurationError('Only one of snakeToCamel or camelToSnake can be true');
  }
  if (snakeToCamel) return 'snake-to-camel';
  if (camelToSnake) return 'camel-to-snake';
  return 'none';
}

export function casingOptionsFor(direction: CaseDirection): Required<CasingOptions> {
  return { snakeToCamel: direction === 'snake-to-camel', camelToSnake: direction === 'camel-to-snake' };
}

/** External (wire) name of an internal field name under a casing direction. */
export function externalName(name: string, direction: CaseDirection): string {
  if (direction === 'snake-to-camel') return toCamel(name);
  if (direction === 'camel-to-snake') return toSnake(name);
  return name;
}
