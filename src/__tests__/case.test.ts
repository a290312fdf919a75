import { describe, it, expect } from 'vitest';
import { externalName, resolveCasing, toCamel, toSnake } from '../case';
import { InvalidConfigurationError } from '../errors';

describe('toCamel', () => {
  it.each([
    ['', ''],
    ['name', 'name'],
    ['school_id', 'schoolId'],
    ['attr_one_two', 'attrOneTwo'],
    ['attr_1', 'attr1'],
    ['http_URL', 'httpURL'],
  ])('%j -> %j', (input, expected) => {
    expect(toCamel(input)).toBe(expected);
  });

  it('drops empty segments', () => {
    expect(toCamel('_private')).toBe('Private');
    expect(toCamel('trailing_')).toBe('trailing');
    expect(toCamel('double__under')).toBe('doubleUnder');
    expect(toCamel('_')).toBe('');
  });
});

describe('toSnake', () => {
  it.each([
    ['', ''],
    ['name', 'name'],
    ['schoolId', 'school_id'],
    ['attrOneTwo', 'attr_one_two'],
    ['camelAttribute', 'camel_attribute'],
    ['already_snake', 'already_snake'],
    ['_privateField', '_private_field'],
    ['a1B2', 'a1_b2'],
  ])('%j -> %j', (input, expected) => {
    expect(toSnake(input)).toBe(expected);
  });

  it('does not split acronyms', () => {
    expect(toSnake('getHTTPResponse')).toBe('get_httpresponse');
    expect(toSnake('HTTPServer')).toBe('httpserver');
    expect(toSnake('ABc')).toBe('abc');
  });

  it('does not split a trailing single capital', () => {
    expect(toSnake('aB')).toBe('ab');
  });
});

describe('round trip', () => {
  it.each(['id', 'school_id', 'author_id', 'attr_one_two', 'created_at', 'x_ray_machine'])('toSnake(toCamel(%j))', (name) => {
    expect(toSnake(toCamel(name))).toBe(name);
  });

  it('loses single-letter segments', () => {
    expect(toCamel('point_x')).toBe('pointX');
    expect(toSnake('pointX')).toBe('pointx');
  });
});

describe('resolveCasing', () => {
  it('defaults to no conversion', () => {
    expect(resolveCasing()).toBe('none');
    expect(resolveCasing({ snakeToCamel: false, camelToSnake: false })).toBe('none');
  });

  it('resolves each direction', () => {
    expect(resolveCasing({ snakeToCamel: true })).toBe('snake-to-camel');
    expect(resolveCasing({ camelToSnake: true })).toBe('camel-to-snake');
  });

  it('rejects both directions', () => {
    expect(() => resolveCasing({ snakeToCamel: true, camelToSnake: true })).toThrow(InvalidConfigurationError);
    expect(() => resolveCasing({ snakeToCamel: true, camelToSnake: true })).toThrow(
      'Only one of snakeToCamel or camelToSnake can be true',
    );
  });
});

describe('externalName', () => {
  it('applies the direction', () => {
    expect(externalName('author_id', 'snake-to-camel')).toBe('authorId');
    expect(externalName('authorId', 'camel-to-snake')).toBe('author_id');
    expect(externalName('author_id', 'none')).toBe('author_id');
  });
});
