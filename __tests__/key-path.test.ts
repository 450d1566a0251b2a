import { describe, it, expect } from 'vitest';
import { keyToPath, pathToKey } from '../shared/keyPath';
import { ValidationError } from '../shared/errors';
import { bytes } from './helpers';

describe('pathToKey() / keyToPath()', () => {
  it('appends a null byte', () => {
    const key = pathToKey('/foo/bar');
    expect(key).toEqual(bytes('/foo/bar\0'));
    expect(keyToPath(key)).toBe('/foo/bar');
  });

  it('prepends and strips a prefix', () => {
    const key = pathToKey('/foo/bar', 'prefix:');
    expect(key).toEqual(bytes('prefix:/foo/bar\0'));
    expect(keyToPath(key, 'prefix:')).toBe('/foo/bar');
  });

  it('makes paths relative to a root', () => {
    const key = pathToKey('/foo/bar', 'prefix:', '/foo');
    expect(key).toEqual(bytes('prefix:bar\0'));
    expect(keyToPath(key, 'prefix:', '/foo')).toBe('/foo/bar');
  });

  it('rejects keys that are not UTF-8', () => {
    expect(() => keyToPath(new Uint8Array([0xff, 0xfe, 0]))).toThrow(ValidationError);
  });
});
