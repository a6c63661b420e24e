import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { defaultStorageDirectory, resolveStorageDirectory, resolveStoreConfig } from '../../src/core/config.js';
import { InvalidInputError } from '../../src/core/errors.js';

describe('resolveStoreConfig', () => {
  it('applies defaults', () => {
    const config = resolveStoreConfig({ name: 'notes', dimension: 3 });

    expect(config).toEqual({
      name: 'notes',
      dimension: 3,
      defaultNumResults: 10,
      hybridWeight: 0.5,
      k1: 1.2,
      b: 0.75,
      persistConcurrency: 8,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('keeps explicit values', () => {
    const config = resolveStoreConfig({
      name: 'notes',
      dimension: 384,
      defaultNumResults: 3,
      minThreshold: 0.2,
      hybridWeight: 0.9,
      directory: '/data',
    });

    expect(config.defaultNumResults).toBe(3);
    expect(config.minThreshold).toBe(0.2);
    expect(config.hybridWeight).toBe(0.9);
    expect(config.directory).toBe('/data');
  });

  it('rejects invalid values with their path', () => {
    expect(() => resolveStoreConfig({ name: 'notes', dimension: 0 })).toThrow(InvalidInputError);
    expect(() => resolveStoreConfig({ name: 'notes', dimension: 0 })).toThrow(/^Invalid store config: dimension: /);
    expect(() => resolveStoreConfig({ name: '', dimension: 3 })).toThrow(/name: /);
    expect(() => resolveStoreConfig({ name: 'notes', dimension: 3, hybridWeight: 1.5 })).toThrow(/hybridWeight: /);
  });
});

describe('defaultStorageDirectory', () => {
  it('follows XDG on Linux', () => {
    expect(defaultStorageDirectory('db', { HOME: '/home/u' }, 'linux')).toBe(
      join('/home/u', '.local', 'share', 'nearstore', 'db')
    );
    expect(defaultStorageDirectory('db', { HOME: '/home/u', XDG_DATA_HOME: '/xdg' }, 'linux')).toBe(
      join('/xdg', 'nearstore', 'db')
    );
  });

  it('uses Application Support on macOS', () => {
    expect(defaultStorageDirectory('db', { HOME: '/Users/u' }, 'darwin')).toBe(
      join('/Users/u', 'Library', 'Application Support', 'nearstore', 'db')
    );
  });

  it('uses APPDATA on Windows', () => {
    expect(defaultStorageDirectory('db', { HOME: '/home/u', APPDATA: '/appdata' }, 'win32')).toBe(
      join('/appdata', 'nearstore', 'db')
    );
  });
});

describe('resolveStorageDirectory', () => {
  it('nests the store under an explicit directory', () => {
    expect(resolveStorageDirectory({ name: 'db', directory: '/tmp/stores' })).toBe(join('/tmp/stores', 'db'));
  });
});
