/**
 * Unit tests for location rendering
 */

import { describe, it, expect } from 'vitest';
import { formatLocation, pointerToPath, valueAt } from '../../../src/lib/validator/location.js';

describe('formatLocation()', () => {
  it('should render the root as $', () => {
    expect(formatLocation([])).toBe('$');
  });

  it('should render keys with dots and indices with brackets', () => {
    expect(formatLocation(['columns', 0, 'name'])).toBe('$.columns[0].name');
  });
});

describe('pointerToPath()', () => {
  const document = {
    columns: [{ name: 'id' }, { name: 'code' }],
    metadata: { '7': 'lucky', 'a/b': 'slash', 'c~d': 'tilde' },
  };

  it('should map an empty pointer to the root', () => {
    expect(pointerToPath(document, '')).toEqual([]);
  });

  it('should turn tokens under sequences into indices', () => {
    expect(pointerToPath(document, '/columns/1/name')).toEqual(['columns', 1, 'name']);
  });

  it('should keep numeric-looking mapping keys as strings', () => {
    expect(pointerToPath(document, '/metadata/7')).toEqual(['metadata', '7']);
  });

  it('should unescape JSON Pointer tokens', () => {
    expect(pointerToPath(document, '/metadata/a~1b')).toEqual(['metadata', 'a/b']);
    expect(pointerToPath(document, '/metadata/c~0d')).toEqual(['metadata', 'c~d']);
  });
});

describe('valueAt()', () => {
  const document = { columns: [{ name: 'id', type: 'integer' }] };

  it('should follow keys and indices', () => {
    expect(valueAt(document, ['columns', 0, 'type'])).toBe('integer');
  });

  it('should return undefined for absent paths', () => {
    expect(valueAt(document, ['columns', 3, 'type'])).toBeUndefined();
    expect(valueAt(document, ['columns', 0, 'type', 'deeper'])).toBeUndefined();
    expect(valueAt(document, ['columns', 'first'])).toBeUndefined();
  });
});
