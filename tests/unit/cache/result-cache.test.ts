/**
 * Unit tests for the result cache
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ResultCache, hashContent } from '../../../src/lib/cache/index.js';
import type { ValidationIssue } from '../../../src/types/data-model.js';

const issue: ValidationIssue = {
  kind: 'missing',
  location: '$.fqn',
  message: "'fqn' attribute missing",
  detail: { type: 'required', msg: "must have required property 'fqn'" },
};

describe('hashContent()', () => {
  it('should produce a hex sha256 digest', () => {
    expect(hashContent('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('ResultCache', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'schemax-cache-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should build keys from path, content hash, rule and settings', () => {
    expect(
      ResultCache.key({ filePath: 'a.yaml', contentHash: 'abc', ruleId: 'PSX_VAL1', settings: 'none' }),
    ).toBe('a.yaml:abc:PSX_VAL1:none');
  });

  it('should store and return issues', () => {
    const cache = new ResultCache();
    cache.set('k', [issue]);

    expect(cache.get('k')).toEqual([issue]);
    expect(cache.get('other')).toBeUndefined();
  });

  it('should evict the least recently used entry', () => {
    const cache = new ResultCache({ maxEntries: 2 });
    cache.set('a', []);
    cache.set('b', []);
    cache.get('a');
    cache.set('c', []);

    expect(cache.size()).toBe(2);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toEqual([]);
    expect(cache.get('c')).toEqual([]);
  });

  it('should ignore reads and writes when disabled', () => {
    const noRead = new ResultCache({ read: false });
    noRead.set('k', [issue]);
    expect(noRead.get('k')).toBeUndefined();
    expect(noRead.size()).toBe(1);

    const noWrite = new ResultCache({ write: false });
    noWrite.set('k', [issue]);
    expect(noWrite.size()).toBe(0);
  });

  it('should persist entries and load them back', async () => {
    const persistPath = join(tempDir, 'nested', 'results.json');

    const cache = await ResultCache.open({ persistPath });
    cache.set('k', [issue]);
    await cache.save();

    const reopened = await ResultCache.open({ persistPath });
    expect(reopened.get('k')).toEqual([issue]);
  });

  it('should skip saving when nothing changed', async () => {
    const persistPath = join(tempDir, 'results.json');
    const cache = await ResultCache.open({ persistPath });

    await cache.save();

    await expect(readFile(persistPath, 'utf-8')).rejects.toThrow();
  });

  it('should not save when writing is disabled', async () => {
    const persistPath = join(tempDir, 'results.json');
    const cache = await ResultCache.open({ persistPath, write: false });
    cache.set('k', [issue]);

    await cache.save();

    await expect(readFile(persistPath, 'utf-8')).rejects.toThrow();
  });

  it('should start empty from a corrupt cache file', async () => {
    const persistPath = join(tempDir, 'results.json');
    await writeFile(persistPath, '{ not json', 'utf-8');

    const cache = await ResultCache.open({ persistPath });

    expect(cache.size()).toBe(0);
  });

  it('should start empty from a cache file with another layout', async () => {
    const persistPath = join(tempDir, 'results.json');
    await writeFile(persistPath, JSON.stringify({ version: 99, entries: [] }), 'utf-8');

    const cache = await ResultCache.open({ persistPath });

    expect(cache.size()).toBe(0);
  });

  it('should not serve persisted entries when reading is disabled', async () => {
    const persistPath = join(tempDir, 'results.json');
    const writer = await ResultCache.open({ persistPath });
    writer.set('k', [issue]);
    await writer.save();

    const cache = await ResultCache.open({ persistPath, read: false });

    expect(cache.get('k')).toBeUndefined();
  });

  it('should keep persisted entries when saving with reading disabled', async () => {
    const persistPath = join(tempDir, 'results.json');
    const writer = await ResultCache.open({ persistPath });
    writer.set('old', [issue]);
    await writer.save();

    const noRead = await ResultCache.open({ persistPath, read: false });
    noRead.set('new', []);
    await noRead.save();

    const reopened = await ResultCache.open({ persistPath });
    expect(reopened.size()).toBe(2);
    expect(reopened.get('old')).toEqual([issue]);
    expect(reopened.get('new')).toEqual([]);
  });

  it('should raise FileIOError when the cache cannot be written', async () => {
    const blocker = join(tempDir, 'blocker');
    await writeFile(blocker, 'file in the way', 'utf-8');
    const cache = await ResultCache.open({ persistPath: join(blocker, 'results.json') });
    cache.set('k', []);

    await expect(cache.save()).rejects.toMatchObject({ code: 'FILE_IO_ERROR' });
  });
});
