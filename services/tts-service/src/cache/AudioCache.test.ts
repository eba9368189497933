import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AudioCache, cachePathFits, deriveCacheKey, MAX_CACHE_PATH_LENGTH, streamPath } from './AudioCache';

describe('deriveCacheKey', () => {
  it('is a stable md5 of text, language and speed', () => {
    const key = deriveCacheKey('Hello world.', 'en-US', 1);

    expect(key).toMatch(/^[0-9a-f]{32}$/);
    expect(deriveCacheKey('Hello world.', 'en-US', 1)).toBe(key);
  });

  it('changes with any input', () => {
    const key = deriveCacheKey('Hello world.', 'en-US', 1);

    expect(deriveCacheKey('Hello world!', 'en-US', 1)).not.toBe(key);
    expect(deriveCacheKey('Hello world.', 'en-GB', 1)).not.toBe(key);
    expect(deriveCacheKey('Hello world.', 'en-US', 1.5)).not.toBe(key);
  });
});

describe('cachePathFits', () => {
  it('counts the separator, key, dot and extension', () => {
    // 1 + 32 + 1 + 5 = 39 characters on top of the directory
    const limit = MAX_CACHE_PATH_LENGTH - 39;

    expect(cachePathFits('/'.padEnd(limit - 1, 'a'), 'sln16')).toBe(true);
    expect(cachePathFits('/'.padEnd(limit, 'a'), 'sln16')).toBe(false);
  });
});

describe('streamPath', () => {
  it('drops the extension', () => {
    expect(streamPath('/var/cache/tts/abc.sln16')).toBe('/var/cache/tts/abc');
    expect(streamPath('/tmp/agi-tts-1')).toBe('/tmp/agi-tts-1');
  });
});

describe('AudioCache', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agi-tts-cache-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates the cache directory on open', async () => {
    const cacheDir = path.join(root, 'nested', 'tts');

    const cache = await AudioCache.open({ cacheDir, extension: 'sln16', enabled: true });

    expect(cache.isEnabled()).toBe(true);
    await expect(fs.stat(cacheDir)).resolves.toBeTruthy();
  });

  it('misses, commits, then hits', async () => {
    const cache = await AudioCache.open({ cacheDir: root, extension: 'sln', enabled: true });
    const key = deriveCacheKey('Hello world.', 'en-US', 1);
    const temp = path.join(root, 'staged.sln');
    await fs.writeFile(temp, 'raw-audio');

    await expect(cache.lookup(key)).resolves.toBeNull();

    const target = await cache.commit(temp, key);

    expect(target).toBe(path.join(root, `${key}.sln`));
    await expect(cache.lookup(key)).resolves.toBe(target);
    await expect(fs.readFile(target, 'utf8')).resolves.toBe('raw-audio');
    await expect(fs.access(temp)).rejects.toThrow();
  });

  it('never hits when disabled', async () => {
    const cache = await AudioCache.open({ cacheDir: root, extension: 'sln', enabled: false });
    const key = deriveCacheKey('Hello world.', 'en-US', 1);
    await fs.writeFile(cache.pathFor(key), 'raw-audio');

    expect(cache.isEnabled()).toBe(false);
    expect(cache.getDegradedReason()).toBeNull();
    await expect(cache.lookup(key)).resolves.toBeNull();
  });

  it('disables itself when the path would be too long', async () => {
    const cacheDir = path.join(root, 'x'.repeat(MAX_CACHE_PATH_LENGTH));

    const cache = await AudioCache.open({ cacheDir, extension: 'sln16', enabled: true });

    expect(cache.isEnabled()).toBe(false);
    expect(cache.getDegradedReason()).toBe('Cache path is too long');
    await expect(cache.lookup('0'.repeat(32))).resolves.toBeNull();
  });

  it('disables itself when the directory cannot be created', async () => {
    const blocker = path.join(root, 'file');
    await fs.writeFile(blocker, '');

    const cache = await AudioCache.open({ cacheDir: path.join(blocker, 'tts'), extension: 'sln', enabled: true });

    expect(cache.isEnabled()).toBe(false);
    expect(cache.getDegradedReason()).toBe('Cache directory is not writable');
  });
});
