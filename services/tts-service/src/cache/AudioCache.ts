/**
 * AudioCache.ts
 *
 * On-disk cache of transcoded segments, addressed by a hash of the text,
 * language and speed. Files are raw audio named `<key>.<extension>`. Entries
 * appear only through an atomic rename and are never evicted here.
 */

import { createHash } from 'crypto';
import { promises as fs, constants as fsConstants } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import type { FormatTag } from '../types';

/** Longest cache file path the filesystem will take */
export const MAX_CACHE_PATH_LENGTH = 4096;

const KEY_LENGTH = 32;

/**
 * Deterministic cache key for a segment
 */
export function deriveCacheKey(text: string, language: string, speed: number): string {
  return createHash('md5').update(`${text} ${language} ${speed}`).digest('hex');
}

export function cachePathFits(cacheDir: string, extension: string): boolean {
  // separator + key + dot + extension
  return cacheDir.length + 1 + KEY_LENGTH + 1 + extension.length < MAX_CACHE_PATH_LENGTH;
}

/**
 * STREAM FILE takes the path without its extension
 */
export function streamPath(filePath: string): string {
  const ext = path.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export interface AudioCacheOptions {
  cacheDir: string;
  extension: FormatTag;
  enabled: boolean;
}

export class AudioCache {
  public readonly cacheDir: string;
  public readonly extension: FormatTag;
  private enabled: boolean;
  private degradedReason: string | null = null;

  private constructor(options: AudioCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.extension = options.extension;
    this.enabled = options.enabled;
  }

  /**
   * Validate the cache location. Problems disable caching for the session
   * instead of failing it.
   */
  static async open(options: AudioCacheOptions): Promise<AudioCache> {
    const cache = new AudioCache(options);
    if (!options.enabled) {
      return cache;
    }

    if (!cachePathFits(options.cacheDir, options.extension)) {
      cache.degrade('Cache path is too long');
      return cache;
    }

    try {
      await fs.mkdir(options.cacheDir, { recursive: true });
      await fs.access(options.cacheDir, fsConstants.W_OK);
    } catch (error) {
      cache.degrade('Cache directory is not writable', error);
    }

    return cache;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Why caching was switched off, if it was
   */
  public getDegradedReason(): string | null {
    return this.degradedReason;
  }

  public pathFor(key: string): string {
    return path.join(this.cacheDir, `${key}.${this.extension}`);
  }

  /**
   * Path of a readable cache entry, or null on a miss
   */
  public async lookup(key: string): Promise<string | null> {
    if (!this.enabled) {
      return null;
    }

    const file = this.pathFor(key);
    try {
      await fs.access(file, fsConstants.R_OK);
      return file;
    } catch {
      logger.debug({ key }, 'Cache miss');
      return null;
    }
  }

  /**
   * Move a finished temp file into the cache under its final name
   */
  public async commit(tempPath: string, key: string): Promise<string> {
    const target = this.pathFor(key);

    try {
      await fs.rename(tempPath, target);
    } catch (error) {
      if (!isCrossDevice(error)) {
        throw error;
      }
      // copy next to the target first so the final name still appears atomically
      const staging = path.join(this.cacheDir, `.${uuidv4()}.tmp`);
      try {
        await fs.copyFile(tempPath, staging);
        await fs.rename(staging, target);
      } finally {
        await fs.rm(staging, { force: true });
      }
      await fs.rm(tempPath, { force: true });
    }

    logger.debug({ key, target }, 'Committed segment to cache');
    return target;
  }

  private degrade(reason: string, error?: unknown): void {
    this.enabled = false;
    this.degradedReason = reason;
    logger.warn({ cacheDir: this.cacheDir, reason, error }, 'Caching disabled for this session');
  }
}

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}
