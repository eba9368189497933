/**
 * Temporary files owned by the segment in flight. `cleanup()` runs in a
 * finally block so the files go away on success, error and cancellation alike.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

export class TempFiles {
  private readonly dir: string;
  private readonly stem: string;
  private files: Set<string> = new Set();

  constructor(dir: string) {
    this.dir = dir;
    this.stem = `agi-tts-${uuidv4()}`;
  }

  /**
   * Reserve a path with the given extension; all paths of one scope share a stem
   */
  acquire(extension: string): string {
    const file = path.join(this.dir, `${this.stem}.${extension}`);
    this.files.add(file);
    return file;
  }

  /**
   * Delete one file now
   */
  async release(file: string): Promise<void> {
    this.files.delete(file);
    await fs.rm(file, { force: true });
  }

  /**
   * Stop tracking a file that was moved elsewhere
   */
  forget(file: string): void {
    this.files.delete(file);
  }

  tracked(): string[] {
    return Array.from(this.files);
  }

  async cleanup(): Promise<void> {
    const files = this.tracked();
    this.files.clear();

    const results = await Promise.allSettled(files.map((file) => fs.rm(file, { force: true })));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.warn({ file: files[index], error: result.reason }, 'Failed to remove temporary file');
      }
    });
  }
}

/**
 * Run `fn` with a fresh scope and always clean it up afterwards
 */
export async function withTempFiles<T>(dir: string, fn: (temp: TempFiles) => Promise<T>): Promise<T> {
  const temp = new TempFiles(dir);
  try {
    return await fn(temp);
  } finally {
    await temp.cleanup();
  }
}
