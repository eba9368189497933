/**
 * Transcoder.ts
 *
 * mp3 -> mono 16-bit wav (mpg123) -> raw audio at the channel rate (sox).
 * A speed factor other than 1 is applied by sox, either with the `tempo`
 * effect (sox 14.3 and later) or the older `stretch` effect.
 */

import { CancelledError, TranscodeError } from '../errors';
import { logger } from '../utils/logger';
import type { TempFiles } from '../playback/TempFiles';
import type { AudioFormatSpec } from '../types';
import type { ToolPaths, ToolRunner } from './tools';

export type SoxDialect = 'tempo' | 'stretch';

export function parseSoxVersion(output: string): { major: number; minor: number } | null {
  const match = /v(\d+)\.(\d+)/.exec(output);
  if (!match) {
    return null;
  }
  return { major: parseInt(match[1], 10), minor: parseInt(match[2], 10) };
}

export function dialectForVersion(version: { major: number; minor: number } | null): SoxDialect {
  if (!version) {
    return 'stretch';
  }
  return version.major > 14 || (version.major === 14 && version.minor >= 3) ? 'tempo' : 'stretch';
}

/**
 * Probe sox once per session
 */
export async function detectSoxDialect(runner: ToolRunner, soxPath: string): Promise<SoxDialect> {
  try {
    const { stdout } = await runner.run(soxPath, ['--version']);
    const dialect = dialectForVersion(parseSoxVersion(stdout));
    logger.debug({ version: stdout.trim(), dialect }, 'Detected sox dialect');
    return dialect;
  } catch (error) {
    logger.warn({ error }, 'Could not read sox version, using stretch effect');
    return 'stretch';
  }
}

export function speedEffect(dialect: SoxDialect, speed: number): string[] {
  if (speed === 1) {
    return [];
  }
  return dialect === 'tempo' ? ['tempo', '-s', String(speed)] : ['stretch', String(1 / speed), '80'];
}

export class Transcoder {
  private runner: ToolRunner;
  private tools: ToolPaths;
  private dialect: SoxDialect;

  constructor(runner: ToolRunner, tools: ToolPaths, dialect: SoxDialect) {
    this.runner = runner;
    this.tools = tools;
    this.dialect = dialect;
  }

  /**
   * Convert a compressed file to the channel's raw format. Returns the path of
   * the raw file, which stays registered with `temp`.
   */
  async transcode(
    mp3Path: string,
    format: AudioFormatSpec,
    speed: number,
    temp: TempFiles,
    signal?: AbortSignal
  ): Promise<string> {
    const wavPath = temp.acquire('wav');
    const rawPath = temp.acquire(format.extension);

    try {
      await this.invoke('mpg123', this.tools.mpg123, ['-q', '-m', '-w', wavPath, mp3Path], signal);
      await this.invoke(
        'sox',
        this.tools.sox,
        [
          wavPath,
          '-q',
          '-r',
          String(format.sampleRate),
          '-c',
          '1',
          '-t',
          'raw',
          rawPath,
          ...speedEffect(this.dialect, speed),
        ],
        signal
      );
    } finally {
      await temp.release(wavPath);
    }

    return rawPath;
  }

  private async invoke(tool: string, file: string, args: string[], signal?: AbortSignal): Promise<void> {
    try {
      await this.runner.run(file, args, signal);
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw new CancelledError(`Session cancelled while running ${tool}`, { cause: error });
      }
      if (error instanceof CancelledError) {
        throw error;
      }
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
      throw new TranscodeError(tool, `${tool} failed to process audio (exit code ${code})`, { cause: error });
    }
  }
}
