/**
 * External audio tools (mpg123, sox) are run through this seam so tests can
 * swap in fakes.
 */

import { execFile } from 'child_process';
import { CancelledError, ConfigurationError } from '../errors';

export interface ToolResult {
  stdout: string;
  stderr: string;
}

export interface ToolRunner {
  run(file: string, args: string[], signal?: AbortSignal): Promise<ToolResult>;
}

export class ExecFileRunner implements ToolRunner {
  async run(file: string, args: string[], signal?: AbortSignal): Promise<ToolResult> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    return new Promise<ToolResult>((resolve, reject) => {
      const child = execFile(file, args, { maxBuffer: 10 * 1024 * 1024, signal }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        if (!signal?.aborted) {
          reject(error);
          return;
        }
        // the abort only sends the kill; wait until the tool has closed its output files
        const cancelled = new CancelledError(`Session cancelled while running ${file}`, { cause: error });
        if (child.exitCode !== null || child.signalCode !== null) {
          reject(cancelled);
        } else {
          child.once('exit', () => reject(cancelled));
        }
      });
    });
  }
}

export interface ToolPaths {
  mpg123: string;
  sox: string;
}

/**
 * Resolve a tool name (or configured path) to an executable via `which`
 */
export async function locateTool(runner: ToolRunner, name: string): Promise<string> {
  try {
    const { stdout } = await runner.run('which', [name]);
    const resolved = stdout.trim().split('\n')[0];
    if (resolved) {
      return resolved;
    }
  } catch (error) {
    throw new ConfigurationError(`${name} is missing. Aborting.`, { cause: error });
  }
  throw new ConfigurationError(`${name} is missing. Aborting.`);
}

export async function locateTools(runner: ToolRunner, configured: ToolPaths): Promise<ToolPaths> {
  return {
    mpg123: await locateTool(runner, configured.mpg123),
    sox: await locateTool(runner, configured.sox),
  };
}
