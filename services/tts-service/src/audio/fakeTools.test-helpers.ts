import { promises as fs } from 'fs';
import type { ToolResult, ToolRunner } from './tools';

export interface ToolCall {
  file: string;
  args: string[];
}

/**
 * Stand-in for mpg123, sox and which. mpg123 writes its `-w` target, sox its
 * raw output; either can be told to fail.
 */
export class FakeToolRunner implements ToolRunner {
  readonly calls: ToolCall[] = [];
  soxVersion = 'sox:      SoX v14.4.2';
  failing = new Set<string>();
  missing = new Set<string>();
  rawContent = Buffer.from('raw-audio');
  /** Runs before a tool produces its output */
  beforeRun?: (call: ToolCall) => void | Promise<void>;

  async run(file: string, args: string[], signal?: AbortSignal): Promise<ToolResult> {
    const call = { file, args };
    this.calls.push(call);

    if (file === 'which') {
      if (this.missing.has(args[0])) {
        throw Object.assign(new Error(`which: no ${args[0]}`), { code: 1 });
      }
      return { stdout: `/usr/bin/${args[0]}\n`, stderr: '' };
    }

    if (args[0] === '--version') {
      return { stdout: `${this.soxVersion}\n`, stderr: '' };
    }

    await this.beforeRun?.(call);
    if (signal?.aborted) {
      throw Object.assign(new Error('The operation was aborted'), { code: 'ABORT_ERR' });
    }

    const tool = file.split('/').pop() ?? file;
    if (this.failing.has(tool)) {
      throw Object.assign(new Error(`Command failed: ${tool}`), { code: 2 });
    }

    if (tool === 'mpg123') {
      await fs.writeFile(args[args.indexOf('-w') + 1], 'RIFF-wave');
    } else if (tool === 'sox') {
      await fs.writeFile(args[args.indexOf('raw') + 1], this.rawContent);
    }

    return { stdout: '', stderr: '' };
  }

  callsTo(tool: string): ToolCall[] {
    return this.calls.filter((call) => call.file.endsWith(tool));
  }
}
