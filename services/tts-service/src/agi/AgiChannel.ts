/**
 * AgiChannel.ts
 *
 * Line-oriented client for the Asterisk Gateway Interface. One command is
 * written per line and exactly one status line is read back for it.
 */

import { createInterface, Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import { CancelledError, ProtocolError } from '../errors';
import { logger } from '../utils/logger';
import type { PlaybackOutcome } from '../types';
import {
  type AgiResponse,
  needsResync,
  parseEnvironmentLine,
  parseResponse,
} from './response';

/** CHANNEL STATUS result for a channel that is already up */
export const CHANNEL_STATUS_UP = 4;

const INTERRUPT_KEY_PATTERN = /^[A-Za-z0-9*#]$/;

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

export interface AgiChannelOptions {
  input: Readable;
  output: Writable;
  signal?: AbortSignal;
}

export class AgiChannel {
  private readonly output: Writable;
  private readonly reader: Interface;
  private readonly signal?: AbortSignal;
  private lines: string[] = [];
  private pending: PendingRead | null = null;
  private closed: boolean = false;
  private outputError: Error | null = null;

  constructor(options: AgiChannelOptions) {
    this.output = options.output;
    this.signal = options.signal;
    this.reader = createInterface({ input: options.input, crlfDelay: Infinity });

    this.reader.on('line', (line) => {
      if (this.pending) {
        const { resolve } = this.pending;
        this.pending = null;
        resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.reader.on('close', () => {
      this.closed = true;
      this.rejectPending(new ProtocolError('Channel closed the connection'));
    });

    // a dead pipe (EPIPE) must fail the session, not the process
    this.output.on('error', (error: Error) => {
      logger.warn({ error }, 'AGI output stream failed');
      this.outputError = error;
      this.rejectPending(new ProtocolError('Channel output failed', { cause: error }));
    });

    this.signal?.addEventListener('abort', this.onAbort, { once: true });
  }

  /**
   * Consume the `agi_*` header block that precedes the first command
   */
  public async readEnvironment(): Promise<Record<string, string>> {
    const env: Record<string, string> = {};

    for (;;) {
      const line = await this.readLine();
      if (line.length === 0) {
        break;
      }
      const entry = parseEnvironmentLine(line);
      if (entry) {
        env[entry[0]] = entry[1];
      }
    }

    return env;
  }

  /**
   * Send one command and parse its response line
   */
  public async sendCommand(command: string): Promise<AgiResponse> {
    if (this.signal?.aborted) {
      throw new CancelledError();
    }
    if (this.outputError) {
      throw new ProtocolError('Channel output failed', { cause: this.outputError });
    }

    this.output.write(`${command}\n`);
    const line = await this.readLine();

    if (needsResync(line)) {
      const extra = await this.readLine();
      throw new ProtocolError(`Unexpected result: ${line}`, { response: `${line}\n${extra}` });
    }

    const response = parseResponse(line);
    logger.trace({ command, response: line }, 'AGI command returned');
    return response;
  }

  public async channelStatus(): Promise<number> {
    const response = await this.sendCommand('CHANNEL STATUS');
    return response.result;
  }

  public async answer(): Promise<void> {
    const response = await this.sendCommand('ANSWER');
    if (response.result !== 0) {
      throw new ProtocolError('Failed to answer channel', { response: `result=${response.result}` });
    }
  }

  /**
   * Answer the channel unless it is already up
   */
  public async ensureAnswered(): Promise<void> {
    const status = await this.channelStatus();
    if (status !== CHANNEL_STATUS_UP) {
      await this.answer();
    }
  }

  /**
   * Play a file (path without extension), allowing the caller to interrupt
   * with any of `keys`
   */
  public async streamFile(path: string, keys: string): Promise<PlaybackOutcome> {
    const response = await this.sendCommand(`STREAM FILE ${path} "${keys}"`);

    if (response.result === -1) {
      return { kind: 'failed', code: response.result };
    }

    if (response.result >= 32) {
      const key = String.fromCharCode(response.result);
      if (INTERRUPT_KEY_PATTERN.test(key)) {
        return { kind: 'interrupted', key };
      }
    }

    return { kind: 'continue' };
  }

  public async setExtension(extension: string): Promise<void> {
    await this.sendCommand(`SET EXTENSION ${extension}`);
  }

  public async setPriority(priority: number): Promise<void> {
    await this.sendCommand(`SET PRIORITY ${priority}`);
  }

  /**
   * Evaluate a dialplan expression, e.g. `CHANNEL(audionativeformat)`.
   * Returns null when the variable is not set.
   */
  public async getFullVariable(expression: string): Promise<string | null> {
    const response = await this.sendCommand(`GET FULL VARIABLE \${${expression}}`);
    return response.result === 1 ? response.payload : null;
  }

  /**
   * Diagnostic message visible in AGI debug traces
   */
  public async noop(message: string): Promise<void> {
    const clean = message.replace(/"/g, "'").replace(/[\r\n]+/g, ' ');
    await this.sendCommand(`NOOP "${clean}"`);
  }

  public close(): void {
    this.signal?.removeEventListener('abort', this.onAbort);
    this.reader.close();
  }

  private readLine(): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this.closed) {
      return Promise.reject(new ProtocolError('Channel closed the connection'));
    }

    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  private onAbort = (): void => {
    this.rejectPending(new CancelledError());
  };

  private rejectPending(error: Error): void {
    if (this.pending) {
      const { reject } = this.pending;
      this.pending = null;
      reject(error);
    }
  }
}
