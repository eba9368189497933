import { createInterface } from 'readline';
import { PassThrough } from 'stream';

export type Responder = (command: string) => string | string[];

export const DEFAULT_ENV: Record<string, string> = {
  request: 'agi-tts',
  channel: 'SIP/test-00000001',
  uniqueid: '1700000000.1',
};

/**
 * Scripted stand-in for the Asterisk side of an AGI session
 */
export function defaultResponder(overrides: Record<string, string | string[]> = {}): Responder {
  return (command) => {
    for (const [prefix, reply] of Object.entries(overrides)) {
      if (command.startsWith(prefix)) {
        return reply;
      }
    }
    if (command === 'CHANNEL STATUS') return '200 result=4';
    if (command === 'ANSWER') return '200 result=0';
    if (command.startsWith('STREAM FILE')) return '200 result=0 endpos=8000';
    if (command.startsWith('GET FULL VARIABLE')) return '200 result=1 (slin16)';
    if (command.startsWith('SET ')) return '200 result=0';
    return '200 result=0';
  };
}

export class FakeAsterisk {
  /** What the bridge reads */
  readonly input = new PassThrough();
  /** What the bridge writes */
  readonly output = new PassThrough();
  readonly commands: string[] = [];
  private responder: Responder;

  constructor(responder: Responder = defaultResponder()) {
    this.responder = responder;
    const reader = createInterface({ input: this.output });
    reader.on('line', (line) => {
      this.commands.push(line);
      const reply = this.responder(line);
      for (const response of Array.isArray(reply) ? reply : [reply]) {
        this.input.write(`${response}\n`);
      }
    });
  }

  setResponder(responder: Responder): void {
    this.responder = responder;
  }

  sendEnvironment(env: Record<string, string> = DEFAULT_ENV): void {
    for (const [name, value] of Object.entries(env)) {
      this.input.write(`agi_${name}: ${value}\n`);
    }
    this.input.write('\n');
  }

  hangup(): void {
    this.input.end();
  }

  commandsStartingWith(prefix: string): string[] {
    return this.commands.filter((command) => command.startsWith(prefix));
  }
}
