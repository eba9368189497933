/**
 * AGI response parsing
 *
 * Every command is answered with one line of the shape
 * `200 result=<int> [payload]`. Anything else is a protocol error.
 */

import { ProtocolError } from '../errors';

export interface AgiResponse {
  code: 200;
  result: number;
  payload: string;
}

const RESPONSE_PATTERN = /^200 result=(-?\d+)\s?(.*)$/;

/**
 * Asterisk answers a malformed command with a multi-line usage block whose
 * first line starts with this prefix. One further line is consumed to get back
 * in step with the stream. Only this observed shape gets the treatment.
 */
export const INVALID_COMMAND_PREFIX = '520-Invalid';

export function parseResponse(line: string): AgiResponse {
  const match = RESPONSE_PATTERN.exec(line);
  if (!match) {
    throw new ProtocolError(`Unexpected result: ${line}`, { response: line });
  }

  return {
    code: 200,
    result: parseInt(match[1], 10),
    payload: match[2],
  };
}

export function needsResync(line: string): boolean {
  return line.startsWith(INVALID_COMMAND_PREFIX);
}

/**
 * Strip the parentheses Asterisk wraps variable values in: `(slin16)` -> `slin16`
 */
export function unwrapValue(payload: string): string {
  const match = /^\((.*)\)$/.exec(payload.trim());
  return match ? match[1] : payload.trim();
}

/**
 * Parse the `agi_<name>: <value>` header block sent before the first command
 */
export function parseEnvironmentLine(line: string): [string, string] | null {
  const match = /^agi_(\w+):\s*(.*)$/.exec(line);
  return match ? [match[1], match[2]] : null;
}
