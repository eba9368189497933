/**
 * Resolves the raw audio format the channel expects. Resolution happens once
 * per session and the result is reused for every segment.
 */

import type { AgiChannel } from '../agi/AgiChannel';
import { unwrapValue } from '../agi/response';
import type { AudioFormatSpec } from '../types';

export const DEFAULT_FORMAT: AudioFormatSpec = { extension: 'sln', sampleRate: 8000 };

// First match wins
const NATIVE_FORMAT_TABLE: Array<{ pattern: RegExp; format: AudioFormatSpec }> = [
  { pattern: /(silk|sln)12/, format: { extension: 'sln12', sampleRate: 12000 } },
  { pattern: /(speex|slin|silk)16|g722|siren7/, format: { extension: 'sln16', sampleRate: 16000 } },
  { pattern: /(speex|slin|celt)32|siren14/, format: { extension: 'sln32', sampleRate: 32000 } },
  { pattern: /(celt|slin)44/, format: { extension: 'sln44', sampleRate: 44100 } },
  { pattern: /(celt|slin)48/, format: { extension: 'sln48', sampleRate: 48000 } },
];

const EXPLICIT_RATES: Record<number, AudioFormatSpec> = {
  12000: { extension: 'sln12', sampleRate: 12000 },
  16000: { extension: 'sln16', sampleRate: 16000 },
  32000: { extension: 'sln32', sampleRate: 32000 },
  44100: { extension: 'sln44', sampleRate: 44100 },
  48000: { extension: 'sln48', sampleRate: 48000 },
};

export function formatForRate(rate: number): AudioFormatSpec {
  return { ...(EXPLICIT_RATES[rate] ?? DEFAULT_FORMAT) };
}

export function formatForNativeCodec(nativeFormat: string): AudioFormatSpec {
  const entry = NATIVE_FORMAT_TABLE.find(({ pattern }) => pattern.test(nativeFormat));
  return { ...(entry?.format ?? DEFAULT_FORMAT) };
}

/**
 * Use the explicit rate when one is configured, otherwise ask the channel for
 * its native codec
 */
export async function negotiateFormat(channel: AgiChannel, explicitRate?: number): Promise<AudioFormatSpec> {
  if (explicitRate !== undefined) {
    return formatForRate(explicitRate);
  }

  const native = await channel.getFullVariable('CHANNEL(audionativeformat)');
  return native === null ? { ...DEFAULT_FORMAT } : formatForNativeCodec(unwrapValue(native));
}
