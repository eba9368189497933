/**
 * Session configuration
 *
 * Built once from the AGI arguments and the environment, validated, frozen and
 * handed to every component. Nothing else reads process state.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { ToolPaths } from './audio/tools';

export const ALL_INTERRUPT_KEYS = '0123456789#*';

export const DEFAULT_TOKEN_URL = 'https://datamarket.accesscontrol.windows.net/v2/OAuth2-13';
export const DEFAULT_SCOPE = 'http://api.microsofttranslator.com';
export const DEFAULT_SPEAK_URL = 'http://api.microsofttranslator.com/V2/Http.svc/Speak';
export const DEFAULT_CACHE_DIR = '/var/lib/asterisk/sounds/tts';

export interface SessionConfig {
  readonly text: string;
  readonly language: string;
  readonly interruptKeys: string;
  readonly speed: number;
  /** Explicit channel sample rate; negotiated with the channel when absent */
  readonly sampleRate?: number;
  readonly cache: { readonly enabled: boolean; readonly dir: string };
  readonly tmpDir: string;
  readonly token: {
    readonly url: string;
    readonly scope: string;
    readonly clientId: string;
    readonly clientSecret: string;
    readonly file: string;
  };
  readonly speech: { readonly url: string; readonly timeoutMs: number };
  readonly tools: Readonly<ToolPaths>;
  /** Mirror progress messages to the channel as NOOP commands */
  readonly debug: boolean;
}

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const flag = z.preprocess(
  emptyToUndefined,
  z
    .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
    .optional()
    .transform((value) => (value === undefined ? undefined : ['1', 'true', 'yes', 'on'].includes(value)))
);

const argsSchema = z.object({
  text: z.string({ required_error: 'No text passed for synthesis' }),
  language: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .regex(/^[a-z]{2,3}(-[A-Za-z0-9]{2,8})*$/, 'Invalid language setting')
      .default('en-US')
  ),
  interruptKeys: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .transform((keys) => (keys === 'any' ? ALL_INTERRUPT_KEYS : keys))
      .pipe(z.string().regex(/^[0-9*#]*$/, 'Invalid interrupt keys'))
      .default('')
  ),
  speed: z.preprocess(
    emptyToUndefined,
    z.coerce
      .number({ invalid_type_error: 'Invalid speed factor' })
      .positive('Invalid speed factor')
      .max(4, 'Invalid speed factor')
      .default(1)
  ),
});

const envSchema = z.object({
  TTS_CLIENT_ID: z.string({ required_error: 'Missing client ID' }).min(1, 'Missing client ID'),
  TTS_CLIENT_SECRET: z.string({ required_error: 'Missing client secret' }).min(1, 'Missing client secret'),
  TTS_CACHE: flag,
  TTS_CACHE_DIR: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_CACHE_DIR)),
  TTS_TMP_DIR: z.preprocess(emptyToUndefined, z.string().optional()),
  TTS_TOKEN_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  TTS_TOKEN_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_TOKEN_URL)),
  TTS_SCOPE: z.preprocess(emptyToUndefined, z.string().default(DEFAULT_SCOPE)),
  TTS_SPEAK_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_SPEAK_URL)),
  TTS_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(10000)),
  TTS_SAMPLE_RATE: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  TTS_DEBUG: flag,
  MPG123_PATH: z.preprocess(emptyToUndefined, z.string().default('mpg123')),
  SOX_PATH: z.preprocess(emptyToUndefined, z.string().default('sox')),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * @param args positional AGI arguments: text, language, interrupt keys, speed
 */
export function loadConfig(args: string[], env: NodeJS.ProcessEnv): SessionConfig {
  const parsedArgs = argsSchema.safeParse({
    text: args[0],
    language: args[1],
    interruptKeys: args[2],
    speed: args[3],
  });
  if (!parsedArgs.success) {
    throw new ConfigurationError(describeIssues(parsedArgs.error), { context: { issues: parsedArgs.error.issues } });
  }

  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError(describeIssues(parsedEnv.error), { context: { issues: parsedEnv.error.issues } });
  }

  const a = parsedArgs.data;
  const e = parsedEnv.data;
  const tmpDir = e.TTS_TMP_DIR ?? os.tmpdir();

  const config: SessionConfig = {
    text: a.text,
    language: a.language,
    interruptKeys: a.interruptKeys,
    speed: a.speed,
    sampleRate: e.TTS_SAMPLE_RATE,
    cache: { enabled: e.TTS_CACHE ?? true, dir: e.TTS_CACHE_DIR },
    tmpDir,
    token: {
      url: e.TTS_TOKEN_URL,
      scope: e.TTS_SCOPE,
      clientId: e.TTS_CLIENT_ID,
      clientSecret: e.TTS_CLIENT_SECRET,
      file: e.TTS_TOKEN_FILE ?? path.join(os.tmpdir(), 'agi-tts-token'),
    },
    speech: { url: e.TTS_SPEAK_URL, timeoutMs: e.TTS_TIMEOUT_MS },
    tools: { mpg123: e.MPG123_PATH, sox: e.SOX_PATH },
    debug: e.TTS_DEBUG ?? false,
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
