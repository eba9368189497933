/**
 * Session setup: reads the AGI environment, validates configuration, probes
 * the toolchain, negotiates the channel format and hands the segments to the
 * playback controller.
 */

import type { AxiosInstance } from 'axios';
import type { Readable, Writable } from 'stream';
import { AgiChannel } from './agi/AgiChannel';
import { negotiateFormat } from './audio/FormatNegotiator';
import { ExecFileRunner, locateTools, type ToolRunner } from './audio/tools';
import { detectSoxDialect, Transcoder } from './audio/Transcoder';
import { AudioCache } from './cache/AudioCache';
import { loadConfig } from './config';
import { BridgeError, CancelledError } from './errors';
import { PlaybackController } from './playback/PlaybackController';
import { SpeechClient } from './providers/SpeechClient';
import { TokenManager } from './providers/TokenManager';
import { prepareSegments } from './text/segmenter';
import type { SessionResult } from './types';
import { logger, type Logger } from './utils/logger';

export interface SessionIO {
  input: Readable;
  output: Writable;
  signal?: AbortSignal;
  /** Overrides for tests */
  runner?: ToolRunner;
  httpClient?: AxiosInstance;
  now?: () => number;
}

export async function runSession(args: string[], env: NodeJS.ProcessEnv, io: SessionIO): Promise<SessionResult> {
  const channel = new AgiChannel({ input: io.input, output: io.output, signal: io.signal });
  let log: Logger = logger;

  try {
    const agiEnv = await channel.readEnvironment();
    log = logger.child({ channel: agiEnv.channel, uniqueid: agiEnv.uniqueid });

    const config = loadConfig(args, env);
    const runner = io.runner ?? new ExecFileRunner();
    const tools = await locateTools(runner, config.tools);
    const dialect = await detectSoxDialect(runner, tools.sox);

    const segments = prepareSegments(config.text);
    if (segments.length === 0) {
      log.warn('No text passed for synthesis');
      return { state: 'completed', segments: 0 };
    }

    await channel.ensureAnswered();
    const format = await negotiateFormat(channel, config.sampleRate);
    const cache = await AudioCache.open({
      cacheDir: config.cache.dir,
      extension: format.extension,
      enabled: config.cache.enabled,
    });

    log.debug({ format, dialect, cache: cache.isEnabled(), segments: segments.length }, 'Session ready');

    const controller = new PlaybackController({
      channel,
      cache,
      format,
      tokens: new TokenManager(
        {
          tokenUrl: config.token.url,
          clientId: config.token.clientId,
          clientSecret: config.token.clientSecret,
          scope: config.token.scope,
          tokenFile: config.token.file,
          timeoutMs: config.speech.timeoutMs,
          now: io.now,
        },
        io.httpClient
      ),
      speech: new SpeechClient({ speakUrl: config.speech.url, timeoutMs: config.speech.timeoutMs }, io.httpClient),
      transcoder: new Transcoder(runner, tools, dialect),
      settings: {
        language: config.language,
        speed: config.speed,
        interruptKeys: config.interruptKeys,
        tmpDir: config.tmpDir,
        debug: config.debug,
      },
      signal: io.signal,
      logger: log,
    });

    return await controller.run(segments);
  } catch (error) {
    const failure = BridgeError.from(error);
    log.error({ error: failure }, failure.message);
    if (!(failure instanceof CancelledError || io.signal?.aborted)) {
      await channel.noop(failure.message).catch((noopError: unknown) => {
        log.warn({ error: noopError }, 'Could not report failure to the channel');
      });
    }
    return { state: 'aborted', segments: 0, error: failure };
  } finally {
    channel.close();
  }
}
