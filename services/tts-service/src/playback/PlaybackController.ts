/**
 * PlaybackController.ts
 *
 * Drives one AGI session through its segments, in order:
 * CacheCheck → (hit) Stream | (miss) Authenticate → Synthesize → Transcode →
 * Stream → CacheCommit. An interrupt key ends the session early; any error
 * aborts it.
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import type { AgiChannel } from '../agi/AgiChannel';
import type { Transcoder } from '../audio/Transcoder';
import { AudioCache, deriveCacheKey, streamPath } from '../cache/AudioCache';
import {
  BridgeError,
  CancelledError,
  ProtocolError,
  TokenError,
  throwIfCancelled,
} from '../errors';
import type { SpeechClient } from '../providers/SpeechClient';
import type { TokenManager } from '../providers/TokenManager';
import type { AudioFormatSpec, PlaybackOutcome, SessionResult } from '../types';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { withTempFiles } from './TempFiles';

export enum SegmentStage {
  CACHE_CHECK = 'cache_check',
  AUTHENTICATE = 'authenticate',
  SYNTHESIZE = 'synthesize',
  TRANSCODE = 'transcode',
  STREAM = 'stream',
  CACHE_COMMIT = 'cache_commit',
}

export interface PlaybackSettings {
  language: string;
  speed: number;
  interruptKeys: string;
  tmpDir: string;
  debug: boolean;
}

export interface PlaybackDependencies {
  channel: AgiChannel;
  cache: AudioCache;
  tokens: TokenManager;
  speech: SpeechClient;
  transcoder: Transcoder;
  format: AudioFormatSpec;
  settings: PlaybackSettings;
  signal?: AbortSignal;
  logger?: Logger;
}

type StreamResult = Exclude<PlaybackOutcome, { kind: 'failed' }>;

export class PlaybackController extends EventEmitter {
  private deps: PlaybackDependencies;
  private log: Logger;
  private stage: SegmentStage = SegmentStage.CACHE_CHECK;

  constructor(deps: PlaybackDependencies) {
    super();
    this.deps = deps;
    this.log = deps.logger ?? rootLogger;
  }

  public getStage(): SegmentStage {
    return this.stage;
  }

  /**
   * Play every segment in order. Never throws; failures come back as an
   * aborted result.
   */
  public async run(segments: Iterable<string>): Promise<SessionResult> {
    let played = 0;

    try {
      for (const segment of segments) {
        this.emit('segment:start', { index: played, text: segment });
        const outcome = await this.processSegment(segment, played);
        played++;
        this.emit('segment:played', { index: played - 1, outcome });

        if (outcome.kind === 'interrupted') {
          await this.deps.channel.setExtension(outcome.key);
          await this.deps.channel.setPriority(1);
          this.log.info({ key: outcome.key, segments: played }, 'Playback interrupted by caller');
          return this.finish({ state: 'interrupted', segments: played, key: outcome.key });
        }
      }
    } catch (error) {
      const failure = BridgeError.from(error);
      await this.reportFatal(failure);
      return this.finish({ state: 'aborted', segments: played, error: failure });
    }

    return this.finish({ state: 'completed', segments: played });
  }

  private async processSegment(text: string, index: number): Promise<StreamResult> {
    const { cache, settings, signal } = this.deps;
    throwIfCancelled(signal);

    this.stage = SegmentStage.CACHE_CHECK;
    const key = deriveCacheKey(text, settings.language, settings.speed);
    const cached = await cache.lookup(key);

    if (cached) {
      this.log.debug({ index, key }, 'Playing cached segment');
      this.emit('segment:cached', { index, key, path: cached });
      return this.stream(cached);
    }

    await this.verbose(`Text to speech: ${text}`);

    return withTempFiles(settings.tmpDir, async (temp) => {
      const { tokens, speech, transcoder, format } = this.deps;

      this.stage = SegmentStage.AUTHENTICATE;
      const token = await tokens.getToken(signal);
      if (!token) {
        throw new TokenError('No usable access token');
      }

      this.stage = SegmentStage.SYNTHESIZE;
      const audio = await speech.synthesize(text, settings.language, token, signal);
      const mp3Path = temp.acquire('mp3');
      await fs.writeFile(mp3Path, audio);

      this.stage = SegmentStage.TRANSCODE;
      const rawPath = await transcoder.transcode(mp3Path, format, settings.speed, temp, signal);
      await temp.release(mp3Path);
      this.emit('segment:synthesized', { index, key, bytes: audio.length });

      const outcome = await this.stream(rawPath);

      if (cache.isEnabled()) {
        this.stage = SegmentStage.CACHE_COMMIT;
        try {
          await cache.commit(rawPath, key);
          temp.forget(rawPath);
        } catch (error) {
          // the segment was already played; the file is removed with the scope
          this.log.warn({ error, key }, 'Failed to commit segment to cache');
        }
      }

      return outcome;
    });
  }

  private async stream(file: string): Promise<StreamResult> {
    this.stage = SegmentStage.STREAM;
    const outcome = await this.deps.channel.streamFile(streamPath(file), this.deps.settings.interruptKeys);

    if (outcome.kind === 'failed') {
      throw new ProtocolError(`Failed to play ${streamPath(file)}`, { response: `result=${outcome.code}` });
    }
    return outcome;
  }

  private async verbose(message: string): Promise<void> {
    if (this.deps.settings.debug) {
      await this.deps.channel.noop(message);
    }
  }

  private async reportFatal(error: BridgeError): Promise<void> {
    this.log.error({ error, stage: this.stage }, error.message);

    // nobody is listening once the call has been torn down
    if (error instanceof CancelledError || this.deps.signal?.aborted) {
      return;
    }

    try {
      await this.deps.channel.noop(error.message);
    } catch (noopError) {
      this.log.warn({ error: noopError }, 'Could not report failure to the channel');
    }
  }

  private finish(result: SessionResult): SessionResult {
    this.emit('session:end', result);
    return result;
  }
}
