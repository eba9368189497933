import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { AgiChannel } from '../agi/AgiChannel';
import { defaultResponder, FakeAsterisk } from '../agi/FakeAsterisk.test-helpers';
import { FakeToolRunner } from '../audio/fakeTools.test-helpers';
import { Transcoder } from '../audio/Transcoder';
import { AudioCache, deriveCacheKey } from '../cache/AudioCache';
import { CancelledError, FetchError, ProtocolError, TokenError } from '../errors';
import { fakeHttp, type FakeReply, type RecordedRequest } from '../providers/fakeHttp.test-helpers';
import { SpeechClient } from '../providers/SpeechClient';
import { TokenManager } from '../providers/TokenManager';
import type { SessionResult } from '../types';
import { PlaybackController, SegmentStage } from './PlaybackController';

const KEYS = '0123456789#*';

function speechApi(overrides: { token?: FakeReply; speech?: FakeReply } = {}) {
  return (request: RecordedRequest): FakeReply => {
    if (request.method === 'POST') {
      return overrides.token ?? { status: 200, data: { access_token: 'test-token', expires_in: 600 } };
    }
    return overrides.speech ?? { status: 200, data: Buffer.from('mp3-bytes') };
  };
}

describe('PlaybackController', () => {
  let root: string;
  let cacheDir: string;
  let tmpDir: string;
  let asterisk: FakeAsterisk;
  let channel: AgiChannel;
  let runner: FakeToolRunner;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agi-tts-playback-'));
    cacheDir = path.join(root, 'cache');
    tmpDir = path.join(root, 'tmp');
    await fs.mkdir(tmpDir);
    asterisk = new FakeAsterisk();
    channel = new AgiChannel({ input: asterisk.input, output: asterisk.output });
    runner = new FakeToolRunner();
  });

  afterEach(async () => {
    channel.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  async function createController(
    options: {
      http?: ReturnType<typeof speechApi>;
      cacheEnabled?: boolean;
      debug?: boolean;
      signal?: AbortSignal;
    } = {}
  ) {
    const { client, requests } = fakeHttp(options.http ?? speechApi());
    const cache = await AudioCache.open({ cacheDir, extension: 'sln16', enabled: options.cacheEnabled ?? true });
    const controller = new PlaybackController({
      channel,
      cache,
      tokens: new TokenManager(
        {
          tokenUrl: 'https://auth.example.test/oauth2',
          clientId: 'test-client',
          clientSecret: 'test-secret',
          scope: 'test-scope',
          tokenFile: path.join(root, 'token'),
          timeoutMs: 1000,
          now: () => 1000,
        },
        client
      ),
      speech: new SpeechClient({ speakUrl: 'https://speech.example.test/Speak', timeoutMs: 1000 }, client),
      transcoder: new Transcoder(runner, { mpg123: '/usr/bin/mpg123', sox: '/usr/bin/sox' }, 'tempo'),
      format: { extension: 'sln16', sampleRate: 16000 },
      settings: { language: 'en-US', speed: 1, interruptKeys: KEYS, tmpDir, debug: options.debug ?? false },
      signal: options.signal,
    });
    return { controller, cache, requests };
  }

  it('synthesises, plays and caches each segment in order', async () => {
    const { controller, requests } = await createController();

    const result = await controller.run(['First part.', 'Second part.']);

    expect(result).toEqual({ state: 'completed', segments: 2 });
    expect(asterisk.commands).toHaveLength(2);
    for (const command of asterisk.commands) {
      expect(command.startsWith(`STREAM FILE ${path.join(tmpDir, 'agi-tts-')}`)).toBe(true);
      expect(command.endsWith(` "${KEYS}"`)).toBe(true);
    }
    expect(requests.map((request) => request.method)).toEqual(['POST', 'GET', 'GET']);
    expect(requests[1].url).toContain('text=First%20part.');
    expect(requests[2].url).toContain('text=Second%20part.');

    const cached = await fs.readdir(cacheDir);
    expect(cached.sort()).toEqual(
      [
        `${deriveCacheKey('First part.', 'en-US', 1)}.sln16`,
        `${deriveCacheKey('Second part.', 'en-US', 1)}.sln16`,
      ].sort()
    );
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
  });

  it('plays a cached segment without synthesis', async () => {
    const key = deriveCacheKey('Hello world.', 'en-US', 1);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(path.join(cacheDir, `${key}.sln16`), 'raw-audio');
    const { controller, requests } = await createController();
    const hits: string[] = [];
    controller.on('segment:cached', (event: { key: string }) => hits.push(event.key));

    const result = await controller.run(['Hello world.']);

    expect(result).toEqual({ state: 'completed', segments: 1 });
    expect(asterisk.commands).toEqual([`STREAM FILE ${path.join(cacheDir, key)} "${KEYS}"`]);
    expect(requests).toEqual([]);
    expect(runner.calls).toEqual([]);
    expect(hits).toEqual([key]);
  });

  it('keeps segment order across cache hits and misses', async () => {
    const key = deriveCacheKey('B.', 'en-US', 1);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(path.join(cacheDir, `${key}.sln16`), 'raw-audio');
    const { controller, requests } = await createController();

    const result = await controller.run(['A.', 'B.', 'C.']);

    expect(result).toEqual({ state: 'completed', segments: 3 });
    const streamed = asterisk.commandsStartingWith('STREAM FILE');
    expect(streamed).toHaveLength(3);
    expect(streamed[0].startsWith(`STREAM FILE ${path.join(tmpDir, 'agi-tts-')}`)).toBe(true);
    expect(streamed[1]).toBe(`STREAM FILE ${path.join(cacheDir, key)} "${KEYS}"`);
    expect(streamed[2].startsWith(`STREAM FILE ${path.join(tmpDir, 'agi-tts-')}`)).toBe(true);
    expect(requests.filter((request) => request.method === 'GET').map((request) => request.url)).toEqual([
      expect.stringContaining('text=A.&'),
      expect.stringContaining('text=C.&'),
    ]);
  });

  it('stops on an interrupt during a cached segment', async () => {
    const key = deriveCacheKey('A.', 'en-US', 1);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(path.join(cacheDir, `${key}.sln16`), 'raw-audio');
    asterisk.setResponder(defaultResponder({ 'STREAM FILE': '200 result=35 endpos=800' }));
    const { controller, requests } = await createController();

    const result = await controller.run(['A.', 'B.']);

    expect(result).toEqual({ state: 'interrupted', segments: 1, key: '#' });
    expect(asterisk.commands).toEqual([
      `STREAM FILE ${path.join(cacheDir, key)} "${KEYS}"`,
      'SET EXTENSION #',
      'SET PRIORITY 1',
    ]);
    expect(requests).toEqual([]);
  });

  it('redirects the dialplan once and stops on an interrupt key', async () => {
    asterisk.setResponder(defaultResponder({ 'STREAM FILE': '200 result=53 endpos=1200' }));
    const { controller, requests } = await createController();

    const result = await controller.run(['One.', 'Two.', 'Three.']);

    expect(result).toEqual({ state: 'interrupted', segments: 1, key: '5' });
    expect(asterisk.commands.slice(1)).toEqual(['SET EXTENSION 5', 'SET PRIORITY 1']);
    expect(asterisk.commandsStartingWith('STREAM FILE')).toHaveLength(1);
    expect(requests.filter((request) => request.method === 'GET')).toHaveLength(1);
  });

  it('aborts without a usable token', async () => {
    const { controller } = await createController({
      http: speechApi({ token: { status: 500, data: 'unavailable' } }),
    });

    const result = await controller.run(['Hello world.']);

    expect(result.state).toBe('aborted');
    expect(result.segments).toBe(0);
    expect(result.error).toBeInstanceOf(TokenError);
    expect(asterisk.commands).toEqual(['NOOP "No usable access token"']);
    expect(controller.getStage()).toBe(SegmentStage.AUTHENTICATE);
  });

  it('aborts on a failed synthesis and cleans up', async () => {
    const { controller } = await createController({
      http: speechApi({ speech: { status: 503, data: Buffer.from('busy') } }),
    });

    const result = await controller.run(['Hello world.', 'Never reached.']);

    expect(result.state).toBe('aborted');
    expect(result.error).toBeInstanceOf(FetchError);
    expect(asterisk.commands).toEqual(['NOOP "Failed to fetch speech data: status 503"']);
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
  });

  it('removes every temporary file when cancelled mid-transcode', async () => {
    const abort = new AbortController();
    runner.beforeRun = (call) => {
      if (call.file.endsWith('sox')) {
        abort.abort();
      }
    };
    const { controller } = await createController({ signal: abort.signal });

    const result = await controller.run(['Hello world.']);

    expect(result.state).toBe('aborted');
    expect(result.error).toBeInstanceOf(CancelledError);
    expect(runner.callsTo('mpg123')).toHaveLength(1);
    expect(asterisk.commands).toEqual([]);
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
    await expect(fs.readdir(cacheDir)).resolves.toEqual([]);
  });

  it('discards the audio when caching is disabled', async () => {
    const { controller, cache } = await createController({ cacheEnabled: false });

    const result = await controller.run(['Hello world.']);

    expect(result).toEqual({ state: 'completed', segments: 1 });
    expect(cache.isEnabled()).toBe(false);
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
    await expect(fs.access(cacheDir)).rejects.toThrow();
  });

  it('aborts when the channel cannot play the file', async () => {
    asterisk.setResponder(defaultResponder({ 'STREAM FILE': '200 result=-1 endpos=0' }));
    const { controller } = await createController();

    const result = await controller.run(['Hello world.']);

    expect(result.state).toBe('aborted');
    expect(result.error).toBeInstanceOf(ProtocolError);
    expect(result.error?.message).toMatch(/^Failed to play /);
    await expect(fs.readdir(tmpDir)).resolves.toEqual([]);
  });

  it('traces the text through NOOP in debug mode', async () => {
    const { controller } = await createController({ debug: true });

    await controller.run(['Hello world.']);

    expect(asterisk.commands[0]).toBe('NOOP "Text to speech: Hello world."');
    expect(asterisk.commands[1].startsWith('STREAM FILE ')).toBe(true);
  });

  it('emits the session result', async () => {
    const { controller } = await createController();
    const ended: SessionResult[] = [];
    controller.on('session:end', (result: SessionResult) => ended.push(result));

    const result = await controller.run([]);

    expect(result).toEqual({ state: 'completed', segments: 0 });
    expect(ended).toEqual([result]);
  });
});
