/**
 * Speech API client
 * Fetches one compressed (mp3) rendering of a text segment per request
 */

import axios, { type AxiosInstance } from 'axios';
import { CancelledError, FetchError } from '../errors';
import { logger } from '../utils/logger';

export interface SpeechClientConfig {
  speakUrl: string;
  timeoutMs: number;
  format?: string;
  quality?: string;
}

export class SpeechClient {
  private config: Required<SpeechClientConfig>;
  private httpClient: AxiosInstance;

  constructor(config: SpeechClientConfig, httpClient?: AxiosInstance) {
    this.config = {
      speakUrl: config.speakUrl,
      timeoutMs: config.timeoutMs,
      format: config.format || 'audio/mp3',
      quality: config.quality || 'MaxQuality',
    };
    this.httpClient = httpClient ?? axios.create();
  }

  /**
   * Build the request URL. Values are percent-encoded (spaces as %20, never
   * `+`); the token is already encoded and is appended as is.
   */
  buildUrl(text: string, language: string, token: string): string {
    const query = [
      ['text', text],
      ['language', language],
      ['format', this.config.format],
      ['options', this.config.quality],
    ]
      .map(([name, value]) => `${name}=${encodeURIComponent(value)}`)
      .join('&');
    return `${this.config.speakUrl}?${query}&appid=${token}`;
  }

  async synthesize(text: string, language: string, token: string, signal?: AbortSignal): Promise<Buffer> {
    const url = this.buildUrl(text, language, token);
    const startTime = Date.now();

    let audio: Buffer;
    try {
      const response = await this.httpClient.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.config.timeoutMs,
        signal,
      });
      audio = Buffer.from(response.data);
    } catch (error: unknown) {
      if (signal?.aborted) {
        throw new CancelledError('Session cancelled during synthesis', { cause: error });
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const reason = status ? `status ${status}` : error.code === 'ECONNABORTED' ? 'timeout' : error.message;
        throw new FetchError(`Failed to fetch speech data: ${reason}`, { status, cause: error });
      }
      throw new FetchError('Failed to fetch speech data', { cause: error });
    }

    if (audio.length === 0) {
      throw new FetchError('Speech API returned an empty body');
    }

    logger.debug({ bytes: audio.length, latencyMs: Date.now() - startTime, language }, 'Fetched speech data');
    return audio;
  }
}
