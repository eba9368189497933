/**
 * Bearer token lifecycle for the speech API.
 *
 * Tokens come from a client-credentials exchange and are shared between
 * sessions through a small scratch file:
 *
 *   expire:<unix seconds>
 *   token:<url-encoded bearer>
 */

import axios, { type AxiosInstance } from 'axios';
import { promises as fs } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { CancelledError, TokenError } from '../errors';
import { logger } from '../utils/logger';
import type { AccessToken } from '../types';

/** Seconds before expiry at which a token counts as stale */
export const TOKEN_SAFETY_MARGIN = 10;

export interface TokenManagerConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope: string;
  tokenFile: string;
  timeoutMs: number;
  /** Unix seconds; injectable for tests */
  now?: () => number;
}

interface TokenResponse {
  access_token: string;
  expires_in: number;
}

export function isTokenValid(token: AccessToken | null, now: number): token is AccessToken {
  return token !== null && token.token.length > 0 && now < token.expiresAt - TOKEN_SAFETY_MARGIN;
}

export function parseTokenRecord(content: string): AccessToken | null {
  const expire = /^expire:(\d+)$/m.exec(content);
  const token = /^token:(\S+)$/m.exec(content);
  if (!expire || !token) {
    return null;
  }
  return { expiresAt: parseInt(expire[1], 10), token: token[1] };
}

export function formatTokenRecord(token: AccessToken): string {
  return `expire:${token.expiresAt}\ntoken:${token.token}\n`;
}

export class TokenManager {
  private config: TokenManagerConfig;
  private httpClient: AxiosInstance;
  private current: AccessToken | null = null;
  private now: () => number;

  constructor(config: TokenManagerConfig, httpClient?: AxiosInstance) {
    this.config = config;
    this.now = config.now ?? (() => Math.floor(Date.now() / 1000));
    this.httpClient = httpClient ?? axios.create({ timeout: config.timeoutMs });
  }

  /**
   * Current bearer value, refreshed when missing or about to expire.
   * Returns an empty string when no token could be obtained.
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    const now = this.now();

    if (isTokenValid(this.current, now)) {
      return this.current.token;
    }

    const persisted = await this.readPersisted();
    if (isTokenValid(persisted, now)) {
      this.current = persisted;
      return persisted.token;
    }

    let fresh: AccessToken;
    try {
      fresh = await this.exchange(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      logger.error({ error }, 'Failed to obtain access token');
      return '';
    }

    this.current = fresh;
    await this.persist(fresh);
    return fresh.token;
  }

  private async exchange(signal?: AbortSignal): Promise<AccessToken> {
    const form = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      scope: this.config.scope,
      grant_type: 'client_credentials',
    });

    let data: unknown;
    try {
      const response = await this.httpClient.post(this.config.tokenUrl, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        responseType: 'json',
        signal,
      });
      data = response.data;
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new TokenError(`Token exchange failed${status ? ` with status ${status}` : ''}`, { cause: error });
    }

    const body = parseTokenResponse(data);
    if (!body) {
      throw new TokenError('Token endpoint returned an unparseable body', { context: { body: data } });
    }

    const expiresIn = body.expires_in;
    logger.debug({ expiresIn }, 'Obtained new access token');

    return {
      token: encodeURIComponent(`Bearer ${body.access_token}`),
      expiresAt: this.now() + expiresIn,
    };
  }

  private async readPersisted(): Promise<AccessToken | null> {
    try {
      const content = await fs.readFile(this.config.tokenFile, 'utf8');
      return parseTokenRecord(content);
    } catch (error) {
      logger.debug({ error, tokenFile: this.config.tokenFile }, 'No persisted token');
      return null;
    }
  }

  // Atomic replace; concurrent sessions race harmlessly, last writer wins
  private async persist(token: AccessToken): Promise<void> {
    const staging = `${this.config.tokenFile}.${uuidv4()}`;
    try {
      await fs.writeFile(staging, formatTokenRecord(token), { mode: 0o600 });
      await fs.rename(staging, this.config.tokenFile);
    } catch (error) {
      logger.debug({ error, tokenFile: this.config.tokenFile }, 'Token not persisted, keeping it in memory');
      await fs.rm(staging, { force: true }).catch((rmError: unknown) => {
        logger.debug({ error: rmError }, 'Failed to remove token staging file');
      });
    }
  }
}

function parseTokenResponse(data: unknown): TokenResponse | null {
  let value = data;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      return null;
    }
  }

  if (typeof value !== 'object' || value === null || !('access_token' in value) || !('expires_in' in value)) {
    return null;
  }

  const accessToken = value.access_token;
  const expiresIn = Number(value.expires_in);
  if (typeof accessToken !== 'string' || accessToken.length === 0 || !Number.isFinite(expiresIn)) {
    return null;
  }

  return { access_token: accessToken, expires_in: expiresIn };
}
