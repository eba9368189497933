import type { BridgeError } from './errors';

/**
 * Raw audio extension understood by the channel; the sample rate is implied
 */
export type FormatTag = 'sln' | 'sln12' | 'sln16' | 'sln32' | 'sln44' | 'sln48';

export interface AudioFormatSpec {
  extension: FormatTag;
  sampleRate: number;
}

export type PlaybackOutcome =
  | { kind: 'continue' }
  | { kind: 'interrupted'; key: string }
  | { kind: 'failed'; code: number };

export type SessionState = 'completed' | 'interrupted' | 'aborted';

export interface SessionResult {
  state: SessionState;
  /** Segments fully or partially streamed */
  segments: number;
  /** Interrupt key pressed by the caller */
  key?: string;
  error?: BridgeError;
}

export interface AccessToken {
  /** URL-encoded `Bearer <token>` value */
  token: string;
  /** Unix seconds */
  expiresAt: number;
}
