/**
 * Error taxonomy for the AGI TTS bridge.
 *
 * Every subclass is fatal to the session that raised it; the playback
 * controller turns them into an aborted session and the CLI into exit code 1.
 */

export enum BridgeErrorCode {
  CONFIGURATION = 'configuration',
  PROTOCOL = 'protocol',
  FETCH = 'fetch',
  TOKEN = 'token',
  TRANSCODE = 'transcode',
  CANCELLED = 'cancelled',
  UNKNOWN = 'unknown',
}

export interface BridgeErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly cause?: unknown;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: BridgeErrorCode = BridgeErrorCode.UNKNOWN, options?: BridgeErrorOptions) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }

  /**
   * Wrap an unknown caught value
   */
  static from(err: unknown, code: BridgeErrorCode = BridgeErrorCode.UNKNOWN): BridgeError {
    if (err instanceof BridgeError) {
      return err;
    }
    if (err instanceof Error) {
      return new BridgeError(err.message, code, { cause: err });
    }
    return new BridgeError(typeof err === 'string' ? err : 'Unknown error occurred', code, {
      context: { originalError: err },
    });
  }
}

/** Missing tools or credentials, invalid language or speed. */
export class ConfigurationError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, BridgeErrorCode.CONFIGURATION, options);
    this.name = 'ConfigurationError';
  }
}

/** Unexpected response from the channel controller. */
export class ProtocolError extends BridgeError {
  readonly response?: string;

  constructor(message: string, options?: BridgeErrorOptions & { response?: string }) {
    super(message, BridgeErrorCode.PROTOCOL, {
      ...options,
      context: { ...options?.context, response: options?.response },
    });
    this.name = 'ProtocolError';
    this.response = options?.response;
  }
}

/** The synthesis request failed, timed out or returned a non-success status. */
export class FetchError extends BridgeError {
  readonly status?: number;

  constructor(message: string, options?: BridgeErrorOptions & { status?: number }) {
    super(message, BridgeErrorCode.FETCH, {
      ...options,
      context: { ...options?.context, status: options?.status },
    });
    this.name = 'FetchError';
    this.status = options?.status;
  }
}

/** No usable bearer token could be obtained. */
export class TokenError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, BridgeErrorCode.TOKEN, options);
    this.name = 'TokenError';
  }
}

/** mpg123 or sox exited non-zero or could not be spawned. */
export class TranscodeError extends BridgeError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: BridgeErrorOptions) {
    super(message, BridgeErrorCode.TRANSCODE, {
      ...options,
      context: { ...options?.context, tool },
    });
    this.name = 'TranscodeError';
    this.tool = tool;
  }
}

/** The session was aborted by a hangup or termination signal. */
export class CancelledError extends BridgeError {
  constructor(message = 'Session cancelled', options?: BridgeErrorOptions) {
    super(message, BridgeErrorCode.CANCELLED, options);
    this.name = 'CancelledError';
  }
}

/**
 * Throw CancelledError if the signal has already fired
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
