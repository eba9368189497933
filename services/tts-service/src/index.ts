#!/usr/bin/env node
/**
 * AGI entry point: `AGI(agi-tts,"text",[language],[intkeys],[speed])`
 *
 * Hangup and termination signals abort the session; temporary files are
 * released by the segment scope on the way out.
 */

import { runSession } from './session';
import { abortOnSignals } from './signals';
import { logger } from './utils/logger';

const controller = new AbortController();

abortOnSignals(controller);

runSession(process.argv.slice(2), process.env, {
  input: process.stdin,
  output: process.stdout,
  signal: controller.signal,
})
  .then((result) => {
    logger.debug({ state: result.state, segments: result.segments }, 'Session finished');
    process.exit(result.state === 'aborted' ? 1 : 0);
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Session crashed');
    process.exit(1);
  });
