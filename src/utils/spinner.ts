/**
 * Spinner for network calls made by CLI commands
 *
 * Shown on stderr only in an interactive terminal, never in --json mode
 * and never on hosts where ora misbehaves.
 */

import ora, { type Ora } from 'ora';
import { getOutputOptions } from './output.js';
import { isInteractiveTTY, isSpinnerHostile } from './platform.js';

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export function spinnerEnabled(): boolean {
  return !getOutputOptions().json && isInteractiveTTY() && !isSpinnerHostile();
}

/**
 * Started ora spinner, or null when spinners are disabled
 */
export function createSpinner(text: string, stream: NodeJS.WritableStream = process.stderr): Ora | null {
  if (!spinnerEnabled()) {
    return null;
  }
  return ora({ text, stream, spinner: { frames: SPINNER_FRAMES, interval: 80 } }).start();
}

/**
 * Run `fn` under a spinner. The spinner is cleared before the result is
 * rendered, so table output is never interleaved with frames.
 */
export async function withSpinner<T>(text: string, fn: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text);
  try {
    const result = await fn();
    spinner?.stop();
    return result;
  } catch (error) {
    spinner?.fail();
    throw error;
  }
}
