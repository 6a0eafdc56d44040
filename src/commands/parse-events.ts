/**
 * Parse an events file for `tables insert`
 *
 * Accepted layouts: a JSON array of objects, a single JSON object, or
 * JSON Lines (one object per line, blank lines ignored).
 */

import { isRecord } from '../client/errors.js';
import type { PushEvent } from '../client/types.js';

export function parseEvents(content: string): PushEvent[] {
  const text = content.trim();
  if (text.length === 0) {
    return [];
  }

  if (text.startsWith('[')) {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error('Expected a JSON array of events');
    }
    return parsed.map((item, i) => asEvent(item, `item ${i + 1}`));
  }

  const whole = tryParse(text);
  if (isRecord(whole)) {
    return [whole];
  }

  return text
    .split(/\r?\n/)
    .map((line, i) => ({ line: line.trim(), lineNumber: i + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => asEvent(parseLine(line, lineNumber), `line ${lineNumber}`));
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseLine(line: string, lineNumber: number): unknown {
  try {
    return JSON.parse(line);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON on line ${lineNumber}: ${reason}`);
  }
}

function asEvent(value: unknown, where: string): PushEvent {
  if (!isRecord(value)) {
    throw new Error(`Event at ${where} must be a JSON object`);
  }
  return value;
}
