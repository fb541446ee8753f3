/**
 * Reading the workflow event payload GitHub Actions writes to
 * GITHUB_EVENT_PATH.
 *
 * @module github/event
 */

import { readFileSync } from 'node:fs';

export class EventPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventPayloadError';
  }
}

/**
 * Extract `pull_request.number` from a `pull_request` or
 * `pull_request_review` event payload.
 */
export function pullNumberFromPayload(payload: unknown): number {
  if (typeof payload === 'object' && payload !== null && 'pull_request' in payload) {
    const pr = payload.pull_request;
    if (typeof pr === 'object' && pr !== null && 'number' in pr && typeof pr.number === 'number') {
      return pr.number;
    }
  }
  throw new EventPayloadError('Event payload has no pull_request.number');
}

export function readPullNumber(eventPath: string): number {
  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(eventPath, 'utf-8'));
  } catch (e) {
    throw new EventPayloadError(
      `Cannot read event payload ${eventPath}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  return pullNumberFromPayload(payload);
}
