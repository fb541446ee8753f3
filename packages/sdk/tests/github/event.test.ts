import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventPayloadError, pullNumberFromPayload, readPullNumber } from '../../src/github/event.js';

describe('pullNumberFromPayload', () => {
  it('should read the pull request number', () => {
    expect(pullNumberFromPayload({ action: 'submitted', pull_request: { number: 42 } })).toBe(42);
  });

  it.each([
    ['a push payload', { ref: 'refs/heads/main' }],
    ['a string number', { pull_request: { number: '42' } }],
    ['null', null],
  ])('should reject %s', (_label, payload) => {
    expect(() => pullNumberFromPayload(payload)).toThrow('Event payload has no pull_request.number');
  });
});

describe('readPullNumber', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ownergate-event-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read the payload file', () => {
    const path = join(dir, 'event.json');
    writeFileSync(path, JSON.stringify({ pull_request: { number: 7 } }));

    expect(readPullNumber(path)).toBe(7);
  });

  it('should report an unreadable payload', () => {
    const path = join(dir, 'event.json');
    writeFileSync(path, '{not json');

    expect(() => readPullNumber(path)).toThrow(EventPayloadError);
    expect(() => readPullNumber(path)).toThrow(`Cannot read event payload ${path}:`);
  });
});
