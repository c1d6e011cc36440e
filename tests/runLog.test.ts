import { describe, it, expect, vi } from 'vitest';

vi.mock('../server/logging/logger.js', () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import { RunLog } from '../server/runner/runLog.js';
import { CancellationToken } from '../server/runner/cancellation.js';
import { createDefaultSteps, describeSteps } from '../server/runner/steps.js';
import { warn } from '../server/logging/logger.js';
import type { ProgressEvent, StepResult } from '../server/runner/types.js';

function result(stepName: string): StepResult {
  return {
    runId: 'run-1',
    profileId: 'p1',
    profileName: 'alice',
    round: 1,
    stepName,
    outcome: 'success',
    detail: 'Done',
    timestamp: '2024-01-01T00:00:00.000Z',
  };
}

const startEvent: ProgressEvent = {
  type: 'run-start',
  runId: 'run-1',
  timestamp: '2024-01-01T00:00:00.000Z',
  queueLength: 1,
  rounds: 1,
};

describe('RunLog', () => {
  it('should keep only the newest lines', () => {
    const log = new RunLog(3);
    for (let i = 1; i <= 5; i++) {
      log.appendLine('info', `line ${i}`);
    }

    expect(log.getLines().map((l) => l.message)).toEqual(['line 3', 'line 4', 'line 5']);
    expect(log.getLines().map((l) => l.seq)).toEqual([3, 4, 5]);
  });

  it('should keep at least one line when the cap is zero', () => {
    const log = new RunLog(0);
    for (let i = 1; i <= 5; i++) {
      log.appendLine('info', `line ${i}`);
    }

    expect(log.getLines().map((l) => l.message)).toEqual(['line 5']);
  });

  it('should return lines after a sequence number', () => {
    const log = new RunLog();
    log.appendLine('info', 'a');
    log.appendLine('warning', 'b');
    log.appendLine('error', 'c');

    expect(log.getLines(2)).toEqual([expect.objectContaining({ seq: 3, level: 'error', message: 'c' })]);
    expect(log.getLines(3)).toEqual([]);
  });

  it('should keep numbering lines after a clear', () => {
    const log = new RunLog();
    log.appendLine('info', 'a');
    log.clearLines();
    const next = log.appendLine('info', 'b');

    expect(next.seq).toBe(2);
    expect(log.getLines()).toHaveLength(1);
  });

  it('should store results without letting callers change them', () => {
    const log = new RunLog();
    const original = result('verify-login');
    log.appendResult(original);
    original.detail = 'changed';

    const read = log.getResults();
    read[0].detail = 'also changed';

    expect(log.getResults()[0].detail).toBe('Done');
  });

  it('should clear results and lines together', () => {
    const log = new RunLog();
    log.appendResult(result('verify-login'));
    log.appendLine('info', 'a');

    log.clear();

    expect(log.getResults()).toEqual([]);
    expect(log.getLines()).toEqual([]);
  });

  it('should deliver events to subscribers until they unsubscribe', () => {
    const log = new RunLog();
    const received: string[] = [];
    const unsubscribe = log.subscribe((event) => received.push(event.type));

    log.emit(startEvent);
    unsubscribe();
    log.emit(startEvent);

    expect(received).toEqual(['run-start']);
  });

  it('should keep delivering when one subscriber throws', () => {
    const log = new RunLog();
    const received: string[] = [];
    log.subscribe(() => {
      throw new Error('listener broke');
    });
    log.subscribe((event) => received.push(event.type));

    log.emit(startEvent);

    expect(received).toEqual(['run-start']);
    expect(warn).toHaveBeenCalledWith('Progress listener failed on run-start: listener broke', 'RunLog');
  });
});

describe('CancellationToken', () => {
  it('should start uncancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancellationRequested).toBe(false);
    expect(token.signal.aborted).toBe(false);
    expect(token.reason).toBeNull();
  });

  it('should cancel once and keep the first reason', () => {
    const token = new CancellationToken();

    expect(token.cancel('First')).toBe(true);
    expect(token.cancel('Second')).toBe(false);

    expect(token.isCancellationRequested).toBe(true);
    expect(token.signal.aborted).toBe(true);
    expect(token.reason).toBe('First');
  });

  it('should use a default reason', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.reason).toBe('Stop requested');
  });
});

describe('default steps', () => {
  it('should list the seven steps in order', () => {
    expect(describeSteps(createDefaultSteps()).map((s) => s.name)).toEqual([
      'verify-login',
      'check-feed',
      'visit-author-profile',
      'react-to-story',
      'like-post',
      'comment-post',
      'create-image-post',
    ]);
  });

  it('should retry only the feed check', () => {
    const retried = createDefaultSteps().filter((s) => s.retry.maxAttempts > 1);
    expect(retried.map((s) => [s.name, s.retry])).toEqual([['check-feed', { maxAttempts: 2, delayMs: 2000 }]]);
  });

  it('should map every step to the action of the same name', () => {
    expect(createDefaultSteps().every((s) => s.action.name === s.name)).toBe(true);
  });
});
