import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

vi.mock('../server/logging/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../server/logging/logger.js')>()),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import { TaskRunner, type ProfileSource, type TaskRunnerOptions } from '../server/runner/taskRunner.js';
import { getDefaultRunnerOptions } from '../server/config.js';
import { getRunPaths, getScreenshotPath } from '../server/logging/logStore.js';
import { warn } from '../server/logging/logger.js';
import {
  ActionError,
  ConflictError,
  DriverUnavailableError,
  NotFoundError,
  SessionError,
  ValidationError,
} from '../server/errors.js';
import type { Profile } from '../server/profiles/profileStore.js';
import type {
  ActionOutcome,
  BrowserDriver,
  BrowserSession,
  StepAction,
} from '../server/driver/types.js';
import type { ProgressEvent, StepDescriptor } from '../server/runner/types.js';

type Behavior = (action: StepAction, session: FakeSession) => Promise<ActionOutcome>;

const succeed: Behavior = async () => ({ status: 'success' });

class FakeSession implements BrowserSession {
  closed = false;
  performed: string[] = [];
  screenshots: string[] = [];

  constructor(
    readonly profilePath: string,
    private readonly behavior: Behavior,
    private readonly closeError: Error | null = null
  ) {}

  perform(action: StepAction): Promise<ActionOutcome> {
    this.performed.push(action.name);
    return this.behavior(action, this);
  }

  async screenshot(filePath: string): Promise<void> {
    this.screenshots.push(filePath);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.closeError) {
      throw this.closeError;
    }
  }
}

class FakeDriver implements BrowserDriver {
  sessions: FakeSession[] = [];
  opened: string[] = [];
  behavior: Behavior = succeed;
  openFailures = new Map<string, Error>();
  closeFailures = new Map<string, Error>();
  hangOnOpen = false;
  /** While set, openSession waits for it before handing out a session */
  openGate: Promise<void> | null = null;

  async openSession(profilePath: string): Promise<BrowserSession> {
    this.opened.push(profilePath);
    const failure = this.openFailures.get(profilePath);
    if (failure) {
      throw failure;
    }
    if (this.hangOnOpen) {
      return new Promise<BrowserSession>(() => undefined);
    }
    if (this.openGate) {
      await this.openGate;
    }
    const session = new FakeSession(profilePath, this.behavior, this.closeFailures.get(profilePath) ?? null);
    this.sessions.push(session);
    return session;
  }
}

function createProfiles(...names: string[]): { source: ProfileSource; profiles: Profile[] } {
  const profiles = names.map((name, i) => ({
    id: `p${i + 1}`,
    name,
    path: `/profiles/${name}`,
    createdAt: '2024-01-01T00:00:00.000Z',
  }));
  const source: ProfileSource = {
    get(id: string): Profile {
      const profile = profiles.find((p) => p.id === id);
      if (!profile) {
        throw new NotFoundError(`Profile not found: ${id}`);
      }
      return { ...profile };
    },
  };
  return { source, profiles };
}

describe('TaskRunner', () => {
  let dataDir: string;
  let driver: FakeDriver;
  let delays: number[];
  let events: ProgressEvent[];

  function createRunner(source: ProfileSource, overrides: Partial<TaskRunnerOptions> = {}): TaskRunner {
    const runner = new TaskRunner(driver, source, {
      ...getDefaultRunnerOptions(),
      dataDir,
      wait: async (ms) => {
        delays.push(ms);
      },
      ...overrides,
    });
    runner.subscribe((event) => events.push(event));
    return runner;
  }

  function eventTypes(): string[] {
    return events.filter((e) => e.type !== 'log' && e.type !== 'step').map((e) => e.type);
  }

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'runner-test-'));
    driver = new FakeDriver();
    delays = [];
    events = [];
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  describe('a complete run', () => {
    it('should run every step for each profile in order with the delay between profiles', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);

      const started = runner.start(['p1', 'p2']);
      expect(started.status).toBe('running');
      expect(started.queue).toHaveLength(2);

      await runner.waitForIdle();

      expect(eventTypes()).toEqual([
        'run-start',
        'profile-start',
        'session-open',
        'profile-complete',
        'delay',
        'profile-start',
        'session-open',
        'profile-complete',
        'run-end',
      ]);
      expect(delays).toEqual([5000]);

      const delay = events.find((e) => e.type === 'delay');
      expect(delay).toMatchObject({ type: 'delay', delayMs: 5000, nextIndex: 1 });

      const results = runner.results();
      expect(results).toHaveLength(14);
      expect(results.every((r) => r.outcome === 'success')).toBe(true);
      expect(results.slice(0, 7).map((r) => r.stepName)).toEqual([
        'verify-login',
        'check-feed',
        'visit-author-profile',
        'react-to-story',
        'like-post',
        'comment-post',
        'create-image-post',
      ]);
      expect(results[0]).toMatchObject({ profileId: 'p1', profileName: 'alice', round: 1, detail: 'Done' });
      expect(results[7]).toMatchObject({ profileId: 'p2', profileName: 'bob' });

      const status = runner.status();
      expect(status.status).toBe('completed');
      expect(status.queue.map((q) => q.status)).toEqual(['completed', 'completed']);
      expect(status.summary).toEqual({ completed: 2, failed: 0, skipped: 0, stopped: 0 });
      expect(status.currentIndex).toBeNull();
      expect(status.finishedAt).not.toBeNull();

      expect(driver.opened).toEqual(['/profiles/alice', '/profiles/bob']);
      expect(driver.sessions.every((s) => s.closed)).toBe(true);
    });

    it('should emit one step event per result, tagged with the queue index', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      const stepEvents = events.filter((e) => e.type === 'step');
      expect(stepEvents).toHaveLength(14);
      expect(stepEvents.map((e) => (e.type === 'step' ? e.index : -1))).toEqual([
        0, 0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 1, 1, 1,
      ]);
    });

    it('should record a skipped action as skipped with its detail', async () => {
      const { source } = createProfiles('alice');
      driver.behavior = async (action) =>
        action.name === 'react-to-story'
          ? { status: 'skipped', detail: 'No stories available' }
          : { status: 'success' };
      const runner = createRunner(source);

      runner.start(['p1']);
      await runner.waitForIdle();

      const story = runner.results().find((r) => r.stepName === 'react-to-story');
      expect(story).toMatchObject({ outcome: 'skipped', detail: 'No stories available' });
      expect(runner.status().queue[0]).toMatchObject({ status: 'completed', failedSteps: 0 });
    });

    it('should write the run summary and the run log under the data directory', async () => {
      const { source } = createProfiles('alice');
      const runner = createRunner(source);

      const { runId } = runner.start(['p1']);
      await runner.waitForIdle();
      expect(runId).not.toBeNull();

      const paths = getRunPaths(dataDir, runId ?? '');
      const summary = JSON.parse(readFileSync(paths.runJsonPath, 'utf-8'));
      expect(summary.status).toBe('completed');
      expect(summary.results).toHaveLength(7);

      const log = readFileSync(paths.runLogPath, 'utf-8');
      expect(log).toContain('SUCCESS alice verify-login: Done');
    });
  });

  describe('session failures', () => {
    it('should record one open-session failure and carry on with the other profiles', async () => {
      const { source } = createProfiles('one', 'two', 'three');
      driver.openFailures.set('/profiles/two', new SessionError('Profile directory does not exist: /profiles/two'));
      const runner = createRunner(source);

      runner.start(['p1', 'p2', 'p3']);
      await runner.waitForIdle();

      const results = runner.results();
      const forTwo = results.filter((r) => r.profileId === 'p2');
      expect(forTwo).toHaveLength(1);
      expect(forTwo[0]).toMatchObject({
        stepName: 'open-session',
        outcome: 'failure',
        detail: 'Profile directory does not exist: /profiles/two',
      });
      expect(results.filter((r) => r.profileId === 'p1')).toHaveLength(7);
      expect(results.filter((r) => r.profileId === 'p3')).toHaveLength(7);

      expect(runner.status().queue.map((q) => q.status)).toEqual(['completed', 'failed', 'completed']);
      expect(runner.status().status).toBe('completed');
      expect(delays).toEqual([5000, 5000]);
      expect(eventTypes()).toContain('profile-failed');
    });

    it('should fail the profile when the session does not open in time', async () => {
      const { source } = createProfiles('slow');
      driver.hangOnOpen = true;
      const runner = createRunner(source, { sessionTimeoutMs: 20 });

      runner.start(['p1']);
      await runner.waitForIdle();

      expect(runner.results()).toEqual([
        expect.objectContaining({
          stepName: 'open-session',
          outcome: 'failure',
          detail: 'Opening browser session timed out after 20ms',
        }),
      ]);
      expect(runner.status().queue[0].status).toBe('failed');
    });

    it('should warn about a browser that fails to close and move on to the next profile', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);
      driver.closeFailures.set('/profiles/alice', new Error('close broke'));

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      expect(warn).toHaveBeenCalledWith('Failed to close browser for alice: close broke', 'Runner');
      expect(driver.sessions.map((s) => [s.profilePath, s.performed.length, s.closed])).toEqual([
        ['/profiles/alice', 7, true],
        ['/profiles/bob', 7, true],
      ]);
      expect(runner.status().queue.map((q) => q.status)).toEqual(['completed', 'completed']);
      expect(delays).toEqual([5000]);
    });

    it('should end the run when the driver cannot start a browser at all', async () => {
      const { source } = createProfiles('alice', 'bob');
      const defect = new DriverUnavailableError('Browser is not available: msedge');
      driver.openFailures.set('/profiles/alice', defect);
      const runner = createRunner(source);

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      const status = runner.status();
      expect(status.status).toBe('stopped');
      expect(status.error).toBe('Browser is not available: msedge');
      expect(status.queue.map((q) => q.status)).toEqual(['failed', 'skipped']);

      const results = runner.results();
      expect(results).toHaveLength(2);
      expect(results[0]).toMatchObject({
        profileId: 'p1',
        stepName: 'runner',
        outcome: 'failure',
        detail: 'Browser is not available: msedge',
      });
      expect(results[1]).toMatchObject({
        profileId: 'p2',
        stepName: 'profile',
        outcome: 'skipped',
        detail: 'Run aborted: Browser is not available: msedge',
      });

      const end = events.find((e) => e.type === 'run-end');
      expect(end).toMatchObject({ status: 'stopped', error: 'Browser is not available: msedge' });
      expect(driver.opened).toEqual(['/profiles/alice']);
      expect(delays).toEqual([]);
    });
  });

  describe('step failures', () => {
    it('should record a failed step with a screenshot and run the remaining steps', async () => {
      const { source } = createProfiles('alice');
      driver.behavior = async (action) => {
        if (action.name === 'like-post') {
          throw new ActionError('Like button not found', 'like-post');
        }
        return { status: 'success' };
      };
      const runner = createRunner(source);

      const { runId } = runner.start(['p1']);
      await runner.waitForIdle();

      const results = runner.results();
      const like = results.find((r) => r.stepName === 'like-post');
      expect(like).toMatchObject({
        outcome: 'failure',
        detail: 'Like button not found',
        screenshot: '1-p1-like-post.png',
      });
      expect(results.map((r) => r.stepName).slice(-2)).toEqual(['comment-post', 'create-image-post']);
      expect(results.filter((r) => r.outcome === 'success')).toHaveLength(6);

      const session = driver.sessions[0];
      expect(session.screenshots).toEqual([getScreenshotPath(dataDir, runId ?? '', '1-p1-like-post.png')]);
      expect(session.closed).toBe(true);
      expect(runner.status().queue[0]).toMatchObject({ status: 'completed', failedSteps: 1 });
    });

    it('should not take screenshots when they are turned off', async () => {
      const { source } = createProfiles('alice');
      driver.behavior = async () => {
        throw new Error('boom');
      };
      const runner = createRunner(source, { screenshotOnFailure: false });

      runner.start(['p1']);
      await runner.waitForIdle();

      expect(driver.sessions[0].screenshots).toEqual([]);
      expect(runner.results().every((r) => r.screenshot === undefined)).toBe(true);
    });

    it('should retry a step with a retry policy and record the success', async () => {
      const { source } = createProfiles('alice');
      let feedAttempts = 0;
      driver.behavior = async (action) => {
        if (action.name === 'check-feed' && ++feedAttempts === 1) {
          throw new Error('Feed still loading');
        }
        return { status: 'success' };
      };
      const runner = createRunner(source);

      runner.start(['p1']);
      await runner.waitForIdle();

      expect(feedAttempts).toBe(2);
      expect(runner.results().find((r) => r.stepName === 'check-feed')?.outcome).toBe('success');
      expect(delays).toEqual([2000]);
    });

    it('should report the attempt count when every retry fails', async () => {
      const { source } = createProfiles('alice');
      driver.behavior = async (action) => {
        if (action.name === 'check-feed') {
          throw new Error('Feed unavailable');
        }
        return { status: 'success' };
      };
      const runner = createRunner(source, { screenshotOnFailure: false });

      runner.start(['p1']);
      await runner.waitForIdle();

      const feed = runner.results().find((r) => r.stepName === 'check-feed');
      expect(feed).toMatchObject({ outcome: 'failure', detail: 'Feed unavailable (after 2 attempts)' });
      expect(driver.sessions[0].performed.filter((n) => n === 'check-feed')).toHaveLength(2);
    });

    it('should fail a step that runs past its timeout and move on', async () => {
      const { source } = createProfiles('alice');
      const steps: StepDescriptor[] = [
        { name: 'slow', label: 'Slow step', action: { name: 'slow' }, retry: { maxAttempts: 1, delayMs: 0 }, timeoutMs: 20 },
        { name: 'fast', label: 'Fast step', action: { name: 'fast' }, retry: { maxAttempts: 1, delayMs: 0 } },
      ];
      driver.behavior = (action) =>
        action.name === 'slow' ? new Promise<ActionOutcome>(() => undefined) : succeed(action, driver.sessions[0]);
      const runner = createRunner(source, { steps, screenshotOnFailure: false });

      runner.start(['p1']);
      await runner.waitForIdle();

      expect(runner.results().map((r) => [r.stepName, r.outcome, r.detail])).toEqual([
        ['slow', 'failure', 'Step slow timed out after 20ms'],
        ['fast', 'success', 'Done'],
      ]);
      expect(driver.sessions[0].closed).toBe(true);
    });
  });

  describe('start validation', () => {
    it('should reject an empty selection', () => {
      const runner = createRunner(createProfiles('alice').source);
      expect(() => runner.start([])).toThrow(ValidationError);
      expect(runner.status().status).toBe('idle');
    });

    it('should reject rounds outside 1..maxRounds', () => {
      const runner = createRunner(createProfiles('alice').source);
      expect(() => runner.start(['p1'], { rounds: 0 })).toThrow(ValidationError);
      expect(() => runner.start(['p1'], { rounds: 101 })).toThrow(ValidationError);
      expect(() => runner.start(['p1'], { rounds: 1.5 })).toThrow(ValidationError);
      expect(runner.status().status).toBe('idle');
    });

    it('should reject unknown profile ids', () => {
      const runner = createRunner(createProfiles('alice').source);
      expect(() => runner.start(['p1', 'missing'])).toThrow(NotFoundError);
      expect(runner.status().status).toBe('idle');
      expect(driver.opened).toEqual([]);
    });

    it('should reject a second start while a run is active', async () => {
      const runner = createRunner(createProfiles('alice').source);
      runner.start(['p1']);

      expect(() => runner.start(['p1'])).toThrow(ConflictError);

      await runner.waitForIdle();
      expect(driver.opened).toEqual(['/profiles/alice']);
    });
  });

  describe('rounds', () => {
    it('should repeat the selection once per round in selection order', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);

      runner.start(['p2', 'p1'], { rounds: 2 });
      await runner.waitForIdle();

      const status = runner.status();
      expect(status.rounds).toBe(2);
      expect(status.queue.map((q) => [q.profileId, q.round])).toEqual([
        ['p2', 1],
        ['p1', 1],
        ['p2', 2],
        ['p1', 2],
      ]);
      expect(driver.opened).toEqual(['/profiles/bob', '/profiles/alice', '/profiles/bob', '/profiles/alice']);
      expect(delays).toEqual([5000, 5000, 5000]);
      expect(status.summary.completed).toBe(4);
    });
  });

  describe('stop', () => {
    it('should reject a stop when nothing is running', () => {
      const runner = createRunner(createProfiles('alice').source);
      expect(() => runner.stop()).toThrow(ConflictError);
    });

    it('should finish the current step, close the session and skip the rest', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);
      const stopSnapshots: string[] = [];
      driver.behavior = async (action) => {
        if (action.name === 'check-feed') {
          stopSnapshots.push(runner.stop().status);
          stopSnapshots.push(runner.stop().status);
        }
        return { status: 'success' };
      };

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      expect(stopSnapshots).toEqual(['stopping', 'stopping']);
      expect(driver.sessions).toHaveLength(1);
      expect(driver.sessions[0].performed).toEqual(['verify-login', 'check-feed']);
      expect(driver.sessions[0].closed).toBe(true);

      const status = runner.status();
      expect(status.status).toBe('stopped');
      expect(status.error).toBeNull();
      expect(status.queue.map((q) => q.status)).toEqual(['stopped', 'skipped']);
      expect(status.summary).toEqual({ completed: 0, failed: 0, skipped: 1, stopped: 1 });

      expect(runner.results().map((r) => [r.profileId, r.stepName, r.outcome])).toEqual([
        ['p1', 'verify-login', 'success'],
        ['p1', 'check-feed', 'success'],
        ['p2', 'profile', 'skipped'],
      ]);
      expect(runner.results()[2].detail).toBe('Stop requested');
      expect(delays).toEqual([]);
      expect(eventTypes().slice(-3)).toEqual(['profile-stopped', 'profile-skipped', 'run-end']);
    });

    it('should close a session that opens after a stop without running any step', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);
      let release = () => {};
      driver.openGate = new Promise<void>((resolve) => {
        release = resolve;
      });

      runner.start(['p1', 'p2']);
      expect(driver.opened).toEqual(['/profiles/alice']);
      expect(runner.stop().status).toBe('stopping');
      release();
      await runner.waitForIdle();

      expect(driver.sessions).toHaveLength(1);
      expect(driver.sessions[0].performed).toEqual([]);
      expect(driver.sessions[0].closed).toBe(true);
      expect(runner.status().queue.map((q) => q.status)).toEqual(['stopped', 'skipped']);
      expect(runner.results().map((r) => [r.profileId, r.stepName, r.outcome])).toEqual([
        ['p2', 'profile', 'skipped'],
      ]);
      expect(eventTypes().slice(-3)).toEqual(['profile-stopped', 'profile-skipped', 'run-end']);
    });

    it('should skip the remaining profiles when stopped during the delay', async () => {
      const { source } = createProfiles('alice', 'bob');
      let runner: TaskRunner | null = null;
      const wait = async (ms: number) => {
        delays.push(ms);
        runner?.stop();
      };
      runner = createRunner(source, { wait });

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      expect(runner.status().queue.map((q) => q.status)).toEqual(['completed', 'skipped']);
      expect(driver.opened).toEqual(['/profiles/alice']);
      expect(delays).toEqual([5000]);
    });
  });

  describe('state and logs', () => {
    it('should return snapshots that do not share state with the runner', async () => {
      const runner = createRunner(createProfiles('alice').source);
      runner.start(['p1']);
      await runner.waitForIdle();

      const snapshot = runner.status();
      snapshot.queue[0].status = 'failed';
      snapshot.selectedProfiles.push('other');

      expect(runner.status().queue[0].status).toBe('completed');
      expect(runner.status().selectedProfiles).toEqual(['p1']);

      const results = runner.results();
      results.pop();
      expect(runner.results()).toHaveLength(7);
    });

    it('should return log lines after a sequence number', async () => {
      const runner = createRunner(createProfiles('alice').source);
      runner.start(['p1']);
      await runner.waitForIdle();

      const all = runner.logs();
      expect(all.length).toBeGreaterThan(2);
      expect(all[0].message).toBe('Starting run ' + runner.status().runId + ': 1 profile(s) x 1 round(s) = 1 item(s)');
      expect(runner.logs(all[1].seq)).toEqual(all.slice(2));
    });

    it('should clear log lines without touching results', async () => {
      const runner = createRunner(createProfiles('alice').source);
      runner.start(['p1']);
      await runner.waitForIdle();

      runner.clearLogs();

      expect(runner.logs()).toEqual([]);
      expect(runner.results()).toHaveLength(7);
    });

    it('should reset to idle only when no run is active', async () => {
      const runner = createRunner(createProfiles('alice').source);
      runner.start(['p1']);
      expect(() => runner.reset()).toThrow(ConflictError);
      await runner.waitForIdle();

      const reset = runner.reset();

      expect(reset.status).toBe('idle');
      expect(reset.runId).toBeNull();
      expect(reset.queue).toEqual([]);
      expect(runner.results()).toEqual([]);
      expect(runner.logs()).toEqual([]);
    });

    it('should apply updated options to the next run', async () => {
      const { source } = createProfiles('alice', 'bob');
      const runner = createRunner(source);
      runner.updateOptions({ interProfileDelayMs: 250 });

      runner.start(['p1', 'p2']);
      await runner.waitForIdle();

      expect(delays).toEqual([250]);
    });

    it('should finish a run whose data directory cannot be created and accept the next one', async () => {
      const blocked = join(dataDir, 'not-a-directory');
      writeFileSync(blocked, '');
      const runner = createRunner(createProfiles('alice').source, { dataDir: blocked });

      expect(runner.start(['p1']).status).toBe('running');
      await runner.waitForIdle();

      const status = runner.status();
      expect(status.status).toBe('completed');
      expect(status.error).toBeNull();
      expect(runner.results()).toHaveLength(7);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Failed to save run summary'), 'LogStore');

      expect(runner.start(['p1']).status).toBe('running');
      await runner.waitForIdle();
      expect(runner.status().status).toBe('completed');
    });

    it('should not create a run directory for a rejected start', () => {
      const runner = createRunner(createProfiles('alice').source);
      expect(() => runner.start([])).toThrow(ValidationError);
      expect(existsSync(join(dataDir, 'logs'))).toBe(false);
    });
  });
});
