import { randomUUID } from 'crypto';
import type { RunnerOptions } from '../config.js';
import type { BrowserDriver, BrowserSession } from '../driver/types.js';
import { ConflictError, SessionError, ValidationError, errorMessage } from '../errors.js';
import { FileLogger, info, warn, error as logError } from '../logging/logger.js';
import {
  getRunPaths,
  getScreenshotFileName,
  getScreenshotPath,
  writeRunJson,
} from '../logging/logStore.js';
import type { Profile } from '../profiles/profileStore.js';
import { TimeoutError, retryWithBackoff, sleep, withTimeout } from '../utils/timeout.js';
import { CancellationToken } from './cancellation.js';
import { RunLog } from './runLog.js';
import { createDefaultSteps } from './steps.js';
import type {
  LogLine,
  LogLineLevel,
  ProgressEvent,
  ProgressListener,
  QueueItem,
  RunSnapshot,
  RunStatus,
  RunSummary,
  StepDescriptor,
  StepOutcome,
  StepResult,
} from './types.js';

const SCREENSHOT_TIMEOUT_MS = 15000;

export interface ProfileSource {
  /** Throws NotFoundError for an unknown id */
  get(id: string): Profile;
}

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TaskRunnerOptions extends RunnerOptions {
  dataDir: string;
  steps?: StepDescriptor[];
  /** Replaces the real timer for the delay between profiles and between retries */
  wait?: WaitFn;
}

export interface StartOptions {
  rounds?: number;
}

type RunState = Omit<RunSnapshot, 'summary'>;

interface ActiveRun {
  runId: string;
  token: CancellationToken;
  profiles: Profile[];
  fileLog: FileLogger;
}

function generateRunId(): string {
  return `${new Date().toISOString().replace(/[:.]/g, '-')}-${randomUUID().slice(0, 8)}`;
}

function idleState(): RunState {
  return {
    runId: null,
    status: 'idle',
    selectedProfiles: [],
    rounds: 0,
    queue: [],
    currentIndex: null,
    currentStep: null,
    startedAt: null,
    finishedAt: null,
    error: null,
  };
}

export function summarize(queue: QueueItem[]): RunSummary {
  const summary: RunSummary = { completed: 0, failed: 0, skipped: 0, stopped: 0 };
  for (const item of queue) {
    if (item.status === 'completed') summary.completed++;
    else if (item.status === 'failed') summary.failed++;
    else if (item.status === 'skipped') summary.skipped++;
    else if (item.status === 'stopped') summary.stopped++;
  }
  return summary;
}

/**
 * Runs the step sequence once per queued profile, one profile at a time.
 *
 * One instance owns at most one active run. Session and step failures are
 * recorded and the run moves on; only a defect outside those (for example
 * the driver reporting that no browser exists) ends the run early.
 */
export class TaskRunner {
  private state: RunState = idleState();
  private active: ActiveRun | null = null;
  private execution: Promise<void> = Promise.resolve();
  private readonly log: RunLog;
  private readonly steps: StepDescriptor[];
  private readonly wait: WaitFn;
  private options: TaskRunnerOptions;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly profiles: ProfileSource,
    options: TaskRunnerOptions
  ) {
    this.options = { ...options };
    this.steps = (options.steps ?? createDefaultSteps()).map((s) => ({ ...s, retry: { ...s.retry } }));
    this.wait = options.wait ?? sleep;
    this.log = new RunLog(options.maxLogLines);
  }

  // ---------- control ----------

  start(profileIds: string[], startOptions: StartOptions = {}): RunSnapshot {
    if (this.isActive()) {
      throw new ConflictError('A run is already active');
    }

    if (profileIds.length === 0) {
      throw new ValidationError('No profiles selected');
    }

    const rounds = startOptions.rounds ?? 1;
    if (!Number.isInteger(rounds) || rounds < 1 || rounds > this.options.maxRounds) {
      throw new ValidationError(`Rounds must be a whole number from 1 to ${this.options.maxRounds}`);
    }

    // Resolved once; later edits to the store do not affect this run
    const selected = profileIds.map((id) => this.profiles.get(id));

    const runId = generateRunId();
    const queue: QueueItem[] = [];
    const queueProfiles: Profile[] = [];
    for (let round = 1; round <= rounds; round++) {
      for (const profile of selected) {
        queue.push({
          index: queue.length,
          profileId: profile.id,
          profileName: profile.name,
          round,
          status: 'pending',
          failedSteps: 0,
        });
        queueProfiles.push(profile);
      }
    }

    const active: ActiveRun = {
      runId,
      token: new CancellationToken(),
      profiles: queueProfiles,
      fileLog: new FileLogger(getRunPaths(this.options.dataDir, runId).runLogPath),
    };

    this.log.clear();
    this.state = {
      runId,
      status: 'running',
      selectedProfiles: [...profileIds],
      rounds,
      queue,
      currentIndex: null,
      currentStep: null,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      error: null,
    };

    this.active = active;

    this.execution = this.execute(active).catch((error: unknown) => {
      logError(`Run ${runId} ended with an unhandled error: ${errorMessage(error)}`, 'Runner');
    });

    return this.status();
  }

  stop(): RunSnapshot {
    if (!this.active || !this.isActive()) {
      throw new ConflictError('No run is active');
    }

    if (this.state.status === 'stopping') {
      return this.status();
    }

    this.state.status = 'stopping';
    this.active.token.cancel();
    this.line('warning', 'Stop requested, the current step will finish first');
    return this.status();
  }

  reset(): RunSnapshot {
    if (this.isActive()) {
      throw new ConflictError('Cannot reset while a run is active');
    }
    this.state = idleState();
    this.log.clear();
    return this.status();
  }

  clearLogs(): void {
    this.log.clearLines();
  }

  updateOptions(changes: Partial<RunnerOptions>): void {
    this.options = { ...this.options, ...changes };
  }

  // ---------- reads ----------

  status(): RunSnapshot {
    const copy = structuredClone(this.state);
    return { ...copy, summary: summarize(copy.queue) };
  }

  isActive(): boolean {
    return this.state.status === 'running' || this.state.status === 'stopping';
  }

  results(): StepResult[] {
    return this.log.getResults();
  }

  logs(afterSeq: number = 0): LogLine[] {
    return this.log.getLines(afterSeq);
  }

  getSteps(): StepDescriptor[] {
    return this.steps.map((s) => ({ ...s, retry: { ...s.retry } }));
  }

  subscribe(listener: ProgressListener): () => void {
    return this.log.subscribe(listener);
  }

  /** Resolves once the background execution of the current run has settled */
  waitForIdle(): Promise<void> {
    return this.execution;
  }

  // ---------- execution ----------

  private async execute(active: ActiveRun): Promise<void> {
    const { runId, token } = active;
    const total = this.state.queue.length;
    const profileCount = this.state.selectedProfiles.length;

    this.emit({ type: 'run-start', ...this.meta(), queueLength: total, rounds: this.state.rounds });
    this.line(
      'info',
      `Starting run ${runId}: ${profileCount} profile(s) x ${this.state.rounds} round(s) = ${total} item(s)`
    );

    try {
      for (let index = 0; index < total; index++) {
        if (token.isCancellationRequested) {
          this.skipRemaining(active, index);
          break;
        }

        await this.runItem(active, index);

        if (index < total - 1 && !token.isCancellationRequested) {
          const delayMs = this.options.interProfileDelayMs;
          this.emit({ type: 'delay', ...this.meta(), delayMs, nextIndex: index + 1 });
          this.line('info', `Waiting ${delayMs / 1000}s before the next profile`);
          await this.wait(delayMs, token.signal);
        }
      }

      this.finish(active, token.isCancellationRequested ? 'stopped' : 'completed');
    } catch (error) {
      this.failRun(active, error);
    }
  }

  private async runItem(active: ActiveRun, index: number): Promise<void> {
    const { runId, token } = active;
    const item = this.state.queue[index];
    const profile = active.profiles[index];
    const total = this.state.queue.length;
    const ref = { index, profileId: item.profileId, profileName: item.profileName, round: item.round };

    item.status = 'running';
    this.state.currentIndex = index;
    this.state.currentStep = 'open-session';
    this.emit({ type: 'profile-start', ...this.meta(), ...ref });
    this.line(
      'info',
      `[${index + 1}/${total}] ${profile.name} (round ${item.round}/${this.state.rounds}): opening browser`
    );

    let session: BrowserSession;
    try {
      session = await this.openSession(profile.path);
    } catch (error) {
      if (!(error instanceof SessionError) && !(error instanceof TimeoutError)) {
        throw error;
      }

      const detail = errorMessage(error);
      this.record(this.createResult(runId, item, 'open-session', 'failure', detail), index);
      item.status = 'failed';
      this.state.currentStep = null;
      this.emit({ type: 'profile-failed', ...this.meta(), ...ref, detail });
      this.line('error', `${profile.name}: could not open browser session: ${detail}`);
      return;
    }

    this.emit({ type: 'session-open', ...this.meta(), ...ref, profilePath: profile.path });

    let stopped = false;
    try {
      for (const step of this.steps) {
        if (token.isCancellationRequested) {
          stopped = true;
          break;
        }

        this.state.currentStep = step.name;
        const result = await this.runStep(active, index, session, step);
        if (result.outcome === 'failure') {
          item.failedSteps++;
        }
        this.record(result, index);
      }
    } finally {
      this.state.currentStep = 'close-session';
      await session.close().catch((error: unknown) => {
        warn(`Failed to close browser for ${profile.name}: ${errorMessage(error)}`, 'Runner');
      });
      this.state.currentStep = null;
    }

    if (stopped) {
      item.status = 'stopped';
      this.emit({ type: 'profile-stopped', ...this.meta(), ...ref });
      this.line('warning', `${profile.name}: stopped, browser closed`);
      return;
    }

    item.status = 'completed';
    this.emit({ type: 'profile-complete', ...this.meta(), ...ref, failedSteps: item.failedSteps });
    const succeeded = this.steps.length - item.failedSteps;
    this.line(
      item.failedSteps === 0 ? 'success' : 'warning',
      `${profile.name}: finished, ${succeeded}/${this.steps.length} steps without failure`
    );
  }

  /**
   * Opens a session within the session timeout. A session that arrives after
   * the timeout has fired is closed as soon as it does.
   */
  private openSession(profilePath: string): Promise<BrowserSession> {
    const pending = this.driver.openSession(profilePath);
    return withTimeout(pending, {
      timeoutMs: this.options.sessionTimeoutMs,
      label: 'Opening browser session',
      onTimeout: () => {
        pending
          .then((late) => late.close())
          .catch((error: unknown) => {
            warn(`Late session for ${profilePath} ended with: ${errorMessage(error)}`, 'Runner');
          });
      },
    });
  }

  private async runStep(
    active: ActiveRun,
    index: number,
    session: BrowserSession,
    step: StepDescriptor
  ): Promise<StepResult> {
    const item = this.state.queue[index];
    const timeoutMs = step.timeoutMs ?? this.options.stepTimeoutMs;
    const maxAttempts = Math.max(1, step.retry.maxAttempts);

    try {
      const outcome = await retryWithBackoff(
        () => withTimeout(session.perform(step.action), { timeoutMs, label: `Step ${step.name}` }),
        {
          maxRetries: maxAttempts - 1,
          initialDelayMs: step.retry.delayMs,
          maxDelayMs: step.retry.delayMs,
          backoffMultiplier: 1,
          wait: (ms) => this.wait(ms),
          onRetry: (error, attempt) => {
            this.line('warning', `${item.profileName}: ${step.label} failed (attempt ${attempt}/${maxAttempts}), retrying: ${error.message}`);
          },
        }
      );

      const skipped = outcome.status === 'skipped';
      const detail = outcome.detail || (skipped ? 'Nothing to act on' : 'Done');
      this.line(skipped ? 'warning' : 'success', `${item.profileName}: ${step.label}: ${skipped ? 'SKIPPED' : 'SUCCESS'}`);
      return this.createResult(active.runId, item, step.name, skipped ? 'skipped' : 'success', detail);
    } catch (error) {
      const base = errorMessage(error);
      const detail = maxAttempts > 1 ? `${base} (after ${maxAttempts} attempts)` : base;
      const screenshot = await this.captureFailure(active.runId, index, session, step);
      this.line('error', `${item.profileName}: ${step.label}: FAILED: ${detail}`);
      return this.createResult(active.runId, item, step.name, 'failure', detail, screenshot);
    }
  }

  private async captureFailure(
    runId: string,
    index: number,
    session: BrowserSession,
    step: StepDescriptor
  ): Promise<string | undefined> {
    if (!this.options.screenshotOnFailure || !session.screenshot) {
      return undefined;
    }

    const fileName = getScreenshotFileName(index, this.state.queue[index].profileId, step.name);
    const filePath = getScreenshotPath(this.options.dataDir, runId, fileName);
    try {
      await withTimeout(session.screenshot(filePath), {
        timeoutMs: SCREENSHOT_TIMEOUT_MS,
        label: 'Screenshot',
      });
      return fileName;
    } catch (error) {
      warn(`Screenshot after failed ${step.name} not saved: ${errorMessage(error)}`, 'Runner');
      return undefined;
    }
  }

  private skipRemaining(active: ActiveRun, fromIndex: number): void {
    let skipped = 0;
    for (const item of this.state.queue.slice(fromIndex)) {
      if (item.status !== 'pending') continue;

      item.status = 'skipped';
      skipped++;
      this.record(
        this.createResult(active.runId, item, 'profile', 'skipped', active.token.reason ?? 'Run ended early'),
        item.index
      );
      this.emit({
        type: 'profile-skipped',
        ...this.meta(),
        index: item.index,
        profileId: item.profileId,
        profileName: item.profileName,
        round: item.round,
      });
    }

    if (skipped > 0) {
      this.line('warning', `Skipped ${skipped} remaining item(s)`);
    }
  }

  private failRun(active: ActiveRun, error: unknown): void {
    const detail = errorMessage(error);
    const index = this.state.currentIndex;
    const current = index === null ? undefined : this.state.queue[index];

    logError(`Run ${active.runId} aborted: ${detail}`, 'Runner');
    this.state.error = detail;

    if (current && current.status === 'running') {
      current.status = 'failed';
    }

    this.log.appendResult({
      runId: active.runId,
      profileId: current?.profileId ?? null,
      profileName: current?.profileName ?? null,
      round: current?.round ?? 0,
      stepName: 'runner',
      outcome: 'failure',
      detail,
      timestamp: new Date().toISOString(),
    });
    this.line('error', `Run aborted: ${detail}`);

    active.token.cancel(`Run aborted: ${detail}`);
    this.skipRemaining(active, index === null ? 0 : index + 1);
    this.finish(active, 'stopped');
  }

  private finish(active: ActiveRun, status: RunStatus): void {
    this.state.status = status;
    this.state.finishedAt = new Date().toISOString();
    this.state.currentIndex = null;
    this.state.currentStep = null;

    const summary = summarize(this.state.queue);
    this.line(
      status === 'completed' ? 'success' : 'warning',
      `Run ${status}: ${summary.completed} completed, ${summary.failed} failed, ` +
        `${summary.skipped} skipped, ${summary.stopped} stopped`
    );
    this.emit({ type: 'run-end', ...this.meta(), status, summary, error: this.state.error });

    writeRunJson(this.options.dataDir, active.runId, {
      ...this.status(),
      results: this.log.getResults(),
    });

    if (this.active === active) {
      this.active = null;
    }
  }

  // ---------- recording ----------

  private createResult(
    runId: string,
    item: QueueItem,
    stepName: string,
    outcome: StepOutcome,
    detail: string,
    screenshot?: string
  ): StepResult {
    return {
      runId,
      profileId: item.profileId,
      profileName: item.profileName,
      round: item.round,
      stepName,
      outcome,
      detail,
      ...(screenshot ? { screenshot } : {}),
      timestamp: new Date().toISOString(),
    };
  }

  private record(result: StepResult, index: number): void {
    this.log.appendResult(result);
    this.emit({ type: 'step', ...this.meta(), index, result });
    this.active?.fileLog.appendWithTimestamp(
      `${result.outcome.toUpperCase()} ${result.profileName ?? '-'} ${result.stepName}: ${result.detail}`
    );
  }

  private meta(): { runId: string; timestamp: string } {
    return {
      runId: this.active?.runId ?? this.state.runId ?? '',
      timestamp: new Date().toISOString(),
    };
  }

  private emit(event: ProgressEvent): void {
    this.log.emit(event);
  }

  private line(level: LogLineLevel, message: string): void {
    const line = this.log.appendLine(level, message);
    this.active?.fileLog.appendWithTimestamp(`[${level.toUpperCase()}] ${message}`);

    if (level === 'error') logError(message, 'Runner');
    else if (level === 'warning') warn(message, 'Runner');
    else info(message, 'Runner');

    this.emit({ type: 'log', ...this.meta(), line });
  }
}
