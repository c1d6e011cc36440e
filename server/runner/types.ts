import type { StepAction } from '../driver/types.js';

export type RunStatus = 'idle' | 'running' | 'stopping' | 'stopped' | 'completed';

export type QueueItemStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped' | 'stopped';

export type StepOutcome = 'success' | 'failure' | 'skipped';

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export interface StepDescriptor {
  name: string;
  label: string;
  action: StepAction;
  retry: RetryPolicy;
  /** Overrides the runner's step timeout */
  timeoutMs?: number;
}

export interface QueueItem {
  index: number;
  profileId: string;
  profileName: string;
  round: number;
  status: QueueItemStatus;
  failedSteps: number;
}

export interface RunSummary {
  completed: number;
  failed: number;
  skipped: number;
  stopped: number;
}

export interface RunSnapshot {
  runId: string | null;
  status: RunStatus;
  selectedProfiles: string[];
  rounds: number;
  queue: QueueItem[];
  currentIndex: number | null;
  currentStep: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  summary: RunSummary;
  error: string | null;
}

export interface StepResult {
  runId: string;
  /** null only for runner-level entries not tied to a profile */
  profileId: string | null;
  profileName: string | null;
  round: number;
  stepName: string;
  outcome: StepOutcome;
  detail: string;
  screenshot?: string;
  timestamp: string;
}

export type LogLineLevel = 'info' | 'success' | 'warning' | 'error';

export interface LogLine {
  seq: number;
  timestamp: string;
  level: LogLineLevel;
  message: string;
}

interface EventBase {
  runId: string;
  timestamp: string;
}

interface ProfileEventBase extends EventBase {
  index: number;
  profileId: string;
  profileName: string;
  round: number;
}

export type ProgressEvent =
  | (EventBase & { type: 'run-start'; queueLength: number; rounds: number })
  | (ProfileEventBase & { type: 'profile-start' })
  | (ProfileEventBase & { type: 'session-open'; profilePath: string })
  | (EventBase & { type: 'step'; index: number; result: StepResult })
  | (ProfileEventBase & { type: 'profile-failed'; detail: string })
  | (ProfileEventBase & { type: 'profile-complete'; failedSteps: number })
  | (ProfileEventBase & { type: 'profile-stopped' })
  | (ProfileEventBase & { type: 'profile-skipped' })
  | (EventBase & { type: 'delay'; delayMs: number; nextIndex: number })
  | (EventBase & { type: 'run-end'; status: RunStatus; summary: RunSummary; error: string | null })
  | (EventBase & { type: 'log'; line: LogLine });

export type ProgressListener = (event: ProgressEvent) => void;
