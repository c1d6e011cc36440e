const API_BASE = '/api';

export interface Profile {
  id: string;
  name: string;
  path: string;
  createdAt: string;
}

export type RunStatus = 'idle' | 'running' | 'stopping' | 'stopped' | 'completed';
export type QueueItemStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped' | 'stopped';
export type StepOutcome = 'success' | 'failure' | 'skipped';

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

export interface StepInfo {
  name: string;
  label: string;
}

export interface Status {
  run: RunSnapshot;
  profileCount: number;
  steps: StepInfo[];
}

export interface StepResult {
  runId: string;
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

export interface LogsResponse {
  lines: LogLine[];
  results: StepResult[];
}

export interface RunnerOptions {
  interProfileDelayMs: number;
  stepTimeoutMs: number;
  sessionTimeoutMs: number;
  maxRounds: number;
  maxLogLines: number;
  screenshotOnFailure: boolean;
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

const EVENT_TYPES: ReadonlyArray<ProgressEvent['type']> = [
  'run-start',
  'profile-start',
  'session-open',
  'step',
  'profile-failed',
  'profile-complete',
  'profile-stopped',
  'profile-skipped',
  'delay',
  'run-end',
  'log',
];

function readErrorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `HTTP ${status}`;
}

async function fetchJson<T>(path: string, options?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, {
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
    ...options,
  });

  if (!response.ok) {
    const errorData: unknown = await response.json().catch(() => ({}));
    throw new Error(readErrorMessage(errorData, response.status));
  }

  return response.json();
}

async function fetchText(path: string): Promise<string> {
  const response = await fetch(`${API_BASE}${path}`);

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }

  return response.text();
}

export const api = {
  // Status
  getStatus: () => fetchJson<Status>('/status'),

  // Profiles
  getProfiles: () => fetchJson<Profile[]>('/profiles'),

  addProfile: (name: string, path: string) =>
    fetchJson<Profile>('/profiles', {
      method: 'POST',
      body: JSON.stringify({ name, path }),
    }),

  updateProfile: (id: string, changes: { name?: string; path?: string }) =>
    fetchJson<Profile>(`/profiles/${encodeURIComponent(id)}`, {
      method: 'PUT',
      body: JSON.stringify(changes),
    }),

  deleteProfile: (id: string) =>
    fetchJson<{ success: boolean }>(`/profiles/${encodeURIComponent(id)}`, {
      method: 'DELETE',
    }),

  // Run control
  startRun: (profiles: string[], rounds: number) =>
    fetchJson<{ success: boolean; message: string; run: RunSnapshot }>('/run', {
      method: 'POST',
      body: JSON.stringify({ profiles, rounds }),
    }),

  stopRun: () =>
    fetchJson<{ success: boolean; run: RunSnapshot }>('/stop', { method: 'POST' }),

  resetRun: () =>
    fetchJson<{ success: boolean; run: RunSnapshot }>('/reset', { method: 'POST' }),

  // Logs
  getLogs: (since: number = 0) => fetchJson<LogsResponse>(`/logs?since=${since}`),

  clearLogs: () => fetchJson<{ success: boolean }>('/logs/clear', { method: 'POST' }),

  getRuns: () => fetchJson<string[]>('/runs'),

  getRunLog: (runId: string) => fetchText(`/runs/${encodeURIComponent(runId)}/log`),

  cleanup: (maxAgeDays: number) =>
    fetchJson<{ success: boolean; logsDeleted: number; screenshotsDeleted: number }>('/cleanup', {
      method: 'POST',
      body: JSON.stringify({ maxAgeDays }),
    }),

  // Settings
  getRunnerOptions: () => fetchJson<RunnerOptions>('/config/runner'),

  updateRunnerOptions: (changes: Partial<RunnerOptions>) =>
    fetchJson<RunnerOptions>('/config/runner', {
      method: 'PUT',
      body: JSON.stringify(changes),
    }),
};

export function isRunActive(status: RunStatus | undefined): boolean {
  return status === 'running' || status === 'stopping';
}

export function getScreenshotUrl(runId: string, fileName: string): string {
  return `${API_BASE}/screenshots/${encodeURIComponent(runId)}/${encodeURIComponent(fileName)}`;
}

/**
 * Subscribe to runner progress events.
 * Returns cleanup function to close the connection
 */
export function subscribeToRunEvents(
  callbacks: {
    onEvent: (event: ProgressEvent) => void;
    onConnected?: (run: RunSnapshot) => void;
    onDisconnected?: () => void;
  },
  options?: { catchUp?: boolean }
): () => void {
  const params = options?.catchUp ? '?catchUp=true' : '';
  const eventSource = new EventSource(`${API_BASE}/events${params}`);

  eventSource.addEventListener('connected', (e) => {
    const data: { run: RunSnapshot } = JSON.parse(e.data);
    callbacks.onConnected?.(data.run);
  });

  for (const type of EVENT_TYPES) {
    eventSource.addEventListener(type, (e) => {
      const event: ProgressEvent = JSON.parse(e.data);
      callbacks.onEvent(event);
    });
  }

  eventSource.onerror = () => {
    callbacks.onDisconnected?.();
  };

  return () => {
    eventSource.close();
  };
}
