import { Router, Request, Response } from 'express';
import {
  getRunnerOptions,
  setRunnerOptions,
  type RunnerOptions,
} from '../config.js';
import { AppError, ValidationError, errorMessage } from '../errors.js';
import { info, error as logError } from '../logging/logger.js';
import {
  cleanupOldData,
  getRunPaths,
  listRunIds,
  readLogFile,
  readLogTail,
  resolveScreenshotFile,
} from '../logging/logStore.js';
import type { ProfileStore } from '../profiles/profileStore.js';
import { describeSteps } from '../runner/steps.js';
import type { TaskRunner } from '../runner/taskRunner.js';
import type { ProgressEvent } from '../runner/types.js';

const HEARTBEAT_MS = 15000;

export interface UiApiDeps {
  store: ProfileStore;
  runner: TaskRunner;
  dataDir: string;
  /** Persists runner options; defaults to the config file */
  saveRunnerOptions?: (changes: Partial<RunnerOptions>) => RunnerOptions;
  loadRunnerOptions?: () => RunnerOptions;
}

export function sendError(res: Response, error: unknown): void {
  if (error instanceof AppError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  logError(`Request failed: ${errorMessage(error)}`, 'API');
  res.status(500).json({ error: errorMessage(error) });
}

function readStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ValidationError(`${field} must be an array of profile ids`);
  }
  return value;
}

function readRounds(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const rounds = typeof value === 'string' ? Number(value) : value;
  if (typeof rounds !== 'number' || !Number.isInteger(rounds)) {
    throw new ValidationError('rounds must be a whole number');
  }
  return rounds;
}

function readMaxAgeDays(value: unknown): number {
  if (value === undefined) return 7;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError('maxAgeDays must be a non-negative number');
  }
  return value;
}

function readSince(value: unknown): number {
  if (typeof value !== 'string') return 0;
  const since = parseInt(value, 10);
  return Number.isNaN(since) || since < 0 ? 0 : since;
}

const NUMERIC_RUNNER_OPTIONS = [
  'interProfileDelayMs',
  'stepTimeoutMs',
  'sessionTimeoutMs',
  'maxRounds',
] as const;

/** Accepts only known runner options with values of the right type */
export function parseRunnerOptionChanges(body: unknown): Partial<RunnerOptions> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Expected an object of runner options');
  }
  const source: Record<string, unknown> = { ...body };
  const changes: Partial<RunnerOptions> = {};

  for (const key of NUMERIC_RUNNER_OPTIONS) {
    const value = source[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ValidationError(`${key} must be a non-negative number`);
    }
    changes[key] = value;
  }

  if (changes.maxRounds !== undefined && (changes.maxRounds < 1 || !Number.isInteger(changes.maxRounds))) {
    throw new ValidationError('maxRounds must be a whole number of at least 1');
  }

  if (source.screenshotOnFailure !== undefined) {
    if (typeof source.screenshotOnFailure !== 'boolean') {
      throw new ValidationError('screenshotOnFailure must be true or false');
    }
    changes.screenshotOnFailure = source.screenshotOnFailure;
  }

  return changes;
}

function writeEvent(res: Response, type: string, data: unknown): void {
  res.write(`event: ${type}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function createUiApiRouter(deps: UiApiDeps): Router {
  const { store, runner, dataDir } = deps;
  const saveRunnerOptions = deps.saveRunnerOptions ?? setRunnerOptions;
  const loadRunnerOptions = deps.loadRunnerOptions ?? getRunnerOptions;
  const router = Router();

  // ---------- status ----------

  router.get('/status', (_req: Request, res: Response) => {
    res.json({
      run: runner.status(),
      profileCount: store.list().length,
      steps: describeSteps(runner.getSteps()),
    });
  });

  // ---------- profiles ----------

  router.get('/profiles', (_req: Request, res: Response) => {
    res.json(store.list());
  });

  router.post('/profiles', (req: Request, res: Response) => {
    try {
      const { name, path } = req.body ?? {};
      const profile = store.add(name, path);
      res.status(201).json(profile);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.put('/profiles/:id', (req: Request, res: Response) => {
    try {
      const { name, path } = req.body ?? {};
      const profile = store.update(req.params.id, {
        ...(name !== undefined ? { name } : {}),
        ...(path !== undefined ? { path } : {}),
      });
      res.json(profile);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete('/profiles/:id', (req: Request, res: Response) => {
    try {
      store.remove(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ---------- run control ----------

  router.post('/run', (req: Request, res: Response) => {
    try {
      const body = req.body ?? {};
      const profileIds = readStringArray(body.profiles, 'profiles');
      const rounds = readRounds(body.rounds);
      const run = runner.start(profileIds, rounds === undefined ? {} : { rounds });
      info(`Run ${run.runId} started with ${run.queue.length} item(s)`, 'API');
      res.status(202).json({
        success: true,
        message: `Started run for ${profileIds.length} profile(s)`,
        run,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/stop', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, run: runner.stop() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/reset', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, run: runner.reset() });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ---------- logs ----------

  router.get('/logs', (req: Request, res: Response) => {
    res.json({
      lines: runner.logs(readSince(req.query.since)),
      results: runner.results(),
    });
  });

  router.post('/logs/clear', (_req: Request, res: Response) => {
    runner.clearLogs();
    res.json({ success: true });
  });

  router.get('/events', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    writeEvent(res, 'connected', { run: runner.status() });

    if (req.query.catchUp === 'true') {
      const runId = runner.status().runId ?? '';
      for (const line of runner.logs()) {
        const event: ProgressEvent = { type: 'log', runId, timestamp: line.timestamp, line };
        writeEvent(res, event.type, event);
      }
    }

    const unsubscribe = runner.subscribe((event: ProgressEvent) => {
      writeEvent(res, event.type, event);
    });

    const heartbeat = setInterval(() => {
      res.write(': heartbeat\n\n');
    }, HEARTBEAT_MS);

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  });

  // ---------- run history ----------

  router.get('/runs', (_req: Request, res: Response) => {
    res.json(listRunIds(dataDir));
  });

  router.get('/runs/:runId/log', (req: Request, res: Response) => {
    const { runLogPath } = getRunPaths(dataDir, req.params.runId);
    const tail = typeof req.query.tail === 'string' ? parseInt(req.query.tail, 10) : NaN;
    const content = Number.isNaN(tail) ? readLogFile(runLogPath) : readLogTail(runLogPath, tail);

    if (content === null) {
      res.status(404).json({ error: 'Run log not found' });
      return;
    }
    res.type('text/plain').send(content);
  });

  router.get('/runs/:runId/summary', (req: Request, res: Response) => {
    const content = readLogFile(getRunPaths(dataDir, req.params.runId).runJsonPath);
    if (content === null) {
      res.status(404).json({ error: 'Run summary not found' });
      return;
    }
    res.type('application/json').send(content);
  });

  router.get('/screenshots/:runId/:fileName', (req: Request, res: Response) => {
    const filePath = resolveScreenshotFile(dataDir, req.params.runId, req.params.fileName);
    if (!filePath) {
      res.status(404).json({ error: 'Screenshot not found' });
      return;
    }
    res.sendFile(filePath);
  });

  router.post('/cleanup', (req: Request, res: Response) => {
    try {
      const days = readMaxAgeDays(req.body?.maxAgeDays);
      const current = runner.status();
      const keep = runner.isActive() && current.runId ? [current.runId] : [];
      const result = cleanupOldData(dataDir, days, keep);
      res.json({ success: true, ...result });
    } catch (error) {
      sendError(res, error);
    }
  });

  // ---------- settings ----------

  router.get('/config/runner', (_req: Request, res: Response) => {
    res.json(loadRunnerOptions());
  });

  router.put('/config/runner', (req: Request, res: Response) => {
    try {
      const changes = parseRunnerOptionChanges(req.body);
      const saved = saveRunnerOptions(changes);
      runner.updateOptions(changes);
      info(`Runner options updated: ${Object.keys(changes).join(', ') || 'none'}`, 'API');
      res.json(saved);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
