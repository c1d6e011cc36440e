import {
  readFileSync,
  existsSync,
  readdirSync,
  statSync,
  rmSync,
  mkdirSync,
  writeFileSync,
} from 'fs';
import { join, basename } from 'path';
import { info, warn } from './logger.js';

export interface RunPaths {
  runDir: string;
  runLogPath: string;
  runJsonPath: string;
  screenshotsDir: string;
}

export function getLogsDir(dataDir: string): string {
  return join(dataDir, 'logs');
}

export function getScreenshotsDir(dataDir: string): string {
  return join(dataDir, 'screenshots');
}

export function toSafeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]/g, '_');
}

export function getRunPaths(dataDir: string, runId: string): RunPaths {
  const safeRunId = toSafeSegment(runId);
  const runDir = join(getLogsDir(dataDir), safeRunId);

  return {
    runDir,
    runLogPath: join(runDir, 'run.log'),
    runJsonPath: join(runDir, 'run.json'),
    screenshotsDir: join(getScreenshotsDir(dataDir), safeRunId),
  };
}

export function getScreenshotFileName(queueIndex: number, profileId: string, stepName: string): string {
  return `${queueIndex + 1}-${toSafeSegment(profileId)}-${toSafeSegment(stepName)}.png`;
}

export function getScreenshotPath(dataDir: string, runId: string, fileName: string): string {
  return join(getRunPaths(dataDir, runId).screenshotsDir, fileName);
}

/**
 * Resolves a screenshot requested over HTTP. Only bare file names are
 * accepted, so the result always stays inside the run's screenshot folder.
 */
export function resolveScreenshotFile(
  dataDir: string,
  runId: string,
  fileName: string
): string | null {
  if (basename(fileName) !== fileName || !fileName.endsWith('.png')) {
    return null;
  }

  const filePath = getScreenshotPath(dataDir, runId, fileName);
  return existsSync(filePath) ? filePath : null;
}

export function writeRunJson(dataDir: string, runId: string, data: unknown): void {
  const { runDir, runJsonPath } = getRunPaths(dataDir, runId);
  try {
    if (!existsSync(runDir)) {
      mkdirSync(runDir, { recursive: true });
    }
    writeFileSync(runJsonPath, JSON.stringify(data, null, 2));
  } catch (error) {
    warn(`Failed to save run summary for ${runId}: ${error}`, 'LogStore');
  }
}

export function readLogFile(filePath: string): string | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    return readFileSync(filePath, 'utf-8');
  } catch (error) {
    warn(`Failed to read log file ${filePath}: ${error}`, 'LogStore');
    return null;
  }
}

export function readLogTail(filePath: string, lines: number = 40): string {
  const content = readLogFile(filePath);
  if (!content) {
    return '';
  }

  const allLines = content.split('\n');
  return allLines.slice(-lines).join('\n');
}

export function listRunIds(dataDir: string): string[] {
  const logsDir = getLogsDir(dataDir);

  if (!existsSync(logsDir)) {
    return [];
  }

  try {
    return readdirSync(logsDir, { withFileTypes: true })
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort()
      .reverse();
  } catch (error) {
    warn(`Failed to list runs in ${logsDir}: ${error}`, 'LogStore');
    return [];
  }
}

function getFileAge(filePath: string): number {
  try {
    const stats = statSync(filePath);
    return Date.now() - stats.mtimeMs;
  } catch {
    return 0;
  }
}

/** Deletes run data older than `maxAgeDays`, never touching the runs in `keep` */
export function cleanupOldData(
  dataDir: string,
  maxAgeDays: number = 7,
  keep: readonly string[] = []
): { logsDeleted: number; screenshotsDeleted: number } {
  const maxAgeMs = maxAgeDays * 24 * 60 * 60 * 1000;
  let logsDeleted = 0;
  let screenshotsDeleted = 0;

  for (const runId of listRunIds(dataDir)) {
    if (keep.includes(runId)) {
      continue;
    }

    const { runDir, runLogPath, screenshotsDir } = getRunPaths(dataDir, runId);
    const marker = existsSync(runLogPath) ? runLogPath : runDir;

    if (getFileAge(marker) <= maxAgeMs) {
      continue;
    }

    rmSync(runDir, { recursive: true, force: true });
    logsDeleted++;
    info(`Deleted old run directory: ${runDir}`, 'Cleanup');

    if (existsSync(screenshotsDir)) {
      screenshotsDeleted += readdirSync(screenshotsDir).filter((f) => f.endsWith('.png')).length;
      rmSync(screenshotsDir, { recursive: true, force: true });
    }
  }

  return { logsDeleted, screenshotsDeleted };
}
