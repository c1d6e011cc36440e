import 'dotenv/config';
import { loadConfig } from './config.js';
import { info, warn, error as logError, setLogLevel, isLogLevel } from './logging/logger.js';
import { cleanupOldData } from './logging/logStore.js';
import { ProfileStore } from './profiles/profileStore.js';
import { PlaywrightDriver } from './driver/playwrightDriver.js';
import { createDefaultActionRegistry } from './driver/actions.js';
import { missingLoginCheckKeys } from './driver/loginCheck.js';
import { TaskRunner } from './runner/taskRunner.js';
import { describeSteps } from './runner/steps.js';
import { errorMessage } from './errors.js';
import { createApp } from './app.js';

const PORT = parseInt(process.env.PORT || '5000', 10);
const HOST = process.env.HOST || '127.0.0.1';

let runner: TaskRunner | null = null;

async function main() {
  const logLevel = process.env.LOG_LEVEL || 'info';
  if (isLogLevel(logLevel)) {
    setLogLevel(logLevel);
  }

  info('Starting Profile Runner server...', 'Server');

  const config = loadConfig();
  info('Configuration loaded', 'Server');

  const store = new ProfileStore(config.profilesFile);
  const driver = new PlaywrightDriver(config.browser, createDefaultActionRegistry(config.loginCheck));
  runner = new TaskRunner(driver, store, { ...config.runner, dataDir: config.dataDir });

  const cleaned = cleanupOldData(config.dataDir);
  if (cleaned.logsDeleted > 0) {
    info(`Removed ${cleaned.logsDeleted} old run(s)`, 'Server');
  }

  const app = createApp({ store, runner, dataDir: config.dataDir });

  app.listen(PORT, HOST, () => {
    info(`Server listening on http://${HOST}:${PORT}`, 'Server');
    info('', 'Server');
    info('=== Profile Runner Ready ===', 'Server');
    info(`  API:        http://${HOST}:${PORT}/api/*`, 'Server');
    info(`  Frontend:   http://${HOST}:${PORT}/`, 'Server');
    info(`  Profiles:   ${store.list().length} saved in ${config.profilesFile}`, 'Server');
    info(`  Steps:      ${describeSteps(runner?.getSteps() ?? []).map((s) => s.name).join(', ')}`, 'Server');
    info(`  Browser:    ${config.browser.executablePath ?? config.browser.channel ?? 'chromium'}`, 'Server');

    const missing = missingLoginCheckKeys(config.loginCheck);
    if (missing.length > 0) {
      warn(`Login check not configured (${missing.join(', ')}); verify-login will fail`, 'Server');
    }
  });
}

async function shutdown(signal: string): Promise<void> {
  info(`${signal} received, shutting down...`, 'Server');
  if (runner?.isActive()) {
    if (runner.status().status === 'running') {
      runner.stop();
    }
    await runner.waitForIdle();
  }
  process.exit(0);
}

// Handle graceful shutdown
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logError(`Shutdown failed: ${errorMessage(error)}`, 'Server');
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logError(`Shutdown failed: ${errorMessage(error)}`, 'Server');
    process.exit(1);
  });
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logError(`Uncaught exception: ${error.message}`, 'Server');
  console.error(error.stack);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logError(`Unhandled rejection: ${errorMessage(reason)}`, 'Server');
  process.exit(1);
});

main().catch((error) => {
  logError(`Failed to start server: ${errorMessage(error)}`, 'Server');
  process.exit(1);
});
