import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { chromium, type BrowserContext, type Page } from 'playwright-core';
import type { BrowserOptions } from '../config.js';
import { ActionError, DriverUnavailableError, SessionError, errorMessage } from '../errors.js';
import { info, warn } from '../logging/logger.js';
import type { ActionRegistry } from './actions.js';
import { isUserDataDirLocked, resolveProfileLocation } from './profileLocation.js';
import type { ActionOutcome, BrowserDriver, BrowserSession, StepAction } from './types.js';

type LaunchPersistentContext = typeof chromium.launchPersistentContext;

// Playwright's wording when the channel's browser is not installed
const MISSING_BROWSER_PATTERNS = [
  /Executable doesn't exist/i,
  /Chromium distribution '.*' is not found/i,
  /Failed to launch: Error: spawn .* ENOENT/i,
];

export function isMissingBrowserError(message: string): boolean {
  return MISSING_BROWSER_PATTERNS.some((pattern) => pattern.test(message));
}

class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    readonly profilePath: string,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly actions: ActionRegistry
  ) {}

  async perform(action: StepAction): Promise<ActionOutcome> {
    const handler = this.actions.get(action.name);
    if (!handler) {
      throw new ActionError(`No handler registered for action "${action.name}"`, action.name);
    }

    try {
      return await handler({
        page: this.page,
        profilePath: this.profilePath,
        params: action.params || {},
      });
    } catch (error) {
      if (error instanceof ActionError) {
        throw error;
      }
      throw new ActionError(`${action.name} failed: ${errorMessage(error)}`, action.name);
    }
  }

  async screenshot(filePath: string): Promise<void> {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    await this.page.screenshot({ path: filePath });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.context.close();
    info(`Closed browser for ${this.profilePath}`, 'Driver');
  }
}

/**
 * Opens an installed Chromium-family browser (Edge by default) on an existing
 * user-data directory, so the profile's cookies and sign-ins are reused.
 */
export class PlaywrightDriver implements BrowserDriver {
  constructor(
    private readonly options: BrowserOptions,
    private readonly actions: ActionRegistry,
    private readonly launch: LaunchPersistentContext = chromium.launchPersistentContext.bind(chromium)
  ) {}

  async openSession(profilePath: string): Promise<BrowserSession> {
    const { userDataDir, profileDirectory } = resolveProfileLocation(profilePath);

    if (!existsSync(userDataDir)) {
      throw new SessionError(`Profile directory does not exist: ${userDataDir}`, profilePath);
    }

    if (isUserDataDirLocked(userDataDir)) {
      throw new SessionError(
        `Profile is open in another browser window, close it first: ${userDataDir}`,
        profilePath
      );
    }

    info(`Launching ${this.options.channel || 'chromium'} on ${userDataDir} (${profileDirectory})`, 'Driver');

    let context: BrowserContext;
    try {
      context = await this.launch(userDataDir, {
        channel: this.options.executablePath ? undefined : this.options.channel,
        executablePath: this.options.executablePath,
        headless: this.options.headless,
        args: [`--profile-directory=${profileDirectory}`, '--no-first-run', '--no-default-browser-check'],
        viewport: null,
      });
    } catch (error) {
      const message = errorMessage(error);
      if (isMissingBrowserError(message)) {
        throw new DriverUnavailableError(`Browser is not available: ${message}`);
      }
      throw new SessionError(`Failed to open browser for ${profilePath}: ${message}`, profilePath);
    }

    try {
      const page = context.pages()[0] ?? (await context.newPage());
      return new PlaywrightSession(profilePath, context, page, this.actions);
    } catch (error) {
      await context.close().catch((closeError: unknown) => {
        warn(`Failed to close browser after setup error: ${errorMessage(closeError)}`, 'Driver');
      });
      throw new SessionError(`Failed to open a page for ${profilePath}: ${errorMessage(error)}`, profilePath);
    }
  }
}
