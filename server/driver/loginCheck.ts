import type { Page } from 'playwright-core';
import type { LoginCheckOptions } from '../config.js';
import { ActionError } from '../errors.js';
import { sleep } from '../utils/timeout.js';
import type { ActionOutcome } from './types.js';

export type LoginCheckPage = Pick<Page, 'goto' | 'isVisible' | 'url'>;

const POLL_INTERVAL_MS = 250;

export function missingLoginCheckKeys(options: LoginCheckOptions): string[] {
  const missing: string[] = [];
  if (!options.url.trim()) missing.push('loginCheck.url');
  if (!options.loggedInSelector.trim()) missing.push('loginCheck.loggedInSelector');
  return missing;
}

/**
 * Opens `options.url` and decides whether the profile is signed in.
 *
 * Logged out: `loggedOutSelector` is visible once the page has loaded.
 * Logged in: `loggedInSelector` becomes visible within `timeoutMs`.
 * Anything else fails the check.
 */
export async function checkLogin(
  page: LoginCheckPage,
  options: LoginCheckOptions,
  wait: (ms: number) => Promise<void> = sleep
): Promise<ActionOutcome> {
  const missing = missingLoginCheckKeys(options);
  if (missing.length > 0) {
    throw new ActionError(`Login check is not configured: set ${missing.join(', ')}`, 'verify-login');
  }

  await page.goto(options.url, { waitUntil: 'domcontentloaded' });

  if (options.loggedOutSelector && (await page.isVisible(options.loggedOutSelector))) {
    throw new ActionError(`Not logged in: sign-in form shown at ${page.url()}`, 'verify-login');
  }

  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (await page.isVisible(options.loggedInSelector)) {
      return { status: 'success', detail: `Logged in at ${page.url()}` };
    }
    if (Date.now() >= deadline) {
      break;
    }
    await wait(POLL_INTERVAL_MS);
  }

  throw new ActionError(
    `Could not confirm login: "${options.loggedInSelector}" not visible after ${options.timeoutMs}ms`,
    'verify-login'
  );
}
