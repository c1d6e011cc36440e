import type { Page } from 'playwright-core';
import type { LoginCheckOptions } from '../config.js';
import { checkLogin } from './loginCheck.js';
import type { ActionOutcome } from './types.js';

export interface ActionContext {
  page: Page;
  profilePath: string;
  params: Record<string, unknown>;
}

export type ActionHandler = (context: ActionContext) => Promise<ActionOutcome>;

export class ActionRegistry {
  private handlers = new Map<string, ActionHandler>();

  register(name: string, handler: ActionHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  unregister(name: string): boolean {
    return this.handlers.delete(name);
  }

  get(name: string): ActionHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  names(): string[] {
    return [...this.handlers.keys()];
  }
}

/**
 * Registry with the built-in handlers. Site-specific actions are registered
 * by the embedding application.
 */
export function createDefaultActionRegistry(loginCheck: LoginCheckOptions): ActionRegistry {
  return new ActionRegistry().register('verify-login', ({ page }) => checkLogin(page, loginCheck));
}
