/**
 * Narrow capability interface the runner needs from a browser automation
 * library. Nothing outside server/driver/ knows which library sits behind it.
 */

export interface StepAction {
  /** Key of the handler in the action registry */
  name: string;
  params?: Record<string, unknown>;
}

export type ActionStatus = 'success' | 'skipped';

export interface ActionOutcome {
  /** `skipped` means the action found nothing to act on */
  status: ActionStatus;
  detail?: string;
}

export interface BrowserSession {
  readonly profilePath: string;
  /** Rejects with ActionError when the action fails */
  perform(action: StepAction): Promise<ActionOutcome>;
  screenshot?(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  /**
   * Rejects with SessionError when the profile cannot be opened (missing,
   * locked by another browser, launch failure) and with
   * DriverUnavailableError when no browser can be started at all.
   */
  openSession(profilePath: string): Promise<BrowserSession>;
}
