/**
 * Error taxonomy shared by the profile store, the runner and the HTTP layer.
 * Each error carries the status code the API answers with.
 */

export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = 'AppError';
  }
}

/** Bad operator input (empty name or path, empty selection, bad rounds) */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** A run is already active, or none is when one is required */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
    this.name = 'ConflictError';
  }
}

/** The browser session could not be opened for a profile */
export class SessionError extends AppError {
  constructor(message: string, public readonly profilePath?: string) {
    super(message, 502);
    this.name = 'SessionError';
  }
}

/** A single step's action failed */
export class ActionError extends AppError {
  constructor(message: string, public readonly actionName?: string) {
    super(message, 500);
    this.name = 'ActionError';
  }
}

/**
 * The driver itself cannot work at all (no browser executable, broken install).
 * The runner treats this as fatal for the whole run.
 */
export class DriverUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503);
    this.name = 'DriverUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
