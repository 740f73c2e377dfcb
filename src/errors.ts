/**
 * Fatal error types. Nothing here is retried: each one ends the run after the
 * terminal has been restored.
 */

export class GridpickError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The terminal could not be put into fullscreen/raw input mode */
export class TerminalInitError extends GridpickError {}

/** stdin failed while the loop was waiting for the next key */
export class InputReadError extends GridpickError {}

/**
 * Formats an error for stderr, including the first level of `cause`
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error) {
    return `${error.message}: ${cause.message}`;
  }
  if (cause !== undefined) {
    return `${error.message}: ${String(cause)}`;
  }
  return error.message;
}
