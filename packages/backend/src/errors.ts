/**
 * Error taxonomy for a discharge run.
 *
 * Provider, malformed-output and narrative failures are absorbed where they
 * happen and replaced by a fallback. Persistence failures end the run.
 */
export class DischargeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DischargeError';
  }

  toClientJSON(): { detail: string } {
    return { detail: this.message };
  }
}

export class ProviderError extends DischargeError {
  constructor(checkName: string, message: string, options?: { cause?: unknown }) {
    super('provider.failed', `${checkName} check failed: ${message}`, { checkName }, options);
    this.name = 'ProviderError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(checkName: string, timeoutMs: number) {
    super(checkName, `timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export class MalformedProviderOutputError extends DischargeError {
  constructor(checkName: string, reason: string) {
    super('provider.malformed_output', `${checkName} check returned malformed output: ${reason}`, { checkName });
    this.name = 'MalformedProviderOutputError';
  }
}

export class NarrativeError extends DischargeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('narrative.failed', message, undefined, options);
    this.name = 'NarrativeError';
  }
}

/**
 * The message names the operation and target only. The adapter's own error
 * (paths, driver text) stays on `cause` for logs.
 */
export class PersistenceError extends DischargeError {
  constructor(
    public readonly operation: string,
    public readonly target: string,
    options?: { cause?: unknown },
  ) {
    super('persistence.failed', `Failed to ${operation} ${target}`, { operation, target }, options);
    this.name = 'PersistenceError';
  }

  override toClientJSON(): { detail: string } {
    return { detail: `Workflow execution failed: could not ${this.operation} ${this.target}` };
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
