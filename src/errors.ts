export type ErrorCode =
  | 'VALIDATION'
  | 'TOOL_EXECUTION'
  | 'HEALING_EXHAUSTED'
  | 'PROVIDER_TRANSIENT'
  | 'PROVIDER_FATAL'
  | 'ORACLE_CALL'
  | 'PARSE'
  | 'SESSION_IO';

export class InvestigationError extends Error {
  constructor(public readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Fatal errors abort the run; everything else is recovered locally. */
  get fatal(): boolean {
    return this.code === 'VALIDATION' || this.code === 'PROVIDER_FATAL' || this.code === 'SESSION_IO';
  }
}

/** Bad input dump or configuration value. */
export class ValidationError extends InvestigationError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class ToolExecutionError extends InvestigationError {
  constructor(public readonly command: string, message: string) {
    super('TOOL_EXECUTION', message);
  }
}

export class HealingExhausted extends InvestigationError {
  constructor(public readonly command: string, public readonly reason: string) {
    super('HEALING_EXHAUSTED', `Could not heal '${command}': ${reason}`);
  }
}

/** Rate limit or timeout that outlived the retry policy. */
export class ProviderTransientError extends InvestigationError {
  constructor(message: string, public readonly attempts: number) {
    super('PROVIDER_TRANSIENT', message);
  }
}

/** Bad credentials or provider configuration. */
export class ProviderFatalError extends InvestigationError {
  constructor(message: string) {
    super('PROVIDER_FATAL', message);
  }
}

/** Non-retryable oracle failure scoped to the calling phase. */
export class OracleCallError extends InvestigationError {
  constructor(message: string) {
    super('ORACLE_CALL', message);
  }
}

export class ParseError extends InvestigationError {
  constructor(message: string) {
    super('PARSE', message);
  }
}

export class SessionIOError extends InvestigationError {
  constructor(operation: string, target: string, cause: unknown) {
    super('SESSION_IO', `${operation} failed for ${target}: ${describeError(cause)}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
