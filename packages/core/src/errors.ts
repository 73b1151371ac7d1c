// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export type FactsieveErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'NOT_FOUND'
  | 'EXECUTOR_NOT_CONFIGURED'
  | 'EXECUTION_FAILED'
  | 'DECODE_FAILED'
  | 'INVALID_TRANSITION';

export class FactsieveError extends Error {
  constructor(
    message: string,
    public readonly code: FactsieveErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FactsieveError';
  }
}

/** A configuration file that must exist does not. */
export class ConfigMissingError extends FactsieveError {
  constructor(public readonly path: string) {
    super(`Configuration file not found: ${path}`, 'CONFIG_MISSING');
    this.name = 'ConfigMissingError';
  }
}

/** A configuration file exists but is not valid YAML or has the wrong shape. */
export class ConfigInvalidError extends FactsieveError {
  constructor(
    public readonly path: string,
    public readonly issues: string[],
  ) {
    super(`Invalid configuration in ${path}: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigInvalidError';
  }
}

export class NotFoundError extends FactsieveError {
  constructor(
    public readonly kind: string,
    public readonly key: string,
  ) {
    super(`${kind} not found: ${key}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ExecutorNotConfiguredError extends FactsieveError {
  constructor(public readonly agentName: string) {
    super(`No executor configured for agent "${agentName}"`, 'EXECUTOR_NOT_CONFIGURED');
    this.name = 'ExecutorNotConfiguredError';
  }
}

/** An agent call failed, timed out, or produced nothing usable. */
export class ExecutionFailedError extends FactsieveError {
  constructor(
    public readonly agentName: string,
    cause: unknown,
    code: FactsieveErrorCode = 'EXECUTION_FAILED',
  ) {
    super(messageOf(cause), code, { cause });
    this.name = 'ExecutionFailedError';
  }
}

/** Agent output could not be parsed into the shape a phase expects. */
export class DecodeError extends ExecutionFailedError {
  constructor(
    agentName: string,
    public readonly payload: string,
    reason: string,
  ) {
    super(agentName, new Error(reason), 'DECODE_FAILED');
    this.name = 'DecodeError';
  }
}

export class InvalidTransitionError extends FactsieveError {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid status transition: ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
