/**
 * A precondition of the run does not hold: bad date range, missing input
 * directory or files. Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class IngestionError extends Error {
  readonly attempts: number;

  constructor(message: string, options: { attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'IngestionError';
    this.attempts = options.attempts;
  }
}

export class SchemaError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Clean dataset failed validation:\n${violations.map((violation) => `  - ${violation}`).join('\n')}`);
    this.name = 'SchemaError';
    this.violations = violations;
  }
}

/**
 * An optional capability (partitioned writes, holiday calendar) is switched
 * off or cannot run in this environment. Callers degrade instead of failing.
 */
export class CapabilityUnavailableError extends Error {
  readonly capability: string;

  constructor(capability: string, reason: string) {
    super(`${capability} unavailable: ${reason}`);
    this.name = 'CapabilityUnavailableError';
    this.capability = capability;
  }
}
