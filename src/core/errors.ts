export class PlaywiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PlaywiseError';
  }
}

export class ConfigError extends PlaywiseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class RuleEvaluationError extends PlaywiseError {
  constructor(message: string, public readonly rule: string, cause?: Error) {
    super(message, 'RULE_ERROR', 'decide', cause);
    this.name = 'RuleEvaluationError';
  }
}

export class StoreError extends PlaywiseError {
  constructor(message: string, public readonly operation: string, cause?: Error) {
    super(message, 'STORE_ERROR', 'persist', cause);
    this.name = 'StoreError';
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
