/**
 * Application error taxonomy.
 *
 * Every error a handler can show to the user carries an HTTP status and a
 * stable code; anything else is treated as an unexpected 500.
 */

export type ErrorCode =
  | 'InvalidEmail'
  | 'InvalidInput'
  | 'PlanNotConfigured'
  | 'PaymentDeclined'
  | 'ProviderError'
  | 'PipelineError'
  | 'Timeout'
  | 'Cancelled'
  | 'ConfigurationError';

export class AppError extends Error {
  status: number;
  code: ErrorCode;

  constructor(message: string, status: number, code: ErrorCode) {
    super(message);
    this.name = 'AppError';
    this.status = status;
    this.code = code;
  }
}

export class InvalidEmailError extends AppError {
  constructor(message = 'Please enter a valid email address.') {
    super(message, 400, 'InvalidEmail');
    this.name = 'InvalidEmailError';
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400, 'InvalidInput');
    this.name = 'InvalidInputError';
  }
}

export class PlanNotConfiguredError extends AppError {
  constructor(planId: string) {
    super(`Plan "${planId}" is not available for purchase right now.`, 400, 'PlanNotConfigured');
    this.name = 'PlanNotConfiguredError';
  }
}

export class PaymentDeclinedError extends AppError {
  constructor(message: string) {
    super(message, 402, 'PaymentDeclined');
    this.name = 'PaymentDeclinedError';
  }
}

export class ProviderError extends AppError {
  constructor(message: string) {
    super(message, 502, 'ProviderError');
    this.name = 'ProviderError';
  }
}

export class PipelineError extends AppError {
  constructor(message: string) {
    super(message, 502, 'PipelineError');
    this.name = 'PipelineError';
  }
}

export class GenerationTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Diagram generation did not finish within ${Math.round(timeoutMs / 1000)} seconds.`, 504, 'Timeout');
    this.name = 'GenerationTimeoutError';
  }
}

export class GenerationCancelledError extends AppError {
  constructor() {
    super('Diagram generation was cancelled.', 409, 'Cancelled');
    this.name = 'GenerationCancelledError';
  }
}

// Fatal: only ever raised while loading configuration at startup
export class ConfigurationError extends AppError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 500, 'ConfigurationError');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
