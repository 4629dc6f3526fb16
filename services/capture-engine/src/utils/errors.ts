/**
 * Capture Rig - Custom Error Classes
 *
 * Structured error handling with full context for debugging.
 *
 * Propagation policy: TransientError stays inside the loop that raised it
 * (retried, then recorded as a Gap), FatalError fails its loop and reaches
 * sibling loops only through the shutdown flag, ConfigError aborts before any
 * loop starts.
 */

export interface ErrorContext {
  operation: string;
  instrumentId?: string;
  timestamp: Date;
  suggestion?: string;
  [key: string]: unknown;
}

export class CaptureError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    context?: Partial<ErrorContext>,
    isOperational = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = {
      operation: context?.operation || 'unknown',
      timestamp: new Date(),
      ...(context || {}),
    };
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    };
  }
}

// Instrument errors

/** Timeout, transport hiccup, garbled reply. Retried locally. */
export class TransientError extends CaptureError {
  constructor(message: string, context?: Partial<ErrorContext>, code = 'TRANSIENT_ERROR') {
    super(message, code, 503, context);
  }
}

export class AcquireTimeoutError extends TransientError {
  constructor(instrumentId: string, timeoutMs: number, context?: Partial<ErrorContext>) {
    super(
      `Instrument ${instrumentId} did not answer within ${timeoutMs}ms`,
      { ...context, instrumentId, timeoutMs },
      'ACQUIRE_TIMEOUT'
    );
  }
}

/** Device unreachable or protocol desync. Fails the loop. */
export class FatalError extends CaptureError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'FATAL_INSTRUMENT_ERROR', 502, context);
  }
}

// Configuration errors (fail fast, before any loop starts)

export class ConfigError extends CaptureError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Partial<ErrorContext>) {
    super(message, 'CONFIG_ERROR', 400, { ...context, issues });
    this.issues = issues;
  }
}

export class SafetyLimitError extends ConfigError {
  constructor(channelId: string, target: number, limit: number, context?: Partial<ErrorContext>) {
    super(
      `Setpoint ${target} on ${channelId} exceeds the ${limit} safety limit`,
      [`${channelId}: |${target}| > ${limit}`],
      { ...context, channelId, target, limit }
    );
  }
}

// Control server requests

export class ValidationError extends CaptureError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', 400, { ...context, issues });
    this.issues = issues;
  }
}


export class NotFoundError extends CaptureError {
  constructor(resource: string, identifier: string, context?: Partial<ErrorContext>) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { ...context, resource, identifier }
    );
  }
}

// Internal errors (500)
export class InternalError extends CaptureError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 500, context, false);
  }
}

export function isCaptureError(error: unknown): error is CaptureError {
  return error instanceof CaptureError;
}

export function isTransientError(error: unknown): error is TransientError {
  return error instanceof TransientError;
}

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Error handler helper
export function handleError(error: unknown): CaptureError {
  if (isCaptureError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      operation: 'unknown',
      originalError: error.name,
      stack: error.stack,
    });
  }

  return new InternalError('An unexpected error occurred', {
    operation: 'unknown',
    originalError: String(error),
  });
}
