/**
 * Error hierarchy for multiline pattern search.
 */

export interface ErrorOptions {
  cause?: Error;
  traceId?: string;
}

export class SearchError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly traceId?: string;
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    traceId?: string,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'SearchError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.traceId = traceId;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    if (this.traceId !== undefined) {
      obj.trace_id = this.traceId;
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class InvalidPatternError extends SearchError {
  constructor(message: string = 'Pattern is missing, unreadable or empty', options?: ErrorOptions) {
    super('INVALID_PATTERN', message, {}, options?.cause, options?.traceId);
    this.name = 'InvalidPatternError';
  }
}

export class InvalidLandscapeError extends SearchError {
  constructor(message: string = 'Landscape is missing or unreadable', options?: ErrorOptions) {
    super('INVALID_LANDSCAPE', message, {}, options?.cause, options?.traceId);
    this.name = 'InvalidLandscapeError';
  }
}

export class PatternNotSetError extends SearchError {
  constructor(operation: string, phase: string, options?: ErrorOptions) {
    super(
      'PATTERN_NOT_SET',
      `Cannot ${operation} while the search is in phase '${phase}'`,
      { operation, phase },
      options?.cause,
      options?.traceId,
    );
    this.name = 'PatternNotSetError';
  }

  get operation(): string {
    return String(this.details['operation']);
  }

  get phase(): string {
    return String(this.details['phase']);
  }
}

export class ConfigNotFoundError extends SearchError {
  constructor(configPath: string, options?: ErrorOptions) {
    super(
      'CONFIG_NOT_FOUND',
      `Configuration file not found: ${configPath}`,
      { configPath },
      options?.cause,
      options?.traceId,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends SearchError {
  constructor(message: string, errors?: Array<Record<string, unknown>>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, errors ? { errors } : {}, options?.cause, options?.traceId);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = Object.freeze({
  INVALID_PATTERN: 'INVALID_PATTERN',
  INVALID_LANDSCAPE: 'INVALID_LANDSCAPE',
  PATTERN_NOT_SET: 'PATTERN_NOT_SET',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
