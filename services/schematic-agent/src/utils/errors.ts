/**
 * Schematic Agent - Custom Error Classes
 *
 * Structured error handling with full context for debugging
 */

export interface ErrorContext {
  operation: string;
  input?: unknown;
  timestamp: Date;
  operationId?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export class SchematicAgentError extends Error {
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

// Validation Errors (400)
export class ValidationError extends SchematicAgentError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Raised by the input loader: unreadable file, malformed JSON, schema
 * mismatch, or a pin that names an undefined net.
 */
export class CircuitParseError extends SchematicAgentError {
  public readonly source: string;

  constructor(message: string, source: string, context?: Partial<ErrorContext>) {
    super(message, 'CIRCUIT_PARSE_ERROR', 400, { ...context, source });
    this.source = source;
  }
}

// Not Found Errors (404)
export class NotFoundError extends SchematicAgentError {
  constructor(resource: string, identifier: string, context: Partial<ErrorContext>) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { ...context, resource, identifier }
    );
  }
}

// Processing Errors (422)
export class ArchitectResponseError extends SchematicAgentError {
  public readonly raw: string;

  constructor(message: string, raw: string, context: Partial<ErrorContext>) {
    super(message, 'ARCHITECT_RESPONSE_ERROR', 422, context);
    this.raw = raw;
  }
}

export class SchematicWriteError extends SchematicAgentError {
  constructor(message: string, outputPath: string, context: Partial<ErrorContext>) {
    super(message, 'SCHEMATIC_WRITE_ERROR', 422, { ...context, outputPath });
  }
}

// External Service Errors (502)
export class ExternalServiceError extends SchematicAgentError {
  constructor(
    serviceName: string,
    message: string,
    context: Partial<ErrorContext>
  ) {
    super(
      `External service error (${serviceName}): ${message}`,
      'EXTERNAL_SERVICE_ERROR',
      502,
      { ...context, serviceName }
    );
  }
}

export class LLMServiceError extends ExternalServiceError {
  constructor(provider: string, message: string, context: Partial<ErrorContext>) {
    super(`LLM/${provider}`, message, context);
  }
}

export class KiCadError extends ExternalServiceError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super('KiCad', message, context);
  }
}

// Rate Limit Errors (429)
export class RateLimitError extends SchematicAgentError {
  public readonly retryAfter: number;

  constructor(retryAfter: number, context: Partial<ErrorContext>) {
    super(
      `Rate limit exceeded. Retry after ${retryAfter} seconds`,
      'RATE_LIMIT_ERROR',
      429,
      { ...context, retryAfter }
    );
    this.retryAfter = retryAfter;
  }
}

// Timeout Errors (504)
export class TimeoutError extends SchematicAgentError {
  constructor(operation: string, timeoutMs: number, context: Partial<ErrorContext>) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'TIMEOUT_ERROR',
      504,
      { ...context, operation, timeoutMs }
    );
  }
}

// Internal Server Errors (500)
export class InternalError extends SchematicAgentError {
  constructor(message: string, context: Partial<ErrorContext>) {
    super(message, 'INTERNAL_ERROR', 500, context, false);
  }
}

export function isSchematicAgentError(error: unknown): error is SchematicAgentError {
  return error instanceof SchematicAgentError;
}

export function handleError(error: unknown): SchematicAgentError {
  if (isSchematicAgentError(error)) {
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
