/**
 * Error taxonomy shared by the reconciler, the providers and the CLI.
 * Every error carries a stable `code` and the context it was raised in.
 */

export class StratoformError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StratoformError';
  }
}

/** Raised by API clients for any non-2xx response */
export class ApiError extends StratoformError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode?: string
  ) {
    super(message, 'API_ERROR', { statusCode, errorCode });
    this.name = 'ApiError';
  }
}

export type ReconcilePhase = 'create/update' | 'read' | 'delete' | 'create/update polling' | 'delete polling';

/** The API rejected or failed a request. Never retried by the reconciler. */
export class RequestError extends StratoformError {
  public readonly resourceId: string;
  public readonly phase: ReconcilePhase;
  public readonly statusCode?: number;

  constructor(message: string, details: { resourceId: string; phase: ReconcilePhase; statusCode?: number; cause?: unknown }) {
    super(message, 'REQUEST_ERROR', { resourceId: details.resourceId, phase: details.phase, statusCode: details.statusCode }, { cause: details.cause });
    this.name = 'RequestError';
    this.resourceId = details.resourceId;
    this.phase = details.phase;
    this.statusCode = details.statusCode;
  }
}

/** A bounded wait ended before reaching a terminal state; the remote operation may still be in progress. */
export class TimeoutError extends StratoformError {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly phase: ReconcilePhase,
    public readonly timeoutMs: number
  ) {
    super(message, 'TIMEOUT', { resourceId, phase, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class InvalidResourceIdError extends StratoformError {
  constructor(
    public readonly input: string,
    public readonly expectedFormat: string,
    reason: string
  ) {
    super(`parsing ${JSON.stringify(input)}: ${reason} (expected ${expectedFormat})`, 'INVALID_RESOURCE_ID', { input, expectedFormat });
    this.name = 'InvalidResourceIdError';
  }
}

export class ResourceExistsError extends StratoformError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string
  ) {
    super(
      `A resource with the ID ${JSON.stringify(resourceId)} already exists - to be managed via Stratoform this resource needs to be imported into the State. Please run "stratoform import ${resourceType}.<name> ${resourceId}".`,
      'RESOURCE_EXISTS',
      { resourceType, resourceId }
    );
    this.name = 'ResourceExistsError';
  }
}

export class ValidationError extends StratoformError {
  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR', { resourceType, field });
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends StratoformError {
  constructor(
    message: string,
    public readonly setting: string
  ) {
    super(message, 'CONFIGURATION_ERROR', { setting });
    this.name = 'ConfigurationError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof ApiError && error.statusCode === 404;
}
