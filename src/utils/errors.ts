/**
 * Base error for the ingestion pipeline
 * Carries context that is enriched as the error travels up
 */
export class PipelineError extends Error {
  public context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PipelineError';
    this.context = context;
  }

  /**
   * Merge additional context into the error
   */
  public enrich(additionalContext: Record<string, unknown>): this {
    this.context = {
      ...this.context,
      ...additionalContext,
    };
    return this;
  }
}

/**
 * Network failure, timeout or non-2xx (other than 429) from a source
 */
export class SourceUnavailableError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Provider asked us to back off (HTTP 429)
 */
export class RateLimitedError extends PipelineError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    context: Record<string, unknown> = {}
  ) {
    super(message, context);
    this.name = 'RateLimitedError';
  }
}

/**
 * Response body (or a single listing in it) does not have the expected shape
 */
export class MalformedResponseError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Dedup store could not be read or written
 */
export class PersistenceError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
    this.name = 'PersistenceError';
  }
}

/**
 * Publishing a message to the channel failed
 */
export class PublishError extends PipelineError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    context: Record<string, unknown> = {}
  ) {
    super(message, context);
    this.name = 'PublishError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any thrown value to a PipelineError
 */
export function toPipelineError(error: unknown, context: Record<string, unknown> = {}): PipelineError {
  if (error instanceof PipelineError) {
    return error.enrich(context);
  }

  return new PipelineError(errorMessage(error), {
    originalError: error,
    stack: error instanceof Error ? error.stack : undefined,
    ...context,
  });
}
