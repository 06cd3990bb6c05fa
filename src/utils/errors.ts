/**
 * Error types shared across the pipeline.
 */

/**
 * Error raised by HTTP collaborators (business registry, LLM judgment backend)
 */
export class APIError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public source: string,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'APIError';
  }
}

/**
 * Invalid pipeline configuration. Raised at load/construction time only.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly problems: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised inside the pipeline when the caller's AbortSignal fires.
 */
export class PipelineCancelledError extends Error {
  constructor(message = 'Processing was cancelled') {
    super(message);
    this.name = 'PipelineCancelledError';
  }
}

/**
 * Turn any thrown value into a message suitable for a details map.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
}

/**
 * Exhaustiveness guard for tagged unions.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
