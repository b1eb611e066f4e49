/**
 * Error handling and reporting utilities
 */

export type ErrorSink = (error: Error) => void;

/**
 * Normalize anything thrown into an Error
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(typeof err === 'string' ? err : `Non-error thrown: ${String(err)}`);
}

/**
 * One-line description including the cause chain
 */
export function describeError(err: unknown): string {
  const error = toError(err);
  let text = `${error.name}: ${error.message}`;
  if ('originalError' in error && error.originalError instanceof Error) {
    text += ` (caused by ${describeError(error.originalError)})`;
  }
  return text;
}

/**
 * Log an error under a component tag and forward it to an optional sink
 */
export function reportError(tag: string, err: unknown, sink?: ErrorSink): Error {
  const error = toError(err);
  console.error(`[${tag}] ${describeError(error)}`);
  sink?.(error);
  return error;
}

/**
 * Safe async wrapper with error handling
 */
export function safeAsync<T>(
  fn: () => Promise<T>,
  tag: string,
  sink?: ErrorSink,
): Promise<T | null> {
  return fn().catch((err: unknown) => {
    reportError(tag, err, sink);
    return null;
  });
}
