/**
 * Error normalization for failures escaping a module compilation.
 */

import {
  FunctionNotAvailableError,
  isTraceableError,
  UndefinedFunctionError,
  type StackFrame,
} from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';

/** First UndefinedFunctionError on the cause chain of `error` */
export function findUndefinedFunction(error: unknown): UndefinedFunctionError | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof UndefinedFunctionError) return current;
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

/**
 * Rewrite an undefined-function failure against the module being compiled
 * into FunctionNotAvailableError. Every other error is returned unchanged.
 */
export function normalizeError(
  error: unknown,
  module: string,
  location?: SourceLocation
): unknown {
  const undefinedFunction = findUndefinedFunction(error);
  if (!undefinedFunction) return error;

  const [origin] = undefinedFunction.frames;
  if (!origin || origin.module !== module) return error;

  const frames: readonly StackFrame[] = isTraceableError(error)
    ? error.frames
    : undefinedFunction.frames;

  return new FunctionNotAvailableError(
    module,
    undefinedFunction.functionName,
    undefinedFunction.arity,
    {
      location: origin.location ?? location,
      frames,
      origin,
      cause: error,
    }
  );
}
