/**
 * Stack frame pruning for hook failures.
 */

import { isTraceableError, type StackFrame } from '../error-classes.js';

/**
 * Keep the frames raised by user code (everything before the first
 * evaluator-internal frame) and end the trace at the hook call site.
 */
export function pruneFrames(
  frames: readonly StackFrame[],
  callSite: StackFrame
): StackFrame[] {
  const firstInternal = frames.findIndex((frame) => frame.internal === true);
  const kept = firstInternal === -1 ? frames : frames.slice(0, firstInternal);
  return [...kept, callSite];
}

export function framesOf(error: unknown): readonly StackFrame[] {
  return isTraceableError(error) ? error.frames : [];
}
