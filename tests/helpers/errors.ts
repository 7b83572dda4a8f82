/**
 * Assertion helpers for thrown errors
 */

import { expect } from 'vitest';
import { CompileError } from '../../src/index.js';

/** Run `fn` and return what it threw */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}

/** Await `promise` and return its rejection reason */
export async function rejected(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

/** Assert `error` is a CompileError with `errorId` and return it */
export function expectCompileError(error: unknown, errorId: string): CompileError {
  expect(error).toBeInstanceOf(CompileError);
  if (!(error instanceof CompileError)) throw error;
  expect(error.errorId).toBe(errorId);
  return error;
}
