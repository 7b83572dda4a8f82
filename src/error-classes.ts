/**
 * Compile Error Classes and Factory
 * Structured error types with registry-based error IDs
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import { formatLocation, type SourceLocation } from './source-location.js';

// ============================================================
// STACK FRAMES
// ============================================================

/**
 * One frame of a compile-time call stack.
 * Evaluators mark their own frames `internal` so the hook engine can
 * prune them from user-facing traces.
 */
export interface StackFrame {
  readonly module: string;
  readonly function: string;
  readonly arity: number;
  readonly location?: SourceLocation | undefined;
  readonly internal?: boolean | undefined;
}

/** Errors that carry a compile-time stack */
export interface TraceableError extends Error {
  readonly frames: readonly StackFrame[];
}

export function isTraceableError(error: unknown): error is TraceableError {
  return (
    error instanceof Error &&
    'frames' in error &&
    Array.isArray(error.frames)
  );
}

export function formatFrame(frame: StackFrame): string {
  const where = frame.location ? ` (${formatLocation(frame.location)})` : '';
  return `${frame.module}.${frame.function}/${frame.arity}${where}`;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface CompileErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Compile-time frames, innermost first */
  readonly frames?: readonly StackFrame[] | undefined;
  /** Frame a lower-level failure was normalized from */
  readonly origin?: StackFrame | undefined;
  readonly cause?: unknown;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a CompileError from the registry.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('MODF-R004', { module: '' }, { file: 'lib/a.mod', line: 1 })
 * // CompileError: "invalid module name:  at lib/a.mod:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): CompileError {
  return new CompileError({
    errorId,
    message: messageFor(errorId, context),
    location,
    context,
  });
}

function messageFor(errorId: string, context: Record<string, unknown>): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for every fatal condition of the module pipeline.
 * Carries the file and line of the module being compiled.
 */
export class CompileError extends Error {
  readonly errorId: string;
  readonly location: SourceLocation | undefined;
  readonly context: Record<string, unknown> | undefined;
  readonly frames: readonly StackFrame[];
  readonly origin: StackFrame | undefined;
  private readonly detail: string;

  constructor(data: CompileErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    super(
      `${data.message}${locationStr}`,
      data.cause === undefined ? undefined : { cause: data.cause }
    );
    this.name = 'CompileError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
    this.frames = data.frames ?? [];
    this.origin = data.origin;
    this.detail = data.message;
  }

  /** Get structured error data for custom formatting */
  toData(): CompileErrorData {
    return {
      errorId: this.errorId,
      message: this.detail,
      location: this.location,
      context: this.context,
      frames: this.frames,
      origin: this.origin,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: CompileErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

export class ModuleReservedError extends CompileError {
  readonly module: string;

  constructor(module: string, location?: SourceLocation) {
    super({
      errorId: 'MODF-R001',
      message: messageFor('MODF-R001', { module }),
      location,
      context: { module },
    });
    this.name = 'ModuleReservedError';
    this.module = module;
  }
}

/** A second open for a module whose compilation is still in progress */
export class ModuleAlreadyDefiningError extends CompileError {
  readonly module: string;
  /** Where the in-progress definition was opened */
  readonly definedAt: SourceLocation;

  constructor(module: string, definedAt: SourceLocation, location?: SourceLocation) {
    const context = { module, file: definedAt.file, line: definedAt.line };
    super({
      errorId: 'MODF-R002',
      message: messageFor('MODF-R002', context),
      location,
      context,
    });
    this.name = 'ModuleAlreadyDefiningError';
    this.module = module;
    this.definedAt = definedAt;
  }
}

export class InvalidExternalResourceError extends CompileError {
  readonly value: unknown;

  constructor(value: unknown, rendered: string, location?: SourceLocation) {
    super({
      errorId: 'MODF-A001',
      message: messageFor('MODF-A001', { value: rendered }),
      location,
      context: { value },
    });
    this.name = 'InvalidExternalResourceError';
    this.value = value;
  }
}

export class InternalSymbolOverriddenError extends CompileError {
  readonly functionName: string;
  readonly arity: number;

  constructor(functionName: string, arity: number, location?: SourceLocation) {
    const context = { name: functionName, arity };
    super({
      errorId: 'MODF-D001',
      message: messageFor('MODF-D001', context),
      location,
      context,
    });
    this.name = 'InternalSymbolOverriddenError';
    this.functionName = functionName;
    this.arity = arity;
  }
}

/**
 * Undefined-function failure against the module being compiled, rewritten
 * so it no longer reads as "module is not loaded".
 */
export class FunctionNotAvailableError extends CompileError {
  readonly module: string;
  readonly functionName: string;
  readonly arity: number;

  constructor(
    module: string,
    functionName: string,
    arity: number,
    options: {
      location?: SourceLocation | undefined;
      frames?: readonly StackFrame[] | undefined;
      origin: StackFrame;
      cause: unknown;
    }
  ) {
    const context = { module, function: functionName, arity };
    super({
      errorId: 'MODF-H001',
      message: messageFor('MODF-H001', context),
      location: options.location,
      context,
      frames: options.frames,
      origin: options.origin,
      cause: options.cause,
    });
    this.name = 'FunctionNotAvailableError';
    this.module = module;
    this.functionName = functionName;
    this.arity = arity;
  }
}

/** Failure raised while expanding or running a lifecycle hook */
export class HookFailedError extends CompileError {
  readonly phase: string;
  readonly hookModule: string;
  readonly hookFunction: string;
  readonly arity: number;

  constructor(
    phase: string,
    origin: StackFrame,
    frames: readonly StackFrame[],
    cause: unknown,
    location?: SourceLocation
  ) {
    const context = {
      phase,
      module: origin.module,
      function: origin.function,
      arity: origin.arity,
      reason: describeError(cause),
    };
    super({
      errorId: 'MODF-H002',
      message: messageFor('MODF-H002', context),
      location,
      context,
      frames,
      origin,
      cause,
    });
    this.name = 'HookFailedError';
    this.phase = phase;
    this.hookModule = origin.module;
    this.hookFunction = origin.function;
    this.arity = origin.arity;
  }
}

export class BuildError extends CompileError {
  readonly module: string;

  constructor(module: string, reason: string, location?: SourceLocation, cause?: unknown) {
    super({
      errorId: 'MODF-B001',
      message: messageFor('MODF-B001', { module, reason }),
      location,
      context: { module, reason },
      cause,
    });
    this.name = 'BuildError';
    this.module = module;
  }
}

// ============================================================
// EVALUATOR-SIDE ERRORS
// ============================================================

/**
 * Raised by evaluators when code calls a function that does not exist.
 * `frames[0]` is the frame that triggered the failure.
 */
export class UndefinedFunctionError extends Error implements TraceableError {
  readonly module: string;
  readonly functionName: string;
  readonly arity: number;
  readonly frames: readonly StackFrame[];

  constructor(
    module: string,
    functionName: string,
    arity: number,
    frames?: readonly StackFrame[]
  ) {
    super(`function ${module}.${functionName}/${arity} is undefined (module ${module} is not available)`);
    this.name = 'UndefinedFunctionError';
    this.module = module;
    this.functionName = functionName;
    this.arity = arity;
    this.frames = frames ?? [{ module, function: functionName, arity }];
  }
}

/** One-line description of any thrown value */
export function describeError(error: unknown): string {
  if (error instanceof CompileError) return error.toData().message;
  if (error instanceof Error) return error.message;
  return String(error);
}
