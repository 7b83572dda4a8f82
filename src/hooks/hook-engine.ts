/**
 * Lifecycle Hook Engine
 *
 * Runs on-definition, before-compile and after-compile hooks registered
 * as accumulating attributes of the module being compiled. Targets under
 * the compiler hook module are handled here; every other target goes
 * through the dispatcher, and expanded forms through the evaluator.
 */

import { inspect } from 'node:util';
import type { Artifact } from '../artifact/artifact.js';
import type { Definition } from '../definitions/definitions-table.js';
import { HookFailedError, type StackFrame } from '../error-classes.js';
import { COMPILER_HOOK_MODULE, type ModuleEntry } from '../registry/module-registry.js';
import { failure, success, type Result } from '../result.js';
import type { CompileEnv, Dispatcher, Evaluator, ModuleScope } from '../compiler/types.js';
import { framesOf, pruneFrames } from './frames.js';

// ============================================================
// TYPES
// ============================================================

export type HookPhase = 'on_definition' | 'before_compile' | 'after_compile';

/** Registered hook: a function of a module */
export interface HookTarget {
  readonly module: string;
  readonly function: string;
}

/** Function called when a hook is registered with a bare module name */
export const DEFAULT_HOOK_FUNCTIONS: Record<HookPhase, string> = {
  on_definition: '__on_definition__',
  before_compile: '__before_compile__',
  after_compile: '__after_compile__',
};

export function isHookTarget(value: unknown): value is HookTarget {
  return (
    typeof value === 'object' &&
    value !== null &&
    'module' in value &&
    'function' in value &&
    typeof value.module === 'string' &&
    typeof value.function === 'string'
  );
}

/** Failed hook call together with the frame of the call site */
export interface HookFailure {
  readonly origin: StackFrame;
  readonly error: unknown;
}

export interface HookEngineOptions {
  readonly entry: ModuleEntry;
  readonly evaluator: Evaluator;
  readonly dispatcher: Dispatcher;
}

// ============================================================
// ENGINE
// ============================================================

export class HookEngine {
  private readonly entry: ModuleEntry;
  private readonly evaluator: Evaluator;
  private readonly dispatcher: Dispatcher;

  constructor(options: HookEngineOptions) {
    this.entry = options.entry;
    this.evaluator = options.evaluator;
    this.dispatcher = options.dispatcher;
  }

  /**
   * Fire on-definition hooks for a new definition. Hooks registered while
   * they run only apply to later definitions.
   */
  async runOnDefinition(scope: ModuleScope, env: CompileEnv, definition: Definition): Promise<void> {
    const hooks = this.entry.attributes.readAll('on_definition');
    for (const hook of hooks) {
      await this.run('on_definition', hook, scope, env, [env, definition]);
    }
  }

  /** Run before-compile hooks, last registered first; returns the final env */
  async runBeforeCompile(scope: ModuleScope, env: CompileEnv): Promise<CompileEnv> {
    let current = env;
    for (const hook of [...this.entry.attributes.readAll('before_compile')].reverse()) {
      current = await this.run('before_compile', hook, scope, current, [current]);
    }
    return current;
  }

  /** Run after-compile hooks, last registered first */
  async runAfterCompile(scope: ModuleScope, env: CompileEnv, artifact: Artifact): Promise<void> {
    let current = env;
    for (const hook of [...this.entry.attributes.readAll('after_compile')].reverse()) {
      current = await this.run('after_compile', hook, scope, current, [current, artifact]);
    }
  }

  /**
   * Invoke one hook and return its resulting env.
   * @throws HookFailedError wrapping whatever the hook raised
   */
  private async run(
    phase: HookPhase,
    hook: unknown,
    scope: ModuleScope,
    env: CompileEnv,
    args: readonly unknown[]
  ): Promise<CompileEnv> {
    const result = await this.expandCallback(phase, hook, scope, env, args);
    if (result.ok) return result.value;

    const { origin, error } = result.error;
    throw new HookFailedError(
      phase,
      origin,
      pruneFrames(framesOf(error), origin),
      error,
      origin.location
    );
  }

  async expandCallback(
    phase: HookPhase,
    hook: unknown,
    scope: ModuleScope,
    env: CompileEnv,
    args: readonly unknown[]
  ): Promise<Result<CompileEnv, HookFailure>> {
    const target = resolveTarget(phase, hook);
    const origin: StackFrame = {
      module: target.ok ? target.value.module : inspect(hook),
      function: target.ok ? target.value.function : DEFAULT_HOOK_FUNCTIONS[phase],
      arity: args.length,
      location: { file: env.file, line: env.line },
    };
    if (!target.ok) return failure({ origin, error: target.error });

    try {
      if (target.value.module === COMPILER_HOOK_MODULE) {
        this.runBuiltin(target.value.function, args);
        return success(env);
      }

      const dispatched = await this.dispatcher.dispatch(
        { module: target.value.module, function: target.value.function, args },
        env,
        scope
      );
      if (dispatched.kind === 'applied') return success(env);

      const evaluated = await this.evaluator.evaluate([dispatched.form], {}, env, scope);
      return success(evaluated.env);
    } catch (error) {
      return failure({ origin, error });
    }
  }

  // ============================================================
  // BUILT-IN HOOKS
  // ============================================================

  private runBuiltin(name: string, args: readonly unknown[]): void {
    switch (name) {
      case 'compile_doc':
        this.compileDoc(args[1]);
        return;
      case 'delete_doc':
        this.entry.attributes.delete('doc');
        return;
      default:
        throw new TypeError(`unknown compiler hook ${name}`);
    }
  }

  /** Move the pending `doc` attribute onto the definition just made */
  private compileDoc(subject: unknown): void {
    const { attributes, docs } = this.entry;
    if (!isDefinition(subject)) {
      throw new TypeError('compile_doc expects a definition');
    }
    if (!attributes.has('doc')) return;

    docs.addDefinitionDoc({
      kind: subject.kind,
      name: subject.name,
      arity: subject.arity,
      line: subject.location.line,
      doc: attributes.read('doc'),
    });
    attributes.delete('doc');
  }
}

function resolveTarget(phase: HookPhase, hook: unknown): Result<HookTarget, TypeError> {
  if (isHookTarget(hook)) return success(hook);
  if (typeof hook === 'string' && hook.length > 0) {
    return success({ module: hook, function: DEFAULT_HOOK_FUNCTIONS[phase] });
  }
  return failure(new TypeError(`expected a module or {module, function} for @${phase}, got: ${inspect(hook)}`));
}

function isDefinition(value: unknown): value is Definition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    'name' in value &&
    'arity' in value &&
    'location' in value
  );
}
