/**
 * Module Scope
 *
 * The view of an open module handed to the evaluator and to hooks.
 */

import type { KeyPolicy } from '../attributes/attribute-store.js';
import { isCallbackKey, isTypeKey } from '../attributes/builtin-keys.js';
import type { DefineOutcome } from '../definitions/definitions-table.js';
import { createError } from '../error-classes.js';
import type { HookEngine } from '../hooks/hook-engine.js';
import type { CompilationPhase, PhaseTracker } from '../hooks/phase.js';
import type { ModuleEntry } from '../registry/module-registry.js';
import type {
  Bindings,
  CompileEnv,
  CompiledModule,
  Form,
  ModuleScope,
  ScopeDefinition,
} from './types.js';

/** Compiles a nested module on behalf of a scope */
export type NestedCompile = (
  name: string,
  body: readonly Form[],
  bindings: Bindings,
  env: CompileEnv
) => Promise<CompiledModule>;

export interface ModuleScopeOptions {
  readonly entry: ModuleEntry;
  readonly env: CompileEnv;
  readonly phase: PhaseTracker;
  readonly hooks: HookEngine;
  readonly docs: boolean;
  readonly compileNested: NestedCompile;
}

export class CompilerModuleScope implements ModuleScope {
  readonly module: string;
  readonly env: CompileEnv;
  private readonly entry: ModuleEntry;
  private readonly tracker: PhaseTracker;
  private readonly hooks: HookEngine;
  private readonly docs: boolean;
  private readonly compileNested: NestedCompile;

  constructor(options: ModuleScopeOptions) {
    this.entry = options.entry;
    this.module = options.entry.module;
    this.env = options.env;
    this.tracker = options.phase;
    this.hooks = options.hooks;
    this.docs = options.docs;
    this.compileNested = options.compileNested;
  }

  get phase(): CompilationPhase {
    return this.tracker.current;
  }

  /**
   * Add a definition and, when it is new, fire on-definition hooks before
   * resolving.
   *
   * @throws CompileError MODF-D003 outside evaluation and before-compile hooks
   * @throws CompileError MODF-D002 on a kind clash
   */
  async define(definition: ScopeDefinition): Promise<DefineOutcome> {
    const location = { file: this.env.file, line: definition.line ?? this.env.line };
    if (!this.tracker.canDefine) {
      throw createError(
        'MODF-D003',
        {
          name: definition.name,
          arity: definition.arity,
          module: this.module,
          phase: this.tracker.current,
        },
        location
      );
    }

    const outcome = this.entry.definitions.define({
      kind: definition.kind,
      name: definition.name,
      arity: definition.arity,
      clauses: definition.clauses,
      location,
    });
    if (outcome.isNew) {
      const env: CompileEnv = {
        ...this.env,
        line: location.line,
        function: { name: definition.name, arity: definition.arity },
      };
      await this.hooks.runOnDefinition(this, env, outcome.definition);
    }
    return outcome;
  }

  /**
   * Write an attribute. Type declarations take the pending `typedoc`,
   * callback declarations the pending `doc`.
   */
  putAttribute(key: string, value: unknown): void {
    this.entry.attributes.write(key, value);

    if (isTypeKey(key)) {
      const documented = this.takePendingDoc('typedoc', value);
      if (documented) this.entry.docs.addTypeDoc({ kind: key, ...documented });
    } else if (isCallbackKey(key)) {
      const documented = this.takePendingDoc('doc', value);
      if (documented) this.entry.docs.addCallbackDoc({ kind: key, ...documented });
    }
  }

  getAttribute(key: string): unknown {
    return this.entry.attributes.read(key);
  }

  registerAttribute(key: string, policy: KeyPolicy): void {
    this.entry.attributes.declareKey(key, policy);
  }

  deleteAttribute(key: string): void {
    this.entry.attributes.delete(key);
  }

  recordLocal(name: string, arity: number): void {
    this.entry.definitions.recordLocal(name, arity);
  }

  compileModule(
    name: string,
    body: readonly Form[],
    bindings: Bindings = {},
    line: number = this.env.line
  ): Promise<CompiledModule> {
    return this.compileNested(name, body, bindings, { ...this.env, line });
  }

  /**
   * Consume a pending doc attribute. Returns the entry to record when docs
   * are enabled and the declared form carries a name.
   */
  private takePendingDoc(
    docKey: 'doc' | 'typedoc',
    value: unknown
  ): { name: string; arity: number; line: number; doc: unknown } | undefined {
    const { attributes } = this.entry;
    if (!attributes.has(docKey)) return undefined;

    const doc = attributes.read(docKey);
    attributes.delete(docKey);

    const form = declaredForm(value, this.env.line);
    return this.docs && form ? { ...form, doc } : undefined;
  }
}

/** Name, arity and line of a spec or type form, if it has them */
function declaredForm(
  value: unknown,
  fallbackLine: number
): { name: string; arity: number; line: number } | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const name: unknown = Reflect.get(value, 'name');
  const params: unknown = Reflect.get(value, 'params');
  const line: unknown = Reflect.get(value, 'line');
  if (typeof name !== 'string' || !Array.isArray(params)) return undefined;
  return {
    name,
    arity: params.length,
    line: typeof line === 'number' ? line : fallbackLine,
  };
}
