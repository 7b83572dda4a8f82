/**
 * Compiler Types
 *
 * Interfaces of the collaborators the pipeline consumes (evaluator,
 * dispatcher) and the types host applications see.
 */

import type { Artifact } from '../artifact/artifact.js';
import type { KeyPolicy } from '../attributes/attribute-store.js';
import type {
  DefineOutcome,
  DefinitionKind,
  NameArity,
} from '../definitions/definitions-table.js';
import type { Diagnostic } from '../diagnostics/diagnostic.js';
import type { CompilationPhase } from '../hooks/phase.js';
import type { LoadedModule } from '../registry/code-session.js';
import type { SourceLocation } from '../source-location.js';

// ============================================================
// ENVIRONMENT
// ============================================================

/** A body form; its structure belongs to the evaluator */
export type Form = unknown;

export type Bindings = Readonly<Record<string, unknown>>;

/** Lexical context threaded through evaluation and hooks */
export interface CompileEnv {
  readonly file: string;
  readonly line: number;
  /** Module whose body is being evaluated, if any */
  readonly module?: string | undefined;
  /** Definition whose body is being evaluated, if any */
  readonly function?: NameArity | undefined;
  /** Modules being compiled, outermost first */
  readonly compiling: readonly string[];
}

/** Modules currently being compiled in the context of `env`, outermost first */
export function compilerModules(env: CompileEnv): readonly string[] {
  return env.compiling;
}

// ============================================================
// CONSUMED INTERFACES
// ============================================================

export interface EvalResult {
  readonly value: unknown;
  readonly bindings: Bindings;
  readonly env: CompileEnv;
}

/** Evaluates module bodies and expanded hook forms */
export interface Evaluator {
  evaluate(
    forms: readonly Form[],
    bindings: Bindings,
    env: CompileEnv,
    scope: ModuleScope
  ): Promise<EvalResult>;
}

export interface RemoteCall {
  readonly module: string;
  readonly function: string;
  readonly args: readonly unknown[];
}

export type DispatchResult =
  | { readonly kind: 'applied'; readonly value: unknown }
  | { readonly kind: 'expanded'; readonly form: Form };

/**
 * Invokes hook targets. A target is either applied directly or expanded
 * into a form that the evaluator runs inside the module.
 */
export interface Dispatcher {
  dispatch(call: RemoteCall, env: CompileEnv, scope: ModuleScope): Promise<DispatchResult>;
}

// ============================================================
// MODULE SCOPE
// ============================================================

export interface ScopeDefinition extends NameArity {
  readonly kind: DefinitionKind;
  readonly clauses?: readonly unknown[] | undefined;
  /** Defaults to the line of the scope's environment */
  readonly line?: number | undefined;
}

/** What an evaluator may do to the module it is evaluating */
export interface ModuleScope {
  readonly module: string;
  readonly env: CompileEnv;
  readonly phase: CompilationPhase;
  define(definition: ScopeDefinition): Promise<DefineOutcome>;
  putAttribute(key: string, value: unknown): void;
  getAttribute(key: string): unknown;
  registerAttribute(key: string, policy: KeyPolicy): void;
  deleteAttribute(key: string): void;
  recordLocal(name: string, arity: number): void;
  /** Compile another module while this one is open */
  compileModule(
    name: string,
    body: readonly Form[],
    bindings?: Bindings,
    line?: number
  ): Promise<CompiledModule>;
}

// ============================================================
// RESULTS
// ============================================================

export interface CompiledModule {
  readonly module: string;
  readonly location: SourceLocation;
  readonly artifact: Artifact;
  readonly exports: readonly NameArity[];
  readonly warnings: readonly Diagnostic[];
  /** Value of the last body form */
  readonly value: unknown;
  readonly loaded: LoadedModule;
}

// ============================================================
// CALLBACKS
// ============================================================

export interface CompilerCallbacks {
  /** Called for each warning produced while compiling */
  onWarning: (diagnostic: Diagnostic) => void;
}

/** Observability callbacks for monitoring compilation */
export interface ObservabilityCallbacks {
  /** Called after a registry entry is opened */
  onModuleOpen?: (event: ModuleOpenEvent) => void;
  /** Called on every phase transition */
  onPhase?: (event: PhaseEvent) => void;
  /** Called once the artifact is recorded in the compilation session */
  onModuleAvailable?: (event: ModuleAvailableInfo) => void;
  /** Called after the registry entry is torn down */
  onModuleClose?: (event: ModuleCloseEvent) => void;
  /** Called when compilation fails */
  onError?: (event: CompileFailureEvent) => void;
}

export interface ModuleOpenEvent {
  readonly module: string;
  readonly location: SourceLocation;
  readonly compiling: readonly string[];
}

export interface PhaseEvent {
  readonly module: string;
  readonly from: CompilationPhase;
  readonly to: CompilationPhase;
}

export interface ModuleAvailableInfo {
  readonly module: string;
  readonly sessionId: string;
  readonly size: number;
}

export interface ModuleCloseEvent {
  readonly module: string;
  readonly ok: boolean;
  /** Time from open to teardown in milliseconds */
  readonly durationMs: number;
}

export interface CompileFailureEvent {
  readonly module: string;
  readonly error: unknown;
}
