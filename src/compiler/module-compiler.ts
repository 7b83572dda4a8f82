/**
 * Module Compiler
 *
 * Compiles one module definition into a loaded artifact:
 *
 *   open → evaluate body → before-compile hooks → assemble → build
 *   → inject Docs → after-compile hooks → session → loader → close
 *
 * The registry entry is torn down on every exit path before the result
 * or the error reaches the caller.
 */

import { assemble } from '../assembler/index.js';
import { DOCS_CHUNK_ID, encodeDocsChunk } from '../assembler/docs.js';
import { buildArtifact, injectChunk } from '../artifact/builder.js';
import { resolveOptions, type CompilerOptions } from '../config/options.js';
import { createDiagnostic, formatDiagnostic, type Diagnostic } from '../diagnostics/diagnostic.js';
import { normalizeError } from '../diagnostics/normalize.js';
import { BuildError, describeError } from '../error-classes.js';
import { HookEngine } from '../hooks/hook-engine.js';
import { PhaseTracker } from '../hooks/phase.js';
import {
  CodeSession,
  CodeSessionLoader,
  CompilationSession,
  type Loader,
} from '../registry/code-session.js';
import { ModuleRegistry, type ModuleEntry } from '../registry/module-registry.js';
import { failure, success, type Result } from '../result.js';
import { relativeToCwd, type SourceLocation } from '../source-location.js';
import { CompilerModuleScope } from './module-scope.js';
import type {
  Bindings,
  CompileEnv,
  CompiledModule,
  CompilerCallbacks,
  Dispatcher,
  Evaluator,
  Form,
  ObservabilityCallbacks,
} from './types.js';

// ============================================================
// OPTIONS
// ============================================================

const defaultCallbacks: CompilerCallbacks = {
  onWarning: (diagnostic) => {
    console.warn(formatDiagnostic(diagnostic));
  },
};

/** Invokes one observability callback; a throwing callback becomes a warning */
type Notify = (callback: keyof ObservabilityCallbacks, call: () => void) => void;

export interface ModuleCompilerOptions {
  readonly evaluator: Evaluator;
  readonly dispatcher: Dispatcher;
  /** Defaults to a loader recording into `codeSession` */
  readonly loader?: Loader | undefined;
  /** Loaded-module table; a fresh one when omitted */
  readonly codeSession?: CodeSession | undefined;
  readonly session?: CompilationSession | undefined;
  /** Shared registry; a private one when omitted */
  readonly registry?: ModuleRegistry | undefined;
  readonly options?: Partial<CompilerOptions> | undefined;
  readonly callbacks?: Partial<CompilerCallbacks> | undefined;
  readonly observability?: ObservabilityCallbacks | undefined;
}

// ============================================================
// COMPILER
// ============================================================

export class ModuleCompiler {
  readonly options: CompilerOptions;
  readonly registry: ModuleRegistry;
  readonly codeSession: CodeSession;
  readonly session: CompilationSession;
  private readonly evaluator: Evaluator;
  private readonly dispatcher: Dispatcher;
  private readonly loader: Loader;
  private readonly callbacks: CompilerCallbacks;
  private readonly observability: ObservabilityCallbacks;

  constructor(options: ModuleCompilerOptions) {
    this.options = resolveOptions(options.options);
    this.registry = options.registry ?? new ModuleRegistry();
    this.codeSession = options.codeSession ?? new CodeSession();
    this.session = options.session ?? new CompilationSession();
    this.evaluator = options.evaluator;
    this.dispatcher = options.dispatcher;
    this.loader = options.loader ?? new CodeSessionLoader(this.codeSession);
    this.callbacks = { ...defaultCallbacks, ...options.callbacks };
    this.observability = options.observability ?? {};
  }

  /**
   * Compile `name` from `body`, evaluated with `bindings` in the lexical
   * context `env`.
   *
   * @throws CompileError for every condition of the error registry; other
   *   errors raised by the evaluator propagate unchanged
   */
  async compileModule(
    name: string,
    body: readonly Form[],
    bindings: Bindings = {},
    env: CompileEnv = { file: 'nofile', line: 1, compiling: [] }
  ): Promise<CompiledModule> {
    const location: SourceLocation = {
      file: relativeToCwd(env.file, this.options.relativeTo),
      line: env.line,
    };
    const warnings: Diagnostic[] = [];
    const report = (diagnostic: Diagnostic): void => {
      warnings.push(diagnostic);
      this.callbacks.onWarning(diagnostic);
    };

    // A failed open must not touch the entry that is already open
    const handle = this.registry.open(name, location, {
      sessionId: this.session.id,
      docs: this.options.docs,
      ignoreModuleConflict: this.options.ignoreModuleConflict,
      codeSession: this.codeSession,
      report,
    });

    const notify = (callback: keyof ObservabilityCallbacks, call: () => void): void => {
      try {
        call();
      } catch (error) {
        this.callbacks.onWarning(
          createDiagnostic('MODF-H004', { callback, module: name, reason: describeError(error) }, location)
        );
      }
    };

    const startTime = Date.now();
    const phase = new PhaseTracker(name, (from, to) => {
      notify('onPhase', () => this.observability.onPhase?.({ module: name, from, to }));
    });
    let ok = false;

    try {
      const moduleEnv: CompileEnv = {
        ...env,
        module: name,
        function: undefined,
        compiling: [...env.compiling, name],
      };
      notify('onModuleOpen', () =>
        this.observability.onModuleOpen?.({ module: name, location, compiling: moduleEnv.compiling })
      );

      const compiled = await this.run(handle.entry, phase, body, bindings, moduleEnv, warnings, report, notify);
      ok = true;
      return compiled;
    } catch (error) {
      const normalized = normalizeError(error, name, location);
      notify('onError', () => this.observability.onError?.({ module: name, error: normalized }));
      throw normalized;
    } finally {
      phase.close();
      this.registry.close(handle);
      notify('onModuleClose', () =>
        this.observability.onModuleClose?.({
          module: name,
          ok,
          durationMs: Date.now() - startTime,
        })
      );
    }
  }

  /** compileModule with the failure returned instead of thrown */
  async tryCompileModule(
    name: string,
    body: readonly Form[],
    bindings?: Bindings,
    env?: CompileEnv
  ): Promise<Result<CompiledModule, unknown>> {
    try {
      return success(await this.compileModule(name, body, bindings, env));
    } catch (error) {
      return failure(error);
    }
  }

  /** @throws CompileError MODF-R005 when `name` is not being compiled */
  getAttribute(name: string, key: string): unknown {
    return this.registry.getAttribute(name, key);
  }

  isOpen(name: string): boolean {
    return this.registry.isOpen(name);
  }

  // ============================================================
  // PIPELINE
  // ============================================================

  private async run(
    entry: ModuleEntry,
    phase: PhaseTracker,
    body: readonly Form[],
    bindings: Bindings,
    env: CompileEnv,
    warnings: Diagnostic[],
    report: (diagnostic: Diagnostic) => void,
    notify: Notify
  ): Promise<CompiledModule> {
    const { module, location, attributes, definitions } = entry;
    const hooks = new HookEngine({
      entry,
      evaluator: this.evaluator,
      dispatcher: this.dispatcher,
    });
    const scope = new CompilerModuleScope({
      entry,
      env,
      phase,
      hooks,
      docs: this.options.docs,
      compileNested: (name, nestedBody, nestedBindings, nestedEnv) =>
        this.compileModule(name, nestedBody, nestedBindings, nestedEnv),
    });

    const evaluated = await this.evaluator.evaluate(body, bindings, env, scope);

    phase.advance('before-hooks');
    const hookEnv = await hooks.runBeforeCompile(scope, evaluated.env);

    phase.advance('assembling');
    for (const target of attributes.readAll('on_load')) {
      const local = onLoadTarget(target);
      if (!local) {
        throw new BuildError(module, `invalid @on_load target ${String(target)}`, location);
      }
      definitions.recordLocal(local.name, local.arity);
    }
    const sections = assemble(
      { module, location, attributes, definitions },
      { docs: this.options.docs, internal: this.options.internal }
    );
    sections.warnings.forEach(report);

    phase.advance('building');
    let artifact = buildArtifact(sections);
    if (this.options.docs) {
      const docs = entry.docs.toChunk({ line: location.line, doc: attributes.read('moduledoc') });
      artifact = injectChunk(artifact, DOCS_CHUNK_ID, () => encodeDocsChunk(docs), sections);
    }

    phase.advance('after-hooks');
    await hooks.runAfterCompile(scope, hookEnv, artifact);

    await this.session.moduleAvailable(module, location.file, artifact);
    notify('onModuleAvailable', () =>
      this.observability.onModuleAvailable?.({
        module,
        sessionId: this.session.id,
        size: artifact.size,
      })
    );

    const loaded = await this.loader.load(module, artifact, {
      file: location.file,
      sessionId: this.session.id,
    });
    if (!loaded.ok) {
      throw new BuildError(module, loaded.error, location);
    }

    return {
      module,
      location,
      artifact,
      exports: sections.exports,
      warnings,
      value: evaluated.value,
      loaded: loaded.value,
    };
  }
}

/** `on_load` names a zero-arity function or a `{name, arity}` pair */
function onLoadTarget(value: unknown): { name: string; arity: number } | undefined {
  if (typeof value === 'string') return { name: value, arity: 0 };
  if (typeof value === 'object' && value !== null) {
    const name: unknown = Reflect.get(value, 'name');
    const arity: unknown = Reflect.get(value, 'arity');
    if (typeof name === 'string' && typeof arity === 'number') return { name, arity };
  }
  return undefined;
}

export function createModuleCompiler(options: ModuleCompilerOptions): ModuleCompiler {
  return new ModuleCompiler(options);
}
