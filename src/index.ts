/**
 * modforge Public API
 */

// ============================================================
// COMPILER
// ============================================================
export {
  ModuleCompiler,
  createModuleCompiler,
  type ModuleCompilerOptions,
} from './compiler/module-compiler.js';
export { CompilerModuleScope } from './compiler/module-scope.js';
export {
  compilerModules,
  type Bindings,
  type CompileEnv,
  type CompileFailureEvent,
  type CompiledModule,
  type CompilerCallbacks,
  type DispatchResult,
  type Dispatcher,
  type EvalResult,
  type Evaluator,
  type Form,
  type ModuleAvailableInfo,
  type ModuleCloseEvent,
  type ModuleOpenEvent,
  type ModuleScope,
  type ObservabilityCallbacks,
  type PhaseEvent,
  type RemoteCall,
  type ScopeDefinition,
} from './compiler/types.js';

// ============================================================
// REGISTRY AND SESSIONS
// ============================================================
export {
  COMPILER_HOOK_MODULE,
  ModuleRegistry,
  RESERVED_MODULES,
  isValidModuleName,
  type ModuleEntry,
  type ModuleHandle,
  type OpenOptions,
} from './registry/module-registry.js';
export {
  CodeSession,
  CodeSessionLoader,
  CompilationSession,
  type LoadOptions,
  type LoadOrigin,
  type LoadedModule,
  type Loader,
  type ModuleAvailableEvent,
  type ModuleAvailableListener,
} from './registry/code-session.js';

// ============================================================
// ATTRIBUTES AND DEFINITIONS
// ============================================================
export {
  AttributeStore,
  DEFAULT_SEED,
  type AttributeSeed,
  type KeyPolicy,
} from './attributes/attribute-store.js';
export { ACCUMULATING_KEYS, PERSISTED_KEYS } from './attributes/builtin-keys.js';
export {
  DefinitionsTable,
  macroName,
  type DefineOutcome,
  type Definition,
  type DefinitionKind,
  type NameArity,
} from './definitions/definitions-table.js';

// ============================================================
// HOOKS
// ============================================================
export { HookEngine, isHookTarget, type HookPhase, type HookTarget } from './hooks/hook-engine.js';
export { PhaseTracker, type CompilationPhase } from './hooks/phase.js';
export { pruneFrames } from './hooks/frames.js';

// ============================================================
// ASSEMBLY AND ARTIFACTS
// ============================================================
export {
  assemble,
  DOCS_CHUNK_ID,
  DOCS_VERSION,
  INFO_FUNCTION,
  INFO_KINDS,
  readDocsChunk,
  type DocsChunk,
  type InfoKind,
  type ModuleSections,
  type SpecDeclaration,
  type SpecForm,
  type TypeDeclaration,
  type TypeExpr,
  type TypeForm,
} from './assembler/index.js';
export { Artifact, addChunk, readChunk } from './artifact/artifact.js';
export { buildArtifact, flattenCompileOptions, injectChunk } from './artifact/builder.js';
export { queryInfo, readInfo, type InfoAnswers } from './artifact/info.js';
export type { Chunk } from './artifact/chunks.js';

// ============================================================
// ERRORS AND DIAGNOSTICS
// ============================================================
export {
  BuildError,
  CompileError,
  FunctionNotAvailableError,
  HookFailedError,
  InternalSymbolOverriddenError,
  InvalidExternalResourceError,
  ModuleAlreadyDefiningError,
  ModuleReservedError,
  UndefinedFunctionError,
  createError,
  type CompileErrorData,
  type StackFrame,
} from './error-classes.js';
export { ERROR_REGISTRY, renderMessage, type ErrorDefinition } from './error-registry.js';
export { formatDiagnostic, type Diagnostic } from './diagnostics/diagnostic.js';
export { normalizeError } from './diagnostics/normalize.js';
export { failure, success, unwrap, type Result } from './result.js';
export type { SourceLocation } from './source-location.js';

// ============================================================
// CONFIGURATION
// ============================================================
export { loadCompilerConfig, CONFIG_FILE_NAME } from './config/loader.js';
export { createDefaultOptions, resolveOptions, type CompilerOptions } from './config/options.js';
