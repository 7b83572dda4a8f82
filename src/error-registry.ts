/**
 * Error Registry
 * Central definition table for every compile error and warning the module
 * pipeline can report, plus message template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'registry'
  | 'attribute'
  | 'definition'
  | 'hook'
  | 'build'
  | 'config';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: MODF-{category letter}{3-digit} (e.g., MODF-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

/** Error ID prefix letter for each category */
export const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  registry: 'R',
  attribute: 'A',
  definition: 'D',
  hook: 'H',
  build: 'B',
  config: 'C',
};

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only lookup of error definitions by ID.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Registry (MODF-R0xx)
  {
    errorId: 'MODF-R001',
    category: 'registry',
    description: 'Reserved module name',
    messageTemplate: 'module {module} is reserved and cannot be defined',
    cause: 'The module name belongs to the fixed set of names the runtime keeps for itself.',
    resolution: 'Pick a different module name.',
  },
  {
    errorId: 'MODF-R002',
    category: 'registry',
    description: 'Module already being defined',
    messageTemplate:
      'cannot define module {module} because it is currently being defined in {file}:{line}',
    cause:
      'A module body (or one of its hooks) asked to compile a module whose compilation is still in progress.',
    resolution:
      'Move the nested definition out of the module body, or give it a different name.',
  },
  {
    errorId: 'MODF-R003',
    category: 'registry',
    severity: 'warning',
    description: 'Module redefinition',
    messageTemplate: 'redefining module {module}{origin}',
    cause: 'A module with the same name is already loaded in the running code session.',
    resolution:
      'Purge the loaded module first, or set ignoreModuleConflict when redefinition is expected.',
  },
  {
    errorId: 'MODF-R004',
    category: 'registry',
    description: 'Invalid module name',
    messageTemplate: 'invalid module name: {module}',
  },
  {
    errorId: 'MODF-R005',
    category: 'registry',
    description: 'Module no longer open',
    messageTemplate:
      'module {module} is not being compiled; its attribute and definition tables are gone',
  },

  // Attributes (MODF-A0xx)
  {
    errorId: 'MODF-A001',
    category: 'attribute',
    description: 'Invalid external resource',
    messageTemplate: 'expected a string value for @external_resource, got: {value}',
    cause: 'A value written to @external_resource is not a file path.',
    resolution: 'Write only string paths to @external_resource.',
  },
  {
    errorId: 'MODF-A002',
    category: 'attribute',
    description: 'Attribute policy changed after write',
    messageTemplate:
      'attribute @{key} already holds a value and cannot be re-registered with accumulate: {accumulate}',
  },
  {
    errorId: 'MODF-A003',
    category: 'attribute',
    description: 'Reserved attribute key',
    messageTemplate: 'attribute key {key} is reserved for the compiler',
  },

  // Definitions and assembly (MODF-D0xx)
  {
    errorId: 'MODF-D001',
    category: 'definition',
    description: 'Internal function overridden',
    messageTemplate: 'function {name}/{arity} is internal and should not be overridden',
    cause: 'The module defines a function with the name and arity of the injected introspection function.',
    resolution: 'Rename the function or change its arity.',
  },
  {
    errorId: 'MODF-D002',
    category: 'definition',
    description: 'Definition kind clash',
    messageTemplate: '{kind} {name}/{arity} already defined as {existing} in {file}:{line}',
  },
  {
    errorId: 'MODF-D003',
    category: 'definition',
    description: 'Definitions closed',
    messageTemplate:
      'cannot define {name}/{arity} in module {module} during the {phase} phase',
    cause: 'After-compile hooks and later phases see the final definitions only.',
    resolution: 'Add definitions from the module body or from a before-compile hook.',
  },
  {
    errorId: 'MODF-D004',
    category: 'definition',
    severity: 'warning',
    description: 'Unused @doc',
    messageTemplate: '@doc provided but no definition follows it',
  },
  {
    errorId: 'MODF-D005',
    category: 'definition',
    severity: 'warning',
    description: 'Unused @typedoc',
    messageTemplate: '@typedoc provided but no type follows it',
  },
  {
    errorId: 'MODF-D006',
    category: 'definition',
    description: 'Invalid typespec',
    messageTemplate: 'invalid @{kind} {name}: {reason}',
  },

  // Hooks (MODF-H0xx)
  {
    errorId: 'MODF-H001',
    category: 'hook',
    description: 'Function not available',
    messageTemplate:
      'function {module}.{function}/{arity} is undefined (function not available)',
    cause:
      'Code running at compile time called a function of the module that is still being compiled.',
    resolution:
      'Call the function after the module is compiled, or move it to a module compiled earlier.',
  },
  {
    errorId: 'MODF-H002',
    category: 'hook',
    description: 'Hook failed',
    messageTemplate: '{phase} hook {module}.{function}/{arity} failed: {reason}',
  },
  {
    errorId: 'MODF-H003',
    category: 'hook',
    description: 'Invalid phase transition',
    messageTemplate: 'cannot move module {module} from {from} to {to}',
  },
  {
    errorId: 'MODF-H004',
    category: 'hook',
    severity: 'warning',
    description: 'Observer failed',
    messageTemplate: 'observability callback {callback} failed for module {module}: {reason}',
    cause: 'A host observability callback threw; compilation continued without it.',
  },

  // Build (MODF-B0xx)
  {
    errorId: 'MODF-B001',
    category: 'build',
    description: 'Artifact build failed',
    messageTemplate: 'could not build artifact for {module}: {reason}',
  },
  {
    errorId: 'MODF-B002',
    category: 'build',
    description: 'Invalid chunk',
    messageTemplate: 'invalid artifact chunk data: {reason}',
  },

  // Configuration (MODF-C0xx)
  {
    errorId: 'MODF-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'invalid configuration in {file}: {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `{name}` placeholders with values from `context`.
 *
 * Missing values render as an empty string; other values go through
 * `String()`.
 *
 * @example
 * renderMessage('module {module} is reserved', { module: 'Any' })
 * // Returns: "module Any is reserved"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}

/** Severity of an error ID, defaulting to 'error' */
export function severityOf(errorId: string): ErrorSeverity {
  return ERROR_REGISTRY.get(errorId)?.severity ?? 'error';
}
