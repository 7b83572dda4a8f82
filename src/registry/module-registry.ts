/**
 * Module Registry
 *
 * Table of modules currently being compiled. Each entry owns the
 * attribute store, definitions table and docs collector of one module;
 * only the handle returned by open() can tear it down.
 */

import { ModuleDocs } from '../assembler/docs.js';
import { AttributeStore } from '../attributes/attribute-store.js';
import { DefinitionsTable } from '../definitions/definitions-table.js';
import { createDiagnostic, type DiagnosticSink } from '../diagnostics/diagnostic.js';
import {
  createError,
  ModuleAlreadyDefiningError,
  ModuleReservedError,
} from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import type { CodeSession, LoadOrigin } from './code-session.js';

// ============================================================
// TYPES
// ============================================================

/** Module names that can never be defined */
export const RESERVED_MODULES: ReadonlySet<string> = new Set([
  'Any',
  'BitString',
  'Function',
  'PID',
  'Reference',
]);

/** Target module of the built-in on-definition hooks */
export const COMPILER_HOOK_MODULE = '$compiler';

export interface ModuleEntry {
  readonly module: string;
  readonly sessionId: string;
  readonly location: SourceLocation;
  readonly attributes: AttributeStore;
  readonly definitions: DefinitionsTable;
  readonly docs: ModuleDocs;
}

/** Proof of ownership of one registry entry */
export interface ModuleHandle {
  readonly entry: ModuleEntry;
}

export interface OpenOptions {
  readonly sessionId: string;
  readonly docs: boolean;
  readonly ignoreModuleConflict: boolean;
  readonly codeSession?: CodeSession | undefined;
  readonly report?: DiagnosticSink | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

export function isValidModuleName(name: string): boolean {
  return name.length > 0 && !/\s/.test(name);
}

function describeOrigin(origin: LoadOrigin): string {
  return origin.kind === 'path'
    ? ` (current version loaded from ${origin.path})`
    : ' (current version defined in memory)';
}

// ============================================================
// REGISTRY
// ============================================================

export class ModuleRegistry {
  private readonly entries = new Map<string, ModuleEntry>();

  /**
   * Open an exclusive entry for `name` and seed its attribute store.
   *
   * @throws CompileError MODF-R004 for an empty or whitespace-bearing name
   * @throws ModuleReservedError for a reserved name
   * @throws ModuleAlreadyDefiningError while `name` is open elsewhere
   */
  open(name: string, location: SourceLocation, options: OpenOptions): ModuleHandle {
    if (!isValidModuleName(name)) {
      throw createError('MODF-R004', { module: name }, location);
    }
    if (RESERVED_MODULES.has(name)) {
      throw new ModuleReservedError(name, location);
    }

    const loaded = options.codeSession?.isLoaded(name);
    if (loaded && !options.ignoreModuleConflict && options.report) {
      options.report(
        createDiagnostic(
          'MODF-R003',
          { module: name, origin: describeOrigin(loaded.origin) },
          location
        )
      );
    }

    const current = this.entries.get(name);
    if (current) {
      throw new ModuleAlreadyDefiningError(name, current.location, location);
    }

    const entry: ModuleEntry = {
      module: name,
      sessionId: options.sessionId,
      location,
      attributes: seedAttributes(name, options.docs),
      definitions: new DefinitionsTable(name),
      docs: new ModuleDocs(),
    };
    this.entries.set(name, entry);
    return { entry };
  }

  /** Tear down the handle's entry; a second call does nothing */
  close(handle: ModuleHandle): void {
    const { entry } = handle;
    if (this.entries.get(entry.module) === entry) {
      this.entries.delete(entry.module);
    }
    if (!entry.attributes.isDestroyed) {
      entry.attributes.destroy();
      entry.definitions.destroy();
      entry.docs.clear();
    }
  }

  isOpen(name: string): boolean {
    return this.entries.has(name);
  }

  lookup(name: string): ModuleEntry | undefined {
    return this.entries.get(name);
  }

  /**
   * Read an attribute of an open module.
   * @throws CompileError MODF-R005 when the module is not open
   */
  getAttribute(name: string, key: string): unknown {
    const entry = this.entries.get(name);
    if (!entry) throw createError('MODF-R005', { module: name });
    return entry.attributes.read(key);
  }

  openModules(): string[] {
    return [...this.entries.keys()].sort();
  }
}

function seedAttributes(module: string, docs: boolean): AttributeStore {
  const attributes = new AttributeStore(module);
  attributes.write('moduledoc', null);
  attributes.write('on_definition', {
    module: COMPILER_HOOK_MODULE,
    function: docs ? 'compile_doc' : 'delete_doc',
  });
  return attributes;
}
