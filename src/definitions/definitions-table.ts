/**
 * Definitions Table
 *
 * Bag of (name, arity) -> definition for one module. A pair's kind is
 * fixed by its first definition; later definitions of the same kind add
 * clauses. Private definitions stay unreachable until a local call or
 * the on_load attribute records them.
 */

import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';

// ============================================================
// TYPES
// ============================================================

export type DefinitionKind = 'def' | 'defp' | 'defmacro' | 'defmacrop';

export const DEFINITION_KINDS: readonly DefinitionKind[] = [
  'def',
  'defp',
  'defmacro',
  'defmacrop',
];

export interface NameArity {
  readonly name: string;
  readonly arity: number;
}

export interface Definition extends NameArity {
  readonly kind: DefinitionKind;
  /** Clauses in definition order; opaque to the compiler */
  readonly clauses: readonly unknown[];
  /** Where the first clause was defined */
  readonly location: SourceLocation;
}

export interface DefinitionInput extends NameArity {
  readonly kind: DefinitionKind;
  readonly clauses?: readonly unknown[] | undefined;
  readonly location: SourceLocation;
}

/** Outcome of define(): the stored definition and whether it is new */
export interface DefineOutcome {
  readonly definition: Definition;
  readonly isNew: boolean;
}

/** Definitions split by kind, as consumed by the metadata assembler */
export interface UnwrappedDefinitions {
  readonly def: readonly NameArity[];
  readonly defp: readonly NameArity[];
  readonly defmacro: readonly NameArity[];
  readonly defmacrop: readonly NameArity[];
  /** Public functions plus public macros under their dispatch name */
  readonly exports: readonly NameArity[];
  /** Every definition, sorted by name and arity */
  readonly functions: readonly Definition[];
  /** Private definitions never recorded as used */
  readonly unreachable: readonly NameArity[];
}

// ============================================================
// NAME/ARITY HELPERS
// ============================================================

export function nameArityKey(pair: NameArity): string {
  return `${pair.name}/${pair.arity}`;
}

/** Internal dispatch name a macro is exported under */
export function macroName(name: string): string {
  return `MACRO-${name}`;
}

/** Dispatch (name, arity) of a macro: renamed, with the caller context first */
export function macroDispatch(pair: NameArity): NameArity {
  return { name: macroName(pair.name), arity: pair.arity + 1 };
}

export function compareNameArity(a: NameArity, b: NameArity): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.arity - b.arity;
}

/** Sort and de-duplicate */
export function sortNameArities(pairs: Iterable<NameArity>): NameArity[] {
  const unique = new Map<string, NameArity>();
  for (const pair of pairs) {
    unique.set(nameArityKey(pair), { name: pair.name, arity: pair.arity });
  }
  return [...unique.values()].sort(compareNameArity);
}

export function isPublicKind(kind: DefinitionKind): boolean {
  return kind === 'def' || kind === 'defmacro';
}

export function isMacroKind(kind: DefinitionKind): boolean {
  return kind === 'defmacro' || kind === 'defmacrop';
}

// ============================================================
// TABLE
// ============================================================

interface MutableDefinition {
  readonly name: string;
  readonly arity: number;
  readonly kind: DefinitionKind;
  readonly clauses: unknown[];
  readonly location: SourceLocation;
}

export class DefinitionsTable {
  readonly module: string;
  private readonly entries = new Map<string, MutableDefinition>();
  private readonly locals = new Set<string>();
  private destroyed = false;

  constructor(module: string) {
    this.module = module;
  }

  /**
   * Add a definition or more clauses to an existing one.
   * @throws CompileError MODF-D002 when the pair exists with another kind
   */
  define(input: DefinitionInput): DefineOutcome {
    this.assertOpen();
    const key = nameArityKey(input);
    const existing = this.entries.get(key);

    if (existing) {
      if (existing.kind !== input.kind) {
        throw createError(
          'MODF-D002',
          {
            kind: input.kind,
            name: input.name,
            arity: input.arity,
            existing: existing.kind,
            file: existing.location.file,
            line: existing.location.line,
          },
          input.location
        );
      }
      existing.clauses.push(...(input.clauses ?? []));
      return { definition: snapshot(existing), isNew: false };
    }

    const created: MutableDefinition = {
      name: input.name,
      arity: input.arity,
      kind: input.kind,
      clauses: [...(input.clauses ?? [])],
      location: input.location,
    };
    this.entries.set(key, created);
    return { definition: snapshot(created), isNew: true };
  }

  get(name: string, arity: number): Definition | undefined {
    this.assertOpen();
    const entry = this.entries.get(nameArityKey({ name, arity }));
    return entry ? snapshot(entry) : undefined;
  }

  has(name: string, arity: number): boolean {
    this.assertOpen();
    return this.entries.has(nameArityKey({ name, arity }));
  }

  /** Mark (name, arity) as used by a local call */
  recordLocal(name: string, arity: number): void {
    this.assertOpen();
    this.locals.add(nameArityKey({ name, arity }));
  }

  get size(): number {
    return this.entries.size;
  }

  unwrap(): UnwrappedDefinitions {
    this.assertOpen();
    const byKind: Record<DefinitionKind, NameArity[]> = {
      def: [],
      defp: [],
      defmacro: [],
      defmacrop: [],
    };
    const unreachable: NameArity[] = [];

    for (const [key, entry] of this.entries) {
      const pair = { name: entry.name, arity: entry.arity };
      byKind[entry.kind].push(pair);
      if (!isPublicKind(entry.kind) && !this.locals.has(key)) {
        unreachable.push(pair);
      }
    }

    return {
      def: sortNameArities(byKind.def),
      defp: sortNameArities(byKind.defp),
      defmacro: sortNameArities(byKind.defmacro),
      defmacrop: sortNameArities(byKind.defmacrop),
      exports: sortNameArities([
        ...byKind.def,
        ...byKind.defmacro.map(macroDispatch),
      ]),
      functions: [...this.entries.values()]
        .map(snapshot)
        .sort(compareNameArity),
      unreachable: sortNameArities(unreachable),
    };
  }

  destroy(): void {
    this.entries.clear();
    this.locals.clear();
    this.destroyed = true;
  }

  private assertOpen(): void {
    if (this.destroyed) {
      throw createError('MODF-R005', { module: this.module });
    }
  }
}

function snapshot(entry: MutableDefinition): Definition {
  return {
    name: entry.name,
    arity: entry.arity,
    kind: entry.kind,
    clauses: [...entry.clauses],
    location: entry.location,
  };
}
