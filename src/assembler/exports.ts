/**
 * Export Lists and the Introspection Symbol
 */

import {
  sortNameArities,
  type DefinitionsTable,
  type NameArity,
  type UnwrappedDefinitions,
} from '../definitions/definitions-table.js';
import { InternalSymbolOverriddenError } from '../error-classes.js';
import type { SpecDeclaration, TypeExpr } from './typespecs.js';

/** Function injected into every module to answer introspection queries */
export const INFO_FUNCTION: NameArity = { name: '__info__', arity: 1 };

export const INFO_KINDS = [
  'attributes',
  'compile-opts',
  'exports',
  'functions',
  'macros',
  'checksum',
  'module',
  'native-addresses',
] as const;

export type InfoKind = (typeof INFO_KINDS)[number];

export function isInfoKind(value: unknown): value is InfoKind {
  return typeof value === 'string' && (INFO_KINDS as readonly string[]).includes(value);
}

export interface ExportSections {
  /** Public functions, macro dispatch functions and the introspection symbol */
  readonly exports: readonly NameArity[];
  /** Public functions as answered by `__info__(functions)` */
  readonly functions: readonly NameArity[];
  /** Public macros under their source name */
  readonly macros: readonly NameArity[];
}

/** @throws InternalSymbolOverriddenError when the module defines `__info__/1` */
export function assertNoInternalOverride(definitions: DefinitionsTable): void {
  const defined = definitions.get(INFO_FUNCTION.name, INFO_FUNCTION.arity);
  if (defined) {
    throw new InternalSymbolOverriddenError(
      INFO_FUNCTION.name,
      INFO_FUNCTION.arity,
      defined.location
    );
  }
}

export function exportSections(definitions: UnwrappedDefinitions): ExportSections {
  return {
    exports: sortNameArities([...definitions.exports, INFO_FUNCTION]),
    functions: definitions.def,
    macros: definitions.defmacro,
  };
}

/** Spec declaration of the introspection symbol */
export function infoSpec(line: number): SpecDeclaration {
  const param: TypeExpr = {
    kind: 'union',
    members: INFO_KINDS.map((kind) => ({ kind: 'literal', value: kind })),
  };
  return {
    kind: 'spec',
    name: INFO_FUNCTION.name,
    arity: INFO_FUNCTION.arity,
    line,
    clauses: [{ params: [param], result: { kind: 'named', name: 'term' } }],
  };
}
