/**
 * Typespec Translation
 *
 * Turns the raw `spec`, `callback`, `macrocallback`, `type`, `typep`,
 * `opaque` and `optional_callbacks` attribute values into the
 * declarations stored in the Type and Spec chunks.
 */

import type { AttributeStore } from '../attributes/attribute-store.js';
import { SPEC_KEYS, TYPE_KEYS, type SpecKey, type TypeKey } from '../attributes/builtin-keys.js';
import {
  compareNameArity,
  macroDispatch,
  nameArityKey,
  sortNameArities,
  type NameArity,
  type UnwrappedDefinitions,
} from '../definitions/definitions-table.js';
import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';

// ============================================================
// TYPE EXPRESSIONS
// ============================================================

export type TypeExpr =
  | { readonly kind: 'named'; readonly name: string; readonly args?: readonly TypeExpr[] }
  | {
      readonly kind: 'remote';
      readonly module: string;
      readonly name: string;
      readonly args?: readonly TypeExpr[];
    }
  | { readonly kind: 'var'; readonly name: string }
  | { readonly kind: 'literal'; readonly value: string | number | boolean | null }
  | { readonly kind: 'union'; readonly members: readonly TypeExpr[] }
  | { readonly kind: 'tuple'; readonly elements: readonly TypeExpr[] }
  | { readonly kind: 'list'; readonly element: TypeExpr }
  | { readonly kind: 'fun'; readonly params: readonly TypeExpr[]; readonly result: TypeExpr };

/** `term()`, the leading parameter of every macro dispatch function */
export const TERM_TYPE: TypeExpr = { kind: 'named', name: 'term' };

// ============================================================
// ATTRIBUTE FORMS
// ============================================================

/** Value written under `spec`, `callback` or `macrocallback` */
export interface SpecForm {
  readonly name: string;
  readonly params: readonly TypeExpr[];
  readonly result: TypeExpr;
  readonly line?: number | undefined;
}

/** Value written under `type`, `typep` or `opaque` */
export interface TypeForm {
  readonly name: string;
  readonly params: readonly string[];
  readonly definition: TypeExpr;
  readonly line?: number | undefined;
}

// ============================================================
// DECLARATIONS
// ============================================================

export interface SpecClause {
  readonly params: readonly TypeExpr[];
  readonly result: TypeExpr;
}

export interface SpecDeclaration extends NameArity {
  readonly kind: 'spec' | 'callback';
  readonly line: number;
  readonly clauses: readonly SpecClause[];
}

export interface TypeDeclaration extends NameArity {
  readonly kind: TypeKey;
  readonly line: number;
  readonly params: readonly string[];
  readonly definition: TypeExpr;
}

export interface TypespecSections {
  readonly types: readonly TypeDeclaration[];
  /** Every `type` and `opaque` declaration */
  readonly exportedTypes: readonly NameArity[];
  readonly specs: readonly SpecDeclaration[];
  readonly callbacks: readonly SpecDeclaration[];
  readonly optionalCallbacks: readonly NameArity[];
}

export const EMPTY_TYPESPECS: TypespecSections = {
  types: [],
  exportedTypes: [],
  specs: [],
  callbacks: [],
  optionalCallbacks: [],
};

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTypeExprList(value: unknown): value is readonly TypeExpr[] {
  return Array.isArray(value) && value.every(isTypeExpr);
}

function optionalArgs(value: unknown): boolean {
  return value === undefined || isTypeExprList(value);
}

export function isTypeExpr(value: unknown): value is TypeExpr {
  if (!isRecord(value)) return false;
  switch (value['kind']) {
    case 'named':
      return typeof value['name'] === 'string' && optionalArgs(value['args']);
    case 'remote':
      return (
        typeof value['module'] === 'string' &&
        typeof value['name'] === 'string' &&
        optionalArgs(value['args'])
      );
    case 'var':
      return typeof value['name'] === 'string';
    case 'literal': {
      const literal = value['value'];
      return (
        literal === null ||
        typeof literal === 'string' ||
        typeof literal === 'number' ||
        typeof literal === 'boolean'
      );
    }
    case 'union':
      return isTypeExprList(value['members']);
    case 'tuple':
      return isTypeExprList(value['elements']);
    case 'list':
      return isTypeExpr(value['element']);
    case 'fun':
      return isTypeExprList(value['params']) && isTypeExpr(value['result']);
    default:
      return false;
  }
}

function isOptionalLine(value: unknown): boolean {
  return value === undefined || (typeof value === 'number' && Number.isInteger(value));
}

function nameOf(value: unknown): string {
  return isRecord(value) && typeof value['name'] === 'string' ? value['name'] : String(value);
}

function invalid(kind: string, name: string, reason: string, location: SourceLocation): never {
  throw createError('MODF-D006', { kind, name, reason }, location);
}

/** @throws CompileError MODF-D006 */
export function assertSpecForm(
  kind: SpecKey,
  value: unknown,
  location: SourceLocation
): asserts value is SpecForm {
  if (!isRecord(value) || typeof value['name'] !== 'string') {
    invalid(kind, nameOf(value), 'expected a form with a name', location);
  }
  if (!isTypeExprList(value['params'])) {
    invalid(kind, value['name'], 'parameters must be type expressions', location);
  }
  if (!isTypeExpr(value['result'])) {
    invalid(kind, value['name'], 'result must be a type expression', location);
  }
  if (!isOptionalLine(value['line'])) {
    invalid(kind, value['name'], 'line must be an integer', location);
  }
}

/** @throws CompileError MODF-D006 */
export function assertTypeForm(
  kind: TypeKey,
  value: unknown,
  location: SourceLocation
): asserts value is TypeForm {
  if (!isRecord(value) || typeof value['name'] !== 'string') {
    invalid(kind, nameOf(value), 'expected a form with a name', location);
  }
  const params = value['params'];
  if (!Array.isArray(params) || !params.every((param) => typeof param === 'string')) {
    invalid(kind, value['name'], 'parameters must be variable names', location);
  }
  if (!isTypeExpr(value['definition'])) {
    invalid(kind, value['name'], 'definition must be a type expression', location);
  }
  if (!isOptionalLine(value['line'])) {
    invalid(kind, value['name'], 'line must be an integer', location);
  }
}

function collectVars(expr: TypeExpr, into: Set<string>): void {
  switch (expr.kind) {
    case 'var':
      into.add(expr.name);
      return;
    case 'named':
    case 'remote':
      for (const arg of expr.args ?? []) collectVars(arg, into);
      return;
    case 'union':
      for (const member of expr.members) collectVars(member, into);
      return;
    case 'tuple':
      for (const element of expr.elements) collectVars(element, into);
      return;
    case 'list':
      collectVars(expr.element, into);
      return;
    case 'fun':
      for (const param of expr.params) collectVars(param, into);
      collectVars(expr.result, into);
      return;
    case 'literal':
      return;
  }
}

// ============================================================
// TRANSLATION
// ============================================================

/**
 * Translate one type form. Every variable in the definition must be one
 * of the declared parameters (`_` is always allowed).
 */
export function translateType(
  kind: TypeKey,
  value: unknown,
  location: SourceLocation
): TypeDeclaration {
  assertTypeForm(kind, value, location);

  const used = new Set<string>();
  collectVars(value.definition, used);
  const bound = new Set(value.params);
  for (const name of used) {
    if (name !== '_' && !bound.has(name)) {
      invalid(kind, value.name, `type variable ${name} is unbound`, location);
    }
  }

  return {
    kind,
    name: value.name,
    arity: value.params.length,
    line: value.line ?? location.line,
    params: [...value.params],
    definition: value.definition,
  };
}

/**
 * Translate one spec form. A macrocallback becomes a callback on the
 * macro's dispatch name with a leading `term()` parameter.
 */
export function translateSpec(
  kind: SpecKey,
  value: unknown,
  location: SourceLocation
): SpecDeclaration {
  assertSpecForm(kind, value, location);
  const line = value.line ?? location.line;

  if (kind === 'macrocallback') {
    const dispatch = macroDispatch({ name: value.name, arity: value.params.length });
    return {
      kind: 'callback',
      ...dispatch,
      line,
      clauses: [{ params: [TERM_TYPE, ...value.params], result: value.result }],
    };
  }

  return {
    kind,
    name: value.name,
    arity: value.params.length,
    line,
    clauses: [{ params: [...value.params], result: value.result }],
  };
}

/** Merge declarations sharing (kind, name, arity) into one at the lowest line */
export function mergeSpecs(declarations: readonly SpecDeclaration[]): SpecDeclaration[] {
  const merged = new Map<string, SpecDeclaration>();
  for (const declaration of declarations) {
    const key = `${declaration.kind}:${nameArityKey(declaration)}`;
    const existing = merged.get(key);
    merged.set(
      key,
      existing
        ? {
            ...existing,
            line: Math.min(existing.line, declaration.line),
            clauses: [...existing.clauses, ...declaration.clauses],
          }
        : declaration
    );
  }
  return [...merged.values()].sort(compareNameArity);
}

/**
 * Decide what a spec declares against. Specs on public macros move to the
 * dispatch function; specs on private macros, unreachable private
 * functions and undefined names have no target and are dropped.
 */
export function retargetSpec(
  declaration: SpecDeclaration,
  definitions: UnwrappedDefinitions
): SpecDeclaration | undefined {
  const key = nameArityKey(declaration);
  const matches = (pairs: readonly NameArity[]): boolean =>
    pairs.some((pair) => nameArityKey(pair) === key);

  if (matches(definitions.def)) return declaration;

  if (matches(definitions.defmacro)) {
    return {
      ...declaration,
      ...macroDispatch(declaration),
      clauses: declaration.clauses.map((clause) => ({
        params: [TERM_TYPE, ...clause.params],
        result: clause.result,
      })),
    };
  }

  if (matches(definitions.defp) && !matches(definitions.unreachable)) {
    return declaration;
  }

  return undefined;
}

function assertOptionalCallbacks(value: unknown, location: SourceLocation): NameArity[] {
  const entries = Array.isArray(value) ? value : [value];
  const pairs: NameArity[] = [];
  for (const entry of entries) {
    if (
      !isRecord(entry) ||
      typeof entry['name'] !== 'string' ||
      typeof entry['arity'] !== 'number' ||
      !Number.isInteger(entry['arity'])
    ) {
      invalid('optional_callbacks', nameOf(entry), 'expected name and arity', location);
    }
    pairs.push({ name: entry['name'], arity: entry['arity'] });
  }
  return pairs;
}

// ============================================================
// SECTIONS
// ============================================================

/** Build the Type and Spec chunk contents of a module */
export function typespecSections(
  attributes: AttributeStore,
  definitions: UnwrappedDefinitions,
  location: SourceLocation
): TypespecSections {
  const types: TypeDeclaration[] = [];
  for (const kind of TYPE_KEYS) {
    for (const value of attributes.readAll(kind)) {
      types.push(translateType(kind, value, location));
    }
  }
  types.sort(compareNameArity);

  const specs: SpecDeclaration[] = [];
  const callbacks: SpecDeclaration[] = [];
  const macroCallbacks = new Set<string>();

  for (const kind of SPEC_KEYS) {
    for (const value of attributes.readAll(kind)) {
      const declaration = translateSpec(kind, value, location);
      if (kind === 'spec') {
        const target = retargetSpec(declaration, definitions);
        if (target) specs.push(target);
      } else {
        if (kind === 'macrocallback') {
          assertSpecForm(kind, value, location);
          macroCallbacks.add(nameArityKey({ name: value.name, arity: value.params.length }));
        }
        callbacks.push(declaration);
      }
    }
  }

  const optional: NameArity[] = [];
  for (const value of attributes.readAll('optional_callbacks')) {
    for (const pair of assertOptionalCallbacks(value, location)) {
      optional.push(macroCallbacks.has(nameArityKey(pair)) ? macroDispatch(pair) : pair);
    }
  }

  return {
    types,
    exportedTypes: sortNameArities(types.filter((type) => type.kind !== 'typep')),
    specs: mergeSpecs(specs),
    callbacks: mergeSpecs(callbacks),
    optionalCallbacks: sortNameArities(optional),
  };
}
