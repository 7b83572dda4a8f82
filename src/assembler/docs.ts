/**
 * Documentation collection and the Docs chunk.
 */

import type { AttributeStore } from '../attributes/attribute-store.js';
import type { TypeKey } from '../attributes/builtin-keys.js';
import type { Artifact } from '../artifact/artifact.js';
import { decodeTerm, encodeTerm } from '../artifact/term-codec.js';
import {
  compareNameArity,
  nameArityKey,
  type DefinitionKind,
  type NameArity,
} from '../definitions/definitions-table.js';
import { createDiagnostic, type Diagnostic } from '../diagnostics/diagnostic.js';
import type { SourceLocation } from '../source-location.js';

export const DOCS_CHUNK_ID = 'Docs';
export const DOCS_VERSION = 'modforge_docs_v1';

// ============================================================
// TYPES
// ============================================================

interface DocBase extends NameArity {
  readonly line: number;
  /** Documentation value as written; null when none was given */
  readonly doc: unknown;
}

export interface DefinitionDoc extends DocBase {
  readonly kind: DefinitionKind;
}

export interface CallbackDoc extends DocBase {
  readonly kind: 'callback' | 'macrocallback';
}

export interface TypeDoc extends DocBase {
  readonly kind: TypeKey;
}

export interface DocsChunk {
  readonly version: typeof DOCS_VERSION;
  readonly moduledoc: { readonly line: number; readonly doc: unknown };
  readonly docs: readonly DefinitionDoc[];
  readonly callbackDocs: readonly CallbackDoc[];
  readonly typeDocs: readonly TypeDoc[];
}

// ============================================================
// COLLECTOR
// ============================================================

/** Documentation entries gathered while a module compiles; first entry wins */
export class ModuleDocs {
  private readonly definitionDocs = new Map<string, DefinitionDoc>();
  private readonly callbackDocEntries = new Map<string, CallbackDoc>();
  private readonly typeDocEntries = new Map<string, TypeDoc>();

  addDefinitionDoc(entry: DefinitionDoc): void {
    addOnce(this.definitionDocs, entry);
  }

  addCallbackDoc(entry: CallbackDoc): void {
    addOnce(this.callbackDocEntries, entry);
  }

  addTypeDoc(entry: TypeDoc): void {
    addOnce(this.typeDocEntries, entry);
  }

  toChunk(moduledoc: { line: number; doc: unknown }): DocsChunk {
    return {
      version: DOCS_VERSION,
      moduledoc,
      docs: [...this.definitionDocs.values()].sort(compareNameArity),
      callbackDocs: [...this.callbackDocEntries.values()].sort(compareNameArity),
      typeDocs: [...this.typeDocEntries.values()].sort(compareNameArity),
    };
  }

  clear(): void {
    this.definitionDocs.clear();
    this.callbackDocEntries.clear();
    this.typeDocEntries.clear();
  }
}

function addOnce<T extends NameArity>(target: Map<string, T>, entry: T): void {
  const key = nameArityKey(entry);
  if (!target.has(key)) target.set(key, entry);
}

// ============================================================
// WARNINGS
// ============================================================

/**
 * One warning per documentation attribute still pending after
 * evaluation: `doc` with no definition after it, `typedoc` with no type.
 */
export function unusedDocWarnings(
  attributes: AttributeStore,
  location: SourceLocation
): Diagnostic[] {
  const warnings: Diagnostic[] = [];
  if (attributes.has('doc')) {
    warnings.push(createDiagnostic('MODF-D004', { attribute: 'doc' }, location));
  }
  if (attributes.has('typedoc')) {
    warnings.push(createDiagnostic('MODF-D005', { attribute: 'typedoc' }, location));
  }
  return warnings;
}

// ============================================================
// CHUNK ENCODING
// ============================================================

export function encodeDocsChunk(chunk: DocsChunk): Buffer {
  return encodeTerm(chunk);
}

/** Decode the Docs chunk of an artifact; undefined when absent or foreign */
export function readDocsChunk(artifact: Artifact): DocsChunk | undefined {
  const payload = artifact.readChunk(DOCS_CHUNK_ID);
  if (!payload) return undefined;

  const decoded = decodeTerm(payload);
  if (!isRecord(decoded) || decoded['version'] !== DOCS_VERSION) return undefined;

  const moduledoc = decoded['moduledoc'];
  if (!isRecord(moduledoc) || typeof moduledoc['line'] !== 'number') return undefined;

  return {
    version: DOCS_VERSION,
    moduledoc: { line: moduledoc['line'], doc: moduledoc['doc'] ?? null },
    docs: docEntries(decoded['docs'], isDefinitionKind),
    callbackDocs: docEntries(decoded['callbackDocs'], isCallbackKind),
    typeDocs: docEntries(decoded['typeDocs'], isTypeKind),
  };
}

function docEntries<K extends string>(
  value: unknown,
  isKind: (kind: unknown) => kind is K
): (DocBase & { kind: K })[] {
  if (!Array.isArray(value)) return [];
  const entries: (DocBase & { kind: K })[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const { name, arity, line, kind, doc } = item;
    if (
      typeof name === 'string' &&
      typeof arity === 'number' &&
      typeof line === 'number' &&
      isKind(kind)
    ) {
      entries.push({ name, arity, line, kind, doc: doc ?? null });
    }
  }
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDefinitionKind(kind: unknown): kind is DefinitionKind {
  return kind === 'def' || kind === 'defp' || kind === 'defmacro' || kind === 'defmacrop';
}

function isCallbackKind(kind: unknown): kind is 'callback' | 'macrocallback' {
  return kind === 'callback' || kind === 'macrocallback';
}

function isTypeKind(kind: unknown): kind is TypeKey {
  return kind === 'type' || kind === 'typep' || kind === 'opaque';
}
