/**
 * Answers of the injected introspection function, read back from the
 * Info chunk.
 */

import type { InfoKind } from '../assembler/exports.js';
import type { NameArity } from '../definitions/definitions-table.js';
import { createError } from '../error-classes.js';
import type { Artifact } from './artifact.js';
import { decodeTerm } from './term-codec.js';

export interface InfoAnswers {
  readonly attributes: readonly (readonly [string, unknown])[];
  readonly 'compile-opts': readonly unknown[];
  readonly exports: readonly NameArity[];
  readonly functions: readonly NameArity[];
  readonly macros: readonly NameArity[];
  readonly checksum: string;
  readonly module: string;
  readonly 'native-addresses': readonly unknown[];
}

function invalid(reason: string): never {
  throw createError('MODF-B002', { reason });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nameArities(value: unknown, kind: InfoKind): NameArity[] {
  if (!Array.isArray(value)) invalid(`Info ${kind} is not a list`);
  return value.map((item: unknown) => {
    if (!isRecord(item) || typeof item['name'] !== 'string' || typeof item['arity'] !== 'number') {
      invalid(`Info ${kind} holds a malformed entry`);
    }
    return { name: item['name'], arity: item['arity'] };
  });
}

function list(value: unknown, kind: InfoKind): unknown[] {
  if (!Array.isArray(value)) invalid(`Info ${kind} is not a list`);
  return value;
}

function text(value: unknown, kind: InfoKind): string {
  if (typeof value !== 'string') invalid(`Info ${kind} is not a string`);
  return value;
}

function attributePairs(value: unknown): [string, unknown][] {
  return list(value, 'attributes').map((pair) => {
    if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== 'string') {
      invalid('Info attributes holds a malformed entry');
    }
    const entry: [string, unknown] = [pair[0], pair[1]];
    return entry;
  });
}

/**
 * Read the Info chunk and validate its shape.
 * @throws CompileError MODF-B002 when the chunk is missing or malformed
 */
export function readInfo(artifact: Artifact): InfoAnswers {
  const payload = artifact.readChunk('Info');
  if (!payload) invalid('artifact has no Info chunk');

  const decoded = decodeTerm(payload);
  if (!isRecord(decoded)) invalid('Info chunk is not a record');

  return {
    attributes: attributePairs(decoded['attributes']),
    'compile-opts': list(decoded['compile-opts'], 'compile-opts'),
    exports: nameArities(decoded['exports'], 'exports'),
    functions: nameArities(decoded['functions'], 'functions'),
    macros: nameArities(decoded['macros'], 'macros'),
    checksum: text(decoded['checksum'], 'checksum'),
    module: text(decoded['module'], 'module'),
    'native-addresses': list(decoded['native-addresses'], 'native-addresses'),
  };
}

/**
 * Answer one introspection query.
 *
 * @example
 * queryInfo(artifact, 'exports')
 * // [{ name: '__info__', arity: 1 }]
 */
export function queryInfo<K extends InfoKind>(artifact: Artifact, kind: K): InfoAnswers[K] {
  return readInfo(artifact)[kind];
}
