/**
 * Artifact Builder
 *
 * Encodes assembled module sections into the base chunks of an artifact.
 * Custom chunks (such as Docs) are added afterwards by injection.
 */

import { createHash } from 'node:crypto';
import type { ModuleSections } from '../assembler/index.js';
import type { InfoKind } from '../assembler/exports.js';
import { BuildError, CompileError, describeError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { Artifact } from './artifact.js';
import type { Chunk } from './chunks.js';
import { encodeTerm } from './term-codec.js';

// ============================================================
// COMPILE OPTIONS
// ============================================================

export interface BackendOptions {
  /** Emit the Dbgi chunk */
  readonly debugInfo: boolean;
  /** Leave the source path out of the CInf chunk */
  readonly deterministic: boolean;
  /** Every flag after flattening, in write order */
  readonly flags: readonly unknown[];
}

/**
 * Flatten `compile` attribute values into backend flags. A value may be
 * a flag, a list of flags or a record of flag → boolean.
 */
export function flattenCompileOptions(values: readonly unknown[]): BackendOptions {
  const flags: unknown[] = [];
  const visit = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) visit(item);
    } else if (typeof value === 'object' && value !== null) {
      for (const [key, enabled] of Object.entries(value)) {
        flags.push(enabled === true ? key : { [key]: enabled });
      }
    } else {
      flags.push(value);
    }
  };
  for (const value of values) visit(value);

  return {
    debugInfo: flags.includes('debug_info'),
    deterministic: flags.includes('deterministic'),
    flags,
  };
}

// ============================================================
// CHUNKS
// ============================================================

export const BASE_CHUNK_IDS = ['Modl', 'ExpT', 'Code', 'Type', 'Spec', 'Attr', 'CInf', 'Info'] as const;
export const DEBUG_CHUNK_ID = 'Dbgi';

function md5(data: Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

function baseChunks(sections: ModuleSections, options: BackendOptions): Chunk[] {
  const { module, location, typespecs } = sections;

  const code = encodeTerm(
    sections.definitions.map((definition) => ({
      name: definition.name,
      arity: definition.arity,
      kind: definition.kind,
      line: definition.location.line,
      clauses: definition.clauses,
    }))
  );

  const compileInfo = options.deterministic
    ? { options: options.flags }
    : { options: options.flags, source: location.file };

  const info: Record<InfoKind, unknown> = {
    attributes: sections.attributes.map((section) => [section.key, section.value]),
    'compile-opts': options.flags,
    exports: sections.exports,
    functions: sections.functions,
    macros: sections.macros,
    checksum: md5(code),
    module,
    'native-addresses': [],
  };

  const chunks: Chunk[] = [
    { id: 'Modl', data: encodeTerm({ module, file: location.file, line: location.line }) },
    { id: 'ExpT', data: encodeTerm(sections.exports) },
    { id: 'Code', data: code },
    { id: 'Type', data: encodeTerm({ types: typespecs.types, exported: typespecs.exportedTypes }) },
    {
      id: 'Spec',
      data: encodeTerm({
        specs: typespecs.specs,
        callbacks: typespecs.callbacks,
        optionalCallbacks: typespecs.optionalCallbacks,
      }),
    },
    { id: 'Attr', data: encodeTerm(sections.attributes) },
    { id: 'CInf', data: encodeTerm(compileInfo) },
    { id: 'Info', data: encodeTerm(info) },
  ];

  if (options.debugInfo) {
    chunks.push({ id: DEBUG_CHUNK_ID, data: encodeTerm({ module, definitions: sections.definitions }) });
  }

  return chunks;
}

/** Turn anything but a CompileError raised by `step` into BuildError */
function buildStep<T>(module: string, location: SourceLocation, step: () => T): T {
  try {
    return step();
  } catch (error) {
    if (error instanceof CompileError) throw error;
    throw new BuildError(module, describeError(error), location, error);
  }
}

/**
 * Build the base artifact of a module.
 * @throws BuildError when a section cannot be encoded
 */
export function buildArtifact(sections: ModuleSections): Artifact {
  return buildStep(sections.module, sections.location, () => {
    const options = flattenCompileOptions(sections.compileOptions);
    return Artifact.fromChunks(baseChunks(sections, options));
  });
}

/**
 * Append a chunk whose payload `encode` produces.
 * @throws BuildError when the payload cannot be encoded
 * @throws CompileError MODF-B002 when the chunk id is invalid or taken
 */
export function injectChunk(
  artifact: Artifact,
  id: string,
  encode: () => Uint8Array,
  owner: { readonly module: string; readonly location: SourceLocation }
): Artifact {
  return buildStep(owner.module, owner.location, () => artifact.withChunk(id, encode()));
}
