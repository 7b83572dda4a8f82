/**
 * Artifact Builder and Introspection Tests
 */

import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import {
  Artifact,
  AttributeStore,
  BuildError,
  DefinitionsTable,
  assemble,
  buildArtifact,
  flattenCompileOptions,
  injectChunk,
  queryInfo,
} from '../../src/index.js';
import { decodeTerm } from '../../src/artifact/term-codec.js';
import { expectCompileError, thrown } from '../helpers/errors.js';

const location = { file: 'lib/a.mod', line: 1 };

function sectionsOf(setup: (attributes: AttributeStore, definitions: DefinitionsTable) => void = () => {}) {
  const attributes = new AttributeStore('Sample');
  const definitions = new DefinitionsTable('Sample');
  setup(attributes, definitions);
  return assemble({ module: 'Sample', location, attributes, definitions }, { docs: true, internal: false });
}

describe('flattenCompileOptions', () => {
  it('flattens flags, lists and records', () => {
    expect(
      flattenCompileOptions(['debug_info', ['deterministic', { inline: true, warnings: false }]])
    ).toEqual({
      debugInfo: true,
      deterministic: true,
      flags: ['debug_info', 'deterministic', 'inline', { warnings: false }],
    });
  });

  it('defaults both backend flags off', () => {
    expect(flattenCompileOptions([])).toEqual({ debugInfo: false, deterministic: false, flags: [] });
  });
});

describe('buildArtifact', () => {
  it('writes the base chunks in order', () => {
    expect(buildArtifact(sectionsOf()).chunkIds()).toEqual([
      'Modl',
      'ExpT',
      'Code',
      'Type',
      'Spec',
      'Attr',
      'CInf',
      'Info',
    ]);
  });

  it('adds debug info only when asked to', () => {
    const artifact = buildArtifact(sectionsOf((attributes) => attributes.write('compile', 'debug_info')));
    expect(artifact.chunkIds().at(-1)).toBe('Dbgi');
  });

  it('records the source path unless deterministic', () => {
    const plain = buildArtifact(sectionsOf());
    const deterministic = buildArtifact(
      sectionsOf((attributes) => attributes.write('compile', 'deterministic'))
    );

    expect(decodeTerm(plain.readChunk('CInf') ?? Buffer.alloc(0))).toEqual({
      options: [],
      source: 'lib/a.mod',
    });
    expect(decodeTerm(deterministic.readChunk('CInf') ?? Buffer.alloc(0))).toEqual({
      options: ['deterministic'],
    });
  });

  it('wraps encoding failures in BuildError', () => {
    const sections = sectionsOf((_attributes, definitions) => {
      definitions.define({ kind: 'def', name: 'run', arity: 0, clauses: [() => 1], location });
    });

    const error = thrown(() => buildArtifact(sections));
    expect(error).toBeInstanceOf(BuildError);
    expect(expectCompileError(error, 'MODF-B001').message).toBe(
      'could not build artifact for Sample: cannot encode a function in an artifact at lib/a.mod:1'
    );
  });
});

describe('injectChunk', () => {
  const owner = { module: 'Sample', location };

  it('appends the encoded chunk', () => {
    const artifact = injectChunk(buildArtifact(sectionsOf()), 'Docs', () => Buffer.from('{}'), owner);
    expect(artifact.readChunk('Docs')).toEqual(Buffer.from('{}'));
  });

  it('wraps encoding failures in BuildError', () => {
    const error = thrown(() =>
      injectChunk(
        buildArtifact(sectionsOf()),
        'Docs',
        () => {
          throw new Error('no payload');
        },
        owner
      )
    );

    expect(error).toBeInstanceOf(BuildError);
    expect(expectCompileError(error, 'MODF-B001').message).toBe(
      'could not build artifact for Sample: no payload at lib/a.mod:1'
    );
  });

  it('passes chunk errors through', () => {
    const error = thrown(() => injectChunk(buildArtifact(sectionsOf()), 'Info', () => Buffer.alloc(0), owner));
    expect(expectCompileError(error, 'MODF-B002').message).toBe(
      'invalid artifact chunk data: chunk Info is already present'
    );
  });
});

describe('queryInfo', () => {
  const artifact = buildArtifact(
    sectionsOf((attributes, definitions) => {
      definitions.define({ kind: 'def', name: 'run', arity: 1, location });
      definitions.define({ kind: 'defmacro', name: 'when', arity: 2, location });
      attributes.write('vsn', 3);
      attributes.write('compile', 'deterministic');
    })
  );

  it('answers module, exports, functions and macros', () => {
    expect(queryInfo(artifact, 'module')).toBe('Sample');
    expect(queryInfo(artifact, 'exports')).toEqual([
      { name: 'MACRO-when', arity: 3 },
      { name: '__info__', arity: 1 },
      { name: 'run', arity: 1 },
    ]);
    expect(queryInfo(artifact, 'functions')).toEqual([{ name: 'run', arity: 1 }]);
    expect(queryInfo(artifact, 'macros')).toEqual([{ name: 'when', arity: 2 }]);
  });

  it('answers attributes and compile options', () => {
    expect(queryInfo(artifact, 'attributes')).toEqual([
      ['vsn', 3],
      ['compile', 'deterministic'],
    ]);
    expect(queryInfo(artifact, 'compile-opts')).toEqual(['deterministic']);
    expect(queryInfo(artifact, 'native-addresses')).toEqual([]);
  });

  it('answers the md5 of the Code chunk as checksum', () => {
    const code = artifact.readChunk('Code') ?? Buffer.alloc(0);
    expect(queryInfo(artifact, 'checksum')).toBe(createHash('md5').update(code).digest('hex'));
  });

  it('rejects artifacts without an Info chunk', () => {
    const bare = artifact.chunks().filter((chunk) => chunk.id !== 'Info');
    expectCompileError(thrown(() => queryInfo(Artifact.fromChunks(bare), 'module')), 'MODF-B002');
  });
});
