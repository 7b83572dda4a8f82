/**
 * Artifact Container Tests
 */

import { describe, expect, it } from 'vitest';
import { Artifact, addChunk, readChunk } from '../../src/index.js';
import { decodeChunks } from '../../src/artifact/chunks.js';
import { decodeTerm, encodeTerm } from '../../src/artifact/term-codec.js';
import { expectCompileError, thrown } from '../helpers/errors.js';

describe('chunk container', () => {
  it('lays out header, chunk and padding', () => {
    const artifact = Artifact.fromChunks([{ id: 'Abcd', data: Buffer.from('xyz') }]);
    const binary = artifact.binary;

    expect(binary.length).toBe(24);
    expect(binary.toString('ascii', 0, 4)).toBe('FOR1');
    expect(binary.readUInt32BE(4)).toBe(16);
    expect(binary.toString('ascii', 8, 12)).toBe('MODF');
    expect(binary.toString('ascii', 12, 16)).toBe('Abcd');
    expect(binary.readUInt32BE(16)).toBe(3);
    expect([...binary.subarray(20, 24)]).toEqual([0x78, 0x79, 0x7a, 0]);
  });

  it('decodes what it encodes', () => {
    const artifact = Artifact.fromChunks([
      { id: 'Aaaa', data: Buffer.from('one') },
      { id: 'Bbbb', data: Buffer.alloc(0) },
    ]);
    const decoded = Artifact.fromBinary(artifact.binary);

    expect(decoded.chunkIds()).toEqual(['Aaaa', 'Bbbb']);
    expect(decoded.readChunk('Aaaa')).toEqual(Buffer.from('one'));
    expect(decoded.readChunk('Bbbb')).toEqual(Buffer.alloc(0));
    expect(decoded.readChunk('Cccc')).toBeUndefined();
  });

  it('rejects a container without the FOR1 header', () => {
    const error = expectCompileError(
      thrown(() => decodeChunks(Buffer.from('XXXX00000000'))),
      'MODF-B002'
    );
    expect(error.message).toBe('invalid artifact chunk data: missing FOR1 header');
  });

  it('rejects a size that does not match the container', () => {
    const binary = Buffer.concat([Artifact.fromChunks([]).binary, Buffer.alloc(4)]);
    const error = expectCompileError(thrown(() => Artifact.fromBinary(binary)), 'MODF-B002');
    expect(error.message).toBe('invalid artifact chunk data: declared size 4 does not match 8');
  });

  it('rejects a chunk overrunning the container', () => {
    const binary = Artifact.fromChunks([{ id: 'Aaaa', data: Buffer.from('abcd') }]).binary;
    binary.writeUInt32BE(40, 16);
    const error = expectCompileError(thrown(() => Artifact.fromBinary(binary)), 'MODF-B002');
    expect(error.message).toBe('invalid artifact chunk data: chunk Aaaa overruns the container');
  });
});

describe('chunk injection', () => {
  const original = Artifact.fromChunks([
    { id: 'Aaaa', data: Buffer.from('one') },
    { id: 'Bbbb', data: Buffer.from('two22') },
  ]);

  it('returns a new artifact with the chunk appended', () => {
    const payload = Buffer.from([1, 2, 3, 4, 5, 6, 7]);
    const injected = addChunk(original, 'Docs', payload);

    expect(injected.chunkIds()).toEqual(['Aaaa', 'Bbbb', 'Docs']);
    expect(readChunk(injected, 'Docs')).toEqual(payload);
    expect(original.chunkIds()).toEqual(['Aaaa', 'Bbbb']);
    expect(original.hasChunk('Docs')).toBe(false);
  });

  it('keeps existing chunks byte-identical', () => {
    const injected = original.withChunk('Docs', Buffer.from('{}'));

    expect(injected.readChunk('Aaaa')).toEqual(Buffer.from('one'));
    expect(injected.readChunk('Bbbb')).toEqual(Buffer.from('two22'));
    expect(injected.binary.subarray(12, original.size)).toEqual(original.binary.subarray(12));
  });

  it('rejects chunk ids that are not 4 printable characters', () => {
    const error = expectCompileError(
      thrown(() => original.withChunk('Doc', Buffer.alloc(0))),
      'MODF-B002'
    );
    expect(error.message).toBe(
      'invalid artifact chunk data: chunk id must be 4 printable ASCII characters, got "Doc"'
    );
  });

  it('rejects a chunk id that is already present', () => {
    const error = expectCompileError(
      thrown(() => original.withChunk('Aaaa', Buffer.from('again'))),
      'MODF-B002'
    );
    expect(error.message).toBe('invalid artifact chunk data: chunk Aaaa is already present');
    expect(original.readChunk('Aaaa')).toEqual(Buffer.from('one'));
  });

  it('rejects a second injection of the same chunk', () => {
    const injected = addChunk(original, 'Docs', Buffer.from('{}'));
    expectCompileError(thrown(() => addChunk(injected, 'Docs', Buffer.from('[]'))), 'MODF-B002');
  });

  it('hands out copies of payloads', () => {
    const payload = original.readChunk('Aaaa');
    payload?.fill(0);
    expect(original.readChunk('Aaaa')).toEqual(Buffer.from('one'));
  });
});

describe('term codec', () => {
  it('keeps values plain JSON cannot hold', () => {
    const decoded = decodeTerm(encodeTerm({ big: 12n, inf: -Infinity, list: [1, 'a', null] }));
    expect(decoded).toEqual({ big: 12n, inf: -Infinity, list: [1, 'a', null] });
  });

  it('refuses functions', () => {
    expect(() => encodeTerm({ run: () => 1 })).toThrow('cannot encode a function in an artifact');
  });

  it('refuses maps, sets and class instances', () => {
    class Point {
      constructor(readonly x: number) {}
    }
    expect(() => encodeTerm({ table: new Map([['a', 1]]) })).toThrow('cannot encode a Map in an artifact');
    expect(() => encodeTerm([new Set([1])])).toThrow('cannot encode a Set in an artifact');
    expect(() => encodeTerm(new Point(1))).toThrow('cannot encode a Point in an artifact');
  });

  it('keeps objects that use the tag key as plain data', () => {
    const value = { $term: 'undefined', note: 'x', nested: { $term: 'bigint', value: '1' } };
    expect(decodeTerm(encodeTerm(value))).toEqual(value);
  });
});
