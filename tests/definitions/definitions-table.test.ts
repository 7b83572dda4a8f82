/**
 * Definitions Table Tests
 */

import { describe, expect, it } from 'vitest';
import { DefinitionsTable, macroName } from '../../src/index.js';
import { expectCompileError, thrown } from '../helpers/errors.js';

const at = (line: number) => ({ file: 'lib/a.mod', line });

describe('DefinitionsTable', () => {
  it('reports whether a definition is new', () => {
    const table = new DefinitionsTable('Sample');
    const first = table.define({ kind: 'def', name: 'run', arity: 1, clauses: ['a'], location: at(3) });
    const second = table.define({ kind: 'def', name: 'run', arity: 1, clauses: ['b'], location: at(5) });

    expect(first.isNew).toBe(true);
    expect(second.isNew).toBe(false);
    expect(table.get('run', 1)).toEqual({
      kind: 'def',
      name: 'run',
      arity: 1,
      clauses: ['a', 'b'],
      location: at(3),
    });
  });

  it('treats another arity as another definition', () => {
    const table = new DefinitionsTable('Sample');
    table.define({ kind: 'def', name: 'run', arity: 1, location: at(3) });
    const outcome = table.define({ kind: 'defp', name: 'run', arity: 2, location: at(4) });

    expect(outcome.isNew).toBe(true);
    expect(table.size).toBe(2);
  });

  it('rejects redefining a pair as another kind', () => {
    const table = new DefinitionsTable('Sample');
    table.define({ kind: 'def', name: 'run', arity: 1, location: at(3) });

    const error = expectCompileError(
      thrown(() => table.define({ kind: 'defmacro', name: 'run', arity: 1, location: at(7) })),
      'MODF-D002'
    );
    expect(error.message).toBe('defmacro run/1 already defined as def in lib/a.mod:3 at lib/a.mod:7');
  });

  it('splits definitions by kind for assembly', () => {
    const table = new DefinitionsTable('Sample');
    table.define({ kind: 'def', name: 'run', arity: 1, location: at(1) });
    table.define({ kind: 'def', name: 'alpha', arity: 0, location: at(2) });
    table.define({ kind: 'defmacro', name: 'when', arity: 2, location: at(3) });
    table.define({ kind: 'defp', name: 'helper', arity: 0, location: at(4) });
    table.define({ kind: 'defp', name: 'used', arity: 1, location: at(5) });
    table.define({ kind: 'defmacrop', name: 'm', arity: 0, location: at(6) });
    table.recordLocal('used', 1);

    const unwrapped = table.unwrap();
    expect(unwrapped.def).toEqual([
      { name: 'alpha', arity: 0 },
      { name: 'run', arity: 1 },
    ]);
    expect(unwrapped.defp).toEqual([
      { name: 'helper', arity: 0 },
      { name: 'used', arity: 1 },
    ]);
    expect(unwrapped.exports).toEqual([
      { name: 'MACRO-when', arity: 3 },
      { name: 'alpha', arity: 0 },
      { name: 'run', arity: 1 },
    ]);
    expect(unwrapped.unreachable).toEqual([
      { name: 'helper', arity: 0 },
      { name: 'm', arity: 0 },
    ]);
    expect(unwrapped.functions.map((definition) => definition.name)).toEqual([
      'alpha',
      'helper',
      'm',
      'run',
      'used',
      'when',
    ]);
  });

  it('names macro dispatch functions', () => {
    expect(macroName('unless')).toBe('MACRO-unless');
  });

  it('fails once destroyed', () => {
    const table = new DefinitionsTable('Sample');
    table.destroy();
    expectCompileError(thrown(() => table.has('run', 1)), 'MODF-R005');
  });
});
