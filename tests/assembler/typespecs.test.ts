/**
 * Typespec Translation Tests
 */

import { describe, expect, it } from 'vitest';
import { AttributeStore, DefinitionsTable, type TypeExpr } from '../../src/index.js';
import {
  TERM_TYPE,
  translateSpec,
  translateType,
  typespecSections,
} from '../../src/assembler/typespecs.js';
import { expectCompileError, thrown } from '../helpers/errors.js';

const location = { file: 'lib/a.mod', line: 1 };
const atom: TypeExpr = { kind: 'named', name: 'atom' };
const integer: TypeExpr = { kind: 'named', name: 'integer' };

const spec = (name: string, params: TypeExpr[], line: number, result: TypeExpr = TERM_TYPE) => ({
  name,
  params,
  result,
  line,
});

describe('translateSpec', () => {
  it('keeps a plain spec', () => {
    expect(translateSpec('spec', spec('run', [integer], 3), location)).toEqual({
      kind: 'spec',
      name: 'run',
      arity: 1,
      line: 3,
      clauses: [{ params: [integer], result: TERM_TYPE }],
    });
  });

  it('moves a macro callback onto the dispatch function', () => {
    expect(translateSpec('macrocallback', spec('expand', [atom], 4), location)).toEqual({
      kind: 'callback',
      name: 'MACRO-expand',
      arity: 2,
      line: 4,
      clauses: [{ params: [TERM_TYPE, atom], result: TERM_TYPE }],
    });
  });

  it('falls back to the module line', () => {
    const declaration = translateSpec('spec', { name: 'run', params: [], result: atom }, location);
    expect(declaration.line).toBe(1);
  });

  it('rejects malformed forms', () => {
    const error = expectCompileError(
      thrown(() => translateSpec('spec', { name: 'run', params: 'x', result: atom }, location)),
      'MODF-D006'
    );
    expect(error.message).toBe('invalid @spec run: parameters must be type expressions at lib/a.mod:1');
  });
});

describe('translateType', () => {
  it('counts parameters as arity', () => {
    const declaration = translateType(
      'opaque',
      { name: 'box', params: ['a'], definition: { kind: 'tuple', elements: [{ kind: 'var', name: 'a' }] } },
      location
    );
    expect(declaration).toMatchObject({ kind: 'opaque', name: 'box', arity: 1, line: 1 });
  });

  it('rejects unbound type variables', () => {
    const error = expectCompileError(
      thrown(() =>
        translateType(
          'type',
          {
            name: 'pair',
            params: ['a'],
            definition: {
              kind: 'tuple',
              elements: [
                { kind: 'var', name: 'a' },
                { kind: 'var', name: 'b' },
              ],
            },
          },
          location
        )
      ),
      'MODF-D006'
    );
    expect(error.message).toBe('invalid @type pair: type variable b is unbound at lib/a.mod:1');
  });

  it('allows the anonymous variable', () => {
    const declaration = translateType(
      'type',
      { name: 'any_list', params: [], definition: { kind: 'list', element: { kind: 'var', name: '_' } } },
      location
    );
    expect(declaration.arity).toBe(0);
  });
});

describe('typespecSections', () => {
  function moduleWithSpecs() {
    const attributes = new AttributeStore('Sample');
    const definitions = new DefinitionsTable('Sample');
    definitions.define({ kind: 'def', name: 'run', arity: 1, location });
    definitions.define({ kind: 'defmacro', name: 'when', arity: 1, location });
    definitions.define({ kind: 'defp', name: 'helper', arity: 0, location });
    definitions.define({ kind: 'defp', name: 'dead', arity: 0, location });
    definitions.define({ kind: 'defmacrop', name: 'secret', arity: 0, location });
    definitions.recordLocal('helper', 0);

    attributes.write('spec', spec('run', [integer], 3, atom));
    attributes.write('spec', spec('run', [atom], 2, atom));
    attributes.write('spec', spec('when', [atom], 5));
    attributes.write('spec', spec('helper', [], 6));
    attributes.write('spec', spec('dead', [], 7));
    attributes.write('spec', spec('secret', [], 8));
    attributes.write('spec', spec('missing', [atom, atom], 9));

    attributes.write('type', { name: 't', params: [], definition: atom, line: 10 });
    attributes.write('typep', { name: 'p', params: [], definition: integer, line: 11 });
    attributes.write('opaque', {
      name: 'o',
      params: ['a'],
      definition: { kind: 'list', element: { kind: 'var', name: 'a' } },
      line: 12,
    });

    attributes.write('callback', spec('init', [TERM_TYPE], 13));
    attributes.write('macrocallback', spec('gen', [], 14));
    attributes.write('optional_callbacks', [
      { name: 'gen', arity: 0 },
      { name: 'init', arity: 1 },
    ]);

    return typespecSections(attributes, definitions.unwrap(), location);
  }

  it('keeps specs with a reachable target and retargets macro specs', () => {
    const sections = moduleWithSpecs();
    expect(sections.specs.map((s) => [s.name, s.arity, s.line])).toEqual([
      ['MACRO-when', 2, 5],
      ['helper', 0, 6],
      ['run', 1, 2],
    ]);
  });

  it('merges specs for one function at the lowest line', () => {
    const run = moduleWithSpecs().specs.find((s) => s.name === 'run');
    expect(run?.clauses).toEqual([
      { params: [integer], result: atom },
      { params: [atom], result: atom },
    ]);
  });

  it('prepends the caller context to retargeted macro specs', () => {
    const when = moduleWithSpecs().specs.find((s) => s.name === 'MACRO-when');
    expect(when?.clauses).toEqual([{ params: [TERM_TYPE, atom], result: TERM_TYPE }]);
  });

  it('exports type and opaque declarations only', () => {
    const sections = moduleWithSpecs();
    expect(sections.types.map((t) => `${t.kind} ${t.name}/${t.arity}`)).toEqual([
      'opaque o/1',
      'typep p/0',
      'type t/0',
    ]);
    expect(sections.exportedTypes).toEqual([
      { name: 'o', arity: 1 },
      { name: 't', arity: 0 },
    ]);
  });

  it('renames optional callbacks that match a macro callback', () => {
    const sections = moduleWithSpecs();
    expect(sections.callbacks.map((c) => [c.name, c.arity])).toEqual([
      ['MACRO-gen', 1],
      ['init', 1],
    ]);
    expect(sections.optionalCallbacks).toEqual([
      { name: 'MACRO-gen', arity: 1 },
      { name: 'init', arity: 1 },
    ]);
  });
});
