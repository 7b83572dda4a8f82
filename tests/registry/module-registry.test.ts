/**
 * Module Registry Tests
 */

import { describe, expect, it } from 'vitest';
import {
  Artifact,
  CodeSession,
  ModuleAlreadyDefiningError,
  ModuleRegistry,
  ModuleReservedError,
  type Diagnostic,
  type OpenOptions,
} from '../../src/index.js';
import { expectCompileError, thrown } from '../helpers/errors.js';

const baseOptions: OpenOptions = {
  sessionId: 'test-session',
  docs: true,
  ignoreModuleConflict: false,
};

describe('ModuleRegistry', () => {
  describe('open', () => {
    it('opens an entry and seeds its attributes', () => {
      const registry = new ModuleRegistry();
      const handle = registry.open('Sample', { file: 'lib/a.mod', line: 1 }, baseOptions);

      expect(registry.isOpen('Sample')).toBe(true);
      expect(registry.openModules()).toEqual(['Sample']);
      expect(handle.entry.sessionId).toBe('test-session');
      expect(registry.getAttribute('Sample', 'moduledoc')).toBeNull();
      expect(registry.getAttribute('Sample', 'before_compile')).toEqual([]);
      expect(registry.getAttribute('Sample', 'after_compile')).toEqual([]);
      expect(registry.getAttribute('Sample', 'on_definition')).toEqual([
        { module: '$compiler', function: 'compile_doc' },
      ]);
    });

    it('seeds the doc-discarding hook when docs are disabled', () => {
      const registry = new ModuleRegistry();
      registry.open('Sample', { file: 'lib/a.mod', line: 1 }, { ...baseOptions, docs: false });

      expect(registry.getAttribute('Sample', 'on_definition')).toEqual([
        { module: '$compiler', function: 'delete_doc' },
      ]);
    });

    it('rejects empty and whitespace-bearing names', () => {
      const registry = new ModuleRegistry();
      const location = { file: 'lib/a.mod', line: 2 };

      const empty = expectCompileError(thrown(() => registry.open('', location, baseOptions)), 'MODF-R004');
      expect(empty.message).toBe('invalid module name:  at lib/a.mod:2');
      expectCompileError(thrown(() => registry.open('My Module', location, baseOptions)), 'MODF-R004');
      expect(registry.openModules()).toEqual([]);
    });

    it('rejects reserved names', () => {
      const registry = new ModuleRegistry();
      const error = thrown(() => registry.open('PID', { file: 'lib/a.mod', line: 1 }, baseOptions));

      expect(error).toBeInstanceOf(ModuleReservedError);
      expectCompileError(error, 'MODF-R001');
    });

    it('rejects a second open and leaves the first entry intact', () => {
      const registry = new ModuleRegistry();
      const first = registry.open('Sample', { file: 'lib/a.mod', line: 1 }, baseOptions);
      first.entry.attributes.write('marker', 'kept');

      const error = thrown(() =>
        registry.open('Sample', { file: 'lib/b.mod', line: 4 }, baseOptions)
      );

      expect(error).toBeInstanceOf(ModuleAlreadyDefiningError);
      const compileError = expectCompileError(error, 'MODF-R002');
      expect(compileError.message).toBe(
        'cannot define module Sample because it is currently being defined in lib/a.mod:1 at lib/b.mod:4'
      );
      expect(registry.lookup('Sample')).toBe(first.entry);
      expect(first.entry.attributes.read('marker')).toBe('kept');
    });

    it('opens different names side by side', () => {
      const registry = new ModuleRegistry();
      registry.open('Outer', { file: 'lib/a.mod', line: 1 }, baseOptions);
      registry.open('Inner', { file: 'lib/a.mod', line: 2 }, baseOptions);

      expect(registry.openModules()).toEqual(['Inner', 'Outer']);
    });
  });

  describe('redefinition warning', () => {
    function openLoaded(origin: Parameters<CodeSession['register']>[2], ignore = false): Diagnostic[] {
      const codeSession = new CodeSession();
      codeSession.register('Sample', Artifact.fromChunks([]), origin);
      const reports: Diagnostic[] = [];
      new ModuleRegistry().open('Sample', { file: 'lib/a.mod', line: 1 }, {
        ...baseOptions,
        ignoreModuleConflict: ignore,
        codeSession,
        report: (diagnostic) => reports.push(diagnostic),
      });
      return reports;
    }

    it('names the path of the loaded version', () => {
      const reports = openLoaded({ kind: 'path', path: '/build/Sample.modf' });

      expect(reports.map((report) => [report.errorId, report.severity, report.message])).toEqual([
        ['MODF-R003', 'warning', 'redefining module Sample (current version loaded from /build/Sample.modf)'],
      ]);
    });

    it('reports in-memory versions', () => {
      const reports = openLoaded({ kind: 'memory' });
      expect(reports.map((report) => report.message)).toEqual([
        'redefining module Sample (current version defined in memory)',
      ]);
    });

    it('stays quiet with ignoreModuleConflict', () => {
      expect(openLoaded({ kind: 'memory' }, true)).toEqual([]);
    });
  });

  describe('close', () => {
    it('tears down the entry and its stores once', () => {
      const registry = new ModuleRegistry();
      const handle = registry.open('Sample', { file: 'lib/a.mod', line: 1 }, baseOptions);

      registry.close(handle);
      registry.close(handle);

      expect(registry.isOpen('Sample')).toBe(false);
      expect(handle.entry.attributes.isDestroyed).toBe(true);
      expectCompileError(thrown(() => handle.entry.definitions.has('run', 0)), 'MODF-R005');
      expectCompileError(thrown(() => registry.getAttribute('Sample', 'moduledoc')), 'MODF-R005');
    });

    it('never removes an entry opened by another handle', () => {
      const registry = new ModuleRegistry();
      const stale = registry.open('Sample', { file: 'lib/a.mod', line: 1 }, baseOptions);
      registry.close(stale);
      const fresh = registry.open('Sample', { file: 'lib/a.mod', line: 9 }, baseOptions);

      registry.close(stale);

      expect(registry.lookup('Sample')).toBe(fresh.entry);
    });
  });
});
