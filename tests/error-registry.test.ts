/**
 * Error Registry Tests
 */

import { describe, expect, it } from 'vitest';
import { CompileError, ERROR_REGISTRY, createError, renderMessage } from '../src/index.js';
import { CATEGORY_PREFIX, severityOf } from '../src/error-registry.js';

describe('ERROR_REGISTRY', () => {
  it('uses the category letter in every error ID', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^MODF-[RADHBC]\d{3}$/);
      expect(errorId.charAt(5)).toBe(CATEGORY_PREFIX[definition.category]);
    }
  });

  it('marks warnings and defaults everything else to error', () => {
    expect(severityOf('MODF-R003')).toBe('warning');
    expect(severityOf('MODF-D004')).toBe('warning');
    expect(severityOf('MODF-H004')).toBe('warning');
    expect(severityOf('MODF-R002')).toBe('error');
  });
});

describe('renderMessage', () => {
  it('fills placeholders and blanks missing values', () => {
    expect(renderMessage('module {module} in {file}', { module: 'Any' })).toBe('module Any in ');
    expect(renderMessage('{count} items', { count: 3 })).toBe('3 items');
  });
});

describe('createError', () => {
  it('appends the location to the message', () => {
    const error = createError('MODF-R004', { module: '' }, { file: 'lib/a.mod', line: 1 });

    expect(error).toBeInstanceOf(CompileError);
    expect(error.message).toBe('invalid module name:  at lib/a.mod:1');
    expect(error.toData().message).toBe('invalid module name: ');
  });

  it('rejects unknown error IDs', () => {
    expect(() => createError('MODF-Z999', {})).toThrow(new TypeError('Unknown error ID: MODF-Z999'));
  });

  it('formats through a host formatter', () => {
    const error = createError('MODF-R001', { module: 'PID' });
    expect(error.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[MODF-R001] module PID is reserved and cannot be defined'
    );
    expect(error.format()).toBe('module PID is reserved and cannot be defined');
  });
});
