/**
 * Configuration Loader
 * Loads and validates modforge.config.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import * as yaml from 'yaml';
import { createError } from '../error-classes.js';
import { resolveOptions, type CompilerOptions } from './options.js';

// ============================================================
// CONSTANTS
// ============================================================

export const CONFIG_FILE_NAME = 'modforge.config.yaml';

const BOOLEAN_FIELDS = ['docs', 'ignoreModuleConflict', 'internal'] as const;
const KNOWN_FIELDS: ReadonlySet<string> = new Set([...BOOLEAN_FIELDS, 'relativeTo']);

// ============================================================
// VALIDATION
// ============================================================

interface ConfigFile {
  docs?: boolean;
  ignoreModuleConflict?: boolean;
  internal?: boolean;
  relativeTo?: string;
}

function invalidConfig(file: string, reason: string): never {
  throw createError('MODF-C001', { file, reason });
}

/**
 * Validate configuration structure and values.
 * @throws CompileError MODF-C001 naming the first problem found
 */
function validateConfig(file: string, data: unknown): asserts data is ConfigFile {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    invalidConfig(file, 'must be a mapping');
  }

  for (const [field, value] of Object.entries(data)) {
    if (!KNOWN_FIELDS.has(field)) {
      invalidConfig(file, `unknown field ${field}`);
    }
    if (field === 'relativeTo') {
      if (typeof value !== 'string') {
        invalidConfig(file, 'relativeTo must be a string');
      }
    } else if (typeof value !== 'boolean') {
      invalidConfig(file, `${field} must be true or false`);
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load compiler options from modforge.config.yaml in `dir`, merged over
 * the defaults. A missing file yields the defaults; an empty file too.
 * A relative `relativeTo` is resolved against `dir`.
 *
 * @throws CompileError MODF-C001 if the file is unreadable or invalid
 */
export function loadCompilerConfig(
  dir: string,
  overrides?: Partial<CompilerOptions>
): CompilerOptions {
  const configPath = join(dir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return resolveOptions(overrides);
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    invalidConfig(
      configPath,
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    invalidConfig(
      configPath,
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  // yaml.parse returns null for an empty document
  const data = parsed ?? {};
  validateConfig(configPath, data);

  const fromFile: Partial<CompilerOptions> = {
    ...data,
    ...(data.relativeTo === undefined ? {} : { relativeTo: resolve(dir, data.relativeTo) }),
  };
  return resolveOptions(fromFile, overrides);
}
