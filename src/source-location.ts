// ============================================================
// SOURCE LOCATION
// ============================================================

import * as path from 'node:path';

/** File and line a module, definition or attribute was declared at */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
}

/** Render a location as `file:line` */
export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}`;
}

/**
 * Express `file` relative to `cwd` when it lives below it.
 * Files outside `cwd` (and relative inputs) are returned unchanged.
 */
export function relativeToCwd(file: string, cwd: string = process.cwd()): string {
  if (!path.isAbsolute(file)) return file;

  const relative = path.relative(cwd, file);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return file;
  }
  return relative;
}
