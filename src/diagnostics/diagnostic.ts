/**
 * Diagnostics
 * Non-fatal conditions reported during compilation.
 */

import { ERROR_REGISTRY, renderMessage, severityOf, type ErrorSeverity } from '../error-registry.js';
import { formatLocation, type SourceLocation } from '../source-location.js';

export interface Diagnostic {
  readonly errorId: string;
  readonly severity: ErrorSeverity;
  readonly message: string;
  readonly location: SourceLocation;
  readonly context?: Record<string, unknown> | undefined;
}

/** Receives diagnostics as they are produced */
export type DiagnosticSink = (diagnostic: Diagnostic) => void;

/**
 * Build a diagnostic from the error registry.
 * @throws TypeError if errorId is not in the registry
 */
export function createDiagnostic(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): Diagnostic {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return {
    errorId,
    severity: severityOf(errorId),
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  };
}

/**
 * @example
 * formatDiagnostic(d)
 * // "lib/a.mod:3: warning: @doc provided but no definition follows it [MODF-D004]"
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${formatLocation(diagnostic.location)}: ${diagnostic.severity}: ${diagnostic.message} [${diagnostic.errorId}]`;
}
