/**
 * Compiler Options
 */

export interface CompilerOptions {
  /** Collect documentation and inject the Docs chunk */
  readonly docs: boolean;
  /** Skip the redefinition warning for modules already loaded */
  readonly ignoreModuleConflict: boolean;
  /** Leave specs and types out of the artifact */
  readonly internal: boolean;
  /** Directory source file paths are made relative to */
  readonly relativeTo: string;
}

export function createDefaultOptions(): CompilerOptions {
  return {
    docs: true,
    ignoreModuleConflict: false,
    internal: false,
    relativeTo: process.cwd(),
  };
}

/** Overlay partial options on the defaults; undefined fields keep the default */
export function resolveOptions(
  ...layers: (Partial<CompilerOptions> | null | undefined)[]
): CompilerOptions {
  let resolved = createDefaultOptions();
  for (const layer of layers) {
    if (!layer) continue;
    resolved = {
      docs: layer.docs ?? resolved.docs,
      ignoreModuleConflict: layer.ignoreModuleConflict ?? resolved.ignoreModuleConflict,
      internal: layer.internal ?? resolved.internal,
      relativeTo: layer.relativeTo ?? resolved.relativeTo,
    };
  }
  return resolved;
}
