/**
 * Metadata Assembler
 *
 * Reads the attribute store and definitions table of a module once its
 * body and before-compile hooks are done, and produces every section the
 * artifact builder encodes.
 */

import type { AttributeStore } from '../attributes/attribute-store.js';
import {
  compareNameArity,
  type Definition,
  type DefinitionsTable,
  type NameArity,
} from '../definitions/definitions-table.js';
import type { Diagnostic } from '../diagnostics/diagnostic.js';
import type { SourceLocation } from '../source-location.js';
import { attributeSections, type AttributeSection } from './attributes.js';
import { unusedDocWarnings } from './docs.js';
import { assertNoInternalOverride, exportSections, infoSpec } from './exports.js';
import { EMPTY_TYPESPECS, typespecSections, type TypespecSections } from './typespecs.js';

export interface AssembleInput {
  readonly module: string;
  readonly location: SourceLocation;
  readonly attributes: AttributeStore;
  readonly definitions: DefinitionsTable;
}

export interface AssembleOptions {
  readonly docs: boolean;
  /** Skip specs and types */
  readonly internal: boolean;
}

export interface ModuleSections {
  readonly module: string;
  readonly location: SourceLocation;
  readonly exports: readonly NameArity[];
  readonly functions: readonly NameArity[];
  readonly macros: readonly NameArity[];
  readonly definitions: readonly Definition[];
  readonly typespecs: TypespecSections;
  readonly attributes: readonly AttributeSection[];
  /** Raw values of the `compile` attribute, in write order */
  readonly compileOptions: readonly unknown[];
  readonly warnings: readonly Diagnostic[];
}

export function assemble(input: AssembleInput, options: AssembleOptions): ModuleSections {
  const { attributes, definitions, location } = input;

  const warnings = options.docs ? unusedDocWarnings(attributes, location) : [];

  assertNoInternalOverride(definitions);
  const unwrapped = definitions.unwrap();
  const exported = exportSections(unwrapped);

  let typespecs = EMPTY_TYPESPECS;
  if (!options.internal) {
    const translated = typespecSections(attributes, unwrapped, location);
    typespecs = {
      ...translated,
      specs: [...translated.specs, infoSpec(location.line)].sort(compareNameArity),
    };
  }

  return {
    module: input.module,
    location,
    ...exported,
    definitions: unwrapped.functions,
    typespecs,
    attributes: attributeSections(attributes, location),
    compileOptions: attributes.readAll('compile'),
    warnings,
  };
}

export { EXTERNAL_RESOURCE_KEY, externalResources, type AttributeSection } from './attributes.js';
export * from './docs.js';
export * from './exports.js';
export * from './typespecs.js';
