/**
 * Attribute keys the compiler declares in every module before the body
 * runs.
 */

/** Keys whose writes append instead of replace */
export const ACCUMULATING_KEYS: readonly string[] = [
  'before_compile',
  'after_compile',
  'on_definition',
  'derive',
  'spec',
  'type',
  'typep',
  'opaque',
  'callback',
  'macrocallback',
  'optional_callbacks',
  'behaviour',
  'on_load',
  'compile',
  'external_resource',
  'dialyzer',
];

/** Keys emitted into the artifact's attribute section */
export const PERSISTED_KEYS: readonly string[] = [
  'vsn',
  'behaviour',
  'on_load',
  'compile',
  'external_resource',
  'dialyzer',
];

/** Keys holding typespec declarations, in emission order */
export const SPEC_KEYS = ['spec', 'callback', 'macrocallback'] as const;
export const TYPE_KEYS = ['type', 'typep', 'opaque'] as const;

export type SpecKey = (typeof SPEC_KEYS)[number];
export type TypeKey = (typeof TYPE_KEYS)[number];

export function isTypeKey(key: string): key is TypeKey {
  return (TYPE_KEYS as readonly string[]).includes(key);
}

export function isCallbackKey(key: string): key is 'callback' | 'macrocallback' {
  return key === 'callback' || key === 'macrocallback';
}
