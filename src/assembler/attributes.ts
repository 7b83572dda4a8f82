/**
 * Persisted attribute sections.
 */

import { inspect } from 'node:util';
import type { AttributeStore } from '../attributes/attribute-store.js';
import { InvalidExternalResourceError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';

export interface AttributeSection {
  readonly key: string;
  readonly value: unknown;
}

export const EXTERNAL_RESOURCE_KEY = 'external_resource';

/**
 * Sorted, de-duplicated external resources.
 * @throws InvalidExternalResourceError on a non-string value
 */
export function externalResources(
  attributes: AttributeStore,
  location: SourceLocation
): string[] {
  const resources = new Set<string>();
  for (const value of attributes.readAll(EXTERNAL_RESOURCE_KEY)) {
    if (typeof value !== 'string') {
      throw new InvalidExternalResourceError(value, inspect(value), location);
    }
    resources.add(value);
  }
  return [...resources].sort();
}

/**
 * One section per persisted value. Keys appear in first-write order and
 * the values of an accumulating key in write order.
 */
export function attributeSections(
  attributes: AttributeStore,
  location: SourceLocation
): AttributeSection[] {
  const sections: AttributeSection[] = [];

  for (const [key, value] of attributes.iterateUserKeys()) {
    if (!attributes.isPersisted(key)) continue;

    if (key === EXTERNAL_RESOURCE_KEY) {
      for (const resource of externalResources(attributes, location)) {
        sections.push({ key, value: resource });
      }
    } else if (attributes.isAccumulating(key) && Array.isArray(value)) {
      for (const item of value) sections.push({ key, value: item });
    } else {
      sections.push({ key, value });
    }
  }

  return sections;
}
