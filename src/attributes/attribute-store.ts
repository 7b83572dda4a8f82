/**
 * Attribute Store
 *
 * Per-module ordered key/value store. Every key carries two policy flags:
 * accumulate (writes append) and persist (values reach the artifact).
 * The policy itself lives in the store as two internal control entries,
 * so the store describes its own configuration.
 */

import { createError } from '../error-classes.js';
import { ACCUMULATING_KEYS, PERSISTED_KEYS } from './builtin-keys.js';

// ============================================================
// TYPES
// ============================================================

/** Internal control keys; never visible through iterateUserKeys() */
export const ACCUMULATE_CONTROL_KEY = '$accumulate';
export const PERSIST_CONTROL_KEY = '$persist';

export interface KeyPolicy {
  readonly accumulate: boolean;
  readonly persist: boolean;
}

type StoreEntry =
  | { readonly tag: 'control'; readonly keys: Set<string> }
  | { readonly tag: 'single'; value: unknown }
  | { readonly tag: 'accumulated'; readonly values: unknown[] };

/** Initial policy table applied when the store is created */
export interface AttributeSeed {
  readonly accumulate: readonly string[];
  readonly persist: readonly string[];
}

export const DEFAULT_SEED: AttributeSeed = {
  accumulate: ACCUMULATING_KEYS,
  persist: PERSISTED_KEYS,
};

// ============================================================
// STORE
// ============================================================

export class AttributeStore {
  readonly module: string;
  private readonly entries = new Map<string, StoreEntry>();
  private destroyed = false;

  constructor(module: string, seed: AttributeSeed = DEFAULT_SEED) {
    this.module = module;
    this.entries.set(ACCUMULATE_CONTROL_KEY, {
      tag: 'control',
      keys: new Set(seed.accumulate),
    });
    this.entries.set(PERSIST_CONTROL_KEY, {
      tag: 'control',
      keys: new Set(seed.persist),
    });
  }

  /**
   * Declare the policy of `key`.
   *
   * Persist can be toggled at any time. Switching accumulate on a key
   * that already holds a value is rejected.
   */
  declareKey(key: string, policy: KeyPolicy): void {
    this.assertUserKey(key);

    const existing = this.entries.get(key);
    if (existing && this.hasValue(existing) && this.isAccumulating(key) !== policy.accumulate) {
      throw createError('MODF-A002', { key, accumulate: policy.accumulate });
    }

    toggle(this.controlKeys(ACCUMULATE_CONTROL_KEY), key, policy.accumulate);
    toggle(this.controlKeys(PERSIST_CONTROL_KEY), key, policy.persist);

    if (policy.accumulate && existing?.tag !== 'accumulated') {
      this.entries.set(key, { tag: 'accumulated', values: [] });
    } else if (!policy.accumulate && existing?.tag === 'accumulated') {
      this.entries.delete(key);
    }
  }

  isAccumulating(key: string): boolean {
    return this.controlKeys(ACCUMULATE_CONTROL_KEY).has(key);
  }

  isPersisted(key: string): boolean {
    return this.controlKeys(PERSIST_CONTROL_KEY).has(key);
  }

  /** Append (accumulating keys) or replace (single-value keys) */
  write(key: string, value: unknown): void {
    this.assertUserKey(key);

    if (this.isAccumulating(key)) {
      const entry = this.entries.get(key);
      if (entry?.tag === 'accumulated') {
        entry.values.push(value);
      } else {
        this.entries.set(key, { tag: 'accumulated', values: [value] });
      }
      return;
    }

    this.entries.set(key, { tag: 'single', value });
  }

  /**
   * Read a key. Accumulating keys return their values in write order
   * (empty when nothing was written); single-value keys return the value;
   * unknown keys return undefined.
   */
  read(key: string): unknown {
    this.assertOpen();
    const entry = this.entries.get(key);

    if (this.isAccumulating(key)) {
      return entry?.tag === 'accumulated' ? [...entry.values] : [];
    }
    if (entry?.tag === 'single') return entry.value;
    return undefined;
  }

  /** Values of an accumulating key, in write order */
  readAll(key: string): readonly unknown[] {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (entry?.tag === 'accumulated') return [...entry.values];
    if (entry?.tag === 'single') return [entry.value];
    return [];
  }

  has(key: string): boolean {
    this.assertOpen();
    const entry = this.entries.get(key);
    return entry !== undefined && this.hasValue(entry);
  }

  /** Remove the value(s) of `key`; its policy is kept */
  delete(key: string): void {
    this.assertUserKey(key);
    const entry = this.entries.get(key);
    if (entry?.tag === 'accumulated') {
      entry.values.length = 0;
    } else {
      this.entries.delete(key);
    }
  }

  /**
   * Lazy view of `[key, value]` pairs for user keys, in first-write order.
   * Each iteration starts over; control keys are skipped.
   */
  iterateUserKeys(): Iterable<readonly [string, unknown]> {
    this.assertOpen();
    return { [Symbol.iterator]: () => this.userEntries() };
  }

  /** Snapshot of the policy table */
  policies(): { accumulate: string[]; persist: string[] } {
    return {
      accumulate: [...this.controlKeys(ACCUMULATE_CONTROL_KEY)],
      persist: [...this.controlKeys(PERSIST_CONTROL_KEY)],
    };
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Release all entries; further access fails with MODF-R005 */
  destroy(): void {
    this.entries.clear();
    this.destroyed = true;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private *userEntries(): Generator<readonly [string, unknown]> {
    this.assertOpen();
    for (const [key, entry] of this.entries) {
      if (entry.tag === 'accumulated') {
        yield [key, [...entry.values]];
      } else if (entry.tag === 'single') {
        yield [key, entry.value];
      }
    }
  }

  private controlKeys(controlKey: string): Set<string> {
    this.assertOpen();
    const entry = this.entries.get(controlKey);
    if (entry?.tag !== 'control') {
      throw new TypeError(`Attribute store for ${this.module} lost control entry ${controlKey}`);
    }
    return entry.keys;
  }

  private hasValue(entry: StoreEntry): boolean {
    if (entry.tag === 'accumulated') return entry.values.length > 0;
    return entry.tag === 'single';
  }

  private assertUserKey(key: string): void {
    this.assertOpen();
    if (key.startsWith('$')) {
      throw createError('MODF-A003', { key });
    }
  }

  private assertOpen(): void {
    if (this.destroyed) {
      throw createError('MODF-R005', { module: this.module });
    }
  }
}

function toggle(keys: Set<string>, key: string, on: boolean): void {
  if (on) keys.add(key);
  else keys.delete(key);
}
