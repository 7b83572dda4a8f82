/**
 * Term Codec
 *
 * JSON-based encoding for chunk payloads. Values JSON cannot hold
 * natively (bigint, undefined, non-finite numbers) are tagged so they
 * survive a round trip. Plain objects carrying the tag key are escaped as
 * an entry list. Only plain objects and arrays are accepted as containers.
 */

const TAG = '$term';

type Tagged =
  | { readonly [TAG]: 'bigint'; readonly value: string }
  | { readonly [TAG]: 'undefined' }
  | { readonly [TAG]: 'number'; readonly value: string }
  | { readonly [TAG]: 'object'; readonly entries: readonly (readonly [string, unknown])[] };

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeType(value: object): string {
  const prototype: unknown = Object.getPrototypeOf(value);
  const ctor: unknown =
    typeof prototype === 'object' && prototype !== null ? Reflect.get(prototype, 'constructor') : undefined;
  return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
}

function tag(value: unknown): unknown {
  if (typeof value === 'bigint') {
    const tagged: Tagged = { [TAG]: 'bigint', value: value.toString() };
    return tagged;
  }
  if (value === undefined) {
    const tagged: Tagged = { [TAG]: 'undefined' };
    return tagged;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    const tagged: Tagged = { [TAG]: 'number', value: String(value) };
    return tagged;
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    throw new TypeError(`cannot encode a ${typeof value} in an artifact`);
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    if (!isPlainObject(value)) {
      throw new TypeError(`cannot encode a ${describeType(value)} in an artifact`);
    }
    if (TAG in value) {
      const tagged: Tagged = { [TAG]: 'object', entries: Object.entries(value) };
      return tagged;
    }
  }
  return value;
}

function untag(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !(TAG in value)) {
    return value;
  }
  const kind: unknown = Reflect.get(value, TAG);
  const payload: unknown = Reflect.get(value, 'value');
  switch (kind) {
    case 'bigint':
      return typeof payload === 'string' ? BigInt(payload) : value;
    case 'undefined':
      return undefined;
    case 'number':
      return typeof payload === 'string' ? Number(payload) : value;
    case 'object': {
      const entries: unknown = Reflect.get(value, 'entries');
      return Array.isArray(entries) ? Object.fromEntries(entries.filter(isEntry)) : value;
    }
    default:
      return value;
  }
}

/**
 * Encode a value as UTF-8 JSON bytes.
 * @throws TypeError for functions, symbols, non-plain objects (Map, Set,
 *   class instances without toJSON) and cyclic structures
 */
export function encodeTerm(value: unknown): Buffer {
  const text = JSON.stringify(value, (_key, current: unknown) => tag(current));
  return Buffer.from(text ?? 'null', 'utf-8');
}

export function decodeTerm(data: Uint8Array): unknown {
  const text = Buffer.from(data).toString('utf-8');
  const parsed: unknown = JSON.parse(text, (_key, current: unknown) => untag(current));
  return parsed;
}

function isEntry(value: unknown): value is [string, unknown] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string';
}
