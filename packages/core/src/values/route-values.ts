import { ErrorCode } from '../errors/codes.js';
import { InvalidArgumentError } from '../types/errors.js';

/**
 * Out-of-line route values as callers supply them.
 */
export type RouteValueInput<V = unknown> =
  | Readonly<Record<string, V>>
  | ReadonlyMap<string, V>;

/**
 * Read-only, case-insensitive view over route values keyed by name.
 */
export interface ReadonlyRouteValueDictionary<V = unknown>
  extends Iterable<[string, V]> {
  readonly size: number;
  get(key: string): V | undefined;
  has(key: string): boolean;
  keys(): IterableIterator<string>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<[string, V]>;
  toObject(): Record<string, V>;
}

interface Slot<V> {
  key: string;
  value: V;
}

function foldKey(key: string): string {
  return key.toLowerCase();
}

/**
 * Insertion-ordered dictionary with case-insensitive keys. The casing of the
 * first write wins. Once frozen every write throws.
 */
export class RouteValueDictionary<V = unknown>
  implements ReadonlyRouteValueDictionary<V>
{
  readonly #slots = new Map<string, Slot<V>>();
  #frozen = false;

  get size(): number {
    return this.#slots.size;
  }

  get isFrozen(): boolean {
    return this.#frozen;
  }

  get(key: string): V | undefined {
    return this.#slots.get(foldKey(key))?.value;
  }

  has(key: string): boolean {
    return this.#slots.has(foldKey(key));
  }

  /**
   * Insert or overwrite. Overwriting keeps the key casing already stored.
   */
  set(key: string, value: V): this {
    this.#assertWritable();
    const folded = foldKey(key);
    const existing = this.#slots.get(folded);
    if (existing) {
      existing.value = value;
    } else {
      this.#slots.set(folded, { key, value });
    }
    return this;
  }

  /**
   * Insert a key that must not exist yet under any casing.
   */
  add(key: string, value: V): this {
    const existing = this.#slots.get(foldKey(key));
    if (existing) {
      throw new InvalidArgumentError({
        message: `An item with the key '${key}' has already been added (existing key '${existing.key}'). Route value keys are case-insensitive.`,
        errorCode: ErrorCode.DUPLICATE_KEY,
        context: { key, value },
      });
    }
    return this.set(key, value);
  }

  freeze(): this {
    this.#frozen = true;
    return this;
  }

  *keys(): IterableIterator<string> {
    for (const slot of this.#slots.values()) yield slot.key;
  }

  *values(): IterableIterator<V> {
    for (const slot of this.#slots.values()) yield slot.value;
  }

  *entries(): IterableIterator<[string, V]> {
    for (const slot of this.#slots.values()) yield [slot.key, slot.value];
  }

  [Symbol.iterator](): IterableIterator<[string, V]> {
    return this.entries();
  }

  toObject(): Record<string, V> {
    const out: Record<string, V> = {};
    for (const slot of this.#slots.values()) {
      out[slot.key] = slot.value;
    }
    return out;
  }

  #assertWritable(): void {
    if (this.#frozen) {
      throw new TypeError('Cannot modify a frozen RouteValueDictionary');
    }
  }
}

const EMPTY_ROUTE_VALUES = new RouteValueDictionary<never>().freeze();

/**
 * Shared frozen empty dictionary; patterns without values all point at it.
 */
export function emptyRouteValues<V>(): ReadonlyRouteValueDictionary<V> {
  return EMPTY_ROUTE_VALUES;
}

/**
 * Copy caller-supplied values into a fresh dictionary. The input is never
 * retained. Keys that collide case-insensitively are rejected.
 */
export function fromRouteValues<V>(
  input: RouteValueInput<V>,
  argument = 'values'
): RouteValueDictionary<V> {
  if (typeof input !== 'object' || input === null) {
    throw new InvalidArgumentError({
      message: `Route values for '${argument}' must be a plain object or a Map.`,
      context: { argument, value: input },
    });
  }

  const dictionary = new RouteValueDictionary<V>();
  const entries: Iterable<[string, V]> = isReadonlyMap(input)
    ? input.entries()
    : Object.entries(input);
  for (const [key, value] of entries) {
    dictionary.add(key, value);
  }
  return dictionary;
}

function isReadonlyMap<V>(
  input: RouteValueInput<V>
): input is ReadonlyMap<string, V> {
  return input instanceof Map;
}

/**
 * Equality used to decide whether two route values are interchangeable.
 */
export interface RouteValueComparer {
  equals(left: unknown, right: unknown): boolean;
}

export function toRouteValueString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Default comparer: values compare by their string form, case-insensitively.
 * `null`, `undefined` and `''` are all the same "no value".
 */
export const RouteValueEqualityComparer: RouteValueComparer = {
  equals(left: unknown, right: unknown): boolean {
    const a = toRouteValueString(left);
    const b = toRouteValueString(right);
    if (a.length === 0 || b.length === 0) {
      return a.length === 0 && b.length === 0;
    }
    return a.toLowerCase() === b.toLowerCase();
  },
};
