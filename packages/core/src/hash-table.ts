/**
 * Open-addressing hash table
 *
 * Collision policy: linear probing; deletes leave a tombstone that later inserts reuse.
 * Hash function: 32-bit FNV-1a over a canonical, type-prefixed key encoding.
 * Resize policy: when live entries plus tombstones would exceed capacity × loadFactor,
 * rehash into a table of double capacity (or the same capacity when most slots are tombstones).
 *
 * Invariants:
 * - At least one empty slot always exists, so probing terminates
 * - Keys that encode identically are the same key (1 and "1" and true are distinct)
 * - `get` on an absent key returns undefined and never throws
 */

/**
 * Keys accepted by the table: primitives, or readonly arrays of keys for composite values
 */
export type HashKey = string | number | boolean | bigint | null | readonly HashKey[];

export interface HashTableOptions {
  /** Initial slot count (default: 16) */
  initialCapacity?: number;
  /** Fill ratio that triggers a rehash, exclusive range (0, 1) (default: 0.75) */
  loadFactor?: number;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a over UTF-16 code units
 */
export function fnv1a(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Canonical encoding of a key. Each value is namespaced by its type so that
 * values with the same textual form never collide.
 */
export function encodeKey(key: HashKey): string {
  if (key === null) {
    return "z:";
  }

  if (Array.isArray(key)) {
    return `a:${JSON.stringify(key.map((part) => encodeKey(part)))}`;
  }

  switch (typeof key) {
    case "string":
      return `s:${key}`;
    case "number":
      // -0 and 0 are the same key
      return `n:${Object.is(key, -0) ? 0 : key}`;
    case "boolean":
      return `b:${key}`;
    case "bigint":
      return `i:${key}`;
    default:
      throw new TypeError(`Unsupported hash key type: ${typeof key}`);
  }
}

interface Slot<K, V> {
  key: K;
  encoded: string;
  hash: number;
  value: V;
}

const TOMBSTONE = Symbol("tombstone");

type Cell<K, V> = Slot<K, V> | typeof TOMBSTONE | undefined;

export class HashTable<K extends HashKey, V> implements Iterable<[K, V]> {
  #cells: Cell<K, V>[];
  #size = 0;
  #tombstones = 0;
  readonly #loadFactor: number;

  constructor(options: HashTableOptions = {}) {
    const capacity = options.initialCapacity ?? 16;
    const loadFactor = options.loadFactor ?? 0.75;

    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`initialCapacity must be a positive integer, got ${capacity}`);
    }
    if (!(loadFactor > 0 && loadFactor < 1)) {
      throw new RangeError(`loadFactor must be between 0 and 1 (exclusive), got ${loadFactor}`);
    }

    this.#cells = new Array<Cell<K, V>>(capacity).fill(undefined);
    this.#loadFactor = loadFactor;
  }

  get size(): number {
    return this.#size;
  }

  get capacity(): number {
    return this.#cells.length;
  }

  /**
   * Locate the slot for an encoded key.
   * Returns the matching index when found, otherwise the first reusable index.
   */
  #probe(encoded: string, hash: number): { index: number; found: boolean } {
    const cells = this.#cells;
    const capacity = cells.length;
    let index = hash % capacity;
    let firstTombstone = -1;

    for (let step = 0; step < capacity; step++) {
      const cell = cells[index];
      if (cell === undefined) {
        return { index: firstTombstone >= 0 ? firstTombstone : index, found: false };
      }
      if (cell === TOMBSTONE) {
        if (firstTombstone < 0) firstTombstone = index;
      } else if (cell.hash === hash && cell.encoded === encoded) {
        return { index, found: true };
      }
      index = (index + 1) % capacity;
    }

    return { index: firstTombstone, found: false };
  }

  #rehash(): void {
    const old = this.#cells;
    // Grow only when live entries need the room; otherwise just clear tombstones
    const grow = (this.#size + 1) / old.length >= this.#loadFactor / 2;
    const capacity = grow ? old.length * 2 : old.length;

    this.#cells = new Array<Cell<K, V>>(capacity).fill(undefined);
    this.#tombstones = 0;

    for (const cell of old) {
      if (cell === undefined || cell === TOMBSTONE) continue;
      let index = cell.hash % capacity;
      while (this.#cells[index] !== undefined) {
        index = (index + 1) % capacity;
      }
      this.#cells[index] = cell;
    }
  }

  /**
   * Insert or replace the value for a key
   */
  put(key: K, value: V): void {
    if (this.#size + this.#tombstones + 1 > this.#cells.length * this.#loadFactor) {
      this.#rehash();
    }

    const encoded = encodeKey(key);
    const hash = fnv1a(encoded);
    const { index, found } = this.#probe(encoded, hash);
    const cell = this.#cells[index];

    if (found && cell !== undefined && cell !== TOMBSTONE) {
      cell.value = value;
      return;
    }

    if (cell === TOMBSTONE) {
      this.#tombstones--;
    }
    this.#cells[index] = { key, encoded, hash, value };
    this.#size++;
  }

  /**
   * Value for a key, or undefined when absent
   */
  get(key: K): V | undefined {
    const slot = this.#find(key);
    return slot?.value;
  }

  contains(key: K): boolean {
    return this.#find(key) !== undefined;
  }

  /**
   * Value for a key, inserting `factory()` first when absent
   */
  getOrCreate(key: K, factory: () => V): V {
    const slot = this.#find(key);
    if (slot) {
      return slot.value;
    }
    const value = factory();
    this.put(key, value);
    return value;
  }

  /**
   * Remove a key. Returns false when it was absent.
   */
  delete(key: K): boolean {
    const encoded = encodeKey(key);
    const { index, found } = this.#probe(encoded, fnv1a(encoded));
    if (!found) {
      return false;
    }
    this.#cells[index] = TOMBSTONE;
    this.#size--;
    this.#tombstones++;
    return true;
  }

  #find(key: K): Slot<K, V> | undefined {
    const encoded = encodeKey(key);
    const { index, found } = this.#probe(encoded, fnv1a(encoded));
    if (!found) {
      return undefined;
    }
    const cell = this.#cells[index];
    return cell === undefined || cell === TOMBSTONE ? undefined : cell;
  }

  *entries(): IterableIterator<[K, V]> {
    for (const cell of this.#cells) {
      if (cell !== undefined && cell !== TOMBSTONE) {
        yield [cell.key, cell.value];
      }
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}

/**
 * Unordered, duplicate-free set backed by HashTable
 */
export class HashSet<K extends HashKey> implements Iterable<K> {
  #table: HashTable<K, true>;

  constructor(options: HashTableOptions = {}) {
    this.#table = new HashTable<K, true>(options);
  }

  static from<K extends HashKey>(items: Iterable<K>, options?: HashTableOptions): HashSet<K> {
    const set = new HashSet<K>(options);
    for (const item of items) {
      set.add(item);
    }
    return set;
  }

  get size(): number {
    return this.#table.size;
  }

  add(key: K): void {
    this.#table.put(key, true);
  }

  has(key: K): boolean {
    return this.#table.contains(key);
  }

  delete(key: K): boolean {
    return this.#table.delete(key);
  }

  values(): IterableIterator<K> {
    return this.#table.keys();
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.#table.keys();
  }
}
