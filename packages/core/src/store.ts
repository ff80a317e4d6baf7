/**
 * Property store: the ordered, immutable record collection both indexes derive from
 *
 * Invariants:
 * - A property's id equals its insertion position, so ids are exactly [0, size)
 * - Records and the store itself are frozen once constructed
 */

import { validateProperty } from "./validation.js";
import type { Property, PropertyInput } from "./types.js";

export class PropertyStore implements Iterable<Property> {
  readonly #records: readonly Property[];

  private constructor(records: readonly Property[]) {
    this.#records = records;
    Object.freeze(this);
  }

  /**
   * Validate inputs and assign ids by position
   */
  static from(inputs: readonly PropertyInput[]): PropertyStore {
    const records = inputs.map((input, position) => {
      validateProperty(input, position);
      return Object.freeze({ ...input, id: position });
    });
    return new PropertyStore(Object.freeze(records));
  }

  get size(): number {
    return this.#records.length;
  }

  get isEmpty(): boolean {
    return this.#records.length === 0;
  }

  /**
   * Record for an id, or undefined when out of range
   */
  get(id: number): Property | undefined {
    return Number.isInteger(id) ? this.#records[id] : undefined;
  }

  /**
   * Records for a list of ids, in the given order. Unknown ids are skipped.
   */
  hydrate(ids: readonly number[], limit?: number): Property[] {
    const out: Property[] = [];
    const max = limit ?? ids.length;
    for (const id of ids) {
      if (out.length >= max) break;
      const record = this.get(id);
      if (record) out.push(record);
    }
    return out;
  }

  /**
   * Every id, ascending: [0, size)
   */
  allIds(): number[] {
    return Array.from({ length: this.#records.length }, (_, id) => id);
  }

  all(): readonly Property[] {
    return this.#records;
  }

  [Symbol.iterator](): Iterator<Property> {
    return this.#records[Symbol.iterator]();
  }
}
