import type { TypeDef } from "./types.js";

/**
 * Read-only, name-indexed view of the named types of a SchemaModel.
 * It has no `set`, `delete` or `clear`, and the backing map is private.
 */
export class TypeRegistry implements ReadonlyMap<string, TypeDef> {
  readonly #types: Map<string, TypeDef>;

  constructor(types: Iterable<readonly [string, TypeDef]>) {
    this.#types = new Map(types);
    Object.freeze(this);
  }

  get size(): number {
    return this.#types.size;
  }

  get(name: string): TypeDef | undefined {
    return this.#types.get(name);
  }

  has(name: string): boolean {
    return this.#types.has(name);
  }

  forEach(
    callback: (def: TypeDef, name: string, registry: ReadonlyMap<string, TypeDef>) => void,
    thisArg?: unknown
  ): void {
    for (const [name, def] of this.#types) {
      callback.call(thisArg, def, name, this);
    }
  }

  keys() {
    return this.#types.keys();
  }

  values() {
    return this.#types.values();
  }

  entries() {
    return this.#types.entries();
  }

  [Symbol.iterator]() {
    return this.#types[Symbol.iterator]();
  }
}
