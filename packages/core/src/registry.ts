/**
 * Generic Registry<K, V>
 *
 * A small keyed store that rejects duplicate keys. Registries are
 * filled once while a parser is being assembled and then frozen into a
 * `ReadonlyMap` that is passed down explicitly. Nothing here is global.
 */

import { InvariantError } from "./safety.js";

export interface RegistryOptions {
  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs.
 *
 * @example
 * ```typescript
 * const fences = createGenericRegistry<string, number>({ name: "fences" });
 * fences.set("@:@", 3);
 * const frozen = fences.freeze(); // ReadonlyMap<string, number>
 * ```
 */
export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  /** Register a new entry */
  set(key: K, value: V): void;

  /** Get an entry by key */
  get(key: K): V | undefined;

  /** Check if a key exists */
  has(key: K): boolean;

  /** Number of entries */
  readonly size: number;

  /** Snapshot the entries into an immutable map */
  freeze(): ReadonlyMap<K, V>;

  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private readonly store = new Map<K, V>();
  private readonly name: string;

  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? "Registry";
  }

  set(key: K, value: V): void {
    if (this.store.has(key)) {
      throw new InvariantError(`${this.name}: entry for key '${String(key)}' already exists`);
    }
    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  get size(): number {
    return this.store.size;
  }

  freeze(): ReadonlyMap<K, V> {
    return new Map(this.store);
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

/**
 * Create a new generic registry instance.
 */
export function createGenericRegistry<K, V>(options?: RegistryOptions): GenericRegistry<K, V> {
  return new GenericRegistryImpl(options);
}
