import { EventEmitter } from 'events';
import { FastifyBaseLogger } from 'fastify';
import { SortedIndex } from './sorted-index.js';
import { IndexEntry, IndexKey, IndexStats, KeyType } from '../types/ordered-index.js';
import { IndexExistsError, IndexNotFoundError, InvalidKeyError } from '../utils/error-utils.js';
import { validateKey } from '../utils/keys.js';

/**
 * Event interface for everything the registry emits
 */
export interface IndexRegistryEvents {
  indexCreated: (stats: IndexStats) => void;               // A new empty index was created
  indexDropped: (name: string) => void;                    // An index and all its entries were dropped
  entryInserted: (index: string, entry: IndexEntry) => void;
  entryRemoved: (index: string, key: IndexKey) => void;
}

const INDEX_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

/**
 * Holds the named ordered indexes served by the API
 *
 * Every mutation goes through the registry so listeners see one event per
 * change. Single-threaded: callers on the event loop never interleave inside
 * an operation.
 */
export class IndexRegistry extends EventEmitter {
  private readonly indexes: Map<string, SortedIndex>;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(logger?: FastifyBaseLogger) {
    super();
    this.logger = logger;
    this.indexes = new Map();
  }

  override on<K extends keyof IndexRegistryEvents>(
    event: K,
    listener: IndexRegistryEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof IndexRegistryEvents>(
    event: K,
    ...args: Parameters<IndexRegistryEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * @throws IndexExistsError when the name is taken
   * @throws InvalidKeyError when the name is not a valid identifier
   */
  createIndex(name: string, keyType: KeyType): SortedIndex {
    if (!INDEX_NAME_PATTERN.test(name)) {
      throw new InvalidKeyError(`Index name "${name}" must be 1-64 letters, digits, '.', '_' or '-'`);
    }
    if (this.indexes.has(name)) {
      throw new IndexExistsError(name);
    }

    const index = new SortedIndex(name, keyType);
    this.indexes.set(name, index);
    this.logger?.info(`Created ${keyType} index ${name}`);
    this.emit('indexCreated', index.stats());
    return index;
  }

  dropIndex(name: string): void {
    const index = this.getIndex(name);
    this.indexes.delete(name);
    this.logger?.info(`Dropped index ${name} with ${index.getSize()} entries`);
    this.emit('indexDropped', name);
  }

  /**
   * @throws IndexNotFoundError when no index has that name
   */
  getIndex(name: string): SortedIndex {
    const index = this.indexes.get(name);
    if (!index) {
      throw new IndexNotFoundError(name);
    }
    return index;
  }

  hasIndex(name: string): boolean {
    return this.indexes.has(name);
  }

  listIndexes(): IndexStats[] {
    return Array.from(this.indexes.values(), index => index.stats());
  }

  /**
   * Inserts an entry after checking the key matches the index key type
   * @returns false if the key was already present
   */
  putEntry(name: string, key: unknown, value: unknown): boolean {
    const index = this.getIndex(name);
    const checkedKey = validateKey(key, index.getKeyType());

    if (!index.put(checkedKey, value)) {
      this.logger?.debug(`Rejected duplicate key ${String(checkedKey)} in index ${name}`);
      return false;
    }
    this.emit('entryInserted', name, { key: checkedKey, value });
    return true;
  }

  /**
   * @returns false if the key was not present
   */
  removeEntry(name: string, key: IndexKey): boolean {
    const index = this.getIndex(name);
    if (!index.remove(key)) {
      return false;
    }
    this.emit('entryRemoved', name, key);
    return true;
  }

  /**
   * Drops every index
   */
  clear(): void {
    for (const name of Array.from(this.indexes.keys())) {
      this.dropIndex(name);
    }
  }
}
