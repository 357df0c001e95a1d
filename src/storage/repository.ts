/**
 * Repository interfaces for storage backends.
 */

/**
 * Generic read operations.
 */
export interface Repository<T extends { id: string }> {
  /** Get an entity by ID */
  get(id: string): Promise<T | null>;

  /** Get all entities */
  getAll(): Promise<T[]>;
}

/**
 * Extended repository with indexed lookups.
 */
export interface IndexedRepository<T extends { id: string }> extends Repository<T> {
  /** Find one entity by a unique indexed field */
  findByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T | null>;

  /** Find all entities matching an indexed field */
  findAllByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T[]>;

  /** Count entities matching an indexed field */
  countByIndex<K extends keyof T>(field: K, value: T[K]): Promise<number>;
}
