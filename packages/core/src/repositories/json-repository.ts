/**
 * Typed collection over a JsonStore. Each read validates every raw record;
 * each write saves the full collection.
 */

import type { JsonStore } from '../storage/json-store.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { formatFieldErrors } from '../errors.js';
import { isOk } from '../types/results.js';
import type { ValidationResult } from '../types/results.js';

export interface RepositoryOptions {
  logger?: Logger;
  /** Clock used for creation timestamps */
  now?: () => Date;
}

export abstract class JsonRepository<T extends { readonly id: number }, R extends object> {
  protected readonly store: JsonStore;
  protected readonly logger: Logger;
  protected readonly now: () => Date;

  /** Lower-case name used in log and error messages */
  protected abstract readonly entityName: string;

  constructor(store: JsonStore, options: RepositoryOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.store.ensure();
  }

  protected abstract validate(raw: unknown): ValidationResult<T>;
  protected abstract serialize(entity: T): R;

  /** All valid entities in file order; invalid records are skipped with a warning */
  getAll(): T[] {
    const items: T[] = [];
    this.store.load().forEach((raw, index) => {
      const result = this.validate(raw);
      if (isOk(result)) {
        items.push(result.value);
      } else {
        this.logger.warn(`Skipping invalid ${this.entityName} at position ${index}: ${formatFieldErrors(result.error)}`);
      }
    });
    return items;
  }

  getById(id: number): T | null {
    return this.getAll().find(item => item.id === id) ?? null;
  }

  /** One more than the highest existing ID, or 1 for an empty collection */
  protected nextId(items: readonly T[]): number {
    return items.reduce((max, item) => Math.max(max, item.id), 0) + 1;
  }

  protected persist(items: readonly T[]): void {
    this.store.save(items.map(item => this.serialize(item)));
  }
}
