import { config } from '../config/env';
import { withConflictRetry } from '../lib/retry';
import type { DataStore, Repositories } from '../repositories/types';

export interface ServiceSettings {
  defaultTaxRate: number;
  defaultDueDays: number;
  maxRetries: number;
}

export function settingsFromConfig(): ServiceSettings {
  return {
    defaultTaxRate: config.DEFAULT_TAX_RATE,
    defaultDueDays: config.DEFAULT_DUE_DAYS,
    maxRetries: config.CONCURRENCY_MAX_RETRIES,
  };
}

export class BaseService {
  protected readonly store: DataStore;
  protected readonly settings: ServiceSettings;

  constructor(store: DataStore, settings: ServiceSettings) {
    this.store = store;
    this.settings = settings;
  }

  /** Read-only work in one transaction. */
  protected read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return this.store.transaction(fn);
  }

  /**
   * Read-compute-write cycle in one transaction, re-run from scratch when a
   * versioned update loses a race.
   */
  protected mutate<T>(operation: string, fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return withConflictRetry(operation, this.settings.maxRetries, () => this.store.transaction(fn));
  }
}
