import type { ProviderAdapter } from './adapter.js';
import { unknownModel, unknownProvider } from './errors.js';
import * as log from '../utils/logger.js';

export interface AdapterEntry {
  id: string;
  adapter: ProviderAdapter;
  /** Models accepted for this provider; empty means any model name is passed through. */
  models: readonly string[];
}

/**
 * Provider id → adapter lookup. Built once at startup and frozen; it is shared
 * by every turn and never changes afterwards, so it needs no locking.
 */
export class AdapterRegistry {
  private readonly entries: ReadonlyMap<string, Readonly<AdapterEntry>>;

  constructor(entries: AdapterEntry[]) {
    const map = new Map<string, Readonly<AdapterEntry>>();
    for (const entry of entries) {
      if (map.has(entry.id)) {
        log.warn(`Provider "${entry.id}" registered twice, keeping the last definition`);
      }
      map.set(entry.id, Object.freeze({ ...entry, models: Object.freeze([...entry.models]) }));
      log.debug(`Provider registered: "${entry.id}" (capabilities=${[...entry.adapter.capabilities].join(',')}, models=${entry.models.join(',') || '*'})`);
    }
    this.entries = map;
    Object.freeze(this);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): Readonly<AdapterEntry> | undefined {
    return this.entries.get(id);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  list(): Array<Readonly<AdapterEntry>> {
    return [...this.entries.values()];
  }

  /** Adapter for `provider`, or a configuration LLMError for an unknown provider/model. */
  resolve(provider: string, model: string): ProviderAdapter {
    const entry = this.entries.get(provider);
    if (!entry) throw unknownProvider(provider, this.ids());
    if (entry.models.length > 0 && !entry.models.includes(model)) {
      throw unknownModel(provider, model);
    }
    return entry.adapter;
  }
}
