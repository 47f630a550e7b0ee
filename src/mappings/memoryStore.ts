import { normalizeMappingKey, toMappingRecords } from './normalizeKey';
import type { LearnedMapping, LearnedMappingStore, MappingInput } from './types';

/**
 * Process-local store for tests and ephemeral runs.
 */
export class InMemoryMappingStore implements LearnedMappingStore {
  readonly kind = 'memory';

  private readonly mappings = new Map<string, LearnedMapping>();

  async get(lineText: string): Promise<LearnedMapping | null> {
    const record = this.mappings.get(normalizeMappingKey(lineText));
    return record ? { ...record } : null;
  }

  async remove(lineText: string): Promise<void> {
    this.mappings.delete(normalizeMappingKey(lineText));
  }

  async save(mappings: Readonly<Record<string, MappingInput>>): Promise<void> {
    for (const [key, record] of toMappingRecords(mappings)) {
      this.mappings.set(key, record);
    }
  }

  get size(): number {
    return this.mappings.size;
  }
}

export default InMemoryMappingStore;
