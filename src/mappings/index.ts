/**
 * Learned-Mapping Store
 *
 * Remembers confirmed line text -> catalog item pairs.
 *
 * MAPPING_STORE selects the backend:
 * - file (default): JSON file at MAPPINGS_FILE
 * - redis: hash in the shared Redis instance
 * - memory: process-local, lost on restart
 */

import type { EnvConfig } from '../config';
import { JsonFileMappingStore } from './jsonFileStore';
import { InMemoryMappingStore } from './memoryStore';
import { RedisMappingStore } from './redisStore';
import type { LearnedMappingStore } from './types';

export function createMappingStore(config: EnvConfig): LearnedMappingStore {
  switch (config.MAPPING_STORE) {
    case 'redis':
      return new RedisMappingStore();
    case 'memory':
      return new InMemoryMappingStore();
    case 'file':
      return new JsonFileMappingStore(config.MAPPINGS_FILE);
  }
}

export { JsonFileMappingStore } from './jsonFileStore';
export { RedisMappingStore, MAPPINGS_HASH_KEY } from './redisStore';
export { InMemoryMappingStore } from './memoryStore';
export { normalizeMappingKey, toMappingRecords } from './normalizeKey';
export type { LearnedMapping, LearnedMappingStore, MappingInput } from './types';
