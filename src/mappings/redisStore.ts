/**
 * Redis Mapping Store
 *
 * One Redis hash holds every mapping: field = normalized line text,
 * value = JSON `{ id, name, code }`. Lookups go through the graceful
 * degradation helpers, so an unreachable Redis reads as a cache miss.
 * Saves report failure so the caller can tell the user nothing was stored.
 */

import { safeRedisOperation, safeRedisWrite } from '../redis/client';
import { componentLogger } from '../utils';
import { PersistenceFailureError } from '../utils/errors';
import { normalizeMappingKey, toMappingRecords } from './normalizeKey';
import { learnedMappingSchema } from './schema';
import type { LearnedMapping, LearnedMappingStore, MappingInput } from './types';

const logger = componentLogger('mappings');

export const MAPPINGS_HASH_KEY = 'mappings:learned';

function parseRecord(key: string, raw: string): LearnedMapping | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logger.warn(`Ignoring malformed mapping for "${key}"`);
    return null;
  }

  const result = learnedMappingSchema.safeParse(json);
  if (!result.success) {
    logger.warn(`Ignoring malformed mapping for "${key}"`);
    return null;
  }

  return result.data;
}

export class RedisMappingStore implements LearnedMappingStore {
  readonly kind = 'redis';

  constructor(private readonly hashKey: string = MAPPINGS_HASH_KEY) {}

  async get(lineText: string): Promise<LearnedMapping | null> {
    const key = normalizeMappingKey(lineText);
    if (!key) {
      return null;
    }

    const raw = await safeRedisOperation(
      (client) => client.hget(this.hashKey, key),
      null,
      'Mapping lookup'
    );

    return raw === null ? null : parseRecord(key, raw);
  }

  async remove(lineText: string): Promise<void> {
    const key = normalizeMappingKey(lineText);
    if (!key) {
      return;
    }

    await safeRedisWrite((client) => client.hdel(this.hashKey, key), 'Mapping removal');
  }

  async save(mappings: Readonly<Record<string, MappingInput>>): Promise<void> {
    const records = toMappingRecords(mappings);
    if (records.length === 0) {
      return;
    }

    const fields: Record<string, string> = {};
    for (const [key, record] of records) {
      fields[key] = JSON.stringify(record);
    }

    const stored = await safeRedisOperation(
      async (client) => {
        await client.hset(this.hashKey, fields);
        return true;
      },
      false,
      'Mapping save'
    );

    if (!stored) {
      throw new PersistenceFailureError('Redis is unavailable; mappings were not saved');
    }
  }
}

export default RedisMappingStore;
