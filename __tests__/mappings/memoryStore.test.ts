import { createMappingStore, InMemoryMappingStore, JsonFileMappingStore, RedisMappingStore } from '../../src/mappings';
import { normalizeMappingKey, toMappingRecords } from '../../src/mappings/normalizeKey';
import { loadEnv } from '../../src/config';

describe('InMemoryMappingStore', () => {
  it('should save, read and remove mappings', async () => {
    const store = new InMemoryMappingStore();

    await store.save({ 'Нори  листы': { id: 'i-nori', name: 'Нори листы' } });

    expect(store.size).toBe(1);
    expect(await store.get(' Нори листы')).toEqual({ id: 'i-nori', name: 'Нори листы', code: '' });

    await store.remove('Нори листы');

    expect(store.size).toBe(0);
    expect(await store.get('Нори листы')).toBeNull();
  });

  it('should hand out copies', async () => {
    const store = new InMemoryMappingStore();
    await store.save({ Гранат: { id: 'i-pomegranate' } });

    const first = await store.get('Гранат');
    if (first) first.id = 'changed';

    expect(await store.get('Гранат')).toEqual({ id: 'i-pomegranate', name: '', code: '' });
  });
});

describe('Mapping keys', () => {
  it('should trim and collapse whitespace', () => {
    expect(normalizeMappingKey('  Сыр \t гауда\n45% ')).toBe('Сыр гауда 45%');
    expect(normalizeMappingKey(null)).toBe('');
  });

  it('should drop entries without a key or id', () => {
    expect(
      toMappingRecords({
        ' a  b ': { id: '1' },
        '   ': { id: '2' },
        c: { id: null },
      })
    ).toEqual([['a b', { id: '1', name: '', code: '' }]]);
  });
});

describe('createMappingStore', () => {
  it.each([
    ['memory', InMemoryMappingStore],
    ['file', JsonFileMappingStore],
    ['redis', RedisMappingStore],
  ] as const)('should create the %s store', (kind, expected) => {
    const store = createMappingStore(loadEnv({ MAPPING_STORE: kind }));

    expect(store).toBeInstanceOf(expected);
    expect(store.kind).toBe(kind);
  });
});
