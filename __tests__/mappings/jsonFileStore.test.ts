import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileMappingStore } from '../../src/mappings/jsonFileStore';
import { PersistenceFailureError } from '../../src/utils/errors';

describe('JsonFileMappingStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mappings-'));
    filePath = join(dir, 'nested', 'product_mappings.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return null when the file does not exist', async () => {
    const store = new JsonFileMappingStore(filePath);

    expect(await store.get('Гранат')).toBeNull();
  });

  it('should round-trip a mapping under a whitespace-collapsed key', async () => {
    const store = new JsonFileMappingStore(filePath);

    await store.save({ '  Сыр   гауда 45% ': { id: 'i-gouda-45', name: 'Сыр Гауда 45%', code: '10022' } });

    expect(await store.get('Сыр гауда 45%')).toEqual({ id: 'i-gouda-45', name: 'Сыр Гауда 45%', code: '10022' });
    expect(await store.get('Сыр  гауда   45%')).toEqual({ id: 'i-gouda-45', name: 'Сыр Гауда 45%', code: '10022' });
  });

  it('should write pretty-printed UTF-8 JSON', async () => {
    const store = new JsonFileMappingStore(filePath);

    await store.save({ Гранат: { id: 'i-pomegranate', name: 'Гранат', code: null } });

    expect(await readFile(filePath, 'utf8')).toBe(
      '{\n  "Гранат": {\n    "id": "i-pomegranate",\n    "name": "Гранат",\n    "code": ""\n  }\n}\n'
    );
  });

  it('should merge into existing mappings', async () => {
    const store = new JsonFileMappingStore(filePath);

    await store.save({ Гранат: { id: 'i-pomegranate' } });
    await store.save({ 'Нори листы': { id: 'i-nori' } });
    await store.save({ Гранат: { id: 'i-pomegranate-2' } });

    expect(await store.get('Гранат')).toEqual({ id: 'i-pomegranate-2', name: '', code: '' });
    expect(await store.get('Нори листы')).toEqual({ id: 'i-nori', name: '', code: '' });
  });

  it('should skip entries without an id or key', async () => {
    const store = new JsonFileMappingStore(filePath);

    await store.save({ Гранат: { id: null }, '   ': { id: 'i-nori' } });

    await expect(readFile(filePath, 'utf8')).rejects.toThrow();
  });

  it('should remove a mapping', async () => {
    const store = new JsonFileMappingStore(filePath);
    await store.save({ Гранат: { id: 'i-pomegranate' }, 'Нори листы': { id: 'i-nori' } });

    await store.remove(' Гранат ');

    expect(await store.get('Гранат')).toBeNull();
    expect(await store.get('Нори листы')).not.toBeNull();
  });

  it('should keep every mapping from concurrent saves', async () => {
    const store = new JsonFileMappingStore(filePath);
    const lines = Array.from({ length: 20 }, (_, index) => `Позиция ${index}`);

    await Promise.all(lines.map((line, index) => store.save({ [line]: { id: `i-${index}` } })));

    const stored = JSON.parse(await readFile(filePath, 'utf8'));
    expect(Object.keys(stored).sort()).toEqual([...lines].sort());
    expect(await readdir(join(dir, 'nested'))).toEqual(['product_mappings.json']);
  });

  it('should report a corrupt file as a persistence failure', async () => {
    const store = new JsonFileMappingStore(join(dir, 'corrupt.json'));
    await writeFile(join(dir, 'corrupt.json'), '{"Гранат": ');

    await expect(store.get('Гранат')).rejects.toBeInstanceOf(PersistenceFailureError);
    await expect(store.save({ Гранат: { id: 'i-pomegranate' } })).rejects.toBeInstanceOf(PersistenceFailureError);
  });

  it('should reject a file with the wrong shape', async () => {
    const store = new JsonFileMappingStore(join(dir, 'shape.json'));
    await writeFile(join(dir, 'shape.json'), JSON.stringify({ Гранат: 'i-pomegranate' }));

    await expect(store.get('Гранат')).rejects.toThrow(`Mappings file ${join(dir, 'shape.json')} has an unexpected shape`);
  });

  it('should keep working after a failed write', async () => {
    const corruptPath = join(dir, 'recover.json');
    const store = new JsonFileMappingStore(corruptPath);
    await writeFile(corruptPath, 'not json');

    await expect(store.save({ Гранат: { id: 'i-pomegranate' } })).rejects.toThrow();

    await writeFile(corruptPath, '{}');
    await store.save({ Гранат: { id: 'i-pomegranate' } });

    expect(await store.get('Гранат')).toEqual({ id: 'i-pomegranate', name: '', code: '' });
  });
});
