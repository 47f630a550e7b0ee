import { createCatalogSnapshot } from '../../src/catalog/snapshot';
import {
  compareCandidates,
  passesKeywordGate,
  relaxedQueries,
  scoreItem,
  searchByCode,
  searchCatalog,
} from '../../src/matching/searchCatalog';
import { parseTypoTable } from '../../src/matching/normalizeQuery';
import type { CatalogItem } from '../../src/catalog/types';
import { catalogItems } from '../fixtures/catalog';

const pool = createCatalogSnapshot(catalogItems).searchable;

const ids = (query: string, limit?: number): string[] =>
  searchCatalog(query, pool, { limit }).map((candidate) => candidate.id);

describe('Catalog Search', () => {
  describe('searchCatalog', () => {
    it('should return the single item whose code equals the query', () => {
      expect(searchCatalog('00375', pool)).toEqual([
        { id: 'i-pomegranate', name: 'Гранат', code: '00375', score: 100 },
      ]);
    });

    it('should find a code inside a longer line', () => {
      expect(ids('Гранат свежий 00375')).toEqual(['i-pomegranate']);
    });

    it('should rank partial code matches by code similarity', () => {
      expect(searchCatalog('375', pool)).toEqual([
        { id: 'i-pomegranate', name: 'Гранат', code: '00375', score: 75 },
      ]);
    });

    it('should give the same result for a known typo and its correction', () => {
      const corrected = searchCatalog('авокадо хасс', pool);

      expect(searchCatalog('авакадо хасс', pool)).toEqual(corrected);
      expect(corrected).toEqual([{ id: 'i-avocado', name: 'Авокадо Хасс', code: '00412', score: 100 }]);
    });

    it('should order equal scores by shorter name first', () => {
      const results = searchCatalog('сыр гауда', pool);

      expect(results.map((candidate) => candidate.id)).toEqual(['i-gouda', 'i-gouda-45']);
      expect(results[0].score).toBe(100);
      expect(results[1].score).toBeGreaterThanOrEqual(95);
    });

    it('should respect the limit', () => {
      expect(ids('сыр гауда', 1)).toEqual(['i-gouda']);
    });

    it('should be deterministic', () => {
      expect(searchCatalog('масло подсолнечное для фритюра', pool)).toEqual(
        searchCatalog('масло подсолнечное для фритюра', pool)
      );
    });

    it('should retry with the longest word when the full line fails the keyword gate', () => {
      expect(ids('xyz гранатовый')).toEqual(['i-pomegranate']);
    });

    it('should return nothing for a query without significant words', () => {
      expect(searchCatalog('и', pool)).toEqual([]);
    });

    it('should never return excluded items', () => {
      expect(searchCatalog('борщ', pool)).toEqual([]);
      expect(searchCatalog('ролл калифорния', pool)).toEqual([]);
    });

    it('should apply the minimum score to fuzzy results only', () => {
      expect(searchCatalog('сыр гауда', pool, { minScore: 101 })).toEqual([]);
      expect(searchCatalog('00375', pool, { minScore: 101 })).toHaveLength(1);
    });

    it('should use a custom typo table', () => {
      const typos = parseTypoTable({ version: 1, entries: { гранад: 'гранат' } });

      expect(searchCatalog('Гранад', pool, { typos })).toEqual([
        { id: 'i-pomegranate', name: 'Гранат', code: '00375', score: 100 },
      ]);
    });

    it('should return nothing for a blank query or empty pool', () => {
      expect(searchCatalog('   ', pool)).toEqual([]);
      expect(searchCatalog('гранат', [])).toEqual([]);
    });
  });

  describe('searchByCode', () => {
    it('should ignore short numeric tokens', () => {
      expect(searchByCode('молоко 32', pool)).toEqual([]);
    });

    it('should ignore spaces inside a numeric query', () => {
      expect(searchByCode('003 75', pool).map((candidate) => candidate.id)).toEqual(['i-pomegranate']);
    });
  });

  describe('passesKeywordGate', () => {
    it('should require two matching words for multi-word queries', () => {
      expect(passesKeywordGate(['сыр', 'гауда'], 'Сыр Гауда 45%')).toBe(true);
      expect(passesKeywordGate(['сыр', 'пармезан'], 'Сыр Гауда')).toBe(false);
    });

    it('should match declensions by prefix', () => {
      expect(passesKeywordGate(['гранатовый'], 'Гранат')).toBe(true);
    });

    it('should reject queries without significant words', () => {
      expect(passesKeywordGate([], 'Гранат')).toBe(false);
    });
  });

  describe('scoreItem', () => {
    const pomegranate: CatalogItem = { id: 'i1', name: 'Гранат', code: '00375', type: 'Item' };

    it('should score an exact code as 100', () => {
      expect(scoreItem('00375', pomegranate)).toBe(100);
    });

    it('should score a boundary match at least 95', () => {
      expect(scoreItem('нори', { id: 'i2', name: 'Нори листы' })).toBeGreaterThanOrEqual(95);
    });

    it('should prune unrelated items', () => {
      expect(scoreItem('xyz', pomegranate)).toBeNull();
    });
  });

  describe('relaxedQueries', () => {
    it('should list first words, longest word and phrase substitutions in order', () => {
      expect(relaxedQueries('масло подсолнечное для фритюра')).toEqual([
        'масло подсолнечное',
        'подсолнечное',
        'масло фритюра',
      ]);
    });

    it('should skip relaxations that add nothing', () => {
      expect(relaxedQueries('ай')).toEqual([]);
      expect(relaxedQueries('сыр')).toEqual([]);
    });
  });

  describe('compareCandidates', () => {
    it('should sort by score, then by name length', () => {
      const sorted = [
        { id: 'a', name: 'Сыр Гауда 45%', code: '', score: 90 },
        { id: 'b', name: 'Сыр', code: '', score: 80 },
        { id: 'c', name: 'Сыр Гауда', code: '', score: 90 },
      ].sort(compareCandidates);

      expect(sorted.map((candidate) => candidate.id)).toEqual(['c', 'a', 'b']);
    });
  });
});
