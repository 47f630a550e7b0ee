import {
  normalizeUnit,
  parseLocaleNumber,
  parseRowNumber,
  roundMoney,
  stripArticleCode,
} from '../../src/parsing/valueParsers';

describe('Value Parsers', () => {
  describe('normalizeUnit', () => {
    it.each([
      ['Кг', 'kg'],
      ['kg', 'kg'],
      ['килограмм', 'kg'],
      ['Литр', 'liter'],
      ['л.', 'liter'],
      ['L', 'liter'],
      ['шт', 'piece'],
      ['упак', 'piece'],
      ['пл', 'piece'],
    ])('should map "%s" to %s', (raw, expected) => {
      expect(normalizeUnit(raw)).toBe(expected);
    });

    it('should default to piece for missing units', () => {
      expect(normalizeUnit(null)).toBe('piece');
      expect(normalizeUnit(undefined)).toBe('piece');
      expect(normalizeUnit('')).toBe('piece');
    });
  });

  describe('parseLocaleNumber', () => {
    it('should treat comma as decimal point', () => {
      expect(parseLocaleNumber('2,5')).toBe(2.5);
    });

    it('should drop thousands separators', () => {
      expect(parseLocaleNumber('1 234,50')).toBe(1234.5);
      expect(parseLocaleNumber('1 234,5')).toBe(1234.5);
    });

    it('should keep negative values', () => {
      expect(parseLocaleNumber('-1')).toBe(-1);
    });

    it('should pass finite numbers through', () => {
      expect(parseLocaleNumber(12)).toBe(12);
      expect(parseLocaleNumber(Number.NaN)).toBeNull();
    });

    it('should return null for non-numeric text', () => {
      expect(parseLocaleNumber('abc')).toBeNull();
      expect(parseLocaleNumber('')).toBeNull();
      expect(parseLocaleNumber('1,2,3')).toBeNull();
      expect(parseLocaleNumber(null)).toBeNull();
    });
  });

  describe('parseRowNumber', () => {
    it('should accept positive integers', () => {
      expect(parseRowNumber('1')).toBe(1);
      expect(parseRowNumber('3.0')).toBe(3);
    });

    it('should reject zero, fractions and text', () => {
      expect(parseRowNumber('0')).toBeNull();
      expect(parseRowNumber('1,5')).toBeNull();
      expect(parseRowNumber('Итого')).toBeNull();
      expect(parseRowNumber('')).toBeNull();
    });
  });

  describe('stripArticleCode', () => {
    it('should remove a trailing article code', () => {
      expect(stripArticleCode('Мука высший сорт *10013')).toBe('Мука высший сорт');
    });

    it('should collapse newlines', () => {
      expect(stripArticleCode('Сыр\nГауда')).toBe('Сыр Гауда');
      expect(stripArticleCode('Сыр\r\nГауда')).toBe('Сыр Гауда');
    });

    it('should return empty string for missing names', () => {
      expect(stripArticleCode(null)).toBe('');
    });
  });

  describe('roundMoney', () => {
    it('should round to 2 decimals', () => {
      expect(roundMoney(0.1 + 0.2)).toBe(0.3);
      expect(roundMoney(1125 / 2.5)).toBe(450);
      expect(roundMoney(10 / 3)).toBe(3.33);
    });
  });
});
