/**
 * Value Parsers for Invoice Tables
 *
 * Invoice cells come straight from PDF text runs or spreadsheet values, so
 * numbers use locale formatting ("1 234,50") and units are free text
 * ("кг", "Литр", "шт."). These helpers turn them into canonical values.
 */

import type { Unit } from './types';

const KG_TOKENS = ['кг', 'kg', 'килограмм', 'kilogram'];

/** Long enough to be matched as substrings without false positives */
const LITER_WORDS = ['литр', 'liter', 'litre'];

/** Single-letter abbreviations only count as standalone tokens */
const LITER_ABBREVIATIONS = new Set(['л', 'l']);

const splitTokens = (value: string): string[] =>
  value.split(/[^\p{L}\p{N}]+/u).filter(Boolean);

/**
 * Maps a free-text unit of measure to kg, liter or piece.
 *
 * @example
 * normalizeUnit('Кг') // 'kg'
 * normalizeUnit('л.') // 'liter'
 * normalizeUnit('шт') // 'piece'
 */
export function normalizeUnit(raw: string | null | undefined): Unit {
  if (!raw) {
    return 'piece';
  }

  const lower = raw.toLowerCase();

  if (KG_TOKENS.some((token) => lower.includes(token))) {
    return 'kg';
  }

  if (LITER_WORDS.some((word) => lower.includes(word))) {
    return 'liter';
  }

  if (splitTokens(lower).some((token) => LITER_ABBREVIATIONS.has(token))) {
    return 'liter';
  }

  return 'piece';
}

const PLAIN_DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parses a locale-formatted decimal.
 * Whitespace (including non-breaking spaces) is a thousands separator and a
 * comma is the decimal point.
 *
 * @returns The number, or null when the text is not a plain decimal
 *
 * @example
 * parseLocaleNumber('1 234,50') // 1234.5
 * parseLocaleNumber('2,5') // 2.5
 * parseLocaleNumber('abc') // null
 */
export function parseLocaleNumber(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  const cleaned = raw.replace(/\s/g, '').replace(',', '.');

  if (!PLAIN_DECIMAL.test(cleaned)) {
    return null;
  }

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Reads the ordinal from a row-number cell ("1", "12", "3.0").
 * Footers like "Итого" or blank cells yield null.
 */
export function parseRowNumber(raw: string | null | undefined): number | null {
  const value = parseLocaleNumber(raw);

  if (value === null || !Number.isInteger(value) || value <= 0) {
    return null;
  }

  return value;
}

/**
 * Collapses newlines and removes a trailing supplier article code
 * ("Мука высший сорт *10013" → "Мука высший сорт").
 */
export function stripArticleCode(raw: string | null | undefined): string {
  if (!raw) {
    return '';
  }

  return raw
    .trim()
    .replace(/\r?\n/g, ' ')
    .replace(/\s*\*[\p{L}\p{N}_]+\s*$/u, '')
    .trim();
}

/**
 * Rounds to 2 decimal places to avoid floating point noise in prices.
 */
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}
