import type { LearnedMapping, MappingInput } from './types';

/**
 * Trims and collapses internal whitespace, so "Сыр   гауда " and "Сыр гауда"
 * share a mapping.
 */
export function normalizeMappingKey(lineText: string | null | undefined): string {
  return (lineText ?? '').trim().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Normalizes keys and drops entries without a key or an id.
 */
export function toMappingRecords(
  mappings: Readonly<Record<string, MappingInput>>
): Array<[string, LearnedMapping]> {
  const records: Array<[string, LearnedMapping]> = [];

  for (const [lineText, input] of Object.entries(mappings)) {
    const key = normalizeMappingKey(lineText);
    if (!key || !input.id) continue;

    records.push([key, { id: input.id, name: input.name ?? '', code: input.code ?? '' }]);
  }

  return records;
}
