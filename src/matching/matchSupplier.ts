/**
 * Supplier Matching
 *
 * Maps the seller name read from a document onto a known supplier record.
 */

import type { Supplier } from '../catalog/types';
import { SUPPLIER_MIN_NAME_LENGTH, SUPPLIER_MIN_SCORE } from './constants';
import { supplierNameScore } from './similarity';

/**
 * Returns the best-scoring supplier, or null when no supplier scores above
 * SUPPLIER_MIN_SCORE. On equal scores the earlier supplier is kept.
 *
 * @example
 * matchSupplier('ООО Ромашка', [{ id: 's1', name: 'Ромашка ООО' }])
 * // { id: 's1', name: 'Ромашка ООО' }
 */
export function matchSupplier(
  candidateName: string | null | undefined,
  suppliers: readonly Supplier[]
): Supplier | null {
  if (!candidateName || suppliers.length === 0) {
    return null;
  }

  const query = candidateName.toLowerCase().trim();
  if (query.length < SUPPLIER_MIN_NAME_LENGTH) {
    return null;
  }

  let best: Supplier | null = null;
  let bestScore = SUPPLIER_MIN_SCORE;

  for (const supplier of suppliers) {
    const name = supplier.name.toLowerCase();
    if (!name) continue;

    const score = supplierNameScore(query, name);
    if (score > bestScore) {
      bestScore = score;
      best = { id: supplier.id, name: supplier.name };
    }
  }

  return best;
}

export default matchSupplier;
