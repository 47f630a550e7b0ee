/**
 * Learned-mapping types.
 *
 * A learned mapping remembers which catalog item a user confirmed for a line
 * of invoice text, so the next invoice with the same line skips the search.
 */

export interface LearnedMapping {
  id: string;
  name: string;
  code: string;
}

/** What callers hand to `save`; entries without an id are skipped */
export interface MappingInput {
  id?: string | null;
  name?: string | null;
  code?: string | null;
}

export interface LearnedMappingStore {
  /** Short name for logs and health output */
  readonly kind: string;
  get(lineText: string): Promise<LearnedMapping | null>;
  remove(lineText: string): Promise<void>;
  /** Merges into the stored mappings; never replaces the whole set */
  save(mappings: Readonly<Record<string, MappingInput>>): Promise<void>;
}
