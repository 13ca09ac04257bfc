import { CatalogItem } from '../catalog.schema';

/**
 * Which pipeline stage produced the result.
 */
export type SearchMatchKind = 'exact' | 'keyword' | 'similarity' | 'not_found';

export interface ScoredItem {
  item: CatalogItem;
  score: number;
}

/**
 * Result of `CatalogResolverService.search`.
 */
export interface SearchResult {
  kind: SearchMatchKind;
  query: string;
  items: ScoredItem[];
  /** Best score of the returned items (1.0 exact, 0.8 keyword, similarity score otherwise) */
  confidence: number;
  /** True when the caller must ask the customer which item they meant */
  needsConfirmation: boolean;
}
