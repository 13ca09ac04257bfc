import { Inject, Injectable, Logger } from '@nestjs/common';

import { normalizeForSearch, tokenize } from '../../common/utils/arabic-normalize';
import { EMBEDDING_SERVICE } from '../../inference/inference.constants';
import { IEmbeddingService } from '../../inference/interfaces';
import { SEARCH_CONFIDENCE, SEARCH_DEFAULTS } from '../catalog.constants';
import { CatalogItem } from '../catalog.schema';
import { CatalogService } from '../catalog.service';
import { ScoredItem, SearchResult } from '../interfaces';
import { SimilarityIndex } from '../similarity-index';

interface IndexedItem {
  item: CatalogItem;
  name: string;
  fullText: string;
}

/**
 * Catalog Resolver.
 *
 * Three-stage pipeline over the Catalog Index:
 * 1. exact name match (single unambiguous hit only)
 * 2. keyword match on name + description (single hit only)
 * 3. embedding similarity, falling back to the keyword candidates
 */
@Injectable()
export class CatalogResolverService {
  private readonly logger = new Logger(CatalogResolverService.name);

  private indexed: IndexedItem[] | null = null;
  private similarityIndex: Promise<SimilarityIndex> | null = null;

  constructor(
    private readonly catalog: CatalogService,
    @Inject(EMBEDDING_SERVICE) private readonly embeddings: IEmbeddingService,
  ) {}

  async search(query: string, topK: number = SEARCH_DEFAULTS.TOP_K): Promise<SearchResult> {
    const normalized = normalizeForSearch(query);
    if (!normalized) {
      return this.notFound(query);
    }

    const exact = this.exactMatch(normalized);
    if (exact) {
      this.logger.debug(`Exact match for "${query}": ${exact.id}`);
      return this.result('exact', query, [{ item: exact, score: SEARCH_CONFIDENCE.EXACT }]);
    }

    const keywordHits = this.keywordMatches(normalized);
    if (keywordHits.length === 1) {
      this.logger.debug(`Keyword match for "${query}": ${keywordHits[0].id}`);
      return this.result('keyword', query, [
        { item: keywordHits[0], score: SEARCH_CONFIDENCE.KEYWORD },
      ]);
    }

    const similar = await this.similarityMatches(normalized, topK);
    const similarityResult = similar ? this.similarityResult(query, similar) : null;
    if (similarityResult) {
      return similarityResult;
    }

    if (keywordHits.length > 0) {
      return this.result(
        'keyword',
        query,
        keywordHits.slice(0, topK).map((item) => ({ item, score: SEARCH_CONFIDENCE.KEYWORD })),
      );
    }

    return this.notFound(query);
  }

  /**
   * Unique item whose normalized name equals the query, else unique item whose
   * name contains it.
   */
  exactMatch(normalizedQuery: string): CatalogItem | undefined {
    const entries = this.entries();

    const equal = entries.filter((e) => e.name === normalizedQuery);
    if (equal.length === 1) {
      return equal[0].item;
    }
    if (equal.length > 1) {
      return undefined;
    }

    const containing = entries.filter((e) => e.name.includes(normalizedQuery));
    return containing.length === 1 ? containing[0].item : undefined;
  }

  /**
   * Items whose name or description contains any query token, in catalog order.
   */
  keywordMatches(normalizedQuery: string): CatalogItem[] {
    const tokens = tokenize(normalizedQuery).filter(
      (t) => t.length >= SEARCH_DEFAULTS.MIN_KEYWORD_LENGTH,
    );
    if (tokens.length === 0) {
      return [];
    }

    return this.entries()
      .filter((e) => tokens.some((t) => e.fullText.includes(t)))
      .map((e) => e.item);
  }

  // ── Similarity ─────────────────────────────────────────

  /**
   * Returns null when the embedding collaborator is unavailable.
   */
  private async similarityMatches(
    normalizedQuery: string,
    topK: number,
  ): Promise<ScoredItem[] | null> {
    try {
      const index = await this.getIndex();
      const [vector] = await this.embeddings.embed([normalizedQuery]);
      const entries = this.entries();

      return index
        .search(vector, topK, SEARCH_CONFIDENCE.MIN_SCORE)
        .map((hit) => ({ item: entries[hit.position].item, score: hit.score }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Similarity search unavailable, using keyword fallback: ${message}`);
      return null;
    }
  }

  /**
   * Null when nothing reaches the not-found threshold.
   */
  private similarityResult(query: string, hits: ScoredItem[]): SearchResult | null {
    const best = hits[0]?.score ?? 0;
    if (best < SEARCH_CONFIDENCE.NOT_FOUND) {
      return null;
    }

    const candidates = hits.filter((h) => h.score >= SEARCH_CONFIDENCE.NOT_FOUND);
    const runnerUp = candidates[1]?.score ?? 0;
    const clearWinner = best >= SEARCH_CONFIDENCE.HIGH && runnerUp < SEARCH_CONFIDENCE.HIGH;

    return this.result('similarity', query, clearWinner ? [candidates[0]] : candidates);
  }

  /**
   * Builds the index on first use. A failed build is retried on the next search.
   */
  private getIndex(): Promise<SimilarityIndex> {
    if (!this.similarityIndex) {
      this.similarityIndex = this.buildIndex().catch((error: unknown) => {
        this.similarityIndex = null;
        throw error;
      });
    }
    return this.similarityIndex;
  }

  private async buildIndex(): Promise<SimilarityIndex> {
    const entries = this.entries();
    const vectors = await this.embeddings.embed(entries.map((e) => e.fullText));

    const index = new SimilarityIndex(this.embeddings.dimensions);
    index.add(vectors);

    this.logger.log(`Built menu similarity index with ${index.size} items`);
    return index;
  }

  // ── Helpers ────────────────────────────────────────────

  private entries(): IndexedItem[] {
    if (!this.indexed) {
      this.indexed = this.catalog.getAll().map((item) => ({
        item,
        name: normalizeForSearch(item.displayName),
        fullText: normalizeForSearch(`${item.displayName} ${item.category} ${item.description}`),
      }));
    }
    return this.indexed;
  }

  private result(kind: SearchResult['kind'], query: string, items: ScoredItem[]): SearchResult {
    const confidence = items[0]?.score ?? 0;
    return {
      kind,
      query,
      items,
      confidence,
      needsConfirmation:
        items.length > 1 || (kind === 'similarity' && confidence < SEARCH_CONFIDENCE.HIGH),
    };
  }

  private notFound(query: string): SearchResult {
    return { kind: 'not_found', query, items: [], confidence: 0, needsConfirmation: false };
  }
}
