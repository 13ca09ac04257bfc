import { CatalogItem } from '../catalog/catalog.schema';
import { CatalogLookup } from '../catalog/interfaces';
import { OrderError } from '../common/errors/order-error';
import { AR } from '../common/messages/ar';
import { normalizeArabic, tokenize } from '../common/utils/arabic-normalize';

export const MIN_QUANTITY = 1;
export const MAX_QUANTITY = 10;

export interface LedgerLine {
  catalogId: string;
  displayName: string;
  quantity: number;
  unitPrice: number;
  size?: string;
  notes?: string;
}

export interface LineChanges {
  quantity?: number;
  size?: string;
  notes?: string;
}

/**
 * 1-based position, or a name (fuzzy-matched against current lines).
 * Numeric strings are treated as positions.
 */
export type LineSelector = number | string;

const MIN_WORD_MATCH_LENGTH = 3;

export function lineTotal(line: LedgerLine): number {
  return line.quantity * line.unitPrice;
}

/**
 * Mutable cart of selected catalog items.
 * Every operation validates before mutating; a failed call leaves the ledger unchanged.
 */
export class OrderLedger {
  private lines: LedgerLine[] = [];
  private closed = false;

  constructor(private readonly catalog: CatalogLookup) {}

  get items(): readonly Readonly<LedgerLine>[] {
    return this.lines.map((line) => ({ ...line }));
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /** Sum of quantities across lines */
  get itemCount(): number {
    return this.lines.reduce((sum, line) => sum + line.quantity, 0);
  }

  add(catalogId: string, quantity: number, size?: string, notes?: string): LedgerLine {
    this.assertOpen();
    this.assertQuantity(quantity);

    const item = this.catalog.getById(catalogId);
    if (!item) {
      throw new OrderError('ItemNotFound', AR.ITEM_NOT_FOUND, { itemId: catalogId });
    }
    if (!item.available) {
      throw new OrderError('ItemUnavailable', AR.ITEM_UNAVAILABLE(item.displayName), {
        itemId: catalogId,
      });
    }

    const unitPrice = this.priceFor(item, size);
    const line: LedgerLine = {
      catalogId: item.id,
      displayName: item.displayName,
      quantity,
      unitPrice,
      ...(size ? { size } : {}),
      ...(notes?.trim() ? { notes: notes.trim() } : {}),
    };

    this.lines.push(line);
    return { ...line };
  }

  modify(selector: LineSelector, changes: LineChanges): LedgerLine {
    this.assertOpen();
    const index = this.resolve(selector);
    const current = this.lines[index];

    if (changes.quantity !== undefined) {
      this.assertQuantity(changes.quantity);
    }

    let unitPrice = current.unitPrice;
    if (changes.size !== undefined) {
      const item = this.catalog.getById(current.catalogId);
      if (!item) {
        throw new OrderError('ItemNotFound', AR.ITEM_NOT_FOUND, { itemId: current.catalogId });
      }
      unitPrice = this.priceFor(item, changes.size);
    }

    const updated: LedgerLine = {
      ...current,
      quantity: changes.quantity ?? current.quantity,
      unitPrice,
      ...(changes.size !== undefined ? { size: changes.size } : {}),
      ...(changes.notes !== undefined ? { notes: changes.notes.trim() } : {}),
    };

    this.lines[index] = updated;
    return { ...updated };
  }

  remove(selector: LineSelector): LedgerLine {
    this.assertOpen();
    const index = this.resolve(selector);
    const [removed] = this.lines.splice(index, 1);
    return removed;
  }

  /**
   * Subtotal, always recomputed from the current lines.
   */
  total(): number {
    return this.lines.reduce((sum, line) => sum + lineTotal(line), 0);
  }

  /**
   * Freezes the ledger after checkout; later mutations fail with `SessionClosed`.
   */
  close(): void {
    this.closed = true;
  }

  /**
   * Index of the line a selector points at.
   * Out-of-range positions, unknown names and ambiguous names are `ItemNotFound`.
   */
  resolve(selector: LineSelector): number {
    const position = typeof selector === 'number' ? selector : this.asPosition(selector);
    if (position !== null) {
      if (!Number.isInteger(position) || position < 1 || position > this.lines.length) {
        throw this.notInOrder(String(selector));
      }
      return position - 1;
    }

    const query = normalizeArabic(String(selector));
    if (!query) {
      throw this.notInOrder(String(selector));
    }

    const names = this.lines.map((line) => normalizeArabic(line.displayName));

    const equal = this.indexesWhere(names, (name) => name === query);
    if (equal.length === 1) {
      return equal[0];
    }

    const contained = this.indexesWhere(
      names,
      (name) => name.includes(query) || query.includes(name),
    );
    if (contained.length === 1) {
      return contained[0];
    }
    if (contained.length > 1) {
      throw this.notInOrder(String(selector), true);
    }

    const queryWords = tokenize(query).filter((w) => w.length >= MIN_WORD_MATCH_LENGTH);
    const partial = this.indexesWhere(names, (name) =>
      tokenize(name).some((word) =>
        queryWords.some(
          (q) => word.length >= MIN_WORD_MATCH_LENGTH && (word.includes(q) || q.includes(word)),
        ),
      ),
    );
    if (partial.length === 1) {
      return partial[0];
    }

    throw this.notInOrder(String(selector), partial.length > 1);
  }

  // ── Helpers ────────────────────────────────────────────

  private priceFor(item: CatalogItem, size: string | undefined): number {
    if (!size) {
      return item.price;
    }

    const options = item.sizePrices ? Object.keys(item.sizePrices) : [];
    const sizePrice = item.sizePrices?.[size];
    if (sizePrice === undefined) {
      throw new OrderError('InvalidSize', AR.INVALID_SIZE(size, options), {
        itemId: item.id,
        size,
        options,
      });
    }
    return sizePrice;
  }

  private asPosition(selector: string): number | null {
    const trimmed = selector.trim();
    return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
  }

  private indexesWhere(names: string[], predicate: (name: string) => boolean): number[] {
    return names.flatMap((name, index) => (predicate(name) ? [index] : []));
  }

  private assertQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_QUANTITY) {
      throw new OrderError('InvalidQuantity', AR.INVALID_QUANTITY, {
        quantity,
        min: MIN_QUANTITY,
        max: MAX_QUANTITY,
      });
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new OrderError('SessionClosed', AR.ORDER_CLOSED);
    }
  }

  private notInOrder(selector: string, ambiguous = false): OrderError {
    return new OrderError('ItemNotFound', AR.ITEM_NOT_IN_ORDER(selector), {
      selector,
      ambiguous,
      lines: this.lines.map((line, i) => `${i + 1}. ${line.displayName}`),
    });
  }
}
