import { CatalogItem } from '../catalog/catalog.schema';
import { CatalogLookup } from '../catalog/interfaces';
import { OrderError } from '../common/errors/order-error';

import { OrderLedger } from './order-ledger';

const menu: CatalogItem[] = [
  {
    id: 'burger-beef',
    displayName: 'برجر لحم',
    price: 28,
    category: 'برجر',
    description: '',
    available: true,
    sizePrices: { عادي: 28, دبل: 38 },
  },
  {
    id: 'burger-chicken',
    displayName: 'برجر دجاج',
    price: 24,
    category: 'برجر',
    description: '',
    available: true,
  },
  {
    id: 'kabsa-meat',
    displayName: 'كبسة لحم',
    price: 55,
    category: 'أطباق رئيسية',
    description: '',
    available: true,
  },
  {
    id: 'burger-veggie',
    displayName: 'برجر نباتي',
    price: 26,
    category: 'برجر',
    description: '',
    available: false,
  },
];

const catalog: CatalogLookup = {
  getById: (id) => menu.find((item) => item.id === id),
};

function expectOrderError(fn: () => unknown, kind: OrderError['kind']): OrderError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(OrderError);
  expect(caught).toMatchObject({ kind });
  if (!(caught instanceof OrderError)) {
    throw new Error('expected OrderError');
  }
  return caught;
}

describe('OrderLedger', () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger(catalog);
  });

  describe('add', () => {
    it('should add a line at base price', () => {
      const line = ledger.add('kabsa-meat', 2);

      expect(line).toEqual({
        catalogId: 'kabsa-meat',
        displayName: 'كبسة لحم',
        quantity: 2,
        unitPrice: 55,
      });
      expect(ledger.total()).toBe(110);
      expect(ledger.itemCount).toBe(2);
    });

    it('should use the size price when a size is given', () => {
      const line = ledger.add('burger-beef', 1, 'دبل', ' بدون بصل ');

      expect(line.unitPrice).toBe(38);
      expect(line.size).toBe('دبل');
      expect(line.notes).toBe('بدون بصل');
    });

    it('should reject quantities outside 1..10', () => {
      expectOrderError(() => ledger.add('kabsa-meat', 0), 'InvalidQuantity');
      expectOrderError(() => ledger.add('kabsa-meat', 11), 'InvalidQuantity');
      expectOrderError(() => ledger.add('kabsa-meat', 1.5), 'InvalidQuantity');
      expect(ledger.isEmpty).toBe(true);
    });

    it('should reject unknown and unavailable items', () => {
      expectOrderError(() => ledger.add('missing', 1), 'ItemNotFound');
      expectOrderError(() => ledger.add('burger-veggie', 1), 'ItemUnavailable');
      expect(ledger.isEmpty).toBe(true);
    });

    it('should reject a size the item does not offer', () => {
      const error = expectOrderError(() => ledger.add('burger-beef', 1, 'كبير'), 'InvalidSize');

      expect(error.details).toEqual({ itemId: 'burger-beef', size: 'كبير', options: ['عادي', 'دبل'] });
      expectOrderError(() => ledger.add('kabsa-meat', 1, 'كبير'), 'InvalidSize');
      expect(ledger.isEmpty).toBe(true);
    });
  });

  describe('selectors', () => {
    beforeEach(() => {
      ledger.add('burger-beef', 1);
      ledger.add('burger-chicken', 2);
      ledger.add('kabsa-meat', 1);
    });

    it('should resolve 1-based positions, including numeric strings', () => {
      expect(ledger.resolve(1)).toBe(0);
      expect(ledger.resolve('3')).toBe(2);
    });

    it('should reject out-of-range positions', () => {
      expectOrderError(() => ledger.resolve(0), 'ItemNotFound');
      expectOrderError(() => ledger.resolve(4), 'ItemNotFound');
    });

    it('should resolve an exact or contained name', () => {
      expect(ledger.resolve('برجر دجاج')).toBe(1);
      expect(ledger.resolve('كبسه')).toBe(2);
    });

    it('should resolve a single word-level match', () => {
      expect(ledger.resolve('الدجاج المقرمش')).toBe(1);
    });

    it('should reject an ambiguous name', () => {
      const error = expectOrderError(() => ledger.resolve('برجر'), 'ItemNotFound');
      expect(error.details.ambiguous).toBe(true);
    });

    it('should reject a name that is not in the order', () => {
      const error = expectOrderError(() => ledger.resolve('بيتزا'), 'ItemNotFound');
      expect(error.details.lines).toEqual(['1. برجر لحم', '2. برجر دجاج', '3. كبسة لحم']);
    });
  });

  describe('modify', () => {
    beforeEach(() => {
      ledger.add('burger-beef', 1);
    });

    it('should change quantity, size and notes', () => {
      const line = ledger.modify(1, { quantity: 3, size: 'دبل', notes: 'صوص زيادة' });

      expect(line).toEqual({
        catalogId: 'burger-beef',
        displayName: 'برجر لحم',
        quantity: 3,
        unitPrice: 38,
        size: 'دبل',
        notes: 'صوص زيادة',
      });
      expect(ledger.total()).toBe(114);
    });

    it('should leave the line untouched when any change is invalid', () => {
      expectOrderError(() => ledger.modify(1, { quantity: 3, size: 'ضخم' }), 'InvalidSize');
      expectOrderError(() => ledger.modify(1, { quantity: 12 }), 'InvalidQuantity');

      expect(ledger.items[0]).toEqual({
        catalogId: 'burger-beef',
        displayName: 'برجر لحم',
        quantity: 1,
        unitPrice: 28,
      });
    });
  });

  describe('remove', () => {
    it('should restore the prior total after add then remove', () => {
      ledger.add('burger-beef', 2);
      ledger.add('kabsa-meat', 1);
      const before = ledger.total();

      ledger.add('burger-chicken', 3);
      ledger.remove(3);

      expect(ledger.total()).toBe(before);
      expect(ledger.items.map((l) => l.catalogId)).toEqual(['burger-beef', 'kabsa-meat']);
    });

    it('should return the removed line', () => {
      ledger.add('kabsa-meat', 1);
      expect(ledger.remove('كبسة لحم').catalogId).toBe('kabsa-meat');
      expect(ledger.isEmpty).toBe(true);
    });
  });

  describe('total', () => {
    it('should equal the sum of quantity × unit price', () => {
      ledger.add('burger-beef', 2, 'دبل');
      ledger.add('burger-chicken', 1);
      ledger.modify(2, { quantity: 4 });

      const expected = ledger.items.reduce((sum, l) => sum + l.quantity * l.unitPrice, 0);
      expect(ledger.total()).toBe(expected);
      expect(ledger.total()).toBe(2 * 38 + 4 * 24);
    });
  });

  describe('close', () => {
    it('should reject every mutation once closed', () => {
      ledger.add('kabsa-meat', 1);
      ledger.close();

      expectOrderError(() => ledger.add('kabsa-meat', 1), 'SessionClosed');
      expectOrderError(() => ledger.modify(1, { quantity: 2 }), 'SessionClosed');
      expectOrderError(() => ledger.remove(1), 'SessionClosed');
      expect(ledger.total()).toBe(55);
      expect(ledger.items).toHaveLength(1);
    });
  });
});
