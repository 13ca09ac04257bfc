import { CatalogItem } from '../catalog/catalog.schema';
import { CatalogLookup } from '../catalog/interfaces';
import { OrderError } from '../common/errors/order-error';

import { SessionRecord } from './interfaces';
import {
  addConstraints,
  addPendingItem,
  appendTurn,
  assertReadyForCheckout,
  completeOrder,
  confirmDistrict,
  createSessionRecord,
  deliveryFee,
  fullAddress,
  setAddress,
  setCustomerName,
  setCustomerPhone,
  setMode,
  takePendingItems,
} from './session-record';

const kabsa: CatalogItem = {
  id: 'kabsa-meat',
  displayName: 'كبسة لحم',
  price: 55,
  category: 'أطباق رئيسية',
  description: '',
  available: true,
};

const catalog: CatalogLookup = {
  getById: (id) => (id === kabsa.id ? kabsa : undefined),
};

const narjis = { district: 'النرجس', fee: 15, eta: '30-40 دقيقة' };

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

/** `addressComplete ⇒ locationConfirmed` */
function expectLocationInvariant(session: SessionRecord): void {
  expect(!session.location.addressComplete || session.location.locationConfirmed).toBe(true);
}

describe('session record', () => {
  let session: SessionRecord;

  beforeEach(() => {
    session = createSessionRecord('s-1', catalog, new Date('2026-01-01T10:00:00Z'));
  });

  describe('createSessionRecord', () => {
    it('should start active with no stage and an empty ledger', () => {
      expect(session.status).toBe('active');
      expect(session.activeStage).toBeNull();
      expect(session.mode).toBeNull();
      expect(session.ledger.isEmpty).toBe(true);
      expect(session.location).toEqual({
        deliveryFee: 0,
        locationConfirmed: false,
        addressComplete: false,
      });
      expect(session.lastActivityAt).toEqual(session.createdAt);
    });
  });

  describe('appendTurn', () => {
    it('should evict the oldest turns beyond capacity', () => {
      for (let i = 1; i <= 5; i++) {
        appendTurn(session, { role: 'user', content: `m${i}` }, 3);
      }

      expect(session.buffer.map((t) => t.content)).toEqual(['m3', 'm4', 'm5']);
    });
  });

  describe('addConstraints', () => {
    it('should keep insertion order and report only new constraints', () => {
      expect(addConstraints(session, ['حساسية من الفول السوداني', 'نباتي'])).toEqual([
        'حساسية من الفول السوداني',
        'نباتي',
      ]);
      expect(addConstraints(session, ['نباتي', ' ', 'بدون بصل'])).toEqual(['بدون بصل']);
      expect([...session.constraints]).toEqual([
        'حساسية من الفول السوداني',
        'نباتي',
        'بدون بصل',
      ]);
    });
  });

  describe('location', () => {
    it('should confirm a district and switch to delivery', () => {
      confirmDistrict(session, narjis);

      expect(session.mode).toBe('delivery');
      expect(session.location).toMatchObject({
        district: 'النرجس',
        deliveryFee: 15,
        eta: '30-40 دقيقة',
        locationConfirmed: true,
        addressComplete: false,
      });
    });

    it('should refuse an address before the district is confirmed', () => {
      const error = expectOrderError(
        () => setAddress(session, { street: 'شارع الأمير', building: '12' }),
        'AddressIncomplete',
      );

      expect(error.details.missing).toEqual(['الحي']);
      expect(session.location.street).toBeUndefined();
      expectLocationInvariant(session);
    });

    it('should complete the address only once street and building are present', () => {
      confirmDistrict(session, narjis);

      expect(setAddress(session, { street: ' شارع الأمير ' })).toEqual(['رقم المبنى']);
      expect(session.location.addressComplete).toBe(false);

      expect(setAddress(session, { building: '12', notes: 'بجانب المسجد' })).toEqual([]);
      expect(session.location.addressComplete).toBe(true);
      expect(fullAddress(session.location)).toBe(
        'حي النرجس، شارع الأمير، مبنى/فيلا 12، (بجانب المسجد)',
      );
      expectLocationInvariant(session);
    });

    it('should reset the street and building when the district changes', () => {
      confirmDistrict(session, narjis);
      setAddress(session, { street: 'شارع الأمير', building: '12' });

      confirmDistrict(session, { district: 'العليا', fee: 10, eta: '25-35 دقيقة' });

      expect(session.location.street).toBeUndefined();
      expect(session.location.addressComplete).toBe(false);
      expect(session.location.deliveryFee).toBe(10);
    });
  });

  describe('setMode', () => {
    it('should be idempotent', () => {
      expect(setMode(session, 'pickup')).toBe(true);
      expect(setMode(session, 'pickup')).toBe(false);
    });

    it('should clear fee and flags on pickup but keep the district and ledger', () => {
      confirmDistrict(session, narjis);
      setAddress(session, { street: 'شارع الأمير', building: '12' });
      session.ledger.add('kabsa-meat', 1);

      setMode(session, 'pickup');

      expect(session.location).toMatchObject({
        district: 'النرجس',
        deliveryFee: 0,
        locationConfirmed: false,
        addressComplete: false,
      });
      expect(deliveryFee(session)).toBe(0);
      expect(session.ledger.itemCount).toBe(1);
      expectLocationInvariant(session);
    });

    it('should require a fresh district check after switching back to delivery', () => {
      confirmDistrict(session, narjis);
      setMode(session, 'pickup');
      setMode(session, 'delivery');

      expect(session.location.locationConfirmed).toBe(false);
      expectOrderError(() => setAddress(session, { street: 'x', building: '1' }), 'AddressIncomplete');
    });
  });

  describe('customer', () => {
    it('should report an unchanged name', () => {
      expect(setCustomerName(session, ' أحمد ')).toBe(true);
      expect(setCustomerName(session, 'أحمد')).toBe(false);
      expect(session.customer.name).toBe('أحمد');
    });

    it('should compare phones without separators', () => {
      expect(setCustomerPhone(session, '055 123-4567')).toBe(true);
      expect(setCustomerPhone(session, '0551234567')).toBe(false);
      expect(setCustomerPhone(session, '0559999999')).toBe(true);
      expect(session.customer.phone).toBe('0559999999');
    });
  });

  describe('pending items', () => {
    it('should collect and then clear pending items', () => {
      addPendingItem(session, ' برجر ', 2);

      expect(takePendingItems(session)).toEqual([{ text: 'برجر', quantity: 2 }]);
      expect(session.pendingItems).toEqual([]);
    });

    it('should validate the quantity', () => {
      expectOrderError(() => addPendingItem(session, 'برجر', 0), 'InvalidQuantity');
    });
  });

  describe('checkout', () => {
    beforeEach(() => {
      setCustomerName(session, 'أحمد');
      setCustomerPhone(session, '0551234567');
    });

    it('should fail with EmptyOrder on an empty ledger and stay active', () => {
      expectOrderError(() => assertReadyForCheckout(session), 'EmptyOrder');
      expect(session.status).toBe('active');
    });

    it('should require a real name and phone', () => {
      session.ledger.add('kabsa-meat', 1);
      setMode(session, 'pickup');
      session.customer.name = 'غير معروف';
      delete session.customer.phone;

      const error = expectOrderError(() => assertReadyForCheckout(session), 'CustomerInfoMissing');
      expect(error.details.missing).toEqual(['الاسم', 'رقم الجوال']);
    });

    it('should require a complete address for delivery', () => {
      session.ledger.add('kabsa-meat', 1);
      confirmDistrict(session, narjis);

      const error = expectOrderError(() => assertReadyForCheckout(session), 'AddressIncomplete');
      expect(error.details.missing).toEqual(['اسم الشارع', 'رقم المبنى']);
    });

    it('should close the ledger once completed', () => {
      session.ledger.add('kabsa-meat', 1);
      setMode(session, 'pickup');
      assertReadyForCheckout(session);

      completeOrder(session, 'ORD-20260101-AB12');

      expect(session.status).toBe('completed');
      expect(session.orderId).toBe('ORD-20260101-AB12');
      expectOrderError(() => session.ledger.add('kabsa-meat', 1), 'SessionClosed');
      expectOrderError(() => assertReadyForCheckout(session), 'SessionClosed');
    });
  });
});
