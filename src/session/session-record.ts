import { CatalogLookup } from '../catalog/interfaces';
import { OrderError } from '../common/errors/order-error';
import { AR } from '../common/messages/ar';
import type { DistrictMatch } from '../coverage/coverage.service';

import {
  BufferedTurn,
  FulfilmentMode,
  LocationFields,
  PendingItem,
  SessionRecord,
} from './interfaces';
import { MAX_QUANTITY, MIN_QUANTITY, OrderLedger } from './order-ledger';

/** Raw turns kept for same-stage continuity */
export const BUFFER_CAPACITY = 20;

export interface AddressInput {
  street?: string;
  building?: string;
  notes?: string;
}

/**
 * Fresh active record with an empty ledger.
 */
export function createSessionRecord(
  id: string,
  catalog: CatalogLookup,
  now: Date = new Date(),
): SessionRecord {
  return {
    id,
    createdAt: now,
    lastActivityAt: now,
    status: 'active',
    activeStage: null,
    customer: {},
    mode: null,
    location: emptyLocation(),
    constraints: new Set<string>(),
    ledger: new OrderLedger(catalog),
    buffer: [],
    pendingItems: [],
    handoffRequest: null,
    handoff: null,
  };
}

export function assertActive(session: SessionRecord): void {
  if (session.status !== 'active') {
    throw new OrderError('SessionClosed', AR.ORDER_CLOSED, { status: session.status });
  }
}

/**
 * Appends a raw turn, evicting the oldest once `capacity` is exceeded.
 */
export function appendTurn(
  session: SessionRecord,
  turn: BufferedTurn,
  capacity: number = BUFFER_CAPACITY,
): void {
  session.buffer.push(turn);
  if (session.buffer.length > capacity) {
    session.buffer.splice(0, session.buffer.length - capacity);
  }
}

/**
 * Returns the constraints that were not already recorded.
 */
export function addConstraints(session: SessionRecord, constraints: string[]): string[] {
  const added: string[] = [];
  for (const raw of constraints) {
    const constraint = raw.trim();
    if (constraint && !session.constraints.has(constraint)) {
      session.constraints.add(constraint);
      added.push(constraint);
    }
  }
  return added;
}

// ── Fulfilment ────────────────────────────────────────────

/**
 * Returns false when the mode was already set.
 * Pickup drops the delivery fee and both location flags; the district text is kept
 * so a switch back to delivery only needs a fresh coverage check.
 */
export function setMode(session: SessionRecord, mode: FulfilmentMode): boolean {
  if (session.mode === mode) {
    return false;
  }

  session.mode = mode;
  if (mode === 'pickup') {
    session.location.deliveryFee = 0;
    session.location.locationConfirmed = false;
    session.location.addressComplete = false;
  }
  return true;
}

/**
 * Records a covered district. Street and building are reset when the district changes.
 */
export function confirmDistrict(session: SessionRecord, match: DistrictMatch): void {
  const location = session.location;
  if (location.district !== match.district) {
    delete location.street;
    delete location.building;
    delete location.notes;
    location.addressComplete = false;
  }

  location.district = match.district;
  location.deliveryFee = match.fee;
  location.eta = match.eta;
  location.locationConfirmed = true;
  session.mode = 'delivery';
}

/**
 * Stores the given address parts and returns the labels of the parts still missing.
 */
export function setAddress(session: SessionRecord, input: AddressInput): string[] {
  const location = session.location;
  if (!location.locationConfirmed) {
    throw new OrderError('AddressIncomplete', AR.DISTRICT_REQUIRED, {
      missing: [AR.FIELD_DISTRICT],
    });
  }

  const street = input.street?.trim();
  const building = input.building?.trim();
  const notes = input.notes?.trim();
  if (street) location.street = street;
  if (building) location.building = building;
  if (notes) location.notes = notes;

  const missing = missingAddressFields(location);
  location.addressComplete = missing.length === 0;
  return missing;
}

export function missingAddressFields(location: LocationFields): string[] {
  const missing: string[] = [];
  if (!location.locationConfirmed) missing.push(AR.FIELD_DISTRICT);
  if (!location.street) missing.push(AR.FIELD_STREET);
  if (!location.building) missing.push(AR.FIELD_BUILDING);
  return missing;
}

/**
 * `حي <district>، <street>، مبنى/فيلا <building>، (<notes>)`, or null without a district.
 */
export function fullAddress(location: LocationFields): string | null {
  if (!location.district) {
    return null;
  }

  const parts = [`حي ${location.district}`];
  if (location.street) parts.push(location.street);
  if (location.building) parts.push(`مبنى/فيلا ${location.building}`);
  if (location.notes) parts.push(`(${location.notes})`);
  return parts.join('، ');
}

/** Fee charged on top of the subtotal; zero unless delivering */
export function deliveryFee(session: SessionRecord): number {
  return session.mode === 'delivery' ? session.location.deliveryFee : 0;
}

// ── Customer ─────────────────────────────────────────────

export function normalizePhone(phone: string): string {
  return phone.trim().replace(/[\s\-_]/g, '');
}

/**
 * Empty values and "unknown" stand-ins (غير معروف, غير محدد) are not real answers.
 */
export function isPlaceholder(value: string | undefined): boolean {
  return !value || !value.trim() || value.includes('غير');
}

/** Returns false when the same name was already stored */
export function setCustomerName(session: SessionRecord, name: string): boolean {
  const trimmed = name.trim();
  if (session.customer.name === trimmed) {
    return false;
  }
  session.customer.name = trimmed;
  return true;
}

/** Returns false when the same number was already stored, ignoring separators */
export function setCustomerPhone(session: SessionRecord, phone: string): boolean {
  const existing = session.customer.phone;
  if (existing && normalizePhone(existing) === normalizePhone(phone)) {
    return false;
  }
  session.customer.phone = phone.trim();
  return true;
}

// ── Pending items ────────────────────────────────────────

export function addPendingItem(session: SessionRecord, text: string, quantity: number): PendingItem {
  if (!Number.isInteger(quantity) || quantity < MIN_QUANTITY || quantity > MAX_QUANTITY) {
    throw new OrderError('InvalidQuantity', AR.INVALID_QUANTITY, {
      quantity,
      min: MIN_QUANTITY,
      max: MAX_QUANTITY,
    });
  }

  const item: PendingItem = { text: text.trim(), quantity };
  session.pendingItems.push(item);
  return item;
}

/**
 * Returns the pending items and clears the buffer.
 */
export function takePendingItems(session: SessionRecord): PendingItem[] {
  const items = session.pendingItems;
  session.pendingItems = [];
  return items;
}

// ── Checkout ─────────────────────────────────────────────

/**
 * Throws the first reason the order cannot be confirmed yet.
 */
export function assertReadyForCheckout(session: SessionRecord): void {
  assertActive(session);

  if (session.ledger.isEmpty) {
    throw new OrderError('EmptyOrder', AR.ORDER_EMPTY);
  }

  const missing: string[] = [];
  if (isPlaceholder(session.customer.name)) missing.push(AR.FIELD_NAME);
  if (isPlaceholder(session.customer.phone)) missing.push(AR.FIELD_PHONE);
  if (missing.length > 0) {
    throw new OrderError('CustomerInfoMissing', AR.CUSTOMER_INFO_MISSING(missing), { missing });
  }

  if (session.mode !== 'pickup') {
    const missingAddress = missingAddressFields(session.location);
    if (missingAddress.length > 0 || !session.location.addressComplete) {
      throw new OrderError('AddressIncomplete', AR.ADDRESS_PARTIAL(missingAddress), {
        missing: missingAddress,
        mode: session.mode,
      });
    }
  }
}

/**
 * Freezes the order. Later ledger mutations fail with `SessionClosed`.
 */
export function completeOrder(session: SessionRecord, orderId: string): void {
  session.status = 'completed';
  session.orderId = orderId;
  session.ledger.close();
}

function emptyLocation(): LocationFields {
  return {
    deliveryFee: 0,
    locationConfirmed: false,
    addressComplete: false,
  };
}
