import { OrderLedger } from '../order-ledger';

export const STAGES = ['greeting', 'location', 'ordering', 'checkout'] as const;

/**
 * Conversational phase with its own instructions and tool surface.
 */
export type Stage = (typeof STAGES)[number];

export type SessionStatus = 'active' | 'completed' | 'timed-out';

export type FulfilmentMode = 'delivery' | 'pickup';

export interface CustomerFields {
  name?: string;
  phone?: string;
}

/**
 * Delivery location. `addressComplete` implies `locationConfirmed`.
 */
export interface LocationFields {
  district?: string;
  street?: string;
  building?: string;
  notes?: string;
  deliveryFee: number;
  eta?: string;
  /** Set only by a successful coverage check */
  locationConfirmed: boolean;
  /** Set only once street and building are present on a confirmed district */
  addressComplete: boolean;
}

export interface BufferedTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Free-text order hint captured before the ordering stage starts.
 */
export interface PendingItem {
  text: string;
  quantity: number;
}

/**
 * Handoff summary waiting to be injected into the next stage's first input.
 */
export interface PendingHandoff {
  from: Stage | null;
  to: Stage;
  directive: string;
  lastUtterance?: string;
}

/**
 * Single mutable state container for one conversation.
 */
export interface SessionRecord {
  id: string;
  createdAt: Date;
  lastActivityAt: Date;
  status: SessionStatus;

  /** Set by the Stage Router only; null before the first turn */
  activeStage: Stage | null;

  customer: CustomerFields;

  /** Null until the customer states a preference */
  mode: FulfilmentMode | null;

  location: LocationFields;

  /** Insertion-ordered, never shrinks */
  constraints: Set<string>;

  ledger: OrderLedger;

  /** Last N raw turns of the active stage, oldest first */
  buffer: BufferedTurn[];

  pendingItems: PendingItem[];

  /** Stage requested by a transfer tool; the router decides whether to honour it */
  handoffRequest: Stage | null;

  handoff: PendingHandoff | null;

  orderId?: string;
}
