import { FulfilmentMode, SessionRecord, SessionStatus, Stage } from '../session/interfaces';

/**
 * Where the next turn goes. `closed` is the terminal no-op target for sessions
 * that are no longer active.
 */
export type RouteTarget = Stage | 'closed';

/**
 * The Session Record fields routing depends on.
 */
export interface RoutingSnapshot {
  status: SessionStatus;
  previousStage: Stage | null;
  mode: FulfilmentMode | null;
  locationConfirmed: boolean;
  addressComplete: boolean;
  ledgerEmpty: boolean;
  requestedStage: Stage | null;
}

export function routingSnapshot(session: SessionRecord): RoutingSnapshot {
  return {
    status: session.status,
    previousStage: session.activeStage,
    mode: session.mode,
    locationConfirmed: session.location.locationConfirmed,
    addressComplete: session.location.addressComplete,
    ledgerEmpty: session.ledger.isEmpty,
    requestedStage: session.handoffRequest,
  };
}

/**
 * Deterministic, total routing function. Rules are evaluated in order and the
 * first match wins; continuity rules run before the cold-start rule so a
 * returning session never falls back to greeting.
 */
export function route(s: RoutingSnapshot): RouteTarget {
  if (s.status !== 'active') {
    return 'closed';
  }

  const afterOrder = (): Stage => (s.ledgerEmpty ? 'ordering' : 'checkout');

  if (s.previousStage === 'location') {
    // switched to pickup mid-flow
    if (s.mode === 'pickup') {
      return afterOrder();
    }
    if (!s.locationConfirmed) {
      return 'location';
    }
    if (s.addressComplete) {
      return afterOrder();
    }
  }

  if (s.previousStage === 'ordering' && s.mode === 'delivery' && !s.locationConfirmed) {
    return 'location';
  }

  if (s.requestedStage && s.requestedStage !== s.previousStage && requestAllowed(s)) {
    return s.requestedStage;
  }

  if (s.previousStage === 'checkout') {
    return s.ledgerEmpty ? 'ordering' : 'checkout';
  }

  if (s.previousStage !== null) {
    return s.previousStage;
  }

  if (s.mode === 'delivery' && !s.locationConfirmed) {
    return 'location';
  }
  return s.ledgerEmpty ? 'greeting' : 'checkout';
}

export function routeSession(session: SessionRecord): RouteTarget {
  return route(routingSnapshot(session));
}

/**
 * Checkout needs something to check out; location is pointless for pickup.
 */
function requestAllowed(s: RoutingSnapshot): boolean {
  switch (s.requestedStage) {
    case 'checkout':
      return !s.ledgerEmpty;
    case 'location':
      return s.mode !== 'pickup';
    default:
      return true;
  }
}
