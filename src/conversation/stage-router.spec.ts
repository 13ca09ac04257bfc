import { FulfilmentMode, SessionStatus, STAGES, Stage } from '../session/interfaces';

import { route, RoutingSnapshot } from './stage-router';

const snapshot = (overrides: Partial<RoutingSnapshot> = {}): RoutingSnapshot => ({
  status: 'active',
  previousStage: null,
  mode: null,
  locationConfirmed: false,
  addressComplete: false,
  ledgerEmpty: true,
  requestedStage: null,
  ...overrides,
});

describe('route', () => {
  describe('terminal sessions', () => {
    it.each<SessionStatus>(['completed', 'timed-out'])('should close a %s session', (status) => {
      expect(route(snapshot({ status, previousStage: 'checkout', ledgerEmpty: false }))).toBe(
        'closed',
      );
    });
  });

  describe('cold start', () => {
    it('should greet a new session', () => {
      expect(route(snapshot())).toBe('greeting');
    });

    it('should go to location for an unconfirmed delivery', () => {
      expect(route(snapshot({ mode: 'delivery' }))).toBe('location');
    });

    it('should go to checkout when the ledger is not empty', () => {
      expect(route(snapshot({ mode: 'pickup', ledgerEmpty: false }))).toBe('checkout');
    });
  });

  describe('from location', () => {
    it('should leave location when the customer switches to pickup', () => {
      expect(route(snapshot({ previousStage: 'location', mode: 'pickup' }))).toBe('ordering');
      expect(
        route(snapshot({ previousStage: 'location', mode: 'pickup', ledgerEmpty: false })),
      ).toBe('checkout');
    });

    it('should stay until the district is confirmed, even when another stage is requested', () => {
      expect(
        route(
          snapshot({ previousStage: 'location', mode: 'delivery', requestedStage: 'ordering' }),
        ),
      ).toBe('location');
    });

    it('should stay while the address is incomplete', () => {
      expect(
        route(snapshot({ previousStage: 'location', mode: 'delivery', locationConfirmed: true })),
      ).toBe('location');
    });

    it('should move on once the address is complete', () => {
      const ready = snapshot({
        previousStage: 'location',
        mode: 'delivery',
        locationConfirmed: true,
        addressComplete: true,
      });

      expect(route(ready)).toBe('ordering');
      expect(route({ ...ready, ledgerEmpty: false })).toBe('checkout');
    });
  });

  describe('from ordering', () => {
    it('should send an unconfirmed delivery to location', () => {
      expect(route(snapshot({ previousStage: 'ordering', mode: 'delivery' }))).toBe('location');
    });

    it('should stay on ordering otherwise', () => {
      expect(route(snapshot({ previousStage: 'ordering', mode: 'pickup', ledgerEmpty: false }))).toBe(
        'ordering',
      );
    });

    it('should honour a request for checkout with items in the ledger', () => {
      expect(
        route(
          snapshot({
            previousStage: 'ordering',
            mode: 'pickup',
            ledgerEmpty: false,
            requestedStage: 'checkout',
          }),
        ),
      ).toBe('checkout');
    });

    it('should ignore a request for checkout with an empty ledger', () => {
      expect(
        route(snapshot({ previousStage: 'ordering', mode: 'pickup', requestedStage: 'checkout' })),
      ).toBe('ordering');
    });
  });

  describe('from checkout', () => {
    const atCheckout = snapshot({ previousStage: 'checkout', mode: 'pickup', ledgerEmpty: false });

    it('should stay on checkout with a non-empty ledger', () => {
      expect(route(atCheckout)).toBe('checkout');
    });

    it('should let the customer go back to edit the order', () => {
      expect(route({ ...atCheckout, requestedStage: 'ordering' })).toBe('ordering');
    });

    it('should ignore a request for location on a pickup order', () => {
      expect(route({ ...atCheckout, requestedStage: 'location' })).toBe('checkout');
    });

    it('should return to ordering when the ledger is empty', () => {
      expect(route({ ...atCheckout, ledgerEmpty: true })).toBe('ordering');
    });
  });

  describe('from greeting', () => {
    it('should follow a handoff request', () => {
      expect(
        route(snapshot({ previousStage: 'greeting', mode: 'delivery', requestedStage: 'location' })),
      ).toBe('location');
      expect(
        route(snapshot({ previousStage: 'greeting', mode: 'pickup', requestedStage: 'ordering' })),
      ).toBe('ordering');
    });

    it('should stay on greeting without a request', () => {
      expect(route(snapshot({ previousStage: 'greeting', mode: 'delivery' }))).toBe('greeting');
    });
  });

  describe('determinism', () => {
    const modes: Array<FulfilmentMode | null> = [null, 'delivery', 'pickup'];
    const previous: Array<Stage | null> = [null, ...STAGES];
    const flags = [false, true];

    it('should return the same target for identical snapshots across every combination', () => {
      for (const previousStage of previous) {
        for (const mode of modes) {
          for (const locationConfirmed of flags) {
            for (const ledgerEmpty of flags) {
              for (const requestedStage of previous) {
                const input = snapshot({
                  previousStage,
                  mode,
                  locationConfirmed,
                  addressComplete: locationConfirmed,
                  ledgerEmpty,
                  requestedStage,
                });
                const first = route(input);

                expect(route({ ...input })).toBe(first);
                expect([...STAGES, 'closed']).toContain(first);
              }
            }
          }
        }
      }
    });
  });
});
