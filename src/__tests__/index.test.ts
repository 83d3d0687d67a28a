import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { TicketServiceImpl, TicketType, TicketTypeRequest, isInvalidPurchaseError } from '../index.js';

describe('package entry', () => {
  it('purchases through the public API', () => {
    const makePayment = vi.fn();
    const reserveSeat = vi.fn();
    const service = new TicketServiceImpl({ makePayment }, { reserveSeat }, pino({ level: 'silent' }));

    service.purchaseTickets(42, [
      TicketTypeRequest.of(TicketType.ADULT, 1),
      TicketTypeRequest.of(TicketType.INFANT, 1),
    ]);

    expect(makePayment).toHaveBeenCalledWith(42, 20);
    expect(reserveSeat).toHaveBeenCalledWith(42, 1);
  });

  it('exposes a guard for purchase errors', () => {
    const service = new TicketServiceImpl(
      { makePayment: vi.fn() },
      { reserveSeat: vi.fn() },
      pino({ level: 'silent' })
    );

    let caught: unknown;
    try {
      service.purchaseTickets(42, []);
    } catch (e) {
      caught = e;
    }

    expect(isInvalidPurchaseError(caught)).toBe(true);
  });
});
