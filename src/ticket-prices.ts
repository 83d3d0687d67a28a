import { TicketType } from './ticket-type-request.js';

export const MAX_TICKETS_PER_PURCHASE = 20;

export const TICKET_PRICES: Readonly<Record<TicketType, number>> = Object.freeze({
  [TicketType.INFANT]: 0,
  [TicketType.CHILD]: 10,
  [TicketType.ADULT]: 20,
});

export function priceOf(ticketType: TicketType): number {
  return TICKET_PRICES[ticketType] ?? 0;
}

// Infants sit on an adult's lap.
export function consumesSeat(ticketType: TicketType): boolean {
  return ticketType === TicketType.ADULT || ticketType === TicketType.CHILD;
}
