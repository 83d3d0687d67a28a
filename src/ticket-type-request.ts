/**
 * Immutable ticket order line.
 */
export enum TicketType {
  ADULT = 'ADULT',
  CHILD = 'CHILD',
  INFANT = 'INFANT',
}

export function isTicketType(value: string): value is TicketType {
  return Object.values<string>(TicketType).includes(value);
}

export class TicketTypeRequest {
  constructor(
    public readonly ticketType: TicketType,
    public readonly noOfTickets: number
  ) {
    Object.freeze(this);
  }

  static of(ticketType: TicketType, noOfTickets: number): TicketTypeRequest {
    return new TicketTypeRequest(ticketType, noOfTickets);
  }
}
