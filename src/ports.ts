/**
 * Outbound collaborators invoked once a purchase has been validated.
 * Implementations live outside this package.
 */
export interface TicketPaymentService {
  makePayment(accountId: number, totalAmountToPay: number): void;
}

export interface SeatReservationService {
  reserveSeat(accountId: number, totalSeatsToAllocate: number): void;
}
