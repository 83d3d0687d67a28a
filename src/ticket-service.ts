/**
 * Ticket purchase rules and pricing.
 * Payment and seat reservation are delegated to the injected ports.
 */

import { InvalidPurchaseError, isInvalidPurchaseError } from './purchase-error.js';
import { logger as rootLogger, type Logger } from './logger.js';
import type { SeatReservationService, TicketPaymentService } from './ports.js';
import { MAX_TICKETS_PER_PURCHASE, consumesSeat, priceOf } from './ticket-prices.js';
import { TicketType, type TicketTypeRequest } from './ticket-type-request.js';

export interface PurchaseSummary {
  accountId: number;
  totalAmountToPay: number;
  totalSeatsToAllocate: number;
  totalTickets: number;
}

export interface TicketService {
  purchaseTickets(
    accountId: number,
    ticketTypeRequests: readonly TicketTypeRequest[] | null | undefined
  ): void;
}

/**
 * Validates a purchase and returns what it costs and how many seats it takes.
 * Throws on the first rule the order breaks.
 *
 * The maximum is checked line by line against the seats accumulated so far,
 * so infant lines never add to the running total they are compared with.
 */
export function calculatePurchase(
  accountId: number,
  ticketTypeRequests: readonly TicketTypeRequest[] | null | undefined
): PurchaseSummary {
  if (!Number.isInteger(accountId) || accountId <= 0) {
    throw InvalidPurchaseError.invalidAccountId();
  }
  if (!ticketTypeRequests?.length) {
    throw InvalidPurchaseError.missingTicketRequest();
  }

  let hasAdultTicket = false;
  let hasChildOrInfantTicket = false;
  let totalAmountToPay = 0;
  let totalSeatsToAllocate = 0;
  let totalTickets = 0;

  for (const request of ticketTypeRequests) {
    const quantity = request.noOfTickets;

    if (!Number.isInteger(quantity) || quantity < 0) {
      throw InvalidPurchaseError.invalidTicketQuantity(quantity);
    }
    if (totalSeatsToAllocate + quantity > MAX_TICKETS_PER_PURCHASE) {
      throw InvalidPurchaseError.maxTicketsExceeded(MAX_TICKETS_PER_PURCHASE);
    }

    totalAmountToPay += quantity * priceOf(request.ticketType);
    totalTickets += quantity;

    if (request.ticketType === TicketType.ADULT) {
      hasAdultTicket = true;
    } else if (
      request.ticketType === TicketType.CHILD ||
      request.ticketType === TicketType.INFANT
    ) {
      hasChildOrInfantTicket = true;
    }

    if (consumesSeat(request.ticketType)) {
      totalSeatsToAllocate += quantity;
    }
  }

  if (hasChildOrInfantTicket && !hasAdultTicket) {
    throw InvalidPurchaseError.missingAdultTicket();
  }

  return { accountId, totalAmountToPay, totalSeatsToAllocate, totalTickets };
}

/**
 * Purchases tickets: pays first, then reserves seats.
 *
 * Port failures propagate as thrown. There is no compensation when the
 * reservation fails after the payment went through.
 */
export class TicketServiceImpl implements TicketService {
  private readonly logger: Logger;

  constructor(
    private readonly paymentService: TicketPaymentService,
    private readonly reservationService: SeatReservationService,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'ticket-service' });
  }

  purchaseTickets(
    accountId: number,
    ticketTypeRequests: readonly TicketTypeRequest[] | null | undefined
  ): void {
    let summary: PurchaseSummary;
    try {
      summary = calculatePurchase(accountId, ticketTypeRequests);
    } catch (err) {
      if (isInvalidPurchaseError(err)) {
        this.logger.warn({ accountId, errorCode: err.errorCode }, err.message);
      }
      throw err;
    }

    const { totalAmountToPay, totalSeatsToAllocate } = summary;
    this.logger.info(
      { accountId, totalAmountToPay, totalSeatsToAllocate },
      'purchasing tickets'
    );

    try {
      this.paymentService.makePayment(accountId, totalAmountToPay);
    } catch (err) {
      this.logger.error({ err, accountId, totalAmountToPay }, 'payment failed');
      throw err;
    }

    try {
      this.reservationService.reserveSeat(accountId, totalSeatsToAllocate);
    } catch (err) {
      // Payment has already been taken at this point.
      this.logger.error(
        { err, accountId, totalAmountToPay, totalSeatsToAllocate },
        'seat reservation failed after payment'
      );
      throw err;
    }
  }
}
