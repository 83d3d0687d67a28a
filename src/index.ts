export {
  TicketServiceImpl,
  calculatePurchase,
  type PurchaseSummary,
  type TicketService,
} from './ticket-service.js';
export { TicketType, TicketTypeRequest, isTicketType } from './ticket-type-request.js';
export {
  InvalidPurchaseError,
  PurchaseErrorCode,
  isInvalidPurchaseError,
} from './purchase-error.js';
export {
  MAX_TICKETS_PER_PURCHASE,
  TICKET_PRICES,
  consumesSeat,
  priceOf,
} from './ticket-prices.js';
export type { SeatReservationService, TicketPaymentService } from './ports.js';
export { loadConfig, type Config } from './config.js';
export { logger, type Logger } from './logger.js';
