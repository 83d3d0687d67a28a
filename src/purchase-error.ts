/**
 * Error raised when a ticket purchase request breaks a purchase rule.
 * Carries a machine-checkable code so callers can branch on a single catch point.
 */
export enum PurchaseErrorCode {
  INVALID_ACCOUNT_ID = 'INVALID_ACCOUNT_ID',
  MISSING_TICKET_REQUEST = 'MISSING_TICKET_REQUEST',
  INVALID_TICKET_QUANTITY = 'INVALID_TICKET_QUANTITY',
  MAX_TICKETS_EXCEEDED = 'MAX_TICKETS_EXCEEDED',
  MISSING_ADULT_TICKET = 'MISSING_ADULT_TICKET',
}

export class InvalidPurchaseError extends Error {
  constructor(
    public readonly errorCode: PurchaseErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'InvalidPurchaseError';
  }

  static invalidAccountId(): InvalidPurchaseError {
    return new InvalidPurchaseError(
      PurchaseErrorCode.INVALID_ACCOUNT_ID,
      'Invalid AccountId. An AccountId should be greater than zero'
    );
  }

  static missingTicketRequest(): InvalidPurchaseError {
    return new InvalidPurchaseError(
      PurchaseErrorCode.MISSING_TICKET_REQUEST,
      'At least one ticket type request is required'
    );
  }

  static invalidTicketQuantity(quantity: number): InvalidPurchaseError {
    return new InvalidPurchaseError(
      PurchaseErrorCode.INVALID_TICKET_QUANTITY,
      `Invalid ticket quantity: ${quantity}`
    );
  }

  static maxTicketsExceeded(maximum: number): InvalidPurchaseError {
    return new InvalidPurchaseError(
      PurchaseErrorCode.MAX_TICKETS_EXCEEDED,
      `Maximum ${maximum} tickets can be purchased at a time`
    );
  }

  static missingAdultTicket(): InvalidPurchaseError {
    return new InvalidPurchaseError(
      PurchaseErrorCode.MISSING_ADULT_TICKET,
      'Child or infant tickets cannot be purchased without an adult ticket'
    );
  }
}

export function isInvalidPurchaseError(err: unknown): err is InvalidPurchaseError {
  return err instanceof InvalidPurchaseError;
}
