// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidIndexError extends DomainError {
  constructor(index: number, cartSize: number) {
    super(
      `Invalid cart index ${index}. Cart has ${cartSize} items.`,
      'INVALID_INDEX',
      400
    );
  }
}

// cart references a code the store's menu does not carry
export class UnknownItemError extends DomainError {
  constructor(code: string, storeId: string) {
    super(`Item '${code}' is not on the menu of store ${storeId}.`, 'UNKNOWN_ITEM', 422);
  }
}

// 502 - transport or protocol failure talking to the vendor
export class VendorRequestError extends DomainError {
  constructor(
    operation: string,
    detail: string,
    public readonly httpStatus?: number
  ) {
    super(`Vendor ${operation} request failed: ${detail}`, 'VENDOR_REQUEST_FAILED', 502);
  }
}

// vendor answered, but the answer says the order was not accepted
export class SubmissionError extends DomainError {
  constructor(status: number, reasons: string[]) {
    const detail = reasons.length > 0 ? reasons.join(', ') : 'no reason given';
    super(
      `Order submission rejected by vendor (status ${status}): ${detail}`,
      'SUBMISSION_REJECTED',
      502
    );
  }
}

export class ConfigError extends DomainError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
