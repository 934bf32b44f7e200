export type ErrorCode =
  | "CUSTOMER_NOT_FOUND"
  | "PRODUCTS_NOT_FOUND"
  | "ORDER_NOT_FOUND"
  | "DUPLICATE_ORDER_REFERENCE"
  | "INSUFFICIENT_STOCK"
  | "PAYMENT_FAILED"
  | "REMOTE_CALL_FAILED"
  | "VALIDATION_FAILED";

export interface ErrorBody {
  error: ErrorCode;
  message: string;
  [detail: string]: unknown;
}

export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorBody {
    return { error: this.code, message: this.message };
  }
}

export class CustomerNotFoundError extends ServiceError {
  constructor(readonly customerId: string) {
    super(
      "CUSTOMER_NOT_FOUND",
      404,
      `Cannot create order:: No customer exists with the provided ID: ${customerId}`
    );
  }
}

export class ProductsNotFoundError extends ServiceError {
  constructor() {
    super(
      "PRODUCTS_NOT_FOUND",
      404,
      "One or more products does not exist"
    );
  }
}

export class InsufficientStockError extends ServiceError {
  constructor(readonly productId: number) {
    super(
      "INSUFFICIENT_STOCK",
      409,
      `Insufficient stock quantity for product with ID:: ${productId}`
    );
  }

  toBody(): ErrorBody {
    return { ...super.toBody(), productId: this.productId };
  }
}

export class PaymentFailedError extends ServiceError {
  constructor(readonly orderReference: string, reason: string) {
    super(
      "PAYMENT_FAILED",
      402,
      `Payment for order ${orderReference} failed: ${reason}`
    );
  }
}

/** A collaborator could not be reached, timed out or answered unexpectedly. */
export class RemoteCallError extends ServiceError {
  constructor(readonly service: string, reason: string) {
    super(
      "REMOTE_CALL_FAILED",
      502,
      `Call to ${service} failed: ${reason}`
    );
  }
}

export class OrderNotFoundError extends ServiceError {
  constructor(readonly orderId: number) {
    super(
      "ORDER_NOT_FOUND",
      404,
      `No order found with the provided ID: ${orderId}`
    );
  }
}

export class DuplicateOrderReferenceError extends ServiceError {
  constructor(readonly orderReference: string) {
    super(
      "DUPLICATE_ORDER_REFERENCE",
      409,
      `An order with the reference ${orderReference} already exists`
    );
  }
}

export class ValidationError extends ServiceError {
  constructor(readonly errors: Record<string, string>) {
    super("VALIDATION_FAILED", 400, "Request validation failed");
  }

  toBody(): ErrorBody {
    return { ...super.toBody(), errors: this.errors };
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
