export type ErrorCode = "PAYMENT_REJECTED" | "VALIDATION_FAILED";

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

export class PaymentRejectedError extends ServiceError {
  constructor(amount: number, limit: number) {
    super(
      "PAYMENT_REJECTED",
      422,
      `Payment amount ${amount} exceeds the limit of ${limit}`
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
