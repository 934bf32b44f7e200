export type ErrorCode = "CUSTOMER_NOT_FOUND" | "VALIDATION_FAILED";

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
  constructor(readonly customerId: string, action = "find") {
    super(
      "CUSTOMER_NOT_FOUND",
      404,
      `Cannot ${action} customer:: No customer found with the provided ID: ${customerId}`
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
