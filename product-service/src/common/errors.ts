export type ErrorCode =
  | "PRODUCTS_NOT_FOUND"
  | "PRODUCT_NOT_FOUND"
  | "CATEGORY_NOT_FOUND"
  | "INSUFFICIENT_STOCK"
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

/** At least one product of a batch has no stored record. */
export class ProductsNotFoundError extends ServiceError {
  constructor() {
    super("PRODUCTS_NOT_FOUND", 404, "One or more products does not exist");
  }
}

export class ProductNotFoundError extends ServiceError {
  constructor(readonly productId: number) {
    super("PRODUCT_NOT_FOUND", 404, `Product not found with ID:: ${productId}`);
  }
}

export class CategoryNotFoundError extends ServiceError {
  constructor(readonly categoryId: number) {
    super(
      "CATEGORY_NOT_FOUND",
      404,
      `Category not found with ID:: ${categoryId}`
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

export class ValidationError extends ServiceError {
  constructor(readonly errors: Record<string, string>) {
    super("VALIDATION_FAILED", 400, "Request validation failed");
  }

  toBody(): ErrorBody {
    return { ...super.toBody(), errors: this.errors };
  }
}
