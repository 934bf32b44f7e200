import { describe, expect, it } from "vitest";
import {
  InsufficientStockError,
  PaymentFailedError,
  ProductsNotFoundError,
  RemoteCallError,
} from "../../src/common/errors";
import { HttpCustomerClient } from "../../src/customer/customer.client";
import { HttpPaymentClient } from "../../src/payment/payment.client";
import { HttpProductClient } from "../../src/product/product.client";
import { fakeHttp } from "../support/fakeHttp";

const customerPayload = {
  id: "cust-9",
  firstname: "Grace",
  lastname: "Hopper",
  email: "grace@example.com",
};

describe("HttpCustomerClient", () => {
  it("returns the customer", async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 200,
      data: customerPayload,
    }));

    const customer = await new HttpCustomerClient(http).findCustomerById(
      "cust-9"
    );

    expect(customer).toEqual({ ...customerPayload, address: null });
    expect(requests).toEqual([
      { method: "get", url: "/cust-9", body: undefined },
    ]);
  });

  it("returns null for an unknown customer", async () => {
    const { http } = fakeHttp(() => ({
      status: 404,
      data: { error: "CUSTOMER_NOT_FOUND", message: "No customer" },
    }));

    expect(await new HttpCustomerClient(http).findCustomerById("x")).toBeNull();
  });

  it("treats a 404 without a customer error code as a remote failure", async () => {
    const { http } = fakeHttp(() => ({
      status: 404,
      data: "Cannot GET /cust-9",
    }));

    await expect(
      new HttpCustomerClient(http).findCustomerById("cust-9")
    ).rejects.toThrow("Call to customer-service failed: HTTP 404");
  });

  it("fails with RemoteCallError when customer-service errors", async () => {
    const { http } = fakeHttp(() => ({ status: 500 }));

    await expect(
      new HttpCustomerClient(http).findCustomerById("cust-9")
    ).rejects.toThrow("Call to customer-service failed: HTTP 500");
  });
});

describe("HttpProductClient", () => {
  const batch = [{ productId: 3, quantity: 2 }];

  it("posts the batch and returns the purchased products", async () => {
    const purchased = [
      { productId: 3, name: "Lamp", description: "", price: 12, quantity: 2 },
    ];
    const { http, requests } = fakeHttp(() => ({
      status: 200,
      data: purchased,
    }));

    expect(await new HttpProductClient(http).purchaseProducts(batch)).toEqual(
      purchased
    );
    expect(requests).toEqual([{ method: "post", url: "/purchase", body: batch }]);
  });

  it("maps 404 to ProductsNotFoundError", async () => {
    const { http } = fakeHttp(() => ({
      status: 404,
      data: { error: "PRODUCTS_NOT_FOUND", message: "missing" },
    }));

    await expect(
      new HttpProductClient(http).purchaseProducts(batch)
    ).rejects.toBeInstanceOf(ProductsNotFoundError);
  });

  it("treats a 404 without a products error code as a remote failure", async () => {
    const { http } = fakeHttp(() => ({
      status: 404,
      data: "Cannot POST /purchase",
    }));

    const attempt = new HttpProductClient(http).purchaseProducts(batch);

    await expect(attempt).rejects.toBeInstanceOf(RemoteCallError);
    await expect(attempt).rejects.toThrow(
      "Call to product-service failed: An error occurred while processing the products purchase: HTTP 404"
    );
  });

  it("maps an insufficient stock answer to InsufficientStockError", async () => {
    const { http } = fakeHttp(() => ({
      status: 409,
      data: {
        error: "INSUFFICIENT_STOCK",
        message: "Insufficient stock quantity for product with ID:: 3",
        productId: 3,
      },
    }));

    const attempt = new HttpProductClient(http).purchaseProducts(batch);

    await expect(attempt).rejects.toBeInstanceOf(InsufficientStockError);
    await expect(attempt).rejects.toMatchObject({ productId: 3 });
  });

  it("treats a timeout as a remote failure", async () => {
    const { http } = fakeHttp(() => ({ timeout: true }));

    const attempt = new HttpProductClient(http).purchaseProducts(batch);

    await expect(attempt).rejects.toBeInstanceOf(RemoteCallError);
    await expect(attempt).rejects.toThrow(
      "Call to product-service failed: An error occurred while processing the products purchase: timed out (timeout of 5000ms exceeded)"
    );
  });

  it("posts released products", async () => {
    const { http, requests } = fakeHttp(() => ({ status: 204 }));

    await new HttpProductClient(http).releaseProducts(batch);

    expect(requests).toEqual([{ method: "post", url: "/release", body: batch }]);
  });
});

describe("HttpPaymentClient", () => {
  const request = {
    amount: 1500,
    paymentMethod: "PAYPAL" as const,
    orderId: 4,
    orderReference: "ORD-4",
    customer: { ...customerPayload, address: null },
  };

  it("returns the payment id", async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 201,
      data: { id: 77 },
    }));

    expect(await new HttpPaymentClient(http).requestOrderPayment(request)).toBe(
      77
    );
    expect(requests[0].body).toEqual(request);
  });

  it("fails with PaymentFailedError carrying the rejection reason", async () => {
    const { http } = fakeHttp(() => ({
      status: 422,
      data: {
        error: "PAYMENT_REJECTED",
        message: "Payment amount 1500 exceeds the limit of 1000",
      },
    }));

    const attempt = new HttpPaymentClient(http).requestOrderPayment(request);

    await expect(attempt).rejects.toBeInstanceOf(PaymentFailedError);
    await expect(attempt).rejects.toThrow(
      "Payment for order ORD-4 failed: Payment amount 1500 exceeds the limit of 1000"
    );
  });
});
