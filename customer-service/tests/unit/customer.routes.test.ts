import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app";
import { CustomerService } from "../../src/customer/customer.service";
import { InMemoryCustomerRepository } from "../support/inMemoryCustomerRepository";
import { listen, RunningApp } from "../support/listen";

describe("customer routes", () => {
  let running: RunningApp;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const service = new CustomerService(
      new InMemoryCustomerRepository(),
      () => "cust-1"
    );
    running = await listen(
      createApp({ customerService: service, checkDatabase: async () => {} })
    );
  });

  afterAll(async () => {
    await running.close();
  });

  it("creates and returns a customer", async () => {
    const created = await fetch(`${running.baseUrl}/api/v1/customers`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        firstname: "Grace",
        lastname: "Hopper",
        email: "grace@example.com",
      }),
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ id: "cust-1" });

    const found = await fetch(`${running.baseUrl}/api/v1/customers/cust-1`);
    expect(await found.json()).toEqual({
      id: "cust-1",
      firstname: "Grace",
      lastname: "Hopper",
      email: "grace@example.com",
      address: null,
    });
  });

  it("answers 400 for an invalid email", async () => {
    const response = await fetch(`${running.baseUrl}/api/v1/customers`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        firstname: "Grace",
        lastname: "Hopper",
        email: "not-an-email",
      }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "VALIDATION_FAILED",
      message: "Request validation failed",
      errors: { email: "Customer email is not a valid email address" },
    });
  });

  it("answers 404 for an unknown customer", async () => {
    const response = await fetch(`${running.baseUrl}/api/v1/customers/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "CUSTOMER_NOT_FOUND",
      message:
        "Cannot find customer:: No customer found with the provided ID: nope",
    });
  });

  it("tells whether a customer exists", async () => {
    const response = await fetch(
      `${running.baseUrl}/api/v1/customers/exists/nope`
    );

    expect(await response.json()).toBe(false);
  });
});
