import { beforeEach, describe, expect, it, Mock, vi } from "vitest";
import { PaymentRejectedError } from "../../src/common/errors";
import { PaymentNotificationPublisher } from "../../src/kafka/notification.producer";
import { PaymentRepository } from "../../src/payment/payment.repository";
import { PaymentRequest } from "../../src/payment/payment.schemas";
import { PaymentService } from "../../src/payment/payment.service";

const request: PaymentRequest = {
  amount: 250,
  paymentMethod: "MASTER_CARD",
  orderId: 12,
  orderReference: "ORD-12",
  customer: {
    id: "cust-3",
    firstname: "Katherine",
    lastname: "Johnson",
    email: "katherine@example.com",
  },
};

describe("PaymentService", () => {
  let save: Mock<PaymentRepository["save"]>;
  let sendNotification: Mock<PaymentNotificationPublisher["sendNotification"]>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    save = vi.fn<PaymentRepository["save"]>();
    save.mockResolvedValue(31);
    sendNotification = vi.fn<PaymentNotificationPublisher["sendNotification"]>();
    sendNotification.mockResolvedValue(undefined);
  });

  it("stores the payment and notifies the customer", async () => {
    const service = new PaymentService({ save }, { sendNotification });

    expect(await service.createPayment(request)).toBe(31);
    expect(save).toHaveBeenCalledWith({
      amount: 250,
      paymentMethod: "MASTER_CARD",
      orderId: 12,
      orderReference: "ORD-12",
      customerId: "cust-3",
    });
    expect(sendNotification).toHaveBeenCalledWith({
      orderReference: "ORD-12",
      amount: 250,
      paymentMethod: "MASTER_CARD",
      customerFirstname: "Katherine",
      customerLastname: "Johnson",
      customerEmail: "katherine@example.com",
    });
  });

  it("declines amounts above the limit without storing anything", async () => {
    const service = new PaymentService(
      { save },
      { sendNotification },
      { amountLimit: 200 }
    );

    await expect(service.createPayment(request)).rejects.toBeInstanceOf(
      PaymentRejectedError
    );
    expect(save).not.toHaveBeenCalled();
    expect(sendNotification).not.toHaveBeenCalled();
  });

  it("accepts an amount equal to the limit", async () => {
    const service = new PaymentService(
      { save },
      { sendNotification },
      { amountLimit: 250 }
    );

    expect(await service.createPayment(request)).toBe(31);
  });

  it("returns the payment id when the notification cannot be published", async () => {
    const consoleErrorSpy = vi
      .spyOn(console, "error")
      .mockImplementation(() => {});
    sendNotification.mockRejectedValue(new Error("broker down"));
    const service = new PaymentService({ save }, { sendNotification });

    expect(await service.createPayment(request)).toBe(31);
    await vi.waitFor(() =>
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Failed to publish payment notification for order ORD-12:",
        "broker down"
      )
    );
  });
});
