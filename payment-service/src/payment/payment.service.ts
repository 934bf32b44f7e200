import { describeError, PaymentRejectedError } from "../common/errors";
import { PaymentNotificationPublisher } from "../kafka/notification.producer";
import { PaymentRepository } from "./payment.repository";
import { PaymentRequest } from "./payment.schemas";

export interface PaymentServiceOptions {
  /** Payments above this amount are declined. */
  amountLimit?: number;
}

export class PaymentService {
  constructor(
    private readonly repository: PaymentRepository,
    private readonly notifications: PaymentNotificationPublisher,
    private readonly options: PaymentServiceOptions = {}
  ) {}

  async createPayment(request: PaymentRequest): Promise<number> {
    const { amountLimit } = this.options;
    if (amountLimit !== undefined && request.amount > amountLimit) {
      console.log(
        `Payment failed for order ${request.orderReference}: ${request.amount} exceeds the limit of ${amountLimit}.`
      );
      throw new PaymentRejectedError(request.amount, amountLimit);
    }

    const paymentId = await this.repository.save({
      amount: request.amount,
      paymentMethod: request.paymentMethod,
      orderId: request.orderId,
      orderReference: request.orderReference,
      customerId: request.customer.id,
    });
    console.log(
      `Payment processed successfully for order ${request.orderReference}. Payment ID: ${paymentId}`
    );

    this.notifications
      .sendNotification({
        orderReference: request.orderReference,
        amount: request.amount,
        paymentMethod: request.paymentMethod,
        customerFirstname: request.customer.firstname,
        customerLastname: request.customer.lastname,
        customerEmail: request.customer.email,
      })
      .catch((error: unknown) => {
        console.error(
          `Failed to publish payment notification for order ${request.orderReference}:`,
          describeError(error)
        );
      });

    return paymentId;
  }
}
