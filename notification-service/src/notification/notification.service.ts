import { OrderConfirmation } from "../common/events/order.events";
import { PaymentNotification } from "../common/events/payment.events";
import { NotificationRepository } from "./notification.repository";

export class NotificationService {
  constructor(
    private readonly repository: NotificationRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async notifyOrderConfirmed(event: OrderConfirmation): Promise<void> {
    const { customer } = event;
    await this.repository.save({
      type: "ORDER_CONFIRMATION",
      reference: event.orderReference,
      recipient: customer.email,
      payload: event,
      sentAt: this.now(),
    });

    console.log(
      `📧 Order confirmation for ${event.orderReference} sent to ${customer.email}: ` +
        `${event.products.length} product(s), total ${event.totalAmount.toFixed(2)}`
    );
  }

  async notifyPaymentSucceeded(event: PaymentNotification): Promise<void> {
    await this.repository.save({
      type: "PAYMENT_CONFIRMATION",
      reference: event.orderReference,
      recipient: event.customerEmail,
      payload: event,
      sentAt: this.now(),
    });

    console.log(
      `📧 Payment confirmation for ${event.orderReference} sent to ${event.customerEmail}: ` +
        `${event.amount.toFixed(2)} by ${event.paymentMethod}`
    );
  }
}
