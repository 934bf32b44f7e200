import { randomUUID } from "crypto";
import { OrderConfirmation } from "../common/events/order.events";
import {
  CustomerNotFoundError,
  describeError,
  DuplicateOrderReferenceError,
  OrderNotFoundError,
} from "../common/errors";
import { CustomerClient } from "../customer/customer.client";
import { OrderConfirmationPublisher } from "../kafka/order.producer";
import { PaymentClient } from "../payment/payment.client";
import { ProductClient, PurchaseResult } from "../product/product.client";
import { OrderRepository } from "./order.repository";
import {
  Order,
  OrderCreationState,
  OrderRequest,
  OrderResponse,
} from "./order.types";

export interface OrderServiceDependencies {
  orderRepository: OrderRepository;
  customerClient: CustomerClient;
  productClient: ProductClient;
  paymentClient: PaymentClient;
  orderProducer: OrderConfirmationPublisher;
  generateReference?: () => string;
}

export const toOrderResponse = (order: Order): OrderResponse => ({
  id: order.id,
  reference: order.reference,
  amount: order.totalAmount,
  paymentMethod: order.paymentMethod,
  customerId: order.customerId,
  createdAt: order.createdAt.toISOString(),
  lines: order.lines.map((line) => ({
    id: line.id,
    productId: line.productId,
    quantity: line.quantity,
  })),
});

export class OrderService {
  private readonly orderRepository: OrderRepository;
  private readonly customerClient: CustomerClient;
  private readonly productClient: ProductClient;
  private readonly paymentClient: PaymentClient;
  private readonly orderProducer: OrderConfirmationPublisher;
  private readonly generateReference: () => string;

  constructor(deps: OrderServiceDependencies) {
    this.orderRepository = deps.orderRepository;
    this.customerClient = deps.customerClient;
    this.productClient = deps.productClient;
    this.paymentClient = deps.paymentClient;
    this.orderProducer = deps.orderProducer;
    this.generateReference =
      deps.generateReference ?? (() => `ORD-${randomUUID()}`);
  }

  /**
   * Rejects a reference already in use, validates the customer and reserves
   * stock, then stores the order with its lines and requests payment inside
   * one local transaction. The confirmation is published after commit and its
   * outcome never reaches the caller.
   *
   * When anything after the reservation fails, the reserved stock is released
   * again before the error is rethrown.
   */
  async createOrder(request: OrderRequest): Promise<number> {
    const reference = request.reference ?? this.generateReference();
    this.advance(reference, "START");

    if (await this.orderRepository.existsByReference(reference)) {
      throw new DuplicateOrderReferenceError(reference);
    }

    const customer = await this.customerClient.findCustomerById(
      request.customerId
    );
    if (!customer) {
      throw new CustomerNotFoundError(request.customerId);
    }
    this.advance(reference, "CUSTOMER_VALIDATED");

    const purchasedProducts = await this.productClient.purchaseProducts(
      request.products
    );
    this.advance(reference, "INVENTORY_RESERVED");

    let orderId: number;
    try {
      orderId = await this.orderRepository.inTransaction(async (tx) => {
        const order = await tx.saveOrder({
          reference,
          customerId: request.customerId,
          totalAmount: request.amount,
          paymentMethod: request.paymentMethod,
        });

        for (const purchase of request.products) {
          await tx.saveOrderLine({
            orderId: order.id,
            productId: purchase.productId,
            quantity: purchase.quantity,
          });
        }
        this.advance(reference, "ORDER_PERSISTED");

        const paymentId = await this.paymentClient.requestOrderPayment({
          amount: request.amount,
          paymentMethod: request.paymentMethod,
          orderId: order.id,
          orderReference: order.reference,
          customer,
        });
        this.advance(reference, "PAYMENT_INITIATED", `payment ${paymentId}`);

        return order.id;
      });
    } catch (error) {
      console.error(
        `Order ${reference} rolled back: ${describeError(error)}`
      );
      await this.releaseReservation(reference, purchasedProducts);
      throw error;
    }

    this.publishConfirmation({
      orderReference: reference,
      totalAmount: request.amount,
      paymentMethod: request.paymentMethod,
      customer,
      products: purchasedProducts,
    });
    this.advance(reference, "CONFIRMED", `order ${orderId}`);

    return orderId;
  }

  async findAllOrders(): Promise<OrderResponse[]> {
    const orders = await this.orderRepository.findAll();
    return orders.map(toOrderResponse);
  }

  async findById(id: number): Promise<OrderResponse> {
    const order = await this.orderRepository.findById(id);
    if (!order) {
      throw new OrderNotFoundError(id);
    }
    return toOrderResponse(order);
  }

  private async releaseReservation(
    reference: string,
    purchasedProducts: PurchaseResult[]
  ) {
    try {
      await this.productClient.releaseProducts(
        purchasedProducts.map(({ productId, quantity }) => ({
          productId,
          quantity,
        }))
      );
      console.log(`↩️  Released reserved stock for order ${reference}.`);
    } catch (releaseError) {
      // Stock stays reserved; the original failure is what the caller sees.
      console.error(
        `❌ Could not release reserved stock for order ${reference}:`,
        describeError(releaseError)
      );
    }
  }

  private publishConfirmation(confirmation: OrderConfirmation) {
    this.orderProducer
      .sendOrderConfirmation(confirmation)
      .catch((error: unknown) => {
        console.error(
          `Failed to publish confirmation for order ${confirmation.orderReference}:`,
          describeError(error)
        );
      });
  }

  private advance(reference: string, state: OrderCreationState, note = "") {
    console.log(`Order ${reference}: ${state}${note ? ` (${note})` : ""}`);
  }
}
