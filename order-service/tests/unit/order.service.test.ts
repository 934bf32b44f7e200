import {
  beforeEach,
  describe,
  expect,
  it,
  Mock,
  MockInstance,
  vi,
} from "vitest";
import {
  CustomerNotFoundError,
  DuplicateOrderReferenceError,
  InsufficientStockError,
  OrderNotFoundError,
  PaymentFailedError,
  RemoteCallError,
} from "../../src/common/errors";
import { Customer, CustomerClient } from "../../src/customer/customer.client";
import { OrderConfirmationPublisher } from "../../src/kafka/order.producer";
import { OrderService } from "../../src/order/order.service";
import { OrderRequest } from "../../src/order/order.types";
import { OrderLineService } from "../../src/orderline/orderline.service";
import { PaymentClient } from "../../src/payment/payment.client";
import {
  ProductClient,
  PurchaseResult,
} from "../../src/product/product.client";
import { InMemoryOrderRepository } from "../support/inMemoryOrderRepository";

const customer: Customer = {
  id: "cust-1",
  firstname: "Ada",
  lastname: "Lovelace",
  email: "ada@example.com",
  address: { street: "Main Street", houseNumber: "12", zipCode: "10115" },
};

const purchased: PurchaseResult[] = [
  { productId: 1, name: "Keyboard", description: "", price: 40, quantity: 2 },
  { productId: 2, name: "Mouse", description: "", price: 19.5, quantity: 1 },
];

const orderRequest = (overrides: Partial<OrderRequest> = {}): OrderRequest => ({
  amount: 99.5,
  paymentMethod: "VISA",
  customerId: "cust-1",
  products: [
    { productId: 2, quantity: 1 },
    { productId: 1, quantity: 2 },
  ],
  ...overrides,
});

describe("OrderService", () => {
  let repository: InMemoryOrderRepository;
  let findCustomerById: Mock<CustomerClient["findCustomerById"]>;
  let purchaseProducts: Mock<ProductClient["purchaseProducts"]>;
  let releaseProducts: Mock<ProductClient["releaseProducts"]>;
  let requestOrderPayment: Mock<PaymentClient["requestOrderPayment"]>;
  let sendOrderConfirmation: Mock<OrderConfirmationPublisher["sendOrderConfirmation"]>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let service: OrderService;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    repository = new InMemoryOrderRepository(
      () => new Date("2026-03-01T10:00:00.000Z")
    );
    findCustomerById = vi.fn<CustomerClient["findCustomerById"]>();
    findCustomerById.mockResolvedValue(customer);
    purchaseProducts = vi.fn<ProductClient["purchaseProducts"]>();
    purchaseProducts.mockResolvedValue(purchased);
    releaseProducts = vi.fn<ProductClient["releaseProducts"]>();
    releaseProducts.mockResolvedValue(undefined);
    requestOrderPayment = vi.fn<PaymentClient["requestOrderPayment"]>();
    requestOrderPayment.mockResolvedValue(501);
    sendOrderConfirmation =
      vi.fn<OrderConfirmationPublisher["sendOrderConfirmation"]>();
    sendOrderConfirmation.mockResolvedValue(undefined);

    service = new OrderService({
      orderRepository: repository,
      customerClient: { findCustomerById },
      productClient: { purchaseProducts, releaseProducts },
      paymentClient: { requestOrderPayment },
      orderProducer: { sendOrderConfirmation },
      generateReference: () => "ORD-generated",
    });
  });

  describe("createOrder", () => {
    it("stores the order with one line per requested product", async () => {
      const id = await service.createOrder(orderRequest());

      expect(id).toBe(1);
      expect(await service.findById(id)).toEqual({
        id: 1,
        reference: "ORD-generated",
        amount: 99.5,
        paymentMethod: "VISA",
        customerId: "cust-1",
        createdAt: "2026-03-01T10:00:00.000Z",
        lines: [
          { id: 1, productId: 2, quantity: 1 },
          { id: 2, productId: 1, quantity: 2 },
        ],
      });
    });

    it("keeps the multiplicity of repeated products in the order lines", async () => {
      const id = await service.createOrder(
        orderRequest({
          products: [
            { productId: 1, quantity: 2 },
            { productId: 1, quantity: 3 },
          ],
        })
      );

      const order = await service.findById(id);
      expect(order.lines.map(({ productId, quantity }) => [productId, quantity]))
        .toEqual([
          [1, 2],
          [1, 3],
        ]);
    });

    it("runs the steps in order and requests payment for the stored order", async () => {
      await service.createOrder(orderRequest({ reference: "ORD-42" }));

      expect(purchaseProducts).toHaveBeenCalledWith([
        { productId: 2, quantity: 1 },
        { productId: 1, quantity: 2 },
      ]);
      expect(requestOrderPayment).toHaveBeenCalledWith({
        amount: 99.5,
        paymentMethod: "VISA",
        orderId: 1,
        orderReference: "ORD-42",
        customer,
      });

      const lookup = findCustomerById.mock.invocationCallOrder[0];
      const reserve = purchaseProducts.mock.invocationCallOrder[0];
      const pay = requestOrderPayment.mock.invocationCallOrder[0];
      const publish = sendOrderConfirmation.mock.invocationCallOrder[0];
      expect(lookup).toBeLessThan(reserve);
      expect(reserve).toBeLessThan(pay);
      expect(pay).toBeLessThan(publish);
    });

    it("publishes one confirmation with the purchased products", async () => {
      await service.createOrder(orderRequest({ reference: "ORD-42" }));

      expect(sendOrderConfirmation).toHaveBeenCalledTimes(1);
      expect(sendOrderConfirmation).toHaveBeenCalledWith({
        orderReference: "ORD-42",
        totalAmount: 99.5,
        paymentMethod: "VISA",
        customer,
        products: purchased,
      });
    });

    it("fails with CustomerNotFoundError and writes nothing for an unknown customer", async () => {
      findCustomerById.mockResolvedValue(null);

      await expect(service.createOrder(orderRequest())).rejects.toBeInstanceOf(
        CustomerNotFoundError
      );

      expect(purchaseProducts).not.toHaveBeenCalled();
      expect(repository.writes).toBe(0);
      expect(await service.findAllOrders()).toEqual([]);
    });

    it("rejects a reference already in use before reserving any stock", async () => {
      await service.createOrder(orderRequest({ reference: "ORD-1" }));

      await expect(
        service.createOrder(orderRequest({ reference: "ORD-1" }))
      ).rejects.toThrow(
        new DuplicateOrderReferenceError("ORD-1")
      );

      expect(purchaseProducts).toHaveBeenCalledTimes(1);
      expect(releaseProducts).not.toHaveBeenCalled();
      expect(await service.findAllOrders()).toHaveLength(1);
    });

    it("stores nothing when the reservation fails", async () => {
      purchaseProducts.mockRejectedValue(new InsufficientStockError(1));

      await expect(service.createOrder(orderRequest())).rejects.toMatchObject({
        code: "INSUFFICIENT_STOCK",
        productId: 1,
      });

      expect(repository.writes).toBe(0);
      expect(requestOrderPayment).not.toHaveBeenCalled();
      expect(releaseProducts).not.toHaveBeenCalled();
      expect(sendOrderConfirmation).not.toHaveBeenCalled();
    });

    it("rolls back the order and releases the stock when payment fails", async () => {
      requestOrderPayment.mockRejectedValue(
        new PaymentFailedError("ORD-generated", "card declined")
      );

      await expect(service.createOrder(orderRequest())).rejects.toBeInstanceOf(
        PaymentFailedError
      );

      expect(await service.findAllOrders()).toEqual([]);
      expect(releaseProducts).toHaveBeenCalledWith([
        { productId: 1, quantity: 2 },
        { productId: 2, quantity: 1 },
      ]);
      expect(sendOrderConfirmation).not.toHaveBeenCalled();
    });

    it("still reports the payment failure when releasing the stock fails too", async () => {
      requestOrderPayment.mockRejectedValue(
        new PaymentFailedError("ORD-generated", "timed out")
      );
      releaseProducts.mockRejectedValue(
        new RemoteCallError("product-service", "connection refused")
      );

      await expect(service.createOrder(orderRequest())).rejects.toThrow(
        "Payment for order ORD-generated failed: timed out"
      );
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "❌ Could not release reserved stock for order ORD-generated:",
        "Call to product-service failed: connection refused"
      );
    });

    it("returns the order id even when publishing the confirmation fails", async () => {
      sendOrderConfirmation.mockRejectedValue(new Error("broker down"));

      const id = await service.createOrder(orderRequest());

      expect(id).toBe(1);
      expect(await service.findAllOrders()).toHaveLength(1);
      await vi.waitFor(() =>
        expect(consoleErrorSpy).toHaveBeenCalledWith(
          "Failed to publish confirmation for order ORD-generated:",
          "broker down"
        )
      );
    });
  });

  describe("queries", () => {
    it("lists nothing on an empty store", async () => {
      expect(await service.findAllOrders()).toEqual([]);
    });

    it("fails with OrderNotFoundError for an unknown id", async () => {
      await expect(service.findById(7)).rejects.toBeInstanceOf(
        OrderNotFoundError
      );
    });

    it("lists every stored order", async () => {
      await service.createOrder(orderRequest({ reference: "ORD-a" }));
      await service.createOrder(orderRequest({ reference: "ORD-b" }));

      const orders = await service.findAllOrders();
      expect(orders.map((order) => order.reference)).toEqual([
        "ORD-a",
        "ORD-b",
      ]);
    });

    it("returns the lines of one order", async () => {
      const id = await service.createOrder(orderRequest());
      const lines = await new OrderLineService(repository).findAllByOrderId(id);

      expect(lines).toEqual([
        { id: 1, productId: 2, quantity: 1 },
        { id: 2, productId: 1, quantity: 2 },
      ]);
    });
  });
});
