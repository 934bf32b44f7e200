import { OrderLineResponse } from "../order/order.types";
import { OrderRepository } from "../order/order.repository";

export class OrderLineService {
  constructor(private readonly orderRepository: OrderRepository) {}

  /** Empty when the order has no lines or does not exist. */
  async findAllByOrderId(orderId: number): Promise<OrderLineResponse[]> {
    const lines = await this.orderRepository.findLinesByOrderId(orderId);
    return lines.map(({ id, productId, quantity }) => ({
      id,
      productId,
      quantity,
    }));
  }
}
