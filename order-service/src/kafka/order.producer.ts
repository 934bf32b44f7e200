import { CompressionTypes, Producer } from "kafkajs";
import { OrderConfirmation } from "../common/events/order.events";

export interface OrderConfirmationPublisher {
  sendOrderConfirmation(confirmation: OrderConfirmation): Promise<void>;
}

export class KafkaOrderProducer implements OrderConfirmationPublisher {
  constructor(
    private readonly producer: Producer,
    private readonly topic: string
  ) {}

  async sendOrderConfirmation(confirmation: OrderConfirmation): Promise<void> {
    const { orderReference } = confirmation;
    console.log(`Sending order confirmation for order ${orderReference}`);

    const [record] = await this.producer.send({
      topic: this.topic,
      compression: CompressionTypes.GZIP,
      acks: -1,
      timeout: 30000,
      messages: [
        {
          key: orderReference,
          value: JSON.stringify(confirmation),
          headers: {
            correlationId: `order-${orderReference}`,
            "event-type": "OrderConfirmation",
            timestamp: Date.now().toString(),
          },
        },
      ],
    });

    console.log(`✅ Published OrderConfirmation for order ${orderReference}`, {
      partition: record?.partition,
      offset: record?.baseOffset,
    });
  }
}
