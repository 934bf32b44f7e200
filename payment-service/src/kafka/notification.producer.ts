import { Kafka, logLevel, Producer } from "kafkajs";
import { PaymentNotification } from "../common/events/payment.events";

export interface PaymentNotificationPublisher {
  sendNotification(notification: PaymentNotification): Promise<void>;
}

export const createKafka = (clientId: string, brokers: string[]): Kafka =>
  new Kafka({
    clientId,
    brokers,
    logLevel: logLevel.WARN,
    retry: {
      initialRetryTime: 100,
      retries: 8,
    },
  });

export class KafkaNotificationProducer implements PaymentNotificationPublisher {
  constructor(
    private readonly producer: Producer,
    private readonly topic: string
  ) {}

  async sendNotification(notification: PaymentNotification): Promise<void> {
    const { orderReference } = notification;

    await this.producer.send({
      topic: this.topic,
      messages: [
        {
          key: orderReference,
          value: JSON.stringify(notification),
          headers: {
            correlationId: `order-${orderReference}`,
            "event-type": "PaymentConfirmation",
          },
        },
      ],
    });
    console.log(`Published PaymentNotification for order ${orderReference}`);
  }
}
