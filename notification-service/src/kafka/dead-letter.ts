import { IHeaders, Producer } from "kafkajs";

/** The parts of a consumed Kafka message this service reads. */
export interface IncomingMessage {
  key: Buffer | null;
  value: Buffer | null;
  headers?: IHeaders;
  offset: string;
}

export interface DeadLetterPublisher {
  sendToDLQ(
    topic: string,
    message: IncomingMessage,
    error: Error,
    attempts: number
  ): Promise<void>;
}

export class KafkaDeadLetterPublisher implements DeadLetterPublisher {
  constructor(
    private readonly producer: Producer,
    private readonly service: string
  ) {}

  async sendToDLQ(
    topic: string,
    message: IncomingMessage,
    error: Error,
    attempts: number
  ): Promise<void> {
    await this.producer.send({
      topic: `${topic}.dlq`,
      messages: [
        {
          key: message.key,
          value: message.value,
          headers: {
            ...message.headers,
            "x-original-topic": topic,
            "x-error-message": error.message,
            "x-error-timestamp": new Date().toISOString(),
            "x-retry-count": attempts.toString(),
            "x-service": this.service,
          },
        },
      ],
    });

    console.log(`☠️ Poison message sent to DLQ after ${attempts} attempts:`, {
      topic: `${topic}.dlq`,
      error: error.message,
      messageKey: message.key?.toString(),
    });
  }
}
