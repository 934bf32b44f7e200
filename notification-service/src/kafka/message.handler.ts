import { ZodTypeAny, z } from "zod";
import { OrderConfirmationSchema } from "../common/events/order.events";
import { PaymentNotificationSchema } from "../common/events/payment.events";
import { NotificationService } from "../notification/notification.service";
import { DeadLetterPublisher, IncomingMessage } from "./dead-letter";

/** A message that can never be processed, however often it is retried. */
export class InvalidMessageError extends Error {
  constructor(message: string) {
    super(`Validation failed: ${message}`);
    this.name = "InvalidMessageError";
  }
}

export interface MessageHandlerOptions {
  orderTopic: string;
  paymentTopic: string;
  maxRetries: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface HandlerMetrics {
  successfulProcessing: number;
  validationFailures: number;
  poisonMessages: number;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

function decode<S extends ZodTypeAny>(
  schema: S,
  message: IncomingMessage
): z.infer<S> {
  if (!message.value) {
    throw new InvalidMessageError("message has no value");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(message.value.toString());
  } catch (error) {
    throw new InvalidMessageError((error as Error).message);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidMessageError(
      result.error.issues
        .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
        .join(", ")
    );
  }
  return result.data;
}

/**
 * Turns consumed order and payment events into customer notifications.
 *
 * Malformed messages go to the dead letter topic at once. Any other failure
 * is rethrown so the consumer redelivers the message, after an exponential
 * backoff, until `maxRetries` is reached; the message then goes to the dead
 * letter topic as well.
 */
export class NotificationMessageHandler {
  readonly metrics: HandlerMetrics = {
    successfulProcessing: 0,
    validationFailures: 0,
    poisonMessages: 0,
  };

  private readonly retryAttempts = new Map<string, number>();
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly notifications: NotificationService,
    private readonly deadLetters: DeadLetterPublisher,
    private readonly options: MessageHandlerOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async handle(
    topic: string,
    partition: number,
    message: IncomingMessage
  ): Promise<void> {
    const messageId = `${topic}-${partition}-${message.offset}`;
    const currentAttempts = this.retryAttempts.get(messageId) ?? 0;

    try {
      await this.dispatch(topic, message);
      this.metrics.successfulProcessing++;
      this.retryAttempts.delete(messageId);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (failure instanceof InvalidMessageError) {
        this.metrics.validationFailures++;
        console.error(`Validation failed for message ${messageId}:`, failure.message);
        await this.deadLetter(topic, message, failure, 0);
        this.retryAttempts.delete(messageId);
        return;
      }

      console.error(`Error processing message ${messageId}:`, failure.message);

      if (currentAttempts < this.options.maxRetries) {
        this.retryAttempts.set(messageId, currentAttempts + 1);
        const delay = this.options.retryDelayMs * Math.pow(2, currentAttempts);
        console.log(
          `Retrying in ${delay}ms (attempt ${currentAttempts + 1}/${this.options.maxRetries})`
        );
        await this.sleep(delay);
        throw failure;
      }

      console.error(
        `Max retries (${this.options.maxRetries}) exceeded for message ${messageId}`
      );
      await this.deadLetter(topic, message, failure, currentAttempts);
      this.retryAttempts.delete(messageId);
    }
  }

  private async dispatch(topic: string, message: IncomingMessage) {
    if (topic === this.options.orderTopic) {
      const event = decode(OrderConfirmationSchema, message);
      await this.notifications.notifyOrderConfirmed(event);
      return;
    }

    if (topic === this.options.paymentTopic) {
      const event = decode(PaymentNotificationSchema, message);
      await this.notifications.notifyPaymentSucceeded(event);
      return;
    }

    console.warn(`Ignoring message from unexpected topic ${topic}`);
  }

  private async deadLetter(
    topic: string,
    message: IncomingMessage,
    error: Error,
    attempts: number
  ) {
    this.metrics.poisonMessages++;
    await this.deadLetters.sendToDLQ(topic, message, error, attempts);
  }
}
