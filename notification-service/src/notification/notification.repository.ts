import { Database } from "../db";

export type NotificationType = "ORDER_CONFIRMATION" | "PAYMENT_CONFIRMATION";

export interface Notification {
  type: NotificationType;
  reference: string;
  recipient: string;
  payload: unknown;
  sentAt: Date;
}

export interface NotificationRepository {
  save(notification: Notification): Promise<void>;
}

export class PgNotificationRepository implements NotificationRepository {
  constructor(private readonly db: Database) {}

  async save(notification: Notification): Promise<void> {
    await this.db.query(
      `INSERT INTO notifications (type, reference, recipient, payload, sent_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [
        notification.type,
        notification.reference,
        notification.recipient,
        JSON.stringify(notification.payload),
        notification.sentAt,
      ]
    );
  }
}
