import type { NotificationType, Notifier } from "printhub";

export type RecordedNotification = {
  type: NotificationType;
  data: object;
};

/**
 * Notifier that keeps what it was asked to send
 */
export class RecordingNotifier implements Notifier {
  readonly enabled = true;
  readonly sent: RecordedNotification[] = [];

  async notify(type: NotificationType, data: object): Promise<boolean> {
    this.sent.push({ type, data });
    return true;
  }

  ofType(type: NotificationType): RecordedNotification[] {
    return this.sent.filter((notification) => notification.type === type);
  }

  reset(): void {
    this.sent.length = 0;
  }
}
