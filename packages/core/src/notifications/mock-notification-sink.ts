import type { NotificationSink } from './notification-sink'

/**
 * In-memory NotificationSink for testing
 */
export class MockNotificationSink implements NotificationSink {
  readonly alerts: Array<{ subject: string; body: string }> = []

  async alert(subject: string, body: string): Promise<void> {
    this.alerts.push({ subject, body })
  }

  subjects(): string[] {
    return this.alerts.map(a => a.subject)
  }
}
