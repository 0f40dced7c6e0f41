import { type Logger, NoopLogger } from '@tradeloop/shared'
import nodemailer from 'nodemailer'
import type { NotificationConfig } from '../config/app-config'
import { errorMessage, NotificationError } from '../errors'

/**
 * Best-effort operator alerts. `alert` never rejects.
 */
export interface NotificationSink {
  alert(subject: string, body: string): Promise<void>
}

export interface MailMessage {
  readonly from: string
  readonly to: string
  readonly subject: string
  readonly text: string
}

/**
 * The slice of a nodemailer transporter used here
 */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>
}

/**
 * SMTP over implicit TLS
 */
export function createSmtpTransport(config: NotificationConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.smtpHost,
    port: config.smtpPort,
    secure: true,
    auth: {
      user: config.email,
      pass: config.password,
    },
  })
}

/**
 * Mails the operator's own address
 */
export class EmailNotificationSink implements NotificationSink {
  private readonly logger: Logger

  constructor(
    private readonly transport: MailTransport,
    private readonly address: string,
    logger: Logger = new NoopLogger()
  ) {
    this.logger = logger.child('notifications')
  }

  async alert(subject: string, body: string): Promise<void> {
    try {
      await this.transport.sendMail({ from: this.address, to: this.address, subject, text: body })
      this.logger.info('Alert sent', { subject })
    } catch (error) {
      const failure = new NotificationError(`Failed to send alert "${subject}": ${errorMessage(error)}`, {
        cause: error,
      })
      this.logger.warn(failure.message, { error: failure })
    }
  }
}

/**
 * Writes alerts to the log only
 */
export class LogNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  async alert(subject: string, body: string): Promise<void> {
    this.logger.info(`ALERT: ${subject}`, { body })
  }
}
