/**
 * Email Notifier
 * 
 * Sends the packaging summary through the configured mail relay.
 * Delivery is best-effort: failures come back as a Result and are
 * logged as warnings, never thrown.
 */

import nodemailer, { type SendMailOptions, type Transporter } from 'nodemailer';
import { NotificationError, ok, err, type Result } from '@cruise-packager/core';
import { createLogger, type Logger } from '@cruise-packager/utils';

export interface NotificationConfig {
  to: string;
  from: string;
  smtpHost: string;
  smtpPort: number;
}

export interface NotificationReceipt {
  recipient: string;
  messageId: string;
}

export interface NotificationSink {
  send(cruiseId: string, report: string): Promise<Result<NotificationReceipt, NotificationError>>;
}

/**
 * Build the summary message for a cruise
 */
export function buildSummaryMessage(
  config: Pick<NotificationConfig, 'to' | 'from'>,
  cruiseId: string,
  report: string
): SendMailOptions {
  return {
    from: config.from,
    to: config.to,
    subject: `R2R Package Summary - ${cruiseId}`,
    text: `R2R packaging completed for cruise ${cruiseId}\n\n${report}`,
  };
}

export class EmailNotifier implements NotificationSink {
  private config: NotificationConfig;
  private transporter: Transporter;
  private logger: Logger;

  constructor(
    config: NotificationConfig,
    options: { transporter?: Transporter; logger?: Logger } = {}
  ) {
    this.config = config;
    this.logger = options.logger ?? createLogger({ module: 'notifier' });
    this.transporter = options.transporter ?? nodemailer.createTransport({
      host: config.smtpHost,
      port: config.smtpPort,
      secure: false,
    });
  }

  async send(cruiseId: string, report: string): Promise<Result<NotificationReceipt, NotificationError>> {
    const message = buildSummaryMessage(this.config, cruiseId, report);

    try {
      const info: { messageId?: unknown } = await this.transporter.sendMail(message);
      const messageId = typeof info.messageId === 'string' ? info.messageId : '';

      this.logger.info({ recipient: this.config.to, messageId }, `Summary email sent to ${this.config.to}`);
      return ok({ recipient: this.config.to, messageId });
    } catch (error) {
      const notificationError = new NotificationError(this.config.to, error);
      this.logger.warn({ recipient: this.config.to, err: error }, notificationError.message);
      return err(notificationError);
    }
  }
}
