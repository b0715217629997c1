import { Resend } from 'resend';
import { createLogger } from '../../../shared/logger';
import type { EmailConfig } from '../config';
import type { ChangeEvent, Notifier, NotifyResult } from '../types';
import { renderChangeEmail } from './templates';

const log = createLogger('email');

export interface EmailPayload {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

/** The part of the Resend client the notifier calls */
export interface EmailClient {
  emails: {
    send(payload: EmailPayload): Promise<{
      data: { id: string } | null;
      error: { message: string } | null;
    }>;
  };
}

/**
 * Sends one email per check cycle listing every change
 */
export class EmailNotifier implements Notifier {
  readonly channel = 'email';
  private readonly client: EmailClient;

  constructor(
    private readonly config: EmailConfig,
    client?: EmailClient
  ) {
    this.client = client ?? new Resend(config.apiKey);
  }

  async notify(events: ChangeEvent[]): Promise<NotifyResult> {
    if (events.length === 0) {
      return { success: true };
    }

    const email = renderChangeEmail(events);

    try {
      const { data, error } = await this.client.emails.send({
        from: this.config.from,
        to: this.config.to,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });

      if (error) {
        log.error('Failed to send alert email:', error.message);
        return { success: false, error: error.message };
      }

      log.info(`Alert email sent to ${this.config.to.join(', ')}`, {
        messageId: data?.id,
      });
      return { success: true, messageId: data?.id };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      log.error('Error sending alert email:', message);
      return { success: false, error: message };
    }
  }
}
