import type { EmailConfig } from '../config';
import type { Notifier } from '../types';
import { EmailNotifier } from './emailNotifier';

export { EmailNotifier } from './emailNotifier';
export type { EmailClient, EmailPayload } from './emailNotifier';
export { ALERT_SUBJECT, escapeHtml, renderChangeEmail } from './templates';
export type { RenderedEmail } from './templates';

/**
 * Email notifier when alerts are configured, otherwise none
 */
export function createNotifier(email: EmailConfig | null): Notifier | null {
  return email ? new EmailNotifier(email) : null;
}
