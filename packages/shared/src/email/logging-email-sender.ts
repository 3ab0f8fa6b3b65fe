import { type EmailSender, type EmailRecipient } from '@murmur/domain';
import { type SafeLogger } from '../logger';

/**
 * Stands in for a mail provider: records which template went to which user.
 * Addresses and links are redacted by the logger, so nothing sensitive lands
 * in the log stream.
 */
export class LoggingEmailSender implements EmailSender {
  constructor(private readonly logger: SafeLogger) {}

  async sendEmailConfirmation(to: EmailRecipient, confirmationLink: string): Promise<void> {
    this.record('email-confirmation', to, { link: confirmationLink });
  }

  async sendWelcome(to: EmailRecipient): Promise<void> {
    this.record('welcome', to);
  }

  async sendPasswordReset(to: EmailRecipient, resetLink: string): Promise<void> {
    this.record('password-reset', to, { link: resetLink });
  }

  async sendPasswordChanged(to: EmailRecipient): Promise<void> {
    this.record('password-changed', to);
  }

  private record(template: string, to: EmailRecipient, extra: Record<string, unknown> = {}): void {
    this.logger.info({ template, userId: to.userId, email: to.email, ...extra }, 'Email queued');
  }
}
