import sgMail from '@sendgrid/mail';
import { logger } from '../../utils/logger';
import { toProviderError } from '../../utils/errors';

export interface SendGridConfig {
  apiKey?: string;
  fromEmail?: string;
}

export interface OutboundEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
  from?: string;
  cc?: string[];
}

export interface EmailSender {
  isConfigured(): boolean;
  sendEmail(message: OutboundEmail): Promise<string | null>;
}

export class SendGridAdapter implements EmailSender {
  constructor(private config: SendGridConfig) {
    if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
    }
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey && this.config.fromEmail);
  }

  /** Resolves with SendGrid's message id when the response carries one. */
  async sendEmail(message: OutboundEmail): Promise<string | null> {
    const from = message.from || this.config.fromEmail;
    if (!this.config.apiKey || !from) {
      throw new Error('SendGrid not configured');
    }

    try {
      const [response] = await sgMail.send({
        to: message.to,
        from,
        cc: message.cc && message.cc.length > 0 ? message.cc : undefined,
        subject: message.subject,
        text: message.text,
        html: message.html || message.text,
      });

      const messageId = response.headers['x-message-id'];
      logger.info('Email sent', { to: message.to, subject: message.subject });
      return typeof messageId === 'string' ? messageId : null;
    } catch (error) {
      const wrapped = toProviderError('SendGrid', 'sendEmail', error);
      logger.error('SendGrid email failed', { to: message.to, subject: message.subject, error: wrapped.message });
      throw wrapped;
    }
  }
}
