import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { env } from '../env';
import { log } from '../log';
import type { EmailContent, EmailRecipient, Notifier, SentEmail } from './types';

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
}

export function smtpSettingsFromEnv(): SmtpSettings {
  return {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE || env.SMTP_PORT === 465,
    user: env.SMTP_USER,
    password: env.SMTP_PASSWORD,
    from: env.SUMMARY_SENDER_EMAIL,
  };
}

export class SmtpNotifier implements Notifier {
  private readonly transporter: Transporter;
  private readonly from: string;

  constructor(settings: SmtpSettings = smtpSettingsFromEnv(), transporter?: Transporter) {
    this.from = settings.from;
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: settings.host,
        port: settings.port,
        secure: settings.secure,
        auth: settings.user ? { user: settings.user, pass: settings.password } : undefined,
      });
  }

  public async sendSummaryEmail(recipient: EmailRecipient, content: EmailContent): Promise<SentEmail> {
    const info = await this.transporter.sendMail({
      from: this.from,
      to: recipient.name ? { name: recipient.name, address: recipient.address } : recipient.address,
      subject: content.subject,
      html: content.html,
      text: content.text,
    });

    const messageId = typeof info.messageId === 'string' ? info.messageId : 'unknown';
    log.info(
      { event: 'summary_email_sent', recipient: recipient.address, message_id: messageId },
      'summary email sent',
    );
    return { messageId };
  }
}
