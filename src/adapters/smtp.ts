/**
 * SMTP email transport
 * STARTTLS submission with username/app-password authentication.
 */

import nodemailer, { type Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
}

export interface MailSendResult {
  accepted: string[];
  rejected: string[];
}

export interface MailTransport {
  send(message: MailMessage): Promise<MailSendResult>;
  close(): void;
}

export interface SmtpOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
}

function addressList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map(entry =>
    typeof entry === 'object' && entry !== null && 'address' in entry ? String(entry.address) : String(entry)
  );
}

export class SmtpMailTransport implements MailTransport {
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(private readonly options: SmtpOptions, transporter?: Transporter<SMTPTransport.SentMessageInfo>) {
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: options.host,
        port: options.port,
        secure: options.port === 465,
        requireTLS: options.port !== 465,
        auth: {
          user: options.user,
          pass: options.password
        },
        connectionTimeout: 10000,
        greetingTimeout: 10000,
        socketTimeout: 30000
      });
  }

  async send(message: MailMessage): Promise<MailSendResult> {
    const info = await this.transporter.sendMail({
      from: this.options.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html
    });
    return {
      accepted: addressList(info.accepted),
      rejected: addressList(info.rejected)
    };
  }

  close(): void {
    this.transporter.close();
  }
}
