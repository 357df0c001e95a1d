/**
 * Outbound mail.
 */

import nodemailer from "nodemailer";
import { toTransient } from "../errors.js";

export interface MailSender {
  send(to: string, subject: string, body: string): Promise<void>;
}

export interface SmtpSenderOptions {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  password?: string;
  from: string;
}

function createSmtpTransport(options: SmtpSenderOptions) {
  return nodemailer.createTransport({
    host: options.host,
    port: options.port,
    secure: options.secure,
    auth: options.user ? { user: options.user, pass: options.password ?? "" } : undefined,
  });
}

export class SmtpMailSender implements MailSender {
  private readonly transporter: ReturnType<typeof createSmtpTransport>;

  constructor(private readonly options: SmtpSenderOptions) {
    this.transporter = createSmtpTransport(options);
  }

  async send(to: string, subject: string, body: string): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.options.from,
        to,
        subject,
        text: body,
      });
    } catch (err) {
      throw toTransient("smtp", err);
    }
  }

  close(): void {
    this.transporter.close();
  }
}
