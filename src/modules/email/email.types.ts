import type { Transporter } from 'nodemailer';

export const MAIL_TRANSPORT_FACTORY = Symbol('MAIL_TRANSPORT_FACTORY');

export interface SmtpSettings {
  sender: string;
  password: string;
  recipient: string;
  server: string;
  port: number;
}

export type MailTransportFactory = (settings: SmtpSettings) => Transporter;

export interface SendForecastEmailOptions {
  imagePath: string;
  /** Forecast date, YYYY-MM-DD */
  forecastDate: string;
  dryRun?: boolean;
}

export interface EmailResult {
  sent: boolean;
  subject: string;
  recipient: string;
  attachmentBytes: number;
  messageId?: string;
}
