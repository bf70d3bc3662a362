import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import {
  EmailResult,
  MAIL_TRANSPORT_FACTORY,
  MailTransportFactory,
  SendForecastEmailOptions,
  SmtpSettings,
} from './email.types';
import { formatDisplayDate } from '../utils/dates';
import { AssetMissingError, ConfigurationError, isNotFoundError } from '../utils/errors';

const REQUIRED_SETTINGS = {
  EMAIL_ADDRESS: 'sender email address',
  EMAIL_PASSWORD: 'SMTP password or app password',
  RECIPIENT_EMAIL: 'recipient email address',
  SMTP_SERVER: 'SMTP server host',
  SMTP_PORT: 'SMTP port',
} as const;

export function forecastSubject(forecastDate: string): string {
  return `תחזית מזג אוויר יומית - ${formatDisplayDate(forecastDate)} | Daily Weather Forecast`;
}

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private readonly templatePath: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(MAIL_TRANSPORT_FACTORY)
    private readonly createTransport: MailTransportFactory,
  ) {
    this.templatePath = resolve(
      this.configService.get<string>('EMAIL_TEMPLATE_FILE', 'templates/email.html'),
    );
  }

  /**
   * Read and check the SMTP settings. Every missing variable is listed in one error.
   */
  getSettings(): SmtpSettings {
    const missing = Object.entries(REQUIRED_SETTINGS)
      .filter(([name]) => {
        const value = this.configService.get<string | number>(name);
        return value === undefined || value === '';
      })
      .map(([name, description]) => `${name} (${description})`);

    if (missing.length > 0) {
      throw new ConfigurationError(
        `Missing email settings: ${missing.join(', ')}. Copy .env.example to .env and fill them in.`,
      );
    }

    const port = Number(this.configService.get<string | number>('SMTP_PORT'));
    if (!Number.isInteger(port) || port <= 0) {
      throw new ConfigurationError('SMTP_PORT must be a positive integer');
    }

    return {
      sender: this.configService.get<string>('EMAIL_ADDRESS', ''),
      password: this.configService.get<string>('EMAIL_PASSWORD', ''),
      recipient: this.configService.get<string>('RECIPIENT_EMAIL', ''),
      server: this.configService.get<string>('SMTP_SERVER', ''),
      port,
    };
  }

  async renderBody(forecastDate: string): Promise<string> {
    let template: string;
    try {
      template = await readFile(this.templatePath, 'utf8');
    } catch (error) {
      throw new AssetMissingError('template', this.templatePath, error);
    }
    return template.replaceAll('{{forecastDate}}', formatDisplayDate(forecastDate));
  }

  async send({
    imagePath,
    forecastDate,
    dryRun = false,
  }: SendForecastEmailOptions): Promise<EmailResult> {
    const settings = this.getSettings();
    this.logger.log(
      `SMTP ${settings.server}:${settings.port}, from ${settings.sender} to ${settings.recipient}`,
    );

    const subject = forecastSubject(forecastDate);
    const html = await this.renderBody(forecastDate);
    const attachment = await this.readAttachment(imagePath, dryRun);

    if (dryRun) {
      this.logger.log(`[DRY RUN] Email not sent. Subject: ${subject}`);
      if (attachment) {
        this.logger.log(
          `[DRY RUN] Attachment: ${basename(imagePath)} (${attachment.length} bytes)`,
        );
      }
      return {
        sent: false,
        subject,
        recipient: settings.recipient,
        attachmentBytes: attachment?.length ?? 0,
      };
    }

    if (!attachment) {
      throw new AssetMissingError('image', imagePath);
    }

    const transporter = this.createTransport(settings);
    const info = await transporter.sendMail({
      from: settings.sender,
      to: settings.recipient,
      subject,
      html,
      attachments: [
        {
          filename: basename(imagePath),
          content: attachment,
          contentType: 'image/jpeg',
        },
      ],
    });

    this.logger.log(`Email sent to ${settings.recipient} (${info.messageId})`);
    return {
      sent: true,
      subject,
      recipient: settings.recipient,
      attachmentBytes: attachment.length,
      messageId: info.messageId,
    };
  }

  private async readAttachment(imagePath: string, dryRun: boolean): Promise<Buffer | null> {
    try {
      return await readFile(imagePath);
    } catch (error) {
      if (dryRun && isNotFoundError(error)) {
        this.logger.warn(`[DRY RUN] Forecast image ${imagePath} does not exist yet`);
        return null;
      }
      throw new AssetMissingError('image', imagePath, error);
    }
  }
}
