import { Module } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { EmailService } from './email.service';
import { MAIL_TRANSPORT_FACTORY, MailTransportFactory, SmtpSettings } from './email.types';

// STARTTLS on submission ports, implicit TLS on 465
export const smtpTransportFactory: MailTransportFactory = (settings: SmtpSettings) =>
  nodemailer.createTransport({
    host: settings.server,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: { user: settings.sender, pass: settings.password },
  });

@Module({
  providers: [
    EmailService,
    { provide: MAIL_TRANSPORT_FACTORY, useValue: smtpTransportFactory },
  ],
  exports: [EmailService],
})
export class EmailModule {}
