import nodemailer, { Transporter } from 'nodemailer';
import { Logger } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { ChannelTransport } from './channel-transport';
import { RenderedMessage } from './template-renderer';

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const toHtml = (body: string): string =>
  `<div style="font-family: Arial, sans-serif; line-height: 1.6;">${escapeHtml(body).replace(/\n/g, '<br>')}</div>`;

export class EmailTransport implements ChannelTransport {
  readonly channel = 'email' as const;
  private readonly logger = new Logger(EmailTransport.name);
  private readonly from: string;

  constructor(
    private readonly transporter: Pick<Transporter, 'sendMail'> | null,
    from: string,
  ) {
    this.from = from;
  }

  static fromConfig(config: ConfigService): EmailTransport {
    const host = config.getOptional('EMAIL_HOST');
    const user = config.getOptional('EMAIL_USER');
    const password = config.getOptional('EMAIL_PASSWORD');
    const from = config.getOptional('EMAIL_FROM', 'School Fees <noreply@localhost>');

    if (!host || !user || !password) {
      const missing = [!host && 'EMAIL_HOST', !user && 'EMAIL_USER', !password && 'EMAIL_PASSWORD'].filter(Boolean);
      new Logger(EmailTransport.name).warn(
        `Email credentials not configured, email sending will be disabled (missing: ${missing.join(', ')})`,
      );
      return new EmailTransport(null, from);
    }

    const port = config.getNumber('EMAIL_PORT', 587);
    const secure = port === 465;
    const transporter = nodemailer.createTransport({
      host,
      port,
      secure,
      auth: { user, pass: password },
      ...(secure ? {} : { requireTLS: true }),
      connectionTimeout: 20000,
      greetingTimeout: 20000,
      socketTimeout: 20000,
    });
    return new EmailTransport(transporter, from);
  }

  isConfigured(): boolean {
    return this.transporter !== null;
  }

  async deliver(address: string, message: RenderedMessage): Promise<string | undefined> {
    if (!this.transporter) {
      throw new Error('Email transport not configured');
    }
    const info = await this.transporter.sendMail({
      from: this.from,
      to: address,
      subject: message.subject ?? 'School fee notification',
      text: message.body,
      html: toHtml(message.body),
    });
    this.logger.log(`Email sent to ${address} (messageId=${info.messageId})`);
    return typeof info.messageId === 'string' ? info.messageId : undefined;
  }
}
