import { Logger } from '@nestjs/common';
import { errorMessage } from '../../common/utils/errors';
import { ChannelTransport } from './channel-transport';
import {
  DeliveryResult,
  NotificationChannel,
  NotificationRecipient,
  NotificationSender,
  TemplateKey,
  TemplateVariables,
} from './notification-sender';
import { renderTemplate } from './template-renderer';

const addressFor = (recipient: NotificationRecipient, channel: NotificationChannel): string | null => {
  const address = channel === 'email' ? recipient.email : recipient.phone;
  return address && address.trim() ? address.trim() : null;
};

/** Renders the channel's template and hands it to that channel's transport. */
export class TemplatedNotificationSender implements NotificationSender {
  private readonly logger = new Logger(TemplatedNotificationSender.name);
  private readonly transports: Map<NotificationChannel, ChannelTransport>;

  constructor(transports: ChannelTransport[]) {
    this.transports = new Map(transports.map((t) => [t.channel, t]));
  }

  async send(
    recipient: NotificationRecipient,
    channel: NotificationChannel,
    templateKey: TemplateKey,
    variables: TemplateVariables,
  ): Promise<DeliveryResult> {
    const transport = this.transports.get(channel);
    if (!transport || !transport.isConfigured()) {
      return { ok: false, error: `Channel ${channel} is not configured` };
    }
    const address = addressFor(recipient, channel);
    if (!address) {
      return { ok: false, error: `No ${channel === 'email' ? 'email address' : 'phone number'} for ${recipient.name}` };
    }

    try {
      const message = renderTemplate(templateKey, channel, { recipient_name: recipient.name, ...variables });
      const providerReference = await transport.deliver(address, message);
      return providerReference ? { ok: true, providerReference } : { ok: true };
    } catch (error) {
      this.logger.warn(`${channel} ${templateKey} to ${address} failed: ${errorMessage(error)}`);
      return { ok: false, error: errorMessage(error) };
    }
  }
}
