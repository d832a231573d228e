import { NotificationChannel } from './notification-sender';
import { RenderedMessage } from './template-renderer';

export const CHANNEL_TRANSPORTS = 'CHANNEL_TRANSPORTS';

export interface ChannelTransport {
  readonly channel: NotificationChannel;
  isConfigured(): boolean;
  /** Resolves with the provider's message id. */
  deliver(address: string, message: RenderedMessage): Promise<string | undefined>;
}

/** 10-digit numbers get the default country code; everything else is digits only. */
export function formatPhoneNumber(phone: string, countryCode = '91'): string {
  const digits = phone.replace(/\D/g, '');
  return digits.length === 10 ? `${countryCode}${digits}` : digits;
}
