export const NOTIFICATION_SENDER = 'NOTIFICATION_SENDER';

export const NOTIFICATION_CHANNELS = ['sms', 'whatsapp', 'email'] as const;

export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export type TemplateKey = 'fee_reminder' | 'payment_confirmation' | 'refund_confirmation';

export interface NotificationRecipient {
  name: string;
  phone?: string | null;
  email?: string | null;
}

export interface DeliveryResult {
  ok: boolean;
  error?: string;
  providerReference?: string;
}

export type TemplateVariables = Record<string, string | number>;

/** Outbound messaging. Implementations report failures in the result and never throw. */
export interface NotificationSender {
  send(
    recipient: NotificationRecipient,
    channel: NotificationChannel,
    templateKey: TemplateKey,
    variables: TemplateVariables,
  ): Promise<DeliveryResult>;
}

export const isNotificationChannel = (value: string): value is NotificationChannel =>
  NOTIFICATION_CHANNELS.some((channel) => channel === value);
