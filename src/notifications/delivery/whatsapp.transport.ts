import axios, { AxiosInstance } from 'axios';
import { ConfigService } from '../../config/config.service';
import { ChannelTransport, formatPhoneNumber } from './channel-transport';
import { RenderedMessage } from './template-renderer';

interface WhatsAppResponse {
  messages?: Array<{ id?: string }>;
}

/** WhatsApp Business Cloud API text messages; `url` is the phone number's /messages endpoint. */
export class WhatsAppTransport implements ChannelTransport {
  readonly channel = 'whatsapp' as const;

  constructor(
    private readonly http: Pick<AxiosInstance, 'post'>,
    private readonly settings: { url: string; token: string },
  ) {}

  static fromConfig(config: ConfigService, http: Pick<AxiosInstance, 'post'> = axios): WhatsAppTransport {
    return new WhatsAppTransport(http, {
      url: config.getOptional('WHATSAPP_API_URL'),
      token: config.getOptional('WHATSAPP_API_KEY'),
    });
  }

  isConfigured(): boolean {
    return Boolean(this.settings.url && this.settings.token);
  }

  async deliver(address: string, message: RenderedMessage): Promise<string | undefined> {
    if (!this.isConfigured()) {
      throw new Error('WhatsApp API not configured');
    }
    const response = await this.http.post<WhatsAppResponse>(
      this.settings.url,
      {
        messaging_product: 'whatsapp',
        to: formatPhoneNumber(address),
        type: 'text',
        text: { body: message.body },
      },
      {
        headers: { Authorization: `Bearer ${this.settings.token}`, 'Content-Type': 'application/json' },
        timeout: 30000,
      },
    );
    return response.data?.messages?.[0]?.id;
  }
}
