import axios, { AxiosInstance } from 'axios';
import { ConfigService } from '../../config/config.service';
import { ChannelTransport, formatPhoneNumber } from './channel-transport';
import { RenderedMessage } from './template-renderer';

interface SmsGatewayResponse {
  status?: string;
  message?: string;
  message_id?: string;
}

/** Form-encoded bulk SMS gateway (apikey / sender / numbers / message). */
export class SmsTransport implements ChannelTransport {
  readonly channel = 'sms' as const;

  constructor(
    private readonly http: Pick<AxiosInstance, 'post'>,
    private readonly settings: { url: string; apiKey: string; senderId: string },
  ) {}

  static fromConfig(config: ConfigService, http: Pick<AxiosInstance, 'post'> = axios): SmsTransport {
    return new SmsTransport(http, {
      url: config.getOptional('SMS_API_URL'),
      apiKey: config.getOptional('SMS_API_KEY'),
      senderId: config.getOptional('SMS_SENDER_ID', 'SCHOOL'),
    });
  }

  isConfigured(): boolean {
    return Boolean(this.settings.url && this.settings.apiKey);
  }

  async deliver(address: string, message: RenderedMessage): Promise<string | undefined> {
    if (!this.isConfigured()) {
      throw new Error('SMS gateway not configured');
    }
    const form = new URLSearchParams({
      apikey: this.settings.apiKey,
      sender: this.settings.senderId,
      numbers: formatPhoneNumber(address),
      message: message.body,
    });
    const response = await this.http.post<SmsGatewayResponse>(this.settings.url, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: 30000,
    });
    if (response.data?.status !== 'success') {
      throw new Error(response.data?.message || 'SMS sending failed');
    }
    return response.data.message_id;
  }
}
