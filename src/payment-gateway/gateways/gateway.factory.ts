import { Logger } from '@nestjs/common';
import { ConfigService } from '../../config/config.service';
import { GatewayRegistry, isGatewayId } from './gateway-registry';
import { RazorpayGateway, createRazorpayClient } from './razorpay.gateway';
import { StripeGateway } from './stripe.gateway';

const logger = new Logger('PaymentGateways');

export function createGatewayRegistry(config: ConfigService): GatewayRegistry {
  const razorpaySettings = {
    keyId: config.getOptional('RAZORPAY_KEY_ID'),
    keySecret: config.getOptional('RAZORPAY_KEY_SECRET'),
  };
  const razorpay = new RazorpayGateway(
    razorpaySettings,
    razorpaySettings.keyId && razorpaySettings.keySecret ? createRazorpayClient(razorpaySettings) : null,
  );
  const stripe = new StripeGateway({
    secretKey: config.getOptional('STRIPE_SECRET_KEY'),
    publishableKey: config.getOptional('STRIPE_PUBLISHABLE_KEY') || undefined,
  });

  const requested = config.getOptional('PAYMENT_GATEWAY', 'razorpay').toLowerCase();
  const active = isGatewayId(requested) ? requested : 'razorpay';
  if (active !== requested) {
    logger.warn(`Unknown PAYMENT_GATEWAY "${requested}", using razorpay`);
  }

  const registry = new GatewayRegistry([razorpay, stripe], active);
  if (!registry.active()) {
    logger.warn(`Payment gateway ${active} has no credentials; online orders will be mock orders`);
  }
  return registry;
}
