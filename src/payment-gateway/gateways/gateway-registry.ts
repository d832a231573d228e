import { GatewayId, PaymentGateway } from './payment-gateway.interface';

export const GATEWAY_REGISTRY = 'GATEWAY_REGISTRY';

/**
 * Every gateway the deployment knows about. New orders go to the active one;
 * refunds go to whichever gateway issued the transaction id.
 */
export class GatewayRegistry {
  private readonly gateways: Map<GatewayId, PaymentGateway>;

  constructor(
    gateways: PaymentGateway[],
    private readonly activeName: GatewayId,
  ) {
    this.gateways = new Map(gateways.map((g) => [g.name, g]));
  }

  get activeGatewayName(): GatewayId {
    return this.activeName;
  }

  /** The gateway for new orders, or null when it has no credentials. */
  active(): PaymentGateway | null {
    const gateway = this.gateways.get(this.activeName);
    return gateway && gateway.isConfigured() ? gateway : null;
  }

  get(name: string): PaymentGateway | null {
    for (const gateway of this.gateways.values()) {
      if (gateway.name === name) return gateway;
    }
    return null;
  }

  forTransaction(transactionId: string): PaymentGateway | null {
    for (const gateway of this.gateways.values()) {
      if (gateway.ownsTransaction(transactionId)) return gateway;
    }
    return null;
  }
}

export const isGatewayId = (value: string): value is GatewayId => value === 'razorpay' || value === 'stripe';
