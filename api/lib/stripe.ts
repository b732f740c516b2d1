import Stripe from 'stripe';

/**
 * The slice of the payments provider the billing code needs.
 * StripeGateway is the only production implementation; tests swap in a fake.
 */
export interface PaymentsGateway {
  findCustomerByEmail(email: string): Promise<{ id: string } | null>;
  latestSubscription(customerId: string): Promise<ProviderSubscription | null>;
  createCheckoutSession(params: CheckoutParams): Promise<{ id: string; url: string | null }>;
  createPortalSession(customerId: string, returnUrl: string): Promise<{ url: string }>;
}

export interface ProviderSubscription {
  id: string;
  status: string;
  priceId: string | null;
  currentPeriodEnd: Date;
}

export interface CheckoutParams {
  priceId: string;
  customerEmail?: string;
  successUrl: string;
  cancelUrl: string;
  metadata: Record<string, string>;
}

let _stripe: Stripe | null = null;

export function getStripe(secretKey: string): Stripe {
  if (!_stripe) {
    _stripe = new Stripe(secretKey);
  }
  return _stripe;
}

export class StripeGateway implements PaymentsGateway {
  constructor(private readonly stripe: Stripe) {}

  async findCustomerByEmail(email: string): Promise<{ id: string } | null> {
    const customers = await this.stripe.customers.list({ email, limit: 1 });
    const customer = customers.data[0];
    return customer ? { id: customer.id } : null;
  }

  /**
   * Stripe lists subscriptions newest first, so the first entry of an
   * unfiltered list is the customer's most recent subscription.
   */
  async latestSubscription(customerId: string): Promise<ProviderSubscription | null> {
    const subscriptions = await this.stripe.subscriptions.list({
      customer: customerId,
      status: 'all',
      limit: 1,
    });
    const subscription = subscriptions.data[0];

    if (!subscription) {
      return null;
    }

    return {
      id: subscription.id,
      status: subscription.status,
      priceId: subscription.items.data[0]?.price.id ?? null,
      currentPeriodEnd: new Date(subscription.current_period_end * 1000),
    };
  }

  async createCheckoutSession(params: CheckoutParams): Promise<{ id: string; url: string | null }> {
    const session = await this.stripe.checkout.sessions.create({
      mode: 'subscription',
      line_items: [
        {
          price: params.priceId,
          quantity: 1,
        },
      ],
      customer_email: params.customerEmail,
      success_url: params.successUrl,
      cancel_url: params.cancelUrl,
      metadata: params.metadata,
      subscription_data: {
        metadata: params.metadata,
      },
      allow_promotion_codes: true,
    });

    return { id: session.id, url: session.url };
  }

  async createPortalSession(customerId: string, returnUrl: string): Promise<{ url: string }> {
    const session = await this.stripe.billingPortal.sessions.create({
      customer: customerId,
      return_url: returnUrl,
    });

    return { url: session.url };
  }
}
