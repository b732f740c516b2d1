/**
 * Billing client: checkout, subscription lookup and the customer portal.
 *
 * Lookup failures never grant access. The one exception is demo mode, which
 * has to be switched on explicitly with BILLING_DEMO_MODE=true.
 */

import Stripe from 'stripe';
import {
  AppError,
  PaymentDeclinedError,
  PlanNotConfiguredError,
  ProviderError,
} from '../../src/errors';
import type { PlanId, SubscriptionPlan, SubscriptionStatus } from '../../src/types';
import { logger } from '../../src/utils/logger';
import type { PaymentsGateway } from './stripe';
import type { Session } from './session';

const DEMO_GRANT_MS = 24 * 60 * 60 * 1000;

export interface CheckoutSession {
  id: string;
  url: string;
  planId: PlanId;
}

export interface BillingOptions {
  plans: readonly SubscriptionPlan[];
  baseUrl: string;
  demoMode: boolean;
  clock?: () => Date;
}

const inactive = (): SubscriptionStatus => ({ active: false, plan: null, validUntil: null });

/**
 * Maps anything the payments provider throws onto the app's error taxonomy.
 */
export function toBillingError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Stripe.errors.StripeCardError) {
    return new PaymentDeclinedError(error.message || 'Your payment method was declined.');
  }
  return new ProviderError('The payments provider could not complete the request. Please try again.');
}

export class BillingClient {
  private readonly clock: () => Date;

  constructor(
    private readonly gateway: PaymentsGateway,
    private readonly options: BillingOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get plans(): readonly SubscriptionPlan[] {
    return this.options.plans;
  }

  findPlan(planId: string): SubscriptionPlan | undefined {
    return this.options.plans.find((plan) => plan.id === planId);
  }

  async createCheckoutSession(planId: string, customerEmail?: string): Promise<CheckoutSession> {
    const plan = this.findPlan(planId);

    if (!plan || !plan.providerPriceId) {
      throw new PlanNotConfiguredError(planId);
    }

    try {
      const session = await this.gateway.createCheckoutSession({
        priceId: plan.providerPriceId,
        customerEmail,
        successUrl: `${this.options.baseUrl}/?checkout=success&session_id={CHECKOUT_SESSION_ID}`,
        cancelUrl: `${this.options.baseUrl}/?checkout=cancel`,
        metadata: { plan_id: plan.id },
      });

      if (!session.url) {
        throw new ProviderError('The payments provider did not return a checkout page.');
      }

      logger.log('Checkout session created:', session.id, 'plan:', plan.id);
      return { id: session.id, url: session.url, planId: plan.id };
    } catch (error) {
      logger.error('Error creating checkout session:', error);
      throw toBillingError(error);
    }
  }

  async checkSubscription(email: string): Promise<SubscriptionStatus> {
    const now = this.clock();

    try {
      const customer = await this.gateway.findCustomerByEmail(email);
      if (!customer) {
        return inactive();
      }

      const subscription = await this.gateway.latestSubscription(customer.id);
      if (!subscription || subscription.status !== 'active') {
        return inactive();
      }

      const plan = this.options.plans.find(
        (candidate) => candidate.providerPriceId !== null && candidate.providerPriceId === subscription.priceId
      );
      if (!plan) {
        logger.warn(`Active subscription ${subscription.id} uses unknown price ${subscription.priceId}`);
        return inactive();
      }

      if (subscription.currentPeriodEnd.getTime() <= now.getTime()) {
        return inactive();
      }

      return { active: true, plan: plan.id, validUntil: subscription.currentPeriodEnd };
    } catch (error) {
      logger.error('Subscription lookup failed:', error);

      if (this.options.demoMode) {
        logger.warn(`BILLING_DEMO_MODE: granting a demo pro plan to ${email} after a failed lookup`);
        return { active: true, plan: 'pro', validUntil: new Date(now.getTime() + DEMO_GRANT_MS) };
      }

      return inactive();
    }
  }

  async createPortalSession(email: string, returnUrl: string): Promise<{ url: string }> {
    try {
      const customer = await this.gateway.findCustomerByEmail(email);
      if (!customer) {
        throw new ProviderError('No billing account was found for this email.');
      }
      return await this.gateway.createPortalSession(customer.id, returnUrl);
    } catch (error) {
      logger.error('Error creating customer portal session:', error);
      throw toBillingError(error);
    }
  }
}

/**
 * Writes a subscription check into the session. A session only counts as
 * subscribed with a catalog plan and a period end still ahead of `now`.
 */
export function applySubscription(session: Session, status: SubscriptionStatus, now: Date): void {
  let plan: PlanId | null = null;
  let validUntil: Date | null = null;

  if (status.active && status.plan && status.validUntil && status.validUntil.getTime() > now.getTime()) {
    plan = status.plan;
    validUntil = status.validUntil;
  }

  session.set('isSubscribed', plan !== null);
  session.set('plan', plan ?? 'none');
  session.set('validUntil', validUntil);
  session.set('lastVerifiedAt', now);
}
