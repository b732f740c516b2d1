import Stripe from 'stripe';
import { describe, expect, it } from 'vitest';
import { PaymentDeclinedError, PlanNotConfiguredError, ProviderError } from '../../src/errors';
import { BillingClient, applySubscription, toBillingError } from '../lib/billing';
import { SessionStore } from '../lib/session';
import { FakeGateway, NEXT_MONTH, NOW, PRO_PRICE, testConfig } from './helpers';

function createBilling(options: { demoMode?: boolean } = {}) {
  const gateway = new FakeGateway();
  const config = testConfig();
  const billing = new BillingClient(gateway, {
    plans: config.plans,
    baseUrl: config.baseUrl,
    demoMode: options.demoMode ?? false,
    clock: () => NOW,
  });
  return { gateway, billing };
}

describe('BillingClient.createCheckoutSession', () => {
  it('creates a subscription checkout for a configured plan', async () => {
    const { gateway, billing } = createBilling();

    const checkout = await billing.createCheckoutSession('pro', 'a@b.ch');

    expect(checkout).toEqual({
      id: 'cs_test_1',
      url: `https://checkout.example.test/pay?price=${PRO_PRICE}`,
      planId: 'pro',
    });
    expect(gateway.checkoutCalls).toEqual([
      {
        priceId: PRO_PRICE,
        customerEmail: 'a@b.ch',
        successUrl: 'http://localhost:3000/?checkout=success&session_id={CHECKOUT_SESSION_ID}',
        cancelUrl: 'http://localhost:3000/?checkout=cancel',
        metadata: { plan_id: 'pro' },
      },
    ]);
  });

  it('refuses a plan without a price id', async () => {
    const { gateway, billing } = createBilling();

    await expect(billing.createCheckoutSession('enterprise')).rejects.toBeInstanceOf(PlanNotConfiguredError);
    expect(gateway.checkoutCalls).toHaveLength(0);
  });

  it('refuses a plan that is not in the catalog', async () => {
    const { billing } = createBilling();

    await expect(billing.createCheckoutSession('platinum')).rejects.toMatchObject({ code: 'PlanNotConfigured' });
  });

  it('reports a declined card with the provider message', async () => {
    const { gateway, billing } = createBilling();
    gateway.checkoutError = new Stripe.errors.StripeCardError({
      type: 'card_error',
      message: 'Your card was declined.',
    });

    const error = await billing.createCheckoutSession('pro').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PaymentDeclinedError);
    expect(error).toMatchObject({ code: 'PaymentDeclined', message: 'Your card was declined.', status: 402 });
  });

  it('reports any other provider failure as ProviderError', async () => {
    const { gateway, billing } = createBilling();
    gateway.checkoutError = new Error('socket hang up');

    await expect(billing.createCheckoutSession('pro')).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('BillingClient.checkSubscription', () => {
  it('is inactive for an unknown customer', async () => {
    const { billing } = createBilling();

    await expect(billing.checkSubscription('nobody@example.com')).resolves.toEqual({
      active: false,
      plan: null,
      validUntil: null,
    });
  });

  it('only treats status "active" as active', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('late@example.com', 'past_due', PRO_PRICE);
    gateway.subscribe('trial@example.com', 'trialing', PRO_PRICE);

    expect((await billing.checkSubscription('late@example.com')).active).toBe(false);
    expect((await billing.checkSubscription('trial@example.com')).active).toBe(false);
  });

  it('returns the plan and period end of an active subscription', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('a@b.ch', 'active', PRO_PRICE);

    await expect(billing.checkSubscription('a@b.ch')).resolves.toEqual({
      active: true,
      plan: 'pro',
      validUntil: NEXT_MONTH,
    });
  });

  it('does not grant access for a price outside the catalog', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('a@b.ch', 'active', 'price_someone_else');

    expect((await billing.checkSubscription('a@b.ch')).active).toBe(false);
  });

  it('does not grant access for a period that already ended', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('a@b.ch', 'active', PRO_PRICE, new Date('2026-02-28T00:00:00.000Z'));

    expect((await billing.checkSubscription('a@b.ch')).active).toBe(false);
  });

  it('falls back to inactive when the lookup fails', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('a@b.ch', 'active', PRO_PRICE);
    gateway.failLookups = true;

    expect((await billing.checkSubscription('a@b.ch')).active).toBe(false);
  });

  it('grants a one-day pro demo on lookup failure only in demo mode', async () => {
    const { gateway, billing } = createBilling({ demoMode: true });
    gateway.failLookups = true;

    await expect(billing.checkSubscription('a@b.ch')).resolves.toEqual({
      active: true,
      plan: 'pro',
      validUntil: new Date('2026-03-02T12:00:00.000Z'),
    });
  });
});

describe('BillingClient.createPortalSession', () => {
  it('opens the portal for a known customer', async () => {
    const { gateway, billing } = createBilling();
    gateway.subscribe('a@b.ch', 'active', PRO_PRICE);

    const portal = await billing.createPortalSession('a@b.ch', 'http://localhost:3000/');

    expect(portal.url).toBe('https://billing.example.test/portal/cus_1?return=http%3A%2F%2Flocalhost%3A3000%2F');
  });

  it('fails with ProviderError when there is no customer', async () => {
    const { billing } = createBilling();

    await expect(billing.createPortalSession('nobody@example.com', 'http://localhost:3000/')).rejects.toMatchObject({
      code: 'ProviderError',
      message: 'No billing account was found for this email.',
    });
  });
});

describe('toBillingError', () => {
  it('passes app errors through unchanged', () => {
    const original = new PlanNotConfiguredError('pro');
    expect(toBillingError(original)).toBe(original);
  });

  it('maps non-card provider errors to ProviderError', () => {
    const error = new Stripe.errors.StripeAPIError({ type: 'api_error', message: 'Internal error' });
    expect(toBillingError(error)).toBeInstanceOf(ProviderError);
  });
});

describe('applySubscription', () => {
  it('marks the session subscribed for an active status', () => {
    const { session } = new SessionStore(60_000).open();

    applySubscription(session, { active: true, plan: 'pro', validUntil: NEXT_MONTH }, NOW);

    expect(session.snapshot()).toMatchObject({
      isSubscribed: true,
      plan: 'pro',
      validUntil: NEXT_MONTH,
      lastVerifiedAt: NOW,
    });
  });

  it('never leaves a session subscribed without a future period end', () => {
    const { session } = new SessionStore(60_000).open();
    session.set('isSubscribed', true);
    session.set('plan', 'pro');

    applySubscription(session, { active: true, plan: 'pro', validUntil: NOW }, NOW);

    expect(session.snapshot()).toMatchObject({ isSubscribed: false, plan: 'none', validUntil: null });
  });
});
