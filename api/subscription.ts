import { z } from 'zod';
import { InvalidInputError } from '../src/errors';
import { applySubscription } from './lib/billing';
import {
  type ApiRequest,
  type ApiResponse,
  type RequestContext,
  queryParam,
  redirectHome,
  sendErrorPage,
} from './lib/http';
import { allows, resolveView } from './lib/viewRouter';

const CheckoutFormSchema = z.object({
  plan_id: z.string().min(1),
});

/**
 * Unified subscription endpoint
 * Routes: /api/subscription?action=check-status|create-checkout|portal
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  const action = queryParam(req, 'action');

  switch (action) {
    case 'check-status':
      await handleCheckStatus(req, res, ctx);
      return;
    case 'create-checkout':
      await handleCreateCheckout(req, res, ctx);
      return;
    case 'portal':
      await handlePortal(req, res, ctx);
      return;
    default:
      res.status(400).json({ error: 'Invalid action. Use: check-status, create-checkout, portal' });
  }
}

// Re-verifies the signed-in user's subscription and reports it
async function handleCheckStatus(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'GET' && req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed. Use GET or POST.' });
    return;
  }

  const { session, services } = ctx;
  const email = session.get('userEmail');

  if (!email) {
    res.status(401).json({ error: 'Not signed in' });
    return;
  }

  const now = services.now();
  const status = await services.billing.checkSubscription(email);
  applySubscription(session, status, now);

  const validUntil = session.get('validUntil');
  res.status(200).json({
    plan_type: session.get('plan'),
    status: session.get('isSubscribed') ? 'active' : 'inactive',
    valid_until: validUntil ? validUntil.toISOString() : null,
    view: resolveView(session, now),
  });
}

async function handleCreateCheckout(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed. Use POST.' });
    return;
  }

  const { session, services } = ctx;

  if (!allows(resolveView(session, services.now()), 'create-checkout')) {
    redirectHome(res);
    return;
  }

  const parsed = CheckoutFormSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    sendErrorPage(res, ctx, new InvalidInputError('Please choose a plan.'));
    return;
  }

  try {
    const checkout = await services.billing.createCheckoutSession(parsed.data.plan_id, session.get('userEmail') ?? undefined);
    session.set('pendingCheckoutPlan', checkout.planId);
    res.redirect(303, checkout.url);
  } catch (error) {
    sendErrorPage(res, ctx, error);
  }
}

async function handlePortal(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed. Use POST.' });
    return;
  }

  const { session, services } = ctx;
  const email = session.get('userEmail');

  if (!email || !allows(resolveView(session, services.now()), 'portal')) {
    redirectHome(res);
    return;
  }

  try {
    const portal = await services.billing.createPortalSession(email, `${services.config.baseUrl}/`);
    res.redirect(303, portal.url);
  } catch (error) {
    sendErrorPage(res, ctx, error);
  }
}
