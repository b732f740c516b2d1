import type { Notice } from '../src/types';
import { type ApiRequest, type ApiResponse, type RequestContext, queryParam, sendPage } from './lib/http';
import { refreshSession } from './lib/viewRouter';

/**
 * The single page. Coming back from checkout (?checkout=success|cancel)
 * re-verifies the subscription before the view is picked.
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.status(405).json({ error: 'Method not allowed. Use GET.' });
    return;
  }

  const checkout = queryParam(req, 'checkout');
  const checkoutReturned = checkout === 'success' || checkout === 'cancel' ? checkout : undefined;

  const view = await refreshSession(ctx.session, ctx.services.billing, ctx.services.now(), { checkoutReturned });

  let notice: Notice | undefined;
  if (view !== 'landing' && checkoutReturned === 'success') {
    notice =
      view === 'workspace'
        ? { kind: 'success', message: 'Your subscription is active. Happy diagramming!' }
        : { kind: 'info', message: 'We could not confirm your subscription yet. Give it a moment and check again.' };
  } else if (view !== 'landing' && checkoutReturned === 'cancel') {
    notice = { kind: 'info', message: 'Checkout was cancelled.' };
  }

  sendPage(res, ctx, 200, { notice });
}
