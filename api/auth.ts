import { z } from 'zod';
import { InvalidEmailError } from '../src/errors';
import { logger } from '../src/utils/logger';
import { authenticate, logout } from './lib/auth';
import {
  type ApiRequest,
  type ApiResponse,
  type RequestContext,
  queryParam,
  redirectHome,
  sendErrorPage,
} from './lib/http';
import { allows, resolveView } from './lib/viewRouter';

const LoginFormSchema = z.object({
  email: z.string().default(''),
});

/**
 * Auth endpoint
 * Routes: /api/auth?action=login|logout
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed. Use POST.' });
    return;
  }

  const action = queryParam(req, 'action');

  switch (action) {
    case 'login':
      await handleLogin(req, res, ctx);
      return;
    case 'logout':
      handleLogout(res, ctx);
      return;
    default:
      res.status(400).json({ error: 'Invalid action. Use: login, logout' });
  }
}

async function handleLogin(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  const { session, services } = ctx;

  if (!allows(resolveView(session, services.now()), 'login')) {
    redirectHome(res);
    return;
  }

  const parsed = LoginFormSchema.safeParse(req.body ?? {});
  const email = parsed.success ? parsed.data.email : '';

  const result = await authenticate(session, email, services.billing, services.now);

  if (!result.ok) {
    sendErrorPage(res, ctx, new InvalidEmailError(), { loginEmail: email });
    return;
  }

  redirectHome(res);
}

function handleLogout(res: ApiResponse, ctx: RequestContext): void {
  const { session, services } = ctx;
  const jobId = session.get('currentJobId');

  if (jobId) {
    services.jobs.cancelJob(jobId);
  }

  if (session.get('userId')) {
    logger.log(`[session ${session.id.slice(0, 8)}] logged out`);
  }

  logout(session);
  redirectHome(res);
}
