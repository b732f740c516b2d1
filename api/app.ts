import cookieParser from 'cookie-parser';
import express, { type Request, type Response } from 'express';
import type { AppConfig } from '../src/config';
import { logger } from '../src/utils/logger';
import authHandler from './auth';
import cancelJobHandler from './cancel-job';
import imageHandler from './image';
import jobStatusHandler from './job-status';
import { BillingClient } from './lib/billing';
import { CliDiagramPipeline, DiagramClient, type DiagramPipeline } from './lib/diagram';
import type { AppServices, Handler } from './lib/http';
import { JobRegistry } from './lib/jobs';
import { SESSION_COOKIE, SessionStore } from './lib/session';
import { StripeGateway, getStripe, type PaymentsGateway } from './lib/stripe';
import pageHandler from './page';
import startJobHandler from './start-job';
import subscriptionHandler from './subscription';

export interface ServiceOverrides {
  gateway?: PaymentsGateway;
  pipeline?: DiagramPipeline;
  now?: () => Date;
}

/**
 * Wires the process-wide services. Built once at startup; the plan catalog
 * and the Stripe client are never mutated afterwards.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
  const now = overrides.now ?? (() => new Date());
  const gateway = overrides.gateway ?? new StripeGateway(getStripe(config.stripeSecretKey));
  const pipeline = overrides.pipeline ?? new CliDiagramPipeline(config.generation);

  const billing = new BillingClient(gateway, {
    plans: config.plans,
    baseUrl: config.baseUrl,
    demoMode: config.billingDemoMode,
    clock: now,
  });
  const diagrams = new DiagramClient(pipeline, {
    outputDir: config.generation.outputDir,
    timeoutMs: config.generation.timeoutMs,
  });

  return {
    config,
    sessions: new SessionStore(config.sessionTtlMs, () => now().getTime()),
    billing,
    jobs: new JobRegistry(diagrams, config.sessionTtlMs, () => now().getTime()),
    now,
  };
}

/**
 * Adapts a handler to Express: resolves the session from its cookie and runs
 * the handler inside that session's exclusive section.
 */
export function route(services: AppServices, handler: Handler) {
  return (req: Request, res: Response): void => {
    const token: unknown = req.cookies?.[SESSION_COOKIE];
    const { session } = services.sessions.open(typeof token === 'string' ? token : undefined);

    res.cookie(SESSION_COOKIE, session.id, {
      httpOnly: true,
      sameSite: 'lax',
      secure: services.config.secureCookies,
      maxAge: services.config.sessionTtlMs,
    });

    session
      .runExclusive(() => handler(req, res, { services, session }))
      .catch((error: unknown) => {
        logger.error(`Error in ${req.method} ${req.path}:`, error);
        if (!res.headersSent) {
          res.status(500).json({ error: 'Internal Server Error', message: 'Something went wrong. Please try again.' });
        }
      });
  };
}

export function createApp(services: AppServices): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cookieParser());
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));
  app.use(express.json({ limit: '1mb' }));

  app.all('/', route(services, pageHandler));
  app.all('/api/auth', route(services, authHandler));
  app.all('/api/subscription', route(services, subscriptionHandler));
  app.all('/api/start-job', route(services, startJobHandler));
  app.all('/api/job-status', route(services, jobStatusHandler));
  app.all('/api/cancel-job', route(services, cancelJobHandler));
  app.all('/api/image', route(services, imageHandler));

  return app;
}
