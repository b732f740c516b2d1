/**
 * Request/response shapes the handlers are written against, and the
 * per-request context they receive.
 */

import type { AppConfig } from '../../src/config';
import { AppError } from '../../src/errors';
import type { GenerationRequest, Notice } from '../../src/types';
import { renderPage } from '../../src/ui';
import { logger } from '../../src/utils/logger';
import type { BillingClient } from './billing';
import type { JobRegistry } from './jobs';
import type { Session, SessionStore } from './session';
import { resolveView } from './viewRouter';

export interface ApiRequest {
  method: string;
  query: Record<string, unknown>;
  body: unknown;
  headers: Record<string, string | string[] | undefined>;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  send(body: string): unknown;
  redirect(status: number, url: string): void;
  setHeader(name: string, value: string): unknown;
  sendFile(path: string, callback: (error?: Error) => void): void;
  download(path: string, filename: string, callback: (error?: Error) => void): void;
}

export interface AppServices {
  config: AppConfig;
  sessions: SessionStore;
  billing: BillingClient;
  jobs: JobRegistry;
  now: () => Date;
}

export interface RequestContext {
  services: AppServices;
  session: Session;
}

export type Handler = (req: ApiRequest, res: ApiResponse, ctx: RequestContext) => Promise<void>;

export function queryParam(req: ApiRequest, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

export function wantsJson(req: ApiRequest): boolean {
  const accept = req.headers.accept;
  return typeof accept === 'string' && accept.includes('application/json');
}

export function redirectHome(res: ApiResponse): void {
  res.redirect(303, '/');
}

export interface PageExtras {
  notice?: Notice;
  draft?: Partial<GenerationRequest>;
  loginEmail?: string;
}

/**
 * Renders the session's current view.
 */
export function sendPage(res: ApiResponse, ctx: RequestContext, status: number, extras: PageExtras = {}): void {
  const { session, services } = ctx;
  const now = services.now();
  const jobId = session.get('currentJobId');

  const html = renderPage({
    view: resolveView(session, now),
    userEmail: session.get('userEmail'),
    plan: session.get('plan'),
    validUntil: session.get('validUntil'),
    pendingPlan: session.get('pendingCheckoutPlan'),
    plans: services.billing.plans,
    job: jobId ? services.jobs.getJob(jobId) : null,
    now,
    ...extras,
  });

  res.setHeader('Content-Type', 'text/html; charset=utf-8');
  res.setHeader('Cache-Control', 'no-store');
  res.status(status).send(html);
}

/**
 * Shows an AppError inline on the current view; anything else is rethrown.
 */
export function sendErrorPage(
  res: ApiResponse,
  ctx: RequestContext,
  error: unknown,
  extras: Omit<PageExtras, 'notice'> = {}
): void {
  if (!(error instanceof AppError)) {
    throw error;
  }
  logger.warn(`[session ${ctx.session.id.slice(0, 8)}] ${error.code}: ${error.message}`);
  sendPage(res, ctx, error.status, { ...extras, notice: { kind: 'error', message: error.message } });
}
