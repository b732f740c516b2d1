/**
 * Runtime configuration
 *
 * Read once at startup from the environment (plus config/plans.json for the
 * plan catalog). Anything missing or malformed throws a ConfigurationError
 * before the server starts listening.
 */

import * as path from 'path';
import { z } from 'zod';
import planCatalog from '../config/plans.json';
import { ConfigurationError } from './errors';
import { PLAN_IDS, type PlanId, type SubscriptionPlan } from './types';

export interface GenerationSettings {
  command: string;
  outputDir: string;
  timeoutMs: number;
  vlmProvider: string;
  imageProvider: string;
  refinementIterations: number;
}

export interface AppConfig {
  port: number;
  baseUrl: string;
  secureCookies: boolean;
  stripeSecretKey: string;
  plans: readonly SubscriptionPlan[];
  sessionTtlMs: number;
  generation: GenerationSettings;
  billingDemoMode: boolean;
}

// .env files tend to carry `KEY=` lines; treat those as unset
const blankAsMissing = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const EnvSchema = z.object({
  STRIPE_SECRET_KEY: blankAsMissing(z.string()),
  APP_BASE_URL: blankAsMissing(z.string().url()),
  STRIPE_PRICE_PRO: blankAsMissing(z.string().optional()),
  STRIPE_PRICE_ENTERPRISE: blankAsMissing(z.string().optional()),
  PORT: blankAsMissing(z.coerce.number().int().positive().default(3000)),
  SESSION_TTL_MINUTES: blankAsMissing(z.coerce.number().positive().default(60)),
  GENERATION_TIMEOUT_SECONDS: blankAsMissing(z.coerce.number().positive().default(300)),
  DIAGRAM_PIPELINE_COMMAND: blankAsMissing(z.string().default('paperbanana')),
  DIAGRAM_OUTPUT_DIR: blankAsMissing(z.string().default('outputs')),
  DIAGRAM_VLM_PROVIDER: blankAsMissing(z.string().default('gemini')),
  DIAGRAM_IMAGE_PROVIDER: blankAsMissing(z.string().default('google_imagen')),
  DIAGRAM_REFINEMENT_ITERATIONS: blankAsMissing(z.coerce.number().int().positive().default(3)),
  BILLING_DEMO_MODE: blankAsMissing(z.enum(['true', 'false']).default('false')),
});

const PlanFileSchema = z
  .array(
    z.object({
      id: z.enum(PLAN_IDS),
      displayName: z.string().min(1),
      monthlyPrice: z.number().nonnegative(),
      currency: z.string().length(3),
      features: z.array(z.string().min(1)),
    })
  )
  .refine((plans) => new Set(plans.map((plan) => plan.id)).size === plans.length, {
    message: 'plan ids must be unique',
  });

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${prefix}${issue.path.join('.')}` : prefix.replace(/\.$/, '');
    return `${where}: ${issue.message}`;
  });
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  catalog: unknown = planCatalog
): AppConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  const parsedPlans = PlanFileSchema.safeParse(catalog);

  const issues = [
    ...(parsedEnv.success ? [] : formatIssues('', parsedEnv.error)),
    ...(parsedPlans.success ? [] : formatIssues('plans.', parsedPlans.error)),
  ];

  if (!parsedEnv.success || !parsedPlans.success) {
    throw new ConfigurationError(issues);
  }

  const vars = parsedEnv.data;
  const priceIds: Record<PlanId, string | undefined> = {
    pro: vars.STRIPE_PRICE_PRO,
    enterprise: vars.STRIPE_PRICE_ENTERPRISE,
  };

  const plans: SubscriptionPlan[] = parsedPlans.data.map((plan) =>
    Object.freeze({ ...plan, features: [...plan.features], providerPriceId: priceIds[plan.id] ?? null })
  );

  const baseUrl = vars.APP_BASE_URL.replace(/\/+$/, '');

  return Object.freeze({
    port: vars.PORT,
    baseUrl,
    secureCookies: baseUrl.startsWith('https://'),
    stripeSecretKey: vars.STRIPE_SECRET_KEY,
    plans: Object.freeze(plans),
    sessionTtlMs: vars.SESSION_TTL_MINUTES * 60 * 1000,
    generation: Object.freeze({
      command: vars.DIAGRAM_PIPELINE_COMMAND,
      outputDir: path.resolve(vars.DIAGRAM_OUTPUT_DIR),
      timeoutMs: vars.GENERATION_TIMEOUT_SECONDS * 1000,
      vlmProvider: vars.DIAGRAM_VLM_PROVIDER,
      imageProvider: vars.DIAGRAM_IMAGE_PROVIDER,
      refinementIterations: vars.DIAGRAM_REFINEMENT_ITERATIONS,
    }),
    billingDemoMode: vars.BILLING_DEMO_MODE === 'true',
  });
}
