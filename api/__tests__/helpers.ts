import { mkdtempSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createServices } from '../app';
import type { DiagramPipeline, PipelineInput } from '../lib/diagram';
import type { ApiRequest, ApiResponse, AppServices, RequestContext } from '../lib/http';
import type { Session } from '../lib/session';
import type { CheckoutParams, PaymentsGateway, ProviderSubscription } from '../lib/stripe';
import { type AppConfig, loadConfig } from '../../src/config';

export const PRO_PRICE = 'price_pro_test';
export const NOW = new Date('2026-03-01T12:00:00.000Z');
export const NEXT_MONTH = new Date('2026-04-01T12:00:00.000Z');

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    STRIPE_SECRET_KEY: 'test-secret',
    APP_BASE_URL: 'http://localhost:3000',
    STRIPE_PRICE_PRO: PRO_PRICE,
    DIAGRAM_OUTPUT_DIR: mkdtempSync(path.join(os.tmpdir(), 'diagram-output-')),
    ...overrides,
  });
}

export class FakeGateway implements PaymentsGateway {
  customers = new Map<string, string>();
  subscriptions = new Map<string, ProviderSubscription>();
  checkoutCalls: CheckoutParams[] = [];
  lookups = 0;
  failLookups = false;
  checkoutError: unknown = null;

  async findCustomerByEmail(email: string): Promise<{ id: string } | null> {
    this.lookups += 1;
    if (this.failLookups) {
      throw new Error('provider unavailable');
    }
    const id = this.customers.get(email);
    return id ? { id } : null;
  }

  async latestSubscription(customerId: string): Promise<ProviderSubscription | null> {
    return this.subscriptions.get(customerId) ?? null;
  }

  async createCheckoutSession(params: CheckoutParams): Promise<{ id: string; url: string | null }> {
    if (this.checkoutError) {
      throw this.checkoutError;
    }
    this.checkoutCalls.push(params);
    return {
      id: `cs_test_${this.checkoutCalls.length}`,
      url: `https://checkout.example.test/pay?price=${params.priceId}`,
    };
  }

  async createPortalSession(customerId: string, returnUrl: string): Promise<{ url: string }> {
    return { url: `https://billing.example.test/portal/${customerId}?return=${encodeURIComponent(returnUrl)}` };
  }

  subscribe(email: string, status: string, priceId: string | null, periodEnd: Date = NEXT_MONTH): void {
    const customerId = this.customers.get(email) ?? `cus_${this.customers.size + 1}`;
    this.customers.set(email, customerId);
    this.subscriptions.set(customerId, {
      id: `sub_${customerId}`,
      status,
      priceId,
      currentPeriodEnd: periodEnd,
    });
  }
}

export type PipelineBehaviour = 'ok' | 'fail' | 'partial' | 'hang';

export class FakePipeline implements DiagramPipeline {
  calls: PipelineInput[] = [];
  inputs: string[] = [];
  behaviour: PipelineBehaviour = 'ok';

  async generate(input: PipelineInput, signal: AbortSignal): Promise<{ imagePath: string }> {
    this.calls.push(input);
    this.inputs.push(await readFile(input.inputPath, 'utf8'));

    if (this.behaviour === 'partial') {
      await writeFile(input.outputPath, 'half-a-png');
      throw new Error('critic crashed');
    }
    if (this.behaviour === 'fail') {
      throw new Error('visualizer crashed');
    }
    if (this.behaviour === 'hang') {
      await new Promise<never>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }

    await writeFile(input.outputPath, 'png-bytes');
    return { imagePath: input.outputPath };
  }
}

export class MockResponse implements ApiResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body: unknown = undefined;
  redirectedTo: string | null = null;
  sentFile: { path: string; filename?: string } | null = null;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  send(body: string): this {
    this.body = body;
    return this;
  }

  redirect(status: number, url: string): void {
    this.statusCode = status;
    this.redirectedTo = url;
  }

  setHeader(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  sendFile(filePath: string, callback: (error?: Error) => void): void {
    this.sentFile = { path: filePath };
    callback();
  }

  download(filePath: string, filename: string, callback: (error?: Error) => void): void {
    this.sentFile = { path: filePath, filename };
    callback();
  }

  get html(): string {
    return typeof this.body === 'string' ? this.body : '';
  }
}

export function mockRequest(
  method: string,
  options: { query?: Record<string, unknown>; body?: unknown; headers?: Record<string, string> } = {}
): ApiRequest {
  return {
    method,
    query: options.query ?? {},
    body: options.body ?? {},
    headers: options.headers ?? {},
  };
}

export interface TestHarness {
  services: AppServices;
  gateway: FakeGateway;
  pipeline: FakePipeline;
  session: Session;
  ctx: RequestContext;
  clock: { current: Date };
}

export function createHarness(configOverrides: Record<string, string> = {}): TestHarness {
  const gateway = new FakeGateway();
  const pipeline = new FakePipeline();
  const clock = { current: NOW };
  const services = createServices(testConfig(configOverrides), {
    gateway,
    pipeline,
    now: () => clock.current,
  });
  const { session } = services.sessions.open();

  return { services, gateway, pipeline, session, ctx: { services, session }, clock };
}
