// Shared types between the request handlers and the views

export const PLAN_IDS = ['pro', 'enterprise'] as const;
export type PlanId = (typeof PLAN_IDS)[number];
export type PlanSelection = PlanId | 'none';

export const DIAGRAM_TYPES = ['methodology', 'flowchart', 'architecture'] as const;
export type DiagramType = (typeof DIAGRAM_TYPES)[number];

export type ViewName = 'landing' | 'paywall' | 'workspace';

export interface SubscriptionPlan {
  id: PlanId;
  displayName: string;
  monthlyPrice: number;
  currency: string;
  features: string[];
  providerPriceId: string | null; // null = not purchasable
}

export interface SessionFields {
  userId: string | null;
  userEmail: string | null;
  isSubscribed: boolean;
  plan: PlanSelection;
  validUntil: Date | null;
  lastVerifiedAt: Date | null;
  pendingCheckoutPlan: PlanId | null;
  currentJobId: string | null;
}

export interface SubscriptionStatus {
  active: boolean;
  plan: PlanId | null;
  validUntil: Date | null;
}

export interface GenerationRequest {
  sourceText: string;
  caption: string;
  title?: string;
  diagramType: DiagramType;
}

export interface GenerationResult {
  imagePath: string;
  status: 'ok' | 'failed';
}

export type JobStatus = 'queued' | 'processing' | 'done' | 'error' | 'cancelled';

export interface GenerationJob {
  id: string;
  sessionId: string;
  status: JobStatus;
  request: GenerationRequest;
  output?: GenerationResult;
  error?: string;
  errorCode?: string;
  createdAt: string;
  updatedAt: string;
}

export interface Notice {
  kind: 'error' | 'info' | 'success';
  message: string;
}
