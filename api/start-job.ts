import { z } from 'zod';
import { InvalidInputError } from '../src/errors';
import { DIAGRAM_TYPES, type GenerationRequest } from '../src/types';
import { logger } from '../src/utils/logger';
import { isFinished } from './lib/jobs';
import {
  type ApiRequest,
  type ApiResponse,
  type RequestContext,
  redirectHome,
  sendErrorPage,
  wantsJson,
} from './lib/http';
import { allows, resolveView } from './lib/viewRouter';

const StartJobSchema = z.object({
  source_text: z.string().default(''),
  caption: z.string().default(''),
  title: z.string().optional(),
  diagram_type: z.enum(DIAGRAM_TYPES).default('methodology'),
});

/**
 * Queues a diagram generation for the session and returns immediately.
 * Browsers are sent back to the page, which polls until the job settles;
 * JSON clients get the job id and poll /api/job-status themselves.
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed. Use POST.' });
    return;
  }

  const { session, services } = ctx;

  if (!allows(resolveView(session, services.now()), 'start-job')) {
    if (wantsJson(req)) {
      res.status(403).json({ error: 'An active subscription is required' });
    } else {
      redirectHome(res);
    }
    return;
  }

  const parsed = StartJobSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    const error = new InvalidInputError('Please choose a diagram type.');
    if (wantsJson(req)) {
      res.status(error.status).json({ error: error.code, message: error.message });
    } else {
      sendErrorPage(res, ctx, error);
    }
    return;
  }

  const request: GenerationRequest = {
    sourceText: parsed.data.source_text,
    caption: parsed.data.caption,
    title: parsed.data.title,
    diagramType: parsed.data.diagram_type,
  };

  const currentId = session.get('currentJobId');
  const current = currentId ? services.jobs.getJob(currentId) : null;
  if (current && !isFinished(current.status)) {
    if (wantsJson(req)) {
      res.status(409).json({ error: 'A diagram is already being generated', job_id: current.id });
    } else {
      sendErrorPage(res, ctx, new InvalidInputError('A diagram is already being generated. Wait for it or cancel it first.'), {
        draft: request,
      });
    }
    return;
  }

  try {
    const job = services.jobs.createJob(session.id, request);
    session.set('currentJobId', job.id);
    logger.log(`[session ${session.id.slice(0, 8)}] job queued: ${job.id}`);

    if (wantsJson(req)) {
      res.status(202).json({
        job_id: job.id,
        status: job.status,
        message: 'Job queued successfully. Poll /api/job-status?job_id=... for results.',
      });
    } else {
      redirectHome(res);
    }
  } catch (error) {
    if (wantsJson(req) && error instanceof InvalidInputError) {
      res.status(error.status).json({ error: error.code, message: error.message });
      return;
    }
    sendErrorPage(res, ctx, error, { draft: request });
  }
}
