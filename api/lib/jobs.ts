/**
 * In-memory generation jobs
 * The request that starts a job returns straight away; the page polls for the result
 */

import { randomUUID } from 'crypto';
import { rm } from 'fs/promises';
import { AppError, errorMessage } from '../../src/errors';
import type { GenerationJob, GenerationRequest, JobStatus } from '../../src/types';
import { logger } from '../../src/utils/logger';
import type { DiagramClient } from './diagram';

interface JobEntry {
  job: GenerationJob;
  controller: AbortController;
  settled: Promise<void>;
}

const FINISHED: readonly JobStatus[] = ['done', 'error', 'cancelled'];

export function isFinished(status: JobStatus): boolean {
  return FINISHED.includes(status);
}

export class JobRegistry {
  private jobs = new Map<string, JobEntry>();

  constructor(
    private readonly diagrams: DiagramClient,
    private readonly retentionMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Creates a job and starts generating. Invalid input throws here, before
   * anything is queued.
   */
  createJob(sessionId: string, request: GenerationRequest): GenerationJob {
    const input = this.diagrams.validate(request);
    this.prune();

    const timestamp = new Date(this.clock()).toISOString();
    const job: GenerationJob = {
      id: randomUUID(),
      sessionId,
      status: 'queued',
      request: input,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    const controller = new AbortController();
    const entry: JobEntry = { job, controller, settled: Promise.resolve() };
    this.jobs.set(job.id, entry);

    entry.settled = this.run(entry);

    logger.log(`Created job ${job.id} (${input.diagramType}) for session ${sessionId.slice(0, 8)}`);
    return { ...job };
  }

  /**
   * Fetches a job by ID
   */
  getJob(id: string): GenerationJob | null {
    const entry = this.jobs.get(id);
    return entry ? { ...entry.job } : null;
  }

  /**
   * Cancels a queued or processing job. Returns false if there was nothing to cancel.
   */
  cancelJob(id: string): boolean {
    const entry = this.jobs.get(id);

    if (!entry || isFinished(entry.job.status)) {
      return false;
    }

    this.update(entry, 'cancelled');
    entry.controller.abort();
    logger.log(`Cancelled job ${id}`);
    return true;
  }

  /**
   * Resolves once the job has reached a final status.
   */
  async settled(id: string): Promise<GenerationJob | null> {
    const entry = this.jobs.get(id);
    if (!entry) {
      return null;
    }
    await entry.settled;
    return { ...entry.job };
  }

  private async run(entry: JobEntry): Promise<void> {
    // Let createJob hand the queued job back before work starts
    await Promise.resolve();

    if (this.isCancelled(entry)) {
      return;
    }

    this.update(entry, 'processing');

    try {
      const output = await this.diagrams.generate(entry.job.request, entry.controller.signal);

      if (this.isCancelled(entry)) {
        await this.discardImage(output.imagePath);
        return;
      }
      this.update(entry, 'done', { output });
    } catch (error) {
      if (this.isCancelled(entry)) {
        return;
      }
      logger.error(`Job ${entry.job.id} failed:`, errorMessage(error));
      this.update(entry, 'error', {
        error: errorMessage(error),
        errorCode: error instanceof AppError ? error.code : 'PipelineError',
      });
    }
  }

  private isCancelled(entry: JobEntry): boolean {
    return entry.job.status === 'cancelled';
  }

  private update(entry: JobEntry, status: JobStatus, fields: Partial<GenerationJob> = {}): void {
    entry.job = {
      ...entry.job,
      ...fields,
      status,
      updatedAt: new Date(this.clock()).toISOString(),
    };
    logger.debug(`Updated job ${entry.job.id} to status: ${status}`);
  }

  private prune(): void {
    const cutoff = this.clock() - this.retentionMs;

    for (const [id, entry] of this.jobs) {
      if (isFinished(entry.job.status) && Date.parse(entry.job.updatedAt) < cutoff) {
        this.jobs.delete(id);
        if (entry.job.output) {
          void this.discardImage(entry.job.output.imagePath);
        }
      }
    }
  }

  private discardImage(imagePath: string): Promise<void> {
    return rm(imagePath, { force: true }).catch((error: unknown) => {
      logger.error(`Could not remove image ${imagePath}:`, errorMessage(error));
    });
  }
}

/**
 * File name offered for a job's image: the title, or else the caption,
 * reduced to letters, digits, dashes and underscores.
 */
export function downloadFileName(request: GenerationRequest): string {
  const base = (request.title ?? request.caption)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z0-9 _-]+/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .slice(0, 80);

  return `${base || 'diagram'}.png`;
}
