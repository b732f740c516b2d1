/**
 * Diagram client
 *
 * Wraps the external diagram pipeline (retriever -> planner -> stylist ->
 * visualizer -> critic). The pipeline reads the method text from a file, so
 * every call gets its own temporary directory which is removed on every exit
 * path, including timeouts and cancellation.
 */

import { execFile } from 'child_process';
import { randomUUID } from 'crypto';
import { access, mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import type { GenerationSettings } from '../../src/config';
import {
  AppError,
  GenerationCancelledError,
  GenerationTimeoutError,
  InvalidInputError,
  PipelineError,
  errorMessage,
} from '../../src/errors';
import { DIAGRAM_TYPES, type DiagramType, type GenerationRequest, type GenerationResult } from '../../src/types';
import { logger } from '../../src/utils/logger';

const execFileAsync = promisify(execFile);

export interface PipelineInput {
  inputPath: string;
  communicativeIntent: string;
  diagramType: DiagramType;
  outputPath: string;
}

export interface DiagramPipeline {
  generate(input: PipelineInput, signal: AbortSignal): Promise<{ imagePath: string }>;
}

export function buildPipelineArgs(input: PipelineInput, settings: GenerationSettings): string[] {
  return [
    'generate',
    '--input', input.inputPath,
    '--caption', input.communicativeIntent,
    '--diagram-type', input.diagramType,
    '--output', input.outputPath,
    '--vlm-provider', settings.vlmProvider,
    '--image-provider', settings.imageProvider,
    '--iterations', String(settings.refinementIterations),
  ];
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim();
  }
  return '';
}

/**
 * Runs the pipeline's command-line entry point as a child process.
 */
export class CliDiagramPipeline implements DiagramPipeline {
  constructor(private readonly settings: GenerationSettings) {}

  async generate(input: PipelineInput, signal: AbortSignal): Promise<{ imagePath: string }> {
    try {
      await execFileAsync(this.settings.command, buildPipelineArgs(input, this.settings), {
        signal,
        maxBuffer: 10 * 1024 * 1024,
      });
    } catch (error) {
      const stderr = stderrOf(error);
      logger.error('Diagram pipeline failed:', stderr || errorMessage(error));
      throw new PipelineError(stderr ? `Diagram pipeline failed: ${stderr.split('\n').pop()}` : 'Diagram pipeline failed.');
    }

    try {
      await access(input.outputPath);
    } catch {
      throw new PipelineError('The diagram pipeline finished without writing an image.');
    }

    return { imagePath: input.outputPath };
  }
}

export interface DiagramClientOptions {
  outputDir: string;
  timeoutMs: number;
  tmpDir?: string;
}

// Settles with `work`, or rejects as soon as `signal` aborts
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }

    const onAbort = () => reject(new Error('aborted'));
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class DiagramClient {
  constructor(
    private readonly pipeline: DiagramPipeline,
    private readonly options: DiagramClientOptions
  ) {}

  /**
   * Checks a request before anything external is touched and returns it with
   * caption and title trimmed.
   */
  validate(request: GenerationRequest): GenerationRequest {
    if (!request.sourceText || request.sourceText.trim() === '') {
      throw new InvalidInputError('Please paste the method text.');
    }
    if (!request.caption || request.caption.trim() === '') {
      throw new InvalidInputError('Please enter a caption.');
    }
    if (!DIAGRAM_TYPES.includes(request.diagramType)) {
      throw new InvalidInputError(`Unknown diagram type "${request.diagramType}".`);
    }

    const title = request.title?.trim();
    return {
      sourceText: request.sourceText,
      caption: request.caption.trim(),
      title: title ? title : undefined,
      diagramType: request.diagramType,
    };
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const input = this.validate(request);

    if (signal?.aborted) {
      throw new GenerationCancelledError();
    }

    await mkdir(this.options.outputDir, { recursive: true });
    const workDir = await mkdtemp(path.join(this.options.tmpDir ?? os.tmpdir(), 'diagram-input-'));
    const outputPath = path.join(this.options.outputDir, `${randomUUID()}.png`);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }

    try {
      const inputPath = path.join(workDir, 'method.txt');
      await writeFile(inputPath, input.sourceText, 'utf8');

      const result = await untilAborted(
        this.pipeline.generate(
          {
            inputPath,
            communicativeIntent: input.caption,
            diagramType: input.diagramType,
            outputPath,
          },
          controller.signal
        ),
        controller.signal
      );

      return { imagePath: result.imagePath, status: 'ok' };
    } catch (error) {
      // Never keep a partial image from a failed run
      await rm(outputPath, { force: true });
      if (timedOut || signal?.aborted) {
        throw timedOut ? new GenerationTimeoutError(this.options.timeoutMs) : new GenerationCancelledError();
      }
      if (error instanceof AppError) {
        throw error;
      }
      throw new PipelineError(`Diagram generation failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
