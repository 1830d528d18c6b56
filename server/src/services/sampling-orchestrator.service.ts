import { CircleArtError, ProcessingError } from '../errors/circle-art.errors';
import {
  CircleArtConfig,
  CircleDescriptor,
  SamplePoint,
  SamplingProgress
} from '../models/circle-art.interface';
import { RasterImage } from './raster-image';
import { ChunkOutcome, renderChunk } from './sampling.service';
import { WorkerManagerService } from './worker-manager.service';

export interface ChunkJob {
  jobId: string;
  chunkIndex: number;
  points: SamplePoint[];
  image: RasterImage;
  config: CircleArtConfig;
  progressInterval: number;
}

/**
 * Runs one chunk somewhere (same thread, worker thread, ...) and reports
 * how many of its points are done along the way.
 */
export interface ChunkExecutor {
  execute(job: ChunkJob, onProgress: (processed: number) => void): Promise<ChunkOutcome[]>;
  abort?(jobId: string): void;
}

export class InlineChunkExecutor implements ChunkExecutor {
  async execute(job: ChunkJob, onProgress: (processed: number) => void): Promise<ChunkOutcome[]> {
    const total = job.points.length;
    return renderChunk(job.points, job.image, job.config, processed => {
      if (processed % job.progressInterval === 0 || processed === total) {
        onProgress(processed);
      }
    });
  }
}

export class ThreadChunkExecutor implements ChunkExecutor {
  constructor(private readonly workerManager: WorkerManagerService) {}

  execute(job: ChunkJob, onProgress: (processed: number) => void): Promise<ChunkOutcome[]> {
    return this.workerManager.executeSamplingJob(
      {
        jobId: job.jobId,
        chunkIndex: job.chunkIndex,
        points: job.points,
        image: job.image.toShared(),
        config: job.config,
        progressInterval: job.progressInterval
      },
      { onProgress: progress => onProgress(progress.processed) }
    );
  }

  abort(jobId: string): void {
    this.workerManager.terminateJob(jobId);
  }
}

export interface OrchestratorOptions {
  workerCount: number;
  parallelThreshold: number;
  progressInterval: number;
}

export interface SamplingRunOptions {
  jobId: string;
  onProgress?: (progress: SamplingProgress) => void;
}

export interface SamplingRunResult {
  circles: CircleDescriptor[];
  skipped: number;
  chunkCount: number;
}

/**
 * Split points into at most `chunkCount` contiguous runs, preserving order
 */
export function partitionPoints(points: SamplePoint[], chunkCount: number): SamplePoint[][] {
  if (points.length === 0) return [];

  const count = Math.max(1, Math.min(Math.floor(chunkCount), points.length));
  const size = Math.ceil(points.length / count);
  const chunks: SamplePoint[][] = [];
  for (let start = 0; start < points.length; start += size) {
    chunks.push(points.slice(start, start + size));
  }
  return chunks;
}

/**
 * Scatter-gather over lattice points. Each chunk is rendered independently,
 * then outcomes are re-sorted by sample index, so the result does not depend
 * on which chunk finishes first or how many chunks there were.
 */
export class SamplingOrchestrator {
  private readonly inline = new InlineChunkExecutor();

  constructor(
    private readonly executor: ChunkExecutor,
    private readonly options: OrchestratorOptions
  ) {}

  async run(
    points: SamplePoint[],
    image: RasterImage,
    config: CircleArtConfig,
    runOptions: SamplingRunOptions
  ): Promise<SamplingRunResult> {
    const { jobId, onProgress } = runOptions;
    const parallel = points.length >= this.options.parallelThreshold && this.options.workerCount > 1;
    const chunks = partitionPoints(points, parallel ? this.options.workerCount : 1);
    const executor: ChunkExecutor = parallel ? this.executor : this.inline;

    console.log(
      `[Orchestrator] Job ${jobId}: ${points.length} points in ${chunks.length} chunk(s) (${parallel ? 'threads' : 'inline'})`
    );

    const processedPerChunk = chunks.map(() => 0);
    const reportProgress = (chunkIndex: number, processed: number) => {
      processedPerChunk[chunkIndex] = processed;
      const done = processedPerChunk.reduce((sum, value) => sum + value, 0);
      onProgress?.({
        processed: done,
        total: points.length,
        percentComplete: points.length === 0 ? 100 : Math.floor((done / points.length) * 100)
      });
    };

    let chunkOutcomes: ChunkOutcome[][];
    try {
      chunkOutcomes = await Promise.all(
        chunks.map((chunkPoints, chunkIndex) =>
          executor.execute(
            {
              jobId,
              chunkIndex,
              points: chunkPoints,
              image,
              config,
              progressInterval: this.options.progressInterval
            },
            processed => reportProgress(chunkIndex, processed)
          )
        )
      );
    } catch (error) {
      executor.abort?.(jobId);
      if (error instanceof CircleArtError) throw error;
      throw new ProcessingError(error instanceof Error ? error.message : String(error));
    }

    const outcomes = chunkOutcomes.flat().sort((a, b) => a.index - b.index);

    const circles: CircleDescriptor[] = [];
    const failures = new Map<string, number>();
    for (const outcome of outcomes) {
      if (outcome.circle !== null) {
        circles.push(outcome.circle);
      } else if (outcome.reason !== 'empty') {
        failures.set(outcome.reason, (failures.get(outcome.reason) ?? 0) + 1);
      }
    }

    if (failures.size > 0) {
      const summary = [...failures.entries()].map(([reason, count]) => `${reason} x${count}`).join(', ');
      console.warn(`[Orchestrator] Job ${jobId}: skipped points (${summary})`);
    }

    return {
      circles,
      skipped: outcomes.length - circles.length,
      chunkCount: chunks.length
    };
  }
}
