import { ImageDecodeError, ProcessingError } from '../errors/circle-art.errors';
import { SamplePoint, SamplingProgress } from '../models/circle-art.interface';
import { createConfig } from '../services/config.service';
import { generateLattice } from '../services/lattice.service';
import {
  ChunkExecutor,
  ChunkJob,
  InlineChunkExecutor,
  partitionPoints,
  SamplingOrchestrator,
  ThreadChunkExecutor
} from '../services/sampling-orchestrator.service';
import { ChunkOutcome } from '../services/sampling.service';
import { WorkerManagerService } from '../services/worker-manager.service';
import { BLACK, noiseImage, solidImage } from './helpers/raster-image.helper';

function pointsOf(count: number): SamplePoint[] {
  return Array.from({ length: count }, (_, index) => ({ index, row: 0, column: index, x: index, y: 0 }));
}

/**
 * Finishes chunks in reverse order and hands back each chunk's outcomes reversed
 */
class ReversingExecutor implements ChunkExecutor {
  readonly jobs: ChunkJob[] = [];
  private readonly inline = new InlineChunkExecutor();

  constructor(private readonly chunkCount: number) {}

  async execute(job: ChunkJob, onProgress: (processed: number) => void): Promise<ChunkOutcome[]> {
    this.jobs.push(job);
    await new Promise(resolve => setTimeout(resolve, (this.chunkCount - job.chunkIndex) * 5));
    const outcomes = await this.inline.execute(job, onProgress);
    return outcomes.reverse();
  }
}

describe('SamplingOrchestrator', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('partitionPoints', () => {
    it('should split into contiguous chunks of ceil(n / count)', () => {
      const chunks = partitionPoints(pointsOf(10), 3);

      expect(chunks.map(chunk => chunk.length)).toEqual([4, 4, 2]);
      expect(chunks.flat().map(p => p.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('should never make more chunks than points', () => {
      expect(partitionPoints(pointsOf(2), 5)).toHaveLength(2);
    });

    it('should fall back to a single chunk for a zero count', () => {
      expect(partitionPoints(pointsOf(3), 0)).toHaveLength(1);
    });

    it('should return no chunks for no points', () => {
      expect(partitionPoints([], 4)).toEqual([]);
    });
  });

  describe('run', () => {
    const image = noiseImage(60, 40);
    const config = createConfig({ circleDiameter: 4, circleSpacing: 1 });
    const points = generateLattice(image.width, image.height, config);

    it('should produce the same circles whatever the chunk count or finishing order', async () => {
      const single = new SamplingOrchestrator(new InlineChunkExecutor(), {
        workerCount: 1,
        parallelThreshold: 0,
        progressInterval: 10
      });
      const executor = new ReversingExecutor(4);
      const parallel = new SamplingOrchestrator(executor, {
        workerCount: 4,
        parallelThreshold: 0,
        progressInterval: 10
      });

      const expected = await single.run(points, image, config, { jobId: 'single' });
      const actual = await parallel.run(points, image, config, { jobId: 'parallel' });

      expect(executor.jobs).toHaveLength(4);
      expect(actual.chunkCount).toBe(4);
      expect(expected.chunkCount).toBe(1);
      expect(actual.circles).toEqual(expected.circles);
      expect(actual.circles.map(c => c.index)).toEqual(points.map(p => p.index));
    });

    it('should sample inline below the parallel threshold', async () => {
      const executor = new ReversingExecutor(4);
      const orchestrator = new SamplingOrchestrator(executor, {
        workerCount: 4,
        parallelThreshold: points.length + 1,
        progressInterval: 10
      });

      const result = await orchestrator.run(points, image, config, { jobId: 'small' });

      expect(executor.jobs).toHaveLength(0);
      expect(result.chunkCount).toBe(1);
      expect(result.circles).toHaveLength(points.length);
    });

    it('should report progress up to 100 percent', async () => {
      const progress: SamplingProgress[] = [];
      const orchestrator = new SamplingOrchestrator(new ReversingExecutor(3), {
        workerCount: 3,
        parallelThreshold: 0,
        progressInterval: 7
      });

      await orchestrator.run(points, image, config, {
        jobId: 'progress',
        onProgress: update => progress.push(update)
      });

      const processed = progress.map(p => p.processed);
      expect(processed).toEqual([...processed].sort((a, b) => a - b));
      expect(progress[progress.length - 1]).toEqual({
        processed: points.length,
        total: points.length,
        percentComplete: 100
      });
    });

    it('should count bare spots as skipped without warning', async () => {
      const halftone = createConfig({
        circleDiameter: 4,
        circleSpacing: 1,
        renderMode: 'halftone-white',
        minDotSize: 0,
        maxDotSize: 2
      });
      const dark = solidImage(60, 40, BLACK);
      const orchestrator = new SamplingOrchestrator(new InlineChunkExecutor(), {
        workerCount: 1,
        parallelThreshold: 0,
        progressInterval: 10
      });

      const result = await orchestrator.run(points, dark, halftone, { jobId: 'bare' });

      expect(result.circles).toEqual([]);
      expect(result.skipped).toBe(points.length);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should wrap chunk failures and abort the remaining chunks', async () => {
      const abort = jest.fn();
      const executor: ChunkExecutor = {
        execute: async job => {
          if (job.chunkIndex === 1) throw new Error('boom');
          return [];
        },
        abort
      };
      const orchestrator = new SamplingOrchestrator(executor, {
        workerCount: 2,
        parallelThreshold: 0,
        progressInterval: 10
      });

      const run = orchestrator.run(points, image, config, { jobId: 'failing' });

      await expect(run).rejects.toBeInstanceOf(ProcessingError);
      await expect(run).rejects.toThrow('boom');
      expect(abort).toHaveBeenCalledWith('failing');
    });

    it('should pass pipeline errors through unchanged', async () => {
      const failure = new ImageDecodeError('bad pixels');
      const executor: ChunkExecutor = {
        execute: async () => {
          throw failure;
        }
      };
      const orchestrator = new SamplingOrchestrator(executor, {
        workerCount: 2,
        parallelThreshold: 0,
        progressInterval: 10
      });

      await expect(orchestrator.run(points, image, config, { jobId: 'decode' })).rejects.toBe(failure);
    });
  });

  describe('with worker threads', () => {
    const workerManager = new WorkerManagerService(2);
    const config = createConfig({ circleDiameter: 4, circleSpacing: 0 });

    beforeEach(() => {
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterAll(() => {
      workerManager.terminateAll();
    });

    async function inlineCircles(image: ReturnType<typeof noiseImage>) {
      const inline = new SamplingOrchestrator(new InlineChunkExecutor(), {
        workerCount: 1,
        parallelThreshold: 0,
        progressInterval: 10
      });
      const points = generateLattice(image.width, image.height, config);
      return (await inline.run(points, image, config, { jobId: 'inline' })).circles;
    }

    it('should match inline sampling', async () => {
      const image = noiseImage(40, 40, 3);
      const points = generateLattice(image.width, image.height, config);
      const progress: SamplingProgress[] = [];

      const threaded = new SamplingOrchestrator(new ThreadChunkExecutor(workerManager), {
        workerCount: 2,
        parallelThreshold: 0,
        progressInterval: 10
      });

      const actual = await threaded.run(points, image, config, {
        jobId: 'threads',
        onProgress: update => progress.push(update)
      });

      expect(points).toHaveLength(100);
      expect(actual.chunkCount).toBe(2);
      expect(actual.circles).toEqual(await inlineCircles(image));
      expect(progress[progress.length - 1].percentComplete).toBe(100);
      expect(workerManager.getBusyWorkerCount()).toBe(0);
      expect(workerManager.getQueueLength()).toBe(0);
    });

    it('should never run more threads than the pool holds across concurrent jobs', async () => {
      const threaded = new SamplingOrchestrator(new ThreadChunkExecutor(workerManager), {
        workerCount: 4,
        parallelThreshold: 0,
        progressInterval: 5
      });
      const images = [noiseImage(40, 40, 5), noiseImage(40, 40, 6), noiseImage(40, 40, 7)];
      let peak = 0;
      const track = () => {
        peak = Math.max(peak, workerManager.getActiveWorkerCount());
      };

      const results = await Promise.all(
        images.map((image, i) => {
          const points = generateLattice(image.width, image.height, config);
          const run = threaded.run(points, image, config, { jobId: `concurrent-${i}`, onProgress: track });
          track();
          return run;
        })
      );

      expect(peak).toBeGreaterThan(0);
      expect(peak).toBeLessThanOrEqual(2);
      expect(results.map(r => r.chunkCount)).toEqual([4, 4, 4]);
      for (const [i, image] of images.entries()) {
        expect(results[i].circles).toEqual(await inlineCircles(image));
      }
    });
  });
});
