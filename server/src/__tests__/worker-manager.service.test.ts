import { ProcessingError } from '../errors/circle-art.errors';
import { createConfig } from '../services/config.service';
import { generateLattice } from '../services/lattice.service';
import { renderChunk } from '../services/sampling.service';
import { WorkerManagerService } from '../services/worker-manager.service';
import { SamplingTaskData } from '../workers/sampling.worker';
import { noiseImage } from './helpers/raster-image.helper';

describe('WorkerManagerService', () => {
  const image = noiseImage(24, 24, 9);
  const config = createConfig({ circleDiameter: 4, circleSpacing: 0 });
  const points = generateLattice(image.width, image.height, config);
  let manager: WorkerManagerService;

  function taskFor(jobId: string, chunkIndex: number): SamplingTaskData {
    return { jobId, chunkIndex, points, image: image.toShared(), config, progressInterval: 10 };
  }

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    manager.terminateAll();
    jest.restoreAllMocks();
  });

  it('should reject a pool size that is not a positive integer', () => {
    manager = new WorkerManagerService(1);
    expect(() => new WorkerManagerService(0)).toThrow('Worker pool size must be a positive integer, got 0');
    expect(() => new WorkerManagerService(1.5)).toThrow(RangeError);
  });

  it('should run queued chunks on a single reused thread', async () => {
    manager = new WorkerManagerService(1);
    const processed: number[] = [];

    const first = manager.executeSamplingJob(taskFor('job-a', 0), {
      onProgress: progress => processed.push(progress.processed)
    });
    const second = manager.executeSamplingJob(taskFor('job-a', 1));

    expect(manager.getActiveWorkerCount()).toBe(1);
    expect(manager.getQueueLength()).toBe(1);

    const expected = renderChunk(points, image, config);
    expect(await first).toEqual(expected);
    expect(await second).toEqual(expected);
    expect(processed).toEqual([10, 20, 30, 36]);
    expect(manager.getActiveWorkerCount()).toBe(1);
  });

  it('should cancel queued and running chunks of a job', async () => {
    manager = new WorkerManagerService(1);

    const running = manager.executeSamplingJob(taskFor('job-b', 0));
    const queued = manager.executeSamplingJob(taskFor('job-b', 1));
    manager.terminateJob('job-b');

    await expect(running).rejects.toBeInstanceOf(ProcessingError);
    await expect(running).rejects.toThrow('Job job-b was cancelled');
    await expect(queued).rejects.toThrow('Job job-b was cancelled');
    expect(manager.getActiveWorkerCount()).toBe(0);

    // the pool refills for the next job
    const next = await manager.executeSamplingJob(taskFor('job-c', 0));
    expect(next).toHaveLength(points.length);
  });

  it('should fail pending chunks when the pool shuts down', async () => {
    manager = new WorkerManagerService(1);

    const running = manager.executeSamplingJob(taskFor('job-d', 0));
    manager.terminateAll();

    await expect(running).rejects.toThrow('Worker pool shut down');
    expect(manager.getActiveWorkerCount()).toBe(0);
  });
});
