/**
 * Worker Manager Service
 * Fixed-size pool of worker threads for CPU-intensive sampling.
 * Chunks from every job share one task queue, so concurrent jobs never run
 * more threads than the pool holds.
 */
import { Worker } from 'worker_threads';
import os from 'os';
import path from 'path';
import { ProcessingError } from '../errors/circle-art.errors';
import type { ChunkOutcome } from './sampling.service';
import type {
  SamplingTask,
  SamplingTaskData,
  SamplingWorkerMessage,
  SamplingWorkerProgress
} from '../workers/sampling.worker';

export interface WorkerJobOptions {
  onProgress?: (progress: SamplingWorkerProgress) => void;
}

interface QueuedTask {
  taskId: string;
  data: SamplingTaskData;
  onProgress?: (progress: SamplingWorkerProgress) => void;
  resolve: (outcomes: ChunkOutcome[]) => void;
  reject: (error: Error) => void;
}

interface PooledWorker {
  id: number;
  worker: Worker;
  task: QueuedTask | null;
}

// Running from sources (ts-node, ts-jest) the worker is a .ts file and needs a loader
const RUNNING_FROM_SOURCE = path.extname(__filename) === '.ts';
const WORKER_PATH = path.join(__dirname, `../workers/sampling.worker${RUNNING_FROM_SOURCE ? '.ts' : '.js'}`);
const WORKER_EXEC_ARGV = RUNNING_FROM_SOURCE ? ['-r', 'ts-node/register/transpile-only'] : [];

export class WorkerManagerService {
  private workers: PooledWorker[] = [];
  private queue: QueuedTask[] = [];
  private nextWorkerId = 0;
  private nextTaskId = 0;

  constructor(readonly poolSize: number = Math.max(1, os.cpus().length)) {
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${poolSize}`);
    }
  }

  /**
   * Queue one chunk of lattice points for the pool.
   * Resolves with the chunk's outcomes in input order.
   */
  executeSamplingJob(data: SamplingTaskData, options: WorkerJobOptions = {}): Promise<ChunkOutcome[]> {
    return new Promise((resolve, reject) => {
      this.queue.push({
        taskId: `${data.jobId}:${data.chunkIndex}:${this.nextTaskId++}`,
        data,
        onProgress: options.onProgress,
        resolve,
        reject
      });
      this.processQueue();
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0) {
      let pooled = this.workers.find(w => w.task === null);
      if (!pooled) {
        if (this.workers.length >= this.poolSize) return;
        pooled = this.spawnWorker();
      }

      const task = this.queue.shift();
      if (!task) return;
      this.dispatch(pooled, task);
    }
  }

  private spawnWorker(): PooledWorker {
    const id = this.nextWorkerId++;
    const worker = new Worker(WORKER_PATH, { execArgv: WORKER_EXEC_ARGV });
    const pooled: PooledWorker = { id, worker, task: null };

    // Idle pool threads must not keep the process alive
    worker.unref();

    worker.on('message', (message: SamplingWorkerMessage) => this.handleMessage(pooled, message));

    worker.on('error', (error) => {
      console.error(`[WorkerManager] Worker ${id} error:`, error);
      this.retire(pooled, new ProcessingError(error.message));
    });

    worker.on('exit', (code) => {
      this.retire(pooled, new ProcessingError(`Worker ${id} stopped with exit code ${code} before returning a result`));
    });

    this.workers.push(pooled);
    console.log(`[WorkerManager] Started worker ${id} (${this.workers.length}/${this.poolSize})`);
    return pooled;
  }

  private dispatch(pooled: PooledWorker, task: QueuedTask): void {
    pooled.task = task;
    pooled.worker.ref();

    const message: SamplingTask = { ...task.data, type: 'sample', taskId: task.taskId };
    pooled.worker.postMessage(message);
  }

  private handleMessage(pooled: PooledWorker, message: SamplingWorkerMessage): void {
    const task = pooled.task;
    if (!task || task.taskId !== message.taskId) return;

    if (message.type === 'progress') {
      task.onProgress?.(message);
    } else if (message.type === 'result') {
      this.release(pooled);
      task.resolve(message.outcomes);
    } else {
      console.error(`[WorkerManager] Task ${task.taskId} failed on worker ${pooled.id}: ${message.error}`);
      this.release(pooled);
      task.reject(new ProcessingError(message.error));
    }
  }

  private release(pooled: PooledWorker): void {
    pooled.task = null;
    pooled.worker.unref();
    this.processQueue();
  }

  /**
   * Drop a worker from the pool, failing the task it was running.
   * A replacement is spawned on demand by the next queued task.
   */
  private retire(pooled: PooledWorker, error: Error): void {
    const index = this.workers.indexOf(pooled);
    if (index === -1) return;

    this.workers.splice(index, 1);
    const task = pooled.task;
    pooled.task = null;
    if (task) {
      console.error(`[WorkerManager] Worker ${pooled.id} left the pool during task ${task.taskId}`);
      task.reject(error);
    }
    this.processQueue();
  }

  private terminateWorker(pooled: PooledWorker, reason: string): void {
    this.retire(pooled, new ProcessingError(reason));
    pooled.worker.terminate().catch((error: unknown) => {
      console.error(`[WorkerManager] Failed to terminate worker ${pooled.id}:`, error);
    });
    console.log(`[WorkerManager] Worker ${pooled.id} terminated`);
  }

  /**
   * Cancel every queued and running chunk of a job
   */
  terminateJob(jobId: string): void {
    const reason = `Job ${jobId} was cancelled`;

    const cancelled = this.queue.filter(task => task.data.jobId === jobId);
    this.queue = this.queue.filter(task => task.data.jobId !== jobId);
    cancelled.forEach(task => task.reject(new ProcessingError(reason)));

    for (const pooled of [...this.workers]) {
      if (pooled.task?.data.jobId === jobId) {
        this.terminateWorker(pooled, reason);
      }
    }
  }

  /**
   * Terminate all workers and fail whatever is still queued
   */
  terminateAll(): void {
    console.log(`[WorkerManager] Terminating ${this.workers.length} pooled workers`);

    const pending = this.queue;
    this.queue = [];
    pending.forEach(task => task.reject(new ProcessingError('Worker pool shut down')));

    for (const pooled of [...this.workers]) {
      this.terminateWorker(pooled, 'Worker pool shut down');
    }
  }

  /**
   * Number of live threads in the pool, busy or idle
   */
  getActiveWorkerCount(): number {
    return this.workers.length;
  }

  getBusyWorkerCount(): number {
    return this.workers.filter(w => w.task !== null).length;
  }

  getQueueLength(): number {
    return this.queue.length;
  }
}
