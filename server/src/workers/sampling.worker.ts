/**
 * Pooled worker thread that samples chunks of lattice points.
 * It stays alive between tasks; each task message carries its own chunk.
 * Pixels arrive in a SharedArrayBuffer, so every worker reads the same
 * image memory without copying it.
 */
import { isMainThread, parentPort } from 'worker_threads';
import { CircleArtConfig, SamplePoint } from '../models/circle-art.interface';
import { RasterImage, SharedRasterData } from '../services/raster-image';
import { ChunkOutcome, renderChunk } from '../services/sampling.service';

export interface SamplingTaskData {
  jobId: string;
  chunkIndex: number;
  points: SamplePoint[];
  image: SharedRasterData;
  config: CircleArtConfig;
  progressInterval: number;
}

export interface SamplingTask extends SamplingTaskData {
  type: 'sample';
  taskId: string;
}

export interface SamplingWorkerProgress {
  type: 'progress';
  taskId: string;
  chunkIndex: number;
  processed: number;
  total: number;
}

export interface SamplingWorkerResult {
  type: 'result';
  taskId: string;
  chunkIndex: number;
  outcomes: ChunkOutcome[];
}

export interface SamplingWorkerError {
  type: 'error';
  taskId: string;
  chunkIndex: number;
  error: string;
}

export type SamplingWorkerMessage = SamplingWorkerProgress | SamplingWorkerResult | SamplingWorkerError;

function sendMessage(message: SamplingWorkerMessage) {
  if (parentPort) {
    parentPort.postMessage(message);
  }
}

function performSampling(task: SamplingTask) {
  const { taskId, chunkIndex, points, config, progressInterval } = task;
  const image = RasterImage.fromShared(task.image);
  const total = points.length;

  const outcomes = renderChunk(points, image, config, processed => {
    if (processed % progressInterval === 0 && processed < total) {
      sendMessage({ type: 'progress', taskId, chunkIndex, processed, total });
    }
  });

  sendMessage({ type: 'progress', taskId, chunkIndex, processed: total, total });
  sendMessage({ type: 'result', taskId, chunkIndex, outcomes });
}

// Main worker execution
if (!isMainThread && parentPort) {
  parentPort.on('message', (task: SamplingTask) => {
    try {
      performSampling(task);
    } catch (error) {
      sendMessage({
        type: 'error',
        taskId: task.taskId,
        chunkIndex: task.chunkIndex,
        error: error instanceof Error ? error.message : 'Unknown error in sampling worker'
      });
    }
  });
}
