import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import { EmptySampleSetError } from '../errors/circle-art.errors';
import {
  CircleArtConfig,
  RenderStats,
  SamplingProgress,
  VectorDocument
} from '../models/circle-art.interface';
import { getPitch } from './config.service';
import { ImageService } from './image.service';
import { describeLattice, generateLattice } from './lattice.service';
import { RasterImage } from './raster-image';
import {
  OrchestratorOptions,
  SamplingOrchestrator,
  ThreadChunkExecutor
} from './sampling-orchestrator.service';
import { buildDocument, serializeDocument } from './svg-document.service';
import { WorkerManagerService } from './worker-manager.service';

export interface RenderOptions {
  jobId?: string;
  onProgress?: (progress: SamplingProgress) => void;
}

export interface RenderResult {
  jobId: string;
  document: VectorDocument;
  svg: string;
  stats: RenderStats;
}

/**
 * Image in, SVG circle art out: lattice, parallel sampling, document assembly
 */
export class CircleArtService {
  constructor(
    private readonly orchestrator: SamplingOrchestrator,
    private readonly imageService: ImageService = new ImageService()
  ) {}

  async render(image: RasterImage, config: CircleArtConfig, options: RenderOptions = {}): Promise<RenderResult> {
    const jobId = options.jobId ?? uuidv4();
    const started = performance.now();

    const points = generateLattice(image.width, image.height, config);
    if (points.length === 0) {
      throw new EmptySampleSetError(image.width, image.height, getPitch(config));
    }

    const lattice = describeLattice(points);
    console.log(
      `[CircleArt] Job ${jobId}: ${image.width}x${image.height}px, ${config.samplingMode} lattice of ${lattice.rows} rows x ${lattice.columns} columns, ${config.renderMode} mode, ${lattice.points} points`
    );

    const { circles, skipped } = await this.orchestrator.run(points, image, config, {
      jobId,
      onProgress: options.onProgress
    });

    const document = buildDocument(circles, image.width, image.height, config);
    const svg = serializeDocument(document);
    const durationMs = Math.round(performance.now() - started);

    console.log(`[CircleArt] Job ${jobId} finished: ${circles.length} circles, ${skipped} skipped, ${durationMs}ms`);

    return {
      jobId,
      document,
      svg,
      stats: {
        samplePoints: points.length,
        circles: circles.length,
        skipped,
        durationMs
      }
    };
  }

  async renderBuffer(buffer: Buffer, config: CircleArtConfig, options: RenderOptions = {}): Promise<RenderResult> {
    const image = await this.imageService.decode(buffer);
    return this.render(image, config, options);
  }
}

/**
 * Wire the service to worker threads managed by `workerManager`
 */
export function createCircleArtService(
  workerManager: WorkerManagerService,
  options: OrchestratorOptions
): CircleArtService {
  const orchestrator = new SamplingOrchestrator(new ThreadChunkExecutor(workerManager), options);
  return new CircleArtService(orchestrator);
}
