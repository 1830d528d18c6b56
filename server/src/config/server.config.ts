import os from 'os';
import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().positive().default(fallback)
  );

const nonNegativeInt = (fallback: number) =>
  z.preprocess(
    value => (value === undefined || value === '' ? undefined : Number(value)),
    z.number().int().min(0).default(fallback)
  );

const envSchema = z.object({
  PORT: positiveInt(3001),
  NODE_ENV: z.string().default('development'),
  WORKER_COUNT: positiveInt(Math.max(1, os.cpus().length)),
  PARALLEL_THRESHOLD: nonNegativeInt(2000),
  PROGRESS_INTERVAL: positiveInt(500),
  UPLOAD_LIMIT_MB: positiveInt(25),
  CORS_ORIGINS: z.string().default('http://localhost:4200,http://localhost:8084')
});

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  /** Threads used when a lattice is large enough to split */
  workerCount: number;
  /** Lattices with fewer points than this are sampled on the calling thread */
  parallelThreshold: number;
  progressInterval: number;
  uploadLimitBytes: number;
  corsOrigins: string[];
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid server environment: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    workerCount: values.WORKER_COUNT,
    parallelThreshold: values.PARALLEL_THRESHOLD,
    progressInterval: values.PROGRESS_INTERVAL,
    uploadLimitBytes: values.UPLOAD_LIMIT_MB * 1024 * 1024,
    corsOrigins: values.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean)
  };
}
