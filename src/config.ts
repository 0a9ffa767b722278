import { z } from 'zod';
import { FaasVisionConfig, JobClientConfig, JobTuning } from './types';
import { ConfigError } from './errors';
import { formatIssues } from './schema';

export const DEFAULT_BASE_URL = 'https://api.runpod.ai/v2';

export const DEFAULTS: JobTuning = {
  pollIntervalMs: 1500,
  timeoutMs: 300_000,
  maxRetries: 3,
  requestTimeoutMs: 30_000,
  debug: false
};

export type JobClientOptions = Pick<JobClientConfig, 'endpoint' | 'apiKey'> & Partial<JobTuning>;
export type FaasVisionOptions = Pick<FaasVisionConfig, 'apiKey'> & Partial<FaasVisionConfig>;

// setTimeout fires at once for delays above this
const MAX_TIMER_MS = 2_147_483_647;

const intervalMs = z.number().int().nonnegative().max(MAX_TIMER_MS);
const durationMs = z.number().int().nonnegative();

const tuningShape = {
  pollIntervalMs: intervalMs.default(DEFAULTS.pollIntervalMs),
  timeoutMs: durationMs.default(DEFAULTS.timeoutMs),
  maxRetries: z.number().int().nonnegative().default(DEFAULTS.maxRetries),
  requestTimeoutMs: z.number().int().positive().default(DEFAULTS.requestTimeoutMs),
  debug: z.boolean().default(DEFAULTS.debug)
};

const jobClientConfigSchema = z.object({
  endpoint: z.string().url(),
  apiKey: z.string().min(1),
  ...tuningShape
});

const faasVisionConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  inpaintingEndpointId: z.string().min(1).optional(),
  segmentationEndpointId: z.string().min(1).optional(),
  ...tuningShape
});

const pollOverridesSchema = z.object({
  intervalMs: intervalMs.optional(),
  timeoutMs: durationMs.optional()
});

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === 'true' || v === '1'));

const envSchema = z.object({
  RUNPOD_API_KEY: z.string().min(1, 'RUNPOD_API_KEY is not set'),
  RUNPOD_BASE_URL: z.string().url().optional(),
  RUNPOD_INPAINTING_ENDPOINT_ID: z.string().min(1).optional(),
  RUNPOD_SEGMENTATION_ENDPOINT_ID: z.string().min(1).optional(),
  FAAS_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().optional(),
  FAAS_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  FAAS_DEBUG: flag
});

export function parseJobClientConfig(opts: JobClientOptions): JobClientConfig {
  const parsed = jobClientConfigSchema.safeParse(opts);
  if (!parsed.success) throw new ConfigError(`invalid job client config: ${formatIssues(parsed.error)}`);
  return Object.freeze(parsed.data);
}

export function mergeConfig(cfg: FaasVisionOptions): FaasVisionConfig {
  const parsed = faasVisionConfigSchema.safeParse(cfg);
  if (!parsed.success) throw new ConfigError(`invalid config: ${formatIssues(parsed.error)}`);
  return Object.freeze(parsed.data);
}

export interface PollOverrides {
  intervalMs?: number;
  timeoutMs?: number;
}

/**
 * Validate per-call poll overrides with the same bounds as the config.
 */
export function parsePollOverrides(overrides: PollOverrides): PollOverrides {
  const parsed = pollOverridesSchema.safeParse(overrides);
  if (!parsed.success) throw new ConfigError(`invalid poll options: ${formatIssues(parsed.error)}`);
  return parsed.data;
}

/**
 * Build the job client config for one endpoint id under the configured base URL.
 */
export function jobClientConfigFor(config: FaasVisionConfig, endpointId: string): JobClientConfig {
  if (!endpointId) throw new ConfigError('endpoint id required');
  return parseJobClientConfig({
    endpoint: `${config.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(endpointId)}`,
    apiKey: config.apiKey,
    pollIntervalMs: config.pollIntervalMs,
    timeoutMs: config.timeoutMs,
    maxRetries: config.maxRetries,
    requestTimeoutMs: config.requestTimeoutMs,
    debug: config.debug
  });
}

/**
 * Read the SDK config from environment variables. Never called by the SDK itself;
 * callers decide when (and whether) the environment is consulted.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): FaasVisionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(`invalid environment: ${formatIssues(parsed.error)}`);
  const e = parsed.data;
  return mergeConfig({
    apiKey: e.RUNPOD_API_KEY,
    baseUrl: e.RUNPOD_BASE_URL,
    inpaintingEndpointId: e.RUNPOD_INPAINTING_ENDPOINT_ID,
    segmentationEndpointId: e.RUNPOD_SEGMENTATION_ENDPOINT_ID,
    pollIntervalMs: e.FAAS_POLL_INTERVAL_MS,
    timeoutMs: e.FAAS_TIMEOUT_MS,
    debug: e.FAAS_DEBUG
  });
}
