import type { HttpTransport } from './transport/http';

/**
 * Sink for request/response tracing. Only `debug` is used for tracing;
 * the other levels are kept so any structured logger can be passed in.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Tuning shared by every job client.
 */
export interface JobTuning {
  pollIntervalMs: number;
  timeoutMs: number;
  // consecutive failed status checks tolerated before a poll gives up
  maxRetries: number;
  requestTimeoutMs: number;
  debug: boolean;
}

/**
 * Configuration of a single endpoint's job client. Read-only once the client is built.
 */
export interface JobClientConfig extends JobTuning {
  endpoint: string; // e.g. https://api.runpod.ai/v2/<endpoint id>
  apiKey: string;
}

/**
 * Collaborators injected into a job client.
 */
export interface JobClientDeps {
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Top-level SDK configuration.
 */
export interface FaasVisionConfig extends JobTuning {
  apiKey: string;
  baseUrl: string;
  inpaintingEndpointId?: string;
  segmentationEndpointId?: string;
}
