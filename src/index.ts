export { FaasVisionClient } from './client';
export * from './types';
export * from './errors';
export { DEFAULTS, DEFAULT_BASE_URL, configFromEnv, mergeConfig, jobClientConfigFor } from './config';
export type { JobClientOptions, FaasVisionOptions, PollOverrides } from './config';
export { consoleLogger } from './logger';
export * from './transport/http';
export * from './jobs/jobs';
export * from './jobs/jobTracker';
export * from './jobs/decoders';
export * from './jobs/asyncJobClient';
export * from './services/inpainting';
export * from './services/segmentation';
export { encodeBase64, decodeBase64 } from './codec/base64';
export { toPng, readImageSize } from './codec/image';
