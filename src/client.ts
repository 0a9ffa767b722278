import { FaasVisionConfig, JobClientDeps } from './types';
import { FaasVisionOptions, jobClientConfigFor, mergeConfig } from './config';
import { ConfigError } from './errors';
import { AsyncJobClient, createBytesJobClient } from './jobs/asyncJobClient';
import { OutputDecoder } from './jobs/decoders';
import { decodeInpaintingOutput, InpaintingService } from './services/inpainting';
import { decodeSegmentationOutput, SegmentationService } from './services/segmentation';

/**
 * High-level client entrypoint exported as `FaasVisionClient`.
 * Services are created on first use, so a client configured for one endpoint
 * does not need the other endpoint id.
 */
export class FaasVisionClient {
  public readonly config: FaasVisionConfig;
  private readonly deps: JobClientDeps;
  private inpaintingService?: InpaintingService;
  private segmentationService?: SegmentationService;

  constructor(opts: FaasVisionOptions & JobClientDeps) {
    const { transport, logger, ...cfg } = opts;
    this.config = mergeConfig(cfg);
    this.deps = { transport, logger };
  }

  get inpainting(): InpaintingService {
    if (!this.inpaintingService) {
      const id = this.requireEndpointId(this.config.inpaintingEndpointId, 'inpaintingEndpointId');
      this.inpaintingService = new InpaintingService(this.jobsWith(id, decodeInpaintingOutput), this.deps.logger);
    }
    return this.inpaintingService;
  }

  get segmentation(): SegmentationService {
    if (!this.segmentationService) {
      const id = this.requireEndpointId(this.config.segmentationEndpointId, 'segmentationEndpointId');
      this.segmentationService = new SegmentationService(this.jobsWith(id, decodeSegmentationOutput));
    }
    return this.segmentationService;
  }

  /**
   * Job client for any endpoint whose output is a base64 blob.
   */
  jobs(endpointId: string): AsyncJobClient<Buffer> {
    return createBytesJobClient({ ...jobClientConfigFor(this.config, endpointId), ...this.deps });
  }

  jobsWith<T>(endpointId: string, decodeOutput: OutputDecoder<T>): AsyncJobClient<T> {
    return new AsyncJobClient({ ...jobClientConfigFor(this.config, endpointId), ...this.deps, decodeOutput });
  }

  private requireEndpointId(id: string | undefined, option: string): string {
    if (!id) throw new ConfigError(`${option} not configured`);
    return id;
  }
}
