import { promises as fs } from 'fs';
import { z } from 'zod';
import { decodeBase64 } from '../codec/base64';
import { readImageSize, toPng } from '../codec/image';
import { InvalidRequestError, JobFailedError } from '../errors';
import { AsyncJobClient, PollOptions } from '../jobs/asyncJobClient';
import { schemaOutput } from '../jobs/decoders';
import { createJobRequest, JobTimings } from '../jobs/jobs';
import type { Logger } from '../types';
import { consoleLogger } from '../logger';

export const inpaintingOutputSchema = z.object({
  output_image: z.string().min(1, 'No output image in the response'),
  stats: z
    .object({
      inference_time: z.number().optional(),
      overall_time: z.number().optional()
    })
    .optional()
});

export type InpaintingOutput = z.infer<typeof inpaintingOutputSchema>;

export const decodeInpaintingOutput = schemaOutput(inpaintingOutputSchema);

export interface InpaintInput {
  image: Uint8Array;
  mask: Uint8Array; // non-zero pixels mark the region to fill
}

export interface InpaintResult {
  image: Buffer;
  width: number;
  height: number;
  jobId: string;
  stats: { inferenceTimeS?: number; overallTimeS?: number };
  timings: JobTimings;
}

export interface InpaintFileParams {
  imagePath: string;
  maskPath: string;
  outputPath?: string;
}

/**
 * Fills the masked region of an image on a remote inpainting worker.
 */
export class InpaintingService {
  private readonly jobs: AsyncJobClient<InpaintingOutput>;
  private readonly logger: Logger;

  constructor(jobs: AsyncJobClient<InpaintingOutput>, logger: Logger = consoleLogger) {
    this.jobs = jobs;
    this.logger = logger;
  }

  async inpaint(input: InpaintInput, options?: PollOptions): Promise<InpaintResult> {
    const image = await toPng(input.image, 'image');
    const mask = await toPng(input.mask, 'mask');
    if (image.width !== mask.width || image.height !== mask.height) {
      throw new InvalidRequestError(
        `mask is ${mask.width}x${mask.height} but image is ${image.width}x${image.height}`
      );
    }

    const started = Date.now();
    const result = await this.jobs.run(createJobRequest(image.png, { mask: mask.png }, 'image'), options);
    if (result.status === 'FAILED') throw new JobFailedError(result.jobId, result.error);

    const png = decodeBase64(result.output.output_image, 'output_image');
    const size = await readImageSize(png);
    const stats = {
      inferenceTimeS: result.output.stats?.inference_time,
      overallTimeS: result.output.stats?.overall_time
    };
    if (this.jobs.config.debug) {
      this.logger.debug(`inpainting job ${result.jobId} done`, {
        inferenceTimeS: stats.inferenceTimeS ?? 'N/A',
        overallTimeS: stats.overallTimeS ?? 'N/A',
        clientTotalMs: Date.now() - started
      });
    }
    return { image: png, ...size, jobId: result.jobId, stats, timings: result.timings };
  }

  /**
   * File variant: reads both inputs from disk and writes the result to `outputPath`.
   */
  async inpaintFile(params: InpaintFileParams, options?: PollOptions): Promise<string> {
    const { imagePath, maskPath, outputPath = 'result.png' } = params;
    const [image, mask] = await Promise.all([fs.readFile(imagePath), fs.readFile(maskPath)]);
    const result = await this.inpaint({ image, mask }, options);
    await fs.writeFile(outputPath, result.image);
    return outputPath;
  }
}
