import { promises as fs } from 'fs';
import { z } from 'zod';
import { decodeBase64 } from '../codec/base64';
import { toPng } from '../codec/image';
import { JobFailedError } from '../errors';
import { AsyncJobClient, PollOptions } from '../jobs/asyncJobClient';
import { schemaOutput } from '../jobs/decoders';
import { createJobRequest, JobTimings } from '../jobs/jobs';

export const segmentationOutputSchema = z.object({
  masks: z.array(z.string()).default([]),
  bounding_boxes: z.array(z.array(z.number())).default([])
});

export type SegmentationOutput = z.infer<typeof segmentationOutputSchema>;

export const decodeSegmentationOutput = schemaOutput(segmentationOutputSchema);

export interface SegmentInput {
  image: Uint8Array;
  classNames?: string[]; // all detected classes when omitted
}

export interface SegmentResult {
  masks: Buffer[];
  boundingBoxes: number[][];
  jobId: string;
  timings: JobTimings;
}

export interface SegmentFileParams {
  imagePath: string;
  classNames?: string[];
  outputPath?: string;
}

export class SegmentationService {
  private readonly jobs: AsyncJobClient<SegmentationOutput>;

  constructor(jobs: AsyncJobClient<SegmentationOutput>) {
    this.jobs = jobs;
  }

  async segment(input: SegmentInput, options?: PollOptions): Promise<SegmentResult> {
    const { jobId, output, timings } = await this.runJob(input.image, input.classNames, options);
    return {
      masks: output.masks.map((mask, i) => decodeBase64(mask, `mask ${i}`)),
      boundingBoxes: output.bounding_boxes,
      jobId,
      timings
    };
  }

  /**
   * Writes the raw job output (base64 masks and boxes) as JSON to `outputPath`.
   */
  async segmentFile(params: SegmentFileParams, options?: PollOptions): Promise<string> {
    const { imagePath, classNames, outputPath = 'result.json' } = params;
    const { output } = await this.runJob(await fs.readFile(imagePath), classNames, options);
    await fs.writeFile(outputPath, JSON.stringify(output), 'utf8');
    return outputPath;
  }

  private async runJob(image: Uint8Array, classNames: string[] | undefined, options?: PollOptions) {
    const { png } = await toPng(image, 'image');
    const result = await this.jobs.run(createJobRequest(png, { class_names: classNames ?? null }, 'image'), options);
    if (result.status === 'FAILED') throw new JobFailedError(result.jobId, result.error);
    return result;
  }
}
