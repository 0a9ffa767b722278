/**
 * Example: inpaint a local image with a mask, then segment the result.
 *
 *   RUNPOD_API_KEY=... RUNPOD_INPAINTING_ENDPOINT_ID=... \
 *   RUNPOD_SEGMENTATION_ENDPOINT_ID=... npx tsx examples/inpaint-example.ts photo.png mask.png
 */

import 'dotenv/config';
import { FaasVisionClient } from '../src/client';
import { configFromEnv } from '../src/config';
import { JobFailedError, TimeoutError } from '../src/errors';

async function main() {
  const [imagePath = 'image.png', maskPath = 'mask.png'] = process.argv.slice(2);
  const client = new FaasVisionClient(configFromEnv());

  try {
    const outputPath = await client.inpainting.inpaintFile({ imagePath, maskPath, outputPath: 'inpainted.png' });
    console.log('Inpainted image saved as', outputPath);
  } catch (e) {
    if (e instanceof TimeoutError) {
      console.log(`Job ${e.jobId} is still running remotely; try again later`);
      return;
    }
    if (e instanceof JobFailedError) {
      console.log(`Job ${e.jobId} failed:`, e.reason);
      return;
    }
    throw e;
  }

  const segments = await client.segmentation.segmentFile({
    imagePath: 'inpainted.png',
    classNames: ['person', 'car'],
    outputPath: 'segments.json'
  });
  console.log('Segmentation result saved as', segments);
}

main().catch(console.error);
