import sharp from 'sharp';
import { DecodeError, InvalidRequestError } from '../errors';
import { describeError } from '../transport/http';

export interface ImageSize {
  width: number;
  height: number;
}

export interface EncodedImage extends ImageSize {
  png: Buffer;
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Re-encode any image sharp can read as PNG, the format the workers expect.
 */
export async function toPng(bytes: Uint8Array, what = 'image'): Promise<EncodedImage> {
  if (bytes.byteLength === 0) throw new InvalidRequestError(`${what} is empty`);
  try {
    const { data, info } = await sharp(asBuffer(bytes)).png().toBuffer({ resolveWithObject: true });
    return { png: data, width: info.width, height: info.height };
  } catch (e) {
    throw new InvalidRequestError(`${what} could not be read as an image: ${describeError(e)}`);
  }
}

export async function readImageSize(bytes: Uint8Array, what = 'output image'): Promise<ImageSize> {
  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ width, height } = await sharp(asBuffer(bytes)).metadata());
  } catch (e) {
    throw new DecodeError(`${what} could not be read as an image: ${describeError(e)}`);
  }
  if (!width || !height) throw new DecodeError(`${what} has no dimensions`);
  return { width, height };
}
