import { DecodeError } from '../errors';

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode standard base64 (optionally wrapped in a data URL). Buffer.from silently
 * skips invalid characters, so the alphabet is checked first.
 */
export function decodeBase64(text: string, what = 'payload'): Buffer {
  const stripped = text.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (stripped.length === 0) throw new DecodeError(`${what} is empty`);
  const data = stripped.replace(/=+$/, '');
  const padded = data.length !== stripped.length;
  if (!BASE64.test(stripped) || data.length === 0 || data.length % 4 === 1 || (padded && stripped.length % 4 !== 0)) {
    throw new DecodeError(`${what} is not valid base64`);
  }
  return Buffer.from(stripped, 'base64');
}
