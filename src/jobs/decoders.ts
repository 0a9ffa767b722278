import { z } from 'zod';
import { decodeBase64 } from '../codec/base64';
import { DecodeError } from '../errors';
import { formatIssues } from '../schema';

/**
 * Turns the `output` of a completed job into the caller's result type.
 * Throws DecodeError when the output does not have the expected format.
 */
export type OutputDecoder<T> = (output: unknown) => T;

/**
 * Output is a base64 string, or an object carrying one under `field`.
 */
export function base64Output(field?: string): OutputDecoder<Buffer> {
  return (output) => {
    let value: unknown = output;
    if (field !== undefined) {
      if (typeof output !== 'object' || output === null || !(field in output)) {
        throw new DecodeError(`job output has no "${field}" field`);
      }
      value = Reflect.get(output, field);
    }
    if (typeof value !== 'string') throw new DecodeError(`job output${field ? ` "${field}"` : ''} is not a string`);
    return decodeBase64(value, field ? `job output "${field}"` : 'job output');
  };
}

export function schemaOutput<S extends z.ZodTypeAny>(schema: S): OutputDecoder<z.infer<S>> {
  return (output) => {
    const parsed = schema.safeParse(output);
    if (!parsed.success) {
      throw new DecodeError(`job output has an unexpected shape: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  };
}
