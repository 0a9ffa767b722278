import { z } from 'zod';
import { encodeBase64 } from '../codec/base64';
import { DecodeError } from '../errors';
import { formatIssues } from '../schema';
import { JobRequest, JobStatusReport, REMOTE_STATUS } from './jobs';

/*
 * Wire shapes of the serverless job API:
 *   POST /run            {input} -> {id, status}
 *   POST /runsync        {input} -> {id, status, output?, error?}
 *   GET  /status/{id}            -> {id, status, output?, error?, delayTime?, executionTime?}
 *   POST /cancel/{id}            -> {id, status}
 */

export const remoteStatusSchema = z.enum(['IN_QUEUE', 'IN_PROGRESS', 'COMPLETED', 'FAILED', 'CANCELLED', 'TIMED_OUT']);

export const submitResponseSchema = z.object({
  id: z.string().min(1),
  status: remoteStatusSchema.optional()
});

export const statusResponseSchema = z.object({
  id: z.string().min(1).optional(),
  status: remoteStatusSchema,
  output: z.unknown().optional(),
  error: z.unknown().optional(),
  delayTime: z.number().optional(),
  executionTime: z.number().optional()
});

export const runSyncResponseSchema = statusResponseSchema.extend({ id: z.string().min(1) });

export type StatusResponse = z.infer<typeof statusResponseSchema>;

export interface JobInputBody {
  input: Record<string, unknown>;
}

export function encodeJobInput(request: JobRequest): JobInputBody {
  const input: Record<string, unknown> = { [request.payloadKey]: encodeBase64(request.payload) };
  for (const [key, value] of Object.entries(request.params)) {
    input[key] = value instanceof Uint8Array ? encodeBase64(value) : value;
  }
  return { input };
}

/** Sizes instead of contents, for tracing. */
export function describeJobInput(request: JobRequest): Record<string, unknown> {
  const summary: Record<string, unknown> = { [request.payloadKey]: `${request.payload.byteLength} bytes` };
  for (const [key, value] of Object.entries(request.params)) {
    summary[key] = value instanceof Uint8Array ? `${value.byteLength} bytes` : value;
  }
  return summary;
}

export function parseBody<S extends z.ZodTypeAny>(body: string, schema: S, what: string): z.infer<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new DecodeError(`${what} is not valid JSON`);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError(`${what} has an unexpected shape: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function errorText(error: unknown): string | undefined {
  if (error === undefined || error === null) return undefined;
  return typeof error === 'string' ? error : JSON.stringify(error);
}

export function toStatusReport(jobId: string, resp: StatusResponse): JobStatusReport {
  return {
    jobId,
    status: REMOTE_STATUS[resp.status],
    remoteStatus: resp.status,
    output: resp.output,
    error: errorText(resp.error),
    timings: { delayTimeMs: resp.delayTime, executionTimeMs: resp.executionTime }
  };
}
