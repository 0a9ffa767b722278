import { InvalidRequestError } from '../errors';

export type JobStatus = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT';

/** Statuses a poll can end on; TIMED_OUT surfaces as a TimeoutError instead. */
export type TerminalStatus = 'SUCCEEDED' | 'FAILED';

export type RemoteJobStatus = 'IN_QUEUE' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED' | 'CANCELLED' | 'TIMED_OUT';

/**
 * Remote job states onto client statuses. A worker-side TIMED_OUT is a failed
 * job; the client's own TIMED_OUT is reserved for the local polling deadline.
 */
export const REMOTE_STATUS: Record<RemoteJobStatus, JobStatus> = {
  IN_QUEUE: 'QUEUED',
  IN_PROGRESS: 'RUNNING',
  COMPLETED: 'SUCCEEDED',
  FAILED: 'FAILED',
  CANCELLED: 'FAILED',
  TIMED_OUT: 'FAILED'
};

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'SUCCEEDED' || status === 'FAILED' || status === 'TIMED_OUT';
}

export type JobParamValue = string | number | boolean | null | string[] | Uint8Array;

export interface JobRequest {
  readonly payload: Uint8Array;
  readonly payloadKey: string; // wire field the payload is sent under
  readonly params: Readonly<Record<string, JobParamValue>>;
}

export interface JobHandle {
  readonly id: string;
  readonly endpoint: string;
  readonly submittedAt: number;
}

export interface JobTimings {
  delayTimeMs?: number; // time spent queued remotely
  executionTimeMs?: number;
}

export interface JobStatusReport {
  jobId: string;
  status: JobStatus;
  remoteStatus: RemoteJobStatus;
  output?: unknown;
  error?: string;
  timings: JobTimings;
}

export type JobResult<T> =
  | { status: 'SUCCEEDED'; jobId: string; output: T; timings: JobTimings }
  | { status: 'FAILED'; jobId: string; error: string; timings: JobTimings };

function copyParam(value: JobParamValue): JobParamValue {
  if (value instanceof Uint8Array) return Uint8Array.from(value);
  if (Array.isArray(value)) return [...value];
  return value;
}

/**
 * Build an immutable job request. Byte buffers are copied so later writes by
 * the caller cannot change what gets submitted.
 */
export function createJobRequest(
  payload: Uint8Array,
  params: Record<string, JobParamValue> = {},
  payloadKey = 'payload'
): JobRequest {
  if (!payloadKey) throw new InvalidRequestError('payloadKey must not be empty');
  if (Object.prototype.hasOwnProperty.call(params, payloadKey)) {
    throw new InvalidRequestError(`parameter "${payloadKey}" collides with the payload field`);
  }
  const copied: Record<string, JobParamValue> = {};
  for (const [key, value] of Object.entries(params)) copied[key] = copyParam(value);
  return Object.freeze({
    payload: Uint8Array.from(payload),
    payloadKey,
    params: Object.freeze(copied)
  });
}
