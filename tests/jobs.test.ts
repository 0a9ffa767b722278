import { describe, it, expect } from 'vitest';
import { createJobRequest, isTerminalStatus, REMOTE_STATUS } from '../src/jobs/jobs';
import { JobTracker } from '../src/jobs/jobTracker';
import { encodeJobInput, toStatusReport } from '../src/jobs/wire';
import { base64Output, schemaOutput } from '../src/jobs/decoders';
import { decodeBase64, encodeBase64 } from '../src/codec/base64';
import { DecodeError, InvalidRequestError, JobStateError } from '../src/errors';
import { z } from 'zod';

describe('createJobRequest', () => {
  it('copies buffers so later writes do not change the request', () => {
    const payload = Uint8Array.from([1, 2, 3]);
    const mask = Uint8Array.from([9]);
    const request = createJobRequest(payload, { mask }, 'image');
    payload[0] = 7;
    mask[0] = 0;

    expect(Array.from(request.payload)).toEqual([1, 2, 3]);
    expect(request.params.mask).toEqual(Uint8Array.from([9]));
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.params)).toBe(true);
  });

  it('rejects a parameter that shadows the payload field', () => {
    expect(() => createJobRequest(Uint8Array.from([1]), { image: 'x' }, 'image')).toThrow(InvalidRequestError);
  });

  it('encodes bytes as base64 and passes other values through', () => {
    const request = createJobRequest(Buffer.from('img'), { mask: Buffer.from('msk'), class_names: ['cat'], seed: 4 }, 'image');
    expect(encodeJobInput(request)).toEqual({
      input: { image: 'aW1n', mask: 'bXNr', class_names: ['cat'], seed: 4 }
    });
  });
});

describe('status mapping', () => {
  it('maps remote states onto client statuses', () => {
    expect(REMOTE_STATUS).toEqual({
      IN_QUEUE: 'QUEUED',
      IN_PROGRESS: 'RUNNING',
      COMPLETED: 'SUCCEEDED',
      FAILED: 'FAILED',
      CANCELLED: 'FAILED',
      TIMED_OUT: 'FAILED'
    });
    expect(isTerminalStatus('RUNNING')).toBe(false);
    expect(isTerminalStatus('TIMED_OUT')).toBe(true);
  });

  it('stringifies structured remote errors', () => {
    const report = toStatusReport('job-9', { status: 'FAILED', error: { code: 'OOM' }, executionTime: 12 });
    expect(report).toEqual({
      jobId: 'job-9',
      status: 'FAILED',
      remoteStatus: 'FAILED',
      output: undefined,
      error: '{"code":"OOM"}',
      timings: { delayTimeMs: undefined, executionTimeMs: 12 }
    });
  });
});

describe('JobTracker', () => {
  it('follows submitted -> polling -> terminal', () => {
    const tracker = new JobTracker('job-1');
    tracker.transition('POLLING');
    tracker.transition('POLLING');
    tracker.transition('FAILED');
    expect(tracker.history).toEqual(['SUBMITTED', 'POLLING', 'FAILED']);
    expect(tracker.terminal).toBe(true);
  });

  it('never leaves a terminal phase', () => {
    const tracker = new JobTracker('job-1');
    tracker.transition('POLLING');
    tracker.transition('SUCCEEDED');
    expect(() => tracker.transition('POLLING')).toThrow(JobStateError);
    expect(() => tracker.transition('FAILED')).toThrow('job job-1: SUCCEEDED -> FAILED is not a valid transition');
    expect(tracker.phase).toBe('SUCCEEDED');
  });

  it('cannot finish without polling first', () => {
    expect(() => new JobTracker('job-2').transition('SUCCEEDED')).toThrow(JobStateError);
  });
});

describe('base64 codec', () => {
  it('decodes plain and data-url base64', () => {
    expect(decodeBase64('aGVsbG8=').toString()).toBe('hello');
    expect(decodeBase64('data:image/png;base64,aGVs\nbG8=').toString()).toBe('hello');
    expect(encodeBase64(Uint8Array.from([104, 105]))).toBe('aGk=');
    expect(decodeBase64('aGk').toString()).toBe('hi');
  });

  it('rejects empty and malformed input', () => {
    expect(() => decodeBase64('')).toThrow('payload is empty');
    expect(() => decodeBase64('abc$', 'mask')).toThrow('mask is not valid base64');
    expect(() => decodeBase64('abcde')).toThrow(DecodeError);
    expect(() => decodeBase64('==')).toThrow('payload is not valid base64');
    expect(() => decodeBase64('aG=')).toThrow(DecodeError);
  });
});

describe('output decoders', () => {
  it('reads a named base64 field', () => {
    const decode = base64Output('image');
    expect(decode({ image: 'aGk=' }).toString()).toBe('hi');
    expect(() => decode({ other: 'aGk=' })).toThrow('job output has no "image" field');
    expect(() => decode({ image: 42 })).toThrow('job output "image" is not a string');
  });

  it('validates against a schema', () => {
    const decode = schemaOutput(z.object({ count: z.number() }));
    expect(decode({ count: 3 })).toEqual({ count: 3 });
    expect(() => decode({ count: 'three' })).toThrow(DecodeError);
  });
});
