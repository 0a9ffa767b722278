import { JobClientConfig, JobClientDeps, Logger } from '../types';
import { JobClientOptions, parseJobClientConfig, parsePollOverrides, PollOverrides } from '../config';
import { DecodeError, InvalidRequestError, NotReadyError, TimeoutError, TransientNetworkError } from '../errors';
import { consoleLogger } from '../logger';
import { assertOk, describeError, FetchTransport, HttpMethod, HttpResponse, HttpTransport, truncate } from '../transport/http';
import { JobHandle, JobRequest, JobResult, JobStatusReport, TerminalStatus } from './jobs';
import { JobTracker } from './jobTracker';
import { base64Output, OutputDecoder } from './decoders';
import {
  describeJobInput,
  encodeJobInput,
  parseBody,
  runSyncResponseSchema,
  statusResponseSchema,
  submitResponseSchema,
  toStatusReport
} from './wire';

export interface PollOptions extends PollOverrides {
  // receives the job's phase transitions; a fresh tracker is used when omitted
  tracker?: JobTracker;
}

export type AsyncJobClientInit<TOutput> = JobClientOptions &
  JobClientDeps & {
    decodeOutput: OutputDecoder<TOutput>;
  };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * AsyncJobClient:
 * - submit a job to a serverless endpoint
 * - poll it until it reaches a terminal status or the deadline passes
 * - fetch and decode the result
 *
 * Holds nothing but its frozen config and collaborators, so concurrent jobs on
 * one instance do not interact.
 */
export class AsyncJobClient<TOutput = Buffer> {
  readonly config: JobClientConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly decodeOutput: OutputDecoder<TOutput>;

  constructor(init: AsyncJobClientInit<TOutput>) {
    const { transport, logger, decodeOutput, ...opts } = init;
    this.config = parseJobClientConfig(opts);
    this.transport = transport ?? new FetchTransport();
    this.logger = logger ?? consoleLogger;
    this.decodeOutput = decodeOutput;
  }

  async submit(request: JobRequest): Promise<JobHandle> {
    if (request.payload.byteLength === 0) throw new InvalidRequestError('job payload is empty');
    this.trace('submitting job', { input: describeJobInput(request) });
    const resp = await this.send('POST', '/run', 'submit', JSON.stringify(encodeJobInput(request)));
    const { id } = parseBody(resp.body, submitResponseSchema, 'submit response');
    return { id, endpoint: this.config.endpoint, submittedAt: Date.now() };
  }

  /**
   * One status check, without waiting.
   */
  async status(handle: JobHandle): Promise<JobStatusReport> {
    const resp = await this.send('GET', `/status/${encodeURIComponent(handle.id)}`, 'status check');
    return toStatusReport(handle.id, parseBody(resp.body, statusResponseSchema, 'status response'));
  }

  /**
   * Check the job every `intervalMs` until the remote reports a terminal status.
   * Throws TimeoutError once `timeoutMs` has elapsed; the remote job is left alone.
   */
  async poll(handle: JobHandle, options: PollOptions = {}): Promise<TerminalStatus> {
    const overrides = parsePollOverrides({ intervalMs: options.intervalMs, timeoutMs: options.timeoutMs });
    const intervalMs = overrides.intervalMs ?? this.config.pollIntervalMs;
    const timeoutMs = overrides.timeoutMs ?? this.config.timeoutMs;
    const tracker = options.tracker ?? new JobTracker(handle.id);
    const started = Date.now();
    const deadline = started + timeoutMs;
    let failures = 0;

    for (;;) {
      tracker.transition('POLLING');
      try {
        const report = await this.status(handle);
        failures = 0;
        this.trace(`job ${handle.id} is ${report.remoteStatus}`);
        if (report.status === 'SUCCEEDED' || report.status === 'FAILED') {
          tracker.transition(report.status);
          return report.status;
        }
      } catch (e) {
        if (!(e instanceof TransientNetworkError) || failures >= this.config.maxRetries) throw e;
        failures++;
        this.trace(`status check for job ${handle.id} failed, retry ${failures}/${this.config.maxRetries}`, {
          error: describeError(e)
        });
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        tracker.transition('TIMED_OUT');
        throw new TimeoutError(handle.id, Date.now() - started);
      }
      await sleep(Math.min(intervalMs, remaining));
    }
  }

  /**
   * Fetch the result of a finished job. The output travels in the status
   * response, so repeated calls return the same result.
   */
  async fetchResult(handle: JobHandle): Promise<JobResult<TOutput>> {
    return this.toResult(await this.status(handle));
  }

  async run(request: JobRequest, options: PollOptions = {}): Promise<JobResult<TOutput>> {
    const handle = await this.submit(request);
    await this.poll(handle, options);
    return this.fetchResult(handle);
  }

  /**
   * Submit through the synchronous route. Jobs that outlast the server's wait
   * come back unfinished and are polled like `run`.
   */
  async runSync(request: JobRequest, options: PollOptions = {}): Promise<JobResult<TOutput>> {
    if (request.payload.byteLength === 0) throw new InvalidRequestError('job payload is empty');
    this.trace('submitting job (sync)', { input: describeJobInput(request) });
    const resp = await this.send('POST', '/runsync', 'sync run', JSON.stringify(encodeJobInput(request)));
    const body = parseBody(resp.body, runSyncResponseSchema, 'sync run response');
    const report = toStatusReport(body.id, body);
    if (report.status === 'SUCCEEDED' || report.status === 'FAILED') return this.toResult(report);

    const handle: JobHandle = { id: body.id, endpoint: this.config.endpoint, submittedAt: Date.now() };
    await this.poll(handle, options);
    return this.fetchResult(handle);
  }

  /**
   * Ask the remote side to cancel the job. Never called implicitly.
   */
  async cancel(handle: JobHandle): Promise<void> {
    await this.send('POST', `/cancel/${encodeURIComponent(handle.id)}`, 'cancel');
  }

  private toResult(report: JobStatusReport): JobResult<TOutput> {
    const { jobId, timings } = report;
    if (report.status === 'FAILED') {
      return { status: 'FAILED', jobId, error: report.error ?? `remote status ${report.remoteStatus}`, timings };
    }
    if (report.status !== 'SUCCEEDED') throw new NotReadyError(jobId, report.remoteStatus);
    if (report.output === undefined || report.output === null) {
      throw new DecodeError(`job ${jobId} completed without output`);
    }
    this.trace(`job ${jobId} completed`, { ...timings });
    let output: TOutput;
    try {
      output = this.decodeOutput(report.output);
    } catch (e) {
      if (e instanceof DecodeError) throw e;
      throw new DecodeError(`job ${jobId} output could not be decoded: ${describeError(e)}`);
    }
    return { status: 'SUCCEEDED', jobId, output, timings };
  }

  private async send(method: HttpMethod, path: string, what: string, body?: string): Promise<HttpResponse> {
    const url = `${this.config.endpoint}${path}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.config.apiKey}`
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    this.trace(`${method} ${url}`);
    const started = Date.now();
    const resp = await this.transport.send({ method, url, headers, body, timeoutMs: this.config.requestTimeoutMs });
    this.trace(`${what} -> HTTP ${resp.status} in ${Date.now() - started}ms`, { body: truncate(resp.body, 500) });
    assertOk(resp, what);
    return resp;
  }

  private trace(message: string, meta?: Record<string, unknown>) {
    if (this.config.debug) this.logger.debug(message, meta);
  }
}

/**
 * Job client whose output is a base64-encoded blob.
 */
export function createBytesJobClient(init: JobClientOptions & JobClientDeps): AsyncJobClient<Buffer> {
  return new AsyncJobClient({ ...init, decodeOutput: base64Output() });
}
