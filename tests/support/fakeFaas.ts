import { TransientNetworkError } from '../../src/errors';
import type { HttpRequest, HttpResponse, HttpTransport } from '../../src/transport/http';
import type { RemoteJobStatus } from '../../src/jobs/jobs';

export const API_KEY = 'test-key';
export const ENDPOINT = 'https://faas.test/v2/ep-test';

export type TerminalRemoteStatus = Exclude<RemoteJobStatus, 'IN_QUEUE' | 'IN_PROGRESS'>;

/** What the stand-in worker does with one submitted input. */
export interface FakeJobPlan {
  // status checks answered with a non-terminal status before the job finishes
  pollsUntilDone: number;
  status: TerminalRemoteStatus;
  output?: unknown;
  error?: unknown;
}

export type FakeWorker = (input: Record<string, unknown>) => FakeJobPlan;

interface FakeJob {
  input: Record<string, unknown>;
  plan: FakeJobPlan;
  polls: number;
  cancelled: boolean;
}

/** An injected failure for the next status check: dropped connection or HTTP status. */
export type InjectedFailure = 'network' | number;

function json(status: number, body: unknown): HttpResponse {
  return { status, body: JSON.stringify(body) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * In-process stand-in for a serverless job endpoint.
 */
export class FakeFaas implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly statusFailures: InjectedFailure[] = [];
  private readonly jobs = new Map<string, FakeJob>();
  private nextId = 1;

  constructor(
    private worker: FakeWorker = (input) => ({ pollsUntilDone: 0, status: 'COMPLETED', output: input.payload })
  ) {}

  setWorker(worker: FakeWorker) {
    this.worker = worker;
  }

  statusChecks(): number {
    return this.requests.filter((r) => r.method === 'GET').length;
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    if (req.headers.Authorization !== `Bearer ${API_KEY}`) return json(401, { error: 'Unauthorized' });

    const path = new URL(req.url).pathname;
    let match: RegExpMatchArray | null;
    if ((match = path.match(/\/status\/([^/]+)$/)) && req.method === 'GET') return this.status(match[1]);
    if ((match = path.match(/\/cancel\/([^/]+)$/)) && req.method === 'POST') return this.cancel(match[1]);
    if (path.endsWith('/runsync') && req.method === 'POST') return this.submit(req, true);
    if (path.endsWith('/run') && req.method === 'POST') return this.submit(req, false);
    return json(404, { error: `no route for ${req.method} ${path}` });
  }

  private submit(req: HttpRequest, sync: boolean): HttpResponse {
    const body: unknown = JSON.parse(req.body ?? 'null');
    if (!isRecord(body) || !isRecord(body.input)) return json(400, { error: 'input required' });
    const id = `job-${this.nextId++}`;
    const job: FakeJob = { input: body.input, plan: this.worker(body.input), polls: 0, cancelled: false };
    this.jobs.set(id, job);
    if (sync && job.plan.pollsUntilDone === 0) return json(200, this.terminalBody(id, job));
    return json(200, { id, status: sync ? 'IN_PROGRESS' : 'IN_QUEUE' });
  }

  private status(id: string): HttpResponse {
    const failure = this.statusFailures.shift();
    if (failure === 'network') throw new TransientNetworkError('connection reset');
    if (failure !== undefined) return json(failure, { error: 'injected' });

    const job = this.jobs.get(id);
    if (!job) return json(404, { error: 'job not found' });
    job.polls++;
    if (!job.cancelled && job.polls <= job.plan.pollsUntilDone) {
      return json(200, { id, status: job.polls === 1 ? 'IN_QUEUE' : 'IN_PROGRESS' });
    }
    return json(200, this.terminalBody(id, job));
  }

  private cancel(id: string): HttpResponse {
    const job = this.jobs.get(id);
    if (!job) return json(404, { error: 'job not found' });
    job.cancelled = true;
    return json(200, { id, status: 'CANCELLED' });
  }

  private terminalBody(id: string, job: FakeJob) {
    if (job.cancelled) return { id, status: 'CANCELLED' };
    const { status, output, error } = job.plan;
    return { id, status, output, error, delayTime: 5, executionTime: 20 };
  }
}
