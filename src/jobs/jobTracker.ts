import { JobStateError } from '../errors';

export type JobPhase = 'SUBMITTED' | 'POLLING' | 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT';

const TRANSITIONS: Record<JobPhase, readonly JobPhase[]> = {
  SUBMITTED: ['POLLING'],
  POLLING: ['POLLING', 'SUCCEEDED', 'FAILED', 'TIMED_OUT'],
  SUCCEEDED: [],
  FAILED: [],
  TIMED_OUT: []
};

/**
 * Client-side lifecycle of one job. Terminal phases accept no further transitions.
 */
export class JobTracker {
  readonly jobId: string;
  private current: JobPhase = 'SUBMITTED';
  private readonly visited: JobPhase[] = ['SUBMITTED'];

  constructor(jobId: string) {
    this.jobId = jobId;
  }

  get phase(): JobPhase {
    return this.current;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /** Phases in the order they were entered, without repeats of POLLING. */
  get history(): readonly JobPhase[] {
    return this.visited;
  }

  transition(next: JobPhase): JobPhase {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new JobStateError(`job ${this.jobId}: ${this.current} -> ${next} is not a valid transition`);
    }
    if (next !== this.current) this.visited.push(next);
    this.current = next;
    return next;
  }
}
