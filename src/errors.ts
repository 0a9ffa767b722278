export class FaasError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FaasError';
  }
}

export class ConfigError extends FaasError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Base for failures reported by the remote endpoint over HTTP.
 * `status` is undefined when no response was received at all.
 */
export class HttpError extends FaasError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, status?: number, body?: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }
}

/** Missing, expired or rejected credential. Not retried. */
export class AuthError extends HttpError {
  constructor(message: string, status?: number, body?: string) {
    super(message, status, body);
    this.name = 'AuthError';
  }
}

/** Malformed request; retrying the same request cannot succeed. */
export class InvalidRequestError extends HttpError {
  constructor(message: string, status?: number, body?: string) {
    super(message, status, body);
    this.name = 'InvalidRequestError';
  }
}

/** Connection failure, aborted request, throttling or 5xx. */
export class TransientNetworkError extends HttpError {
  constructor(message: string, status?: number, body?: string) {
    super(message, status, body);
    this.name = 'TransientNetworkError';
  }
}

export class DecodeError extends FaasError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * The local polling deadline elapsed. The remote job may still complete.
 */
export class TimeoutError extends FaasError {
  readonly jobId: string;
  readonly elapsedMs: number;

  constructor(jobId: string, elapsedMs: number) {
    super(`job ${jobId} did not reach a terminal status within ${elapsedMs}ms`);
    this.name = 'TimeoutError';
    this.jobId = jobId;
    this.elapsedMs = elapsedMs;
  }
}

export class NotReadyError extends FaasError {
  readonly jobId: string;
  readonly remoteStatus: string;

  constructor(jobId: string, remoteStatus: string) {
    super(`job ${jobId} is not finished (status ${remoteStatus})`);
    this.name = 'NotReadyError';
    this.jobId = jobId;
    this.remoteStatus = remoteStatus;
  }
}

export class JobStateError extends FaasError {
  constructor(message: string) {
    super(message);
    this.name = 'JobStateError';
  }
}

/** Raised by the image services when the remote job ends in failure. */
export class JobFailedError extends FaasError {
  readonly jobId: string;
  readonly reason: string;

  constructor(jobId: string, reason: string) {
    super(`job ${jobId} failed: ${reason}`);
    this.name = 'JobFailedError';
    this.jobId = jobId;
    this.reason = reason;
  }
}
