// ──────────────────────────────────────────────────────────────────────────────
// Forwarding failures. Only these are turned into result envelopes.
// ──────────────────────────────────────────────────────────────────────────────

export class ForwardError extends Error {
  readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'ForwardError';
    this.url = url;
  }
}

/** The transport call rejected before a response arrived. */
export class NetworkError extends ForwardError {
  constructor(message: string, url: string) {
    super(message, url);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends NetworkError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, url);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends ForwardError {
  readonly status: number;

  constructor(status: number, statusText: string, url: string) {
    const side = status >= 400 && status < 500 ? 'Client' : 'Server';
    super(`${status} ${side} Error: ${statusText} for url: ${url}`, url);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export class DecodeError extends ForwardError {
  constructor(url: string, detail: string) {
    super(`Invalid JSON in response from ${url}: ${detail}`, url);
    this.name = 'DecodeError';
  }
}
