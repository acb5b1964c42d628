// wrap anything thrown into a DnsdbError, DnsdbErrors pass through unchanged
export function toDnsdbError(error: unknown): DnsdbError {
  if (error instanceof DnsdbError) {
    return error;
  }

  const wrapped = new DnsdbError(
    error instanceof Error ? error.message : String(error) || 'Unknown error'
  );
  if (error instanceof Error) {
    wrapped.name = error.name;
    wrapped.stack = error.stack;
  }
  return wrapped;
}

// every error the client raises, code and errno hold an HTTP-like status
export class DnsdbError extends Error {
  public code = -1;
  public errno = -1;
  public syscall = 'dnsdb-query';

  constructor(message: string) {
    super(message);
    this.name = 'DnsdbError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// non-2xx response from the API, code is the HTTP status
export class QueryError extends DnsdbError {
  public status: number;
  public body: string;

  constructor(status: number, statusText: string, body = '') {
    const detail = body.trim();
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}${detail ? `: ${detail}` : ''}`);
    this.name = 'QueryError';
    this.status = status;
    this.body = detail;
    this.code = status;
    this.errno = status;
  }
}

// request timeout error
export class TimeoutError extends DnsdbError {
  public code = 408; // Request Timeout

  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
    this.errno = this.code;
  }
}

// network error, the API server could not be reached
export class ConnectionError extends DnsdbError {
  public code = 503; // Service Unavailable

  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
    this.errno = this.code;
  }
}

// a response line that is not a valid record
export class ParsingError extends DnsdbError {
  public code = 422; // Unprocessable Entity

  constructor(message: string) {
    super(message);
    this.name = 'ParsingError';
    this.errno = this.code;
  }
}

// bad config file, option or argument
export class ConfigurationError extends DnsdbError {
  public code = 500; // Internal Server Error

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.errno = this.code;
  }
}

// AbortSignal cancellation error
export class AbortError extends DnsdbError {
  public code = 499; // Client Closed Request

  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
    this.errno = this.code;
  }
}
