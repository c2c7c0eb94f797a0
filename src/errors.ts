export class RequestError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly transient: boolean = false,
    cause?: unknown
  ) {
    super(message);
    this.name = 'RequestError';
    if (cause !== undefined) this.cause = cause;
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly pmid?: string
  ) {
    super(pmid ? `Record ${pmid}: ${message}` : message);
    this.name = 'ParseError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `- ${i}`).join('\n')}` : message);
    this.name = 'ValidationError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
