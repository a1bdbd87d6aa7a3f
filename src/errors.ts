import { ZodError, type ZodIssue } from 'zod';

export type ErrorDetail = {
  path: string;
  message: string;
  code?: string;
};

const formatIssuePath = (issue: ZodIssue) => (issue.path.length ? issue.path.join('.') : '');

export const formatZodError = (error: ZodError): ErrorDetail[] =>
  error.issues.map((issue) => ({
    path: formatIssuePath(issue),
    message: issue.message,
    code: issue.code
  }));

export class HttpError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }

  static badRequest(message: string, details?: unknown) {
    return new HttpError(400, 'bad_request', message, details);
  }

  static conflict(message = 'Conflict', details?: unknown) {
    return new HttpError(409, 'conflict', message, details);
  }

  static unavailable(message = 'Service unavailable', details?: unknown) {
    return new HttpError(503, 'unavailable', message, details);
  }

  static fromZod(error: ZodError, message = 'Invalid request') {
    return HttpError.badRequest(message, { issues: formatZodError(error) });
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** The browser could not load a page of the payroll site. */
export class NavigationError extends Error {
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Failed to open ${url}: ${describeError(cause)}`, { cause });
    this.name = 'NavigationError';
    this.url = url;
  }
}
