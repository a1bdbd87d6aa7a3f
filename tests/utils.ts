import type { Request, RequestHandler, Response } from 'express';

interface HandlerOptions {
  body?: unknown;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  method?: string;
}

interface HandlerResult<T = unknown> {
  status: number;
  data: T | null;
}

const createMockResponse = <T>() => {
  let status = 200;
  let data: T | null = null;

  const res = {
    locals: {},
    status(code: number) {
      status = code;
      return this;
    },
    json(payload: T) {
      data = payload;
      return this;
    },
    result(): HandlerResult<T> {
      return { status, data };
    }
  };

  return res;
};

export const callHandler = async <T = unknown>(
  handler: RequestHandler,
  options: HandlerOptions = {}
): Promise<HandlerResult<T>> => {
  const headerMap = new Map(Object.entries(options.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v] as const));

  const req = {
    body: options.body ?? {},
    params: options.params ?? {},
    query: {},
    headers: Object.fromEntries(headerMap),
    method: options.method ?? 'POST',
    ip: '127.0.0.1',
    get(name: string) {
      return headerMap.get(name.toLowerCase());
    }
  };

  const res = createMockResponse<T>();

  let nextCalledWithError: unknown = undefined;
  const next = (err?: unknown) => {
    if (err) {
      nextCalledWithError = err;
    }
  };

  await Promise.resolve(handler(req as unknown as Request, res as unknown as Response, next));

  if (nextCalledWithError) {
    throw nextCalledWithError;
  }

  return res.result();
};
