export interface FrameworkResponseOptions {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Explicit HTTP response from a handler. Plain return values are sent as JSON with 200.
 */
export class FrameworkResponse {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Record<string, string>;

  constructor(options: FrameworkResponseOptions) {
    this.status = options.status ?? 200;
    this.body = options.body;
    this.headers = options.headers ?? {};
  }
}

export const redirect = (url: string) => new FrameworkResponse({ status: 302, headers: { Location: url } });

export const html = (status: number, body: string) =>
  new FrameworkResponse({ status, body, headers: { 'Content-Type': 'text/html; charset=utf-8' } });
