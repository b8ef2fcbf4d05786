/** Default per-request timeout in milliseconds (30 seconds). */
export const DEFAULT_TIMEOUT_MS = 30000;

export interface HttpOptions {
  /** Custom HTTP headers to send with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request timeout in milliseconds. Default: `30000`. */
  readonly timeout?: number;
}

/**
 * `fetch` that aborts after `timeout` milliseconds.
 *
 * The timer only covers the wait for response headers; reading the body is not bounded.
 */
export async function fetchWithTimeout(url: string, init: RequestInit, timeout: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeout);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function describeStatus(response: Response): string {
  return `HTTP ${String(response.status)} ${response.statusText}`.trimEnd();
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'AbortError' ? 'request timed out' : error.message;
  }
  return String(error);
}
