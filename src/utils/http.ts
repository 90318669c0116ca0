export class HttpStatusError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/**
 * Network failures, timeouts, throttling and server errors are worth retrying;
 * anything else the server rejected is not.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return TRANSIENT_STATUSES.has(error.status) || error.status >= 500;
  }
  if (error instanceof Error) {
    // fetch rejects with TypeError on connection failures
    return error instanceof TypeError || error.name === 'TimeoutError' || error.name === 'AbortError';
  }
  return false;
}

export async function fetchJson(
  url: string,
  options: {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: unknown;
    timeoutMs?: number;
  } = {}
): Promise<unknown> {
  const { method = 'GET', headers = {}, body, timeoutMs = 30_000 } = options;

  const response = await fetch(url, {
    method,
    headers: {
      Accept: 'application/json',
      ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...headers
    },
    body: body !== undefined ? JSON.stringify(body) : undefined,
    signal: AbortSignal.timeout(timeoutMs)
  });

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 200);
    throw new HttpStatusError(
      response.status,
      `HTTP ${response.status}: ${response.statusText}${detail ? ` - ${detail}` : ''}`
    );
  }

  return response.json();
}
