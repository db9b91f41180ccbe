/** Raised by HTTP adapters when an upstream answers with a non-2xx status. */
export class UpstreamRequestError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'UpstreamRequestError';
  }
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Sends a request and returns the decoded JSON body.
 * Non-2xx responses raise `UpstreamRequestError`; network failures and
 * timeouts propagate as thrown by `fetch`.
 */
export async function requestJson(
  service: string,
  url: URL,
  init: { method?: 'GET' | 'POST'; body?: unknown; timeoutMs?: number } = {},
): Promise<unknown> {
  const response = await fetch(url, {
    method: init.method ?? 'GET',
    headers: init.body !== undefined
      ? { 'Content-Type': 'application/json', Accept: 'application/json' }
      : { Accept: 'application/json' },
    body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
    signal: AbortSignal.timeout(init.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new UpstreamRequestError(
      service,
      response.status,
      `${service} request to ${url.pathname} failed with status ${response.status}`,
    );
  }

  const body: unknown = await response.json();
  return body;
}
