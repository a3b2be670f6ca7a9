import { errorMessage } from '../core/errors';
import { logger } from '../observability/logger';

export type FetchLike = (input: string, init?: { method?: string; signal?: AbortSignal }) => Promise<{
  status: number;
  ok: boolean;
  text(): Promise<string>;
}>;

export interface ProviderResponse {
  status: number;
  ok: boolean;
  // parsed JSON body, or null when the body was empty or not JSON
  body: unknown;
}

export class ProviderRequestError extends Error {
  constructor(provider: string, cause: unknown) {
    super(`${provider} request failed: ${errorMessage(cause)}`, { cause });
    this.name = 'ProviderRequestError';
  }
}

export function buildUrl(base: string, params: Record<string, string | number> = {}) {
  const query = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) query.set(k, String(v));
  const qs = query.toString();
  return qs ? `${base}?${qs}` : base;
}

/**
 * Performs exactly one GET and decodes the JSON body.
 * Transport failures become ProviderRequestError; HTTP error statuses are returned to the caller.
 */
export async function getJson(
  provider: string,
  url: string,
  fetchImpl: FetchLike = fetch
): Promise<ProviderResponse> {
  let res: Awaited<ReturnType<FetchLike>>;
  try {
    res = await fetchImpl(url, { method: 'GET' });
  } catch (err) {
    logger.warn('provider request failed', { provider, error: errorMessage(err) });
    throw new ProviderRequestError(provider, err);
  }

  const text = await res.text();
  let body: unknown = null;
  if (text) {
    try {
      body = JSON.parse(text);
    } catch {
      logger.warn('provider returned non-JSON body', { provider, status: res.status, len: text.length });
    }
  }
  logger.debug('provider response', { provider, status: res.status });
  return { status: res.status, ok: res.ok, body };
}
