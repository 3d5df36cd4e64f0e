/**
 * Single outbound GET with a JSON body. Every failure (network, timeout, HTTP status,
 * unparsable body) comes back as { ok: false } so callers branch on one flag.
 */
import { logger } from '@/services/logger';

const log = logger.getSubLogger({ name: 'http' });

export interface JsonRequestOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

export type JsonResult =
  | { ok: true; data: unknown }
  | { ok: false; reason: string };

export type FetchJson = (url: string, options: JsonRequestOptions) => Promise<JsonResult>;

export const fetchJson: FetchJson = async (url, { headers, timeoutMs }) => {
  let res: Response;
  try {
    res = await fetch(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn('fetchJson:request_failed', { url, reason });
    return { ok: false, reason };
  }

  if (!res.ok) {
    const reason = `HTTP ${res.status}`;
    log.warn('fetchJson:bad_status', { url, status: res.status });
    return { ok: false, reason };
  }

  try {
    const data: unknown = await res.json();
    return { ok: true, data };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn('fetchJson:invalid_body', { url, reason });
    return { ok: false, reason };
  }
};
