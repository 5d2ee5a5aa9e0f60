import type { PageFetcher } from './types.js';
import { SourceError, errorMessage } from '../shared/errors.js';

export interface HttpFetchOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * GET a url and return the body text. Non-2xx, network failures and
 * timeouts all surface as SourceError.
 */
export async function httpGetText(
  url: string,
  accept: string,
  options: HttpFetchOptions = {},
): Promise<string> {
  const { timeoutMs = 15000, userAgent = 'Feedloom/0.1' } = options;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SourceError(`Request timed out after ${timeoutMs}ms: ${url}`, { url, timeout: timeoutMs }));
    }, timeoutMs);
  });

  try {
    const response = await Promise.race([
      fetch(url, {
        headers: { 'User-Agent': userAgent, Accept: accept },
        signal: controller.signal,
        redirect: 'follow',
      }),
      timeoutPromise,
    ]);

    if (!response.ok) {
      throw new SourceError(`Fetch failed: ${response.status} from ${url}`, {
        url,
        status: response.status,
      });
    }

    return await response.text();
  } catch (err) {
    if (err instanceof SourceError) throw err;
    throw new SourceError(`Fetch failed: ${errorMessage(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpFetchOptions = {}) {}

  get(url: string): Promise<string> {
    return httpGetText(url, 'text/html,application/xhtml+xml,*/*;q=0.8', this.options);
  }
}
