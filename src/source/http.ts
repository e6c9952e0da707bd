import { SourceError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { FetchOptions } from './adapter.js';

/**
 * GET an HTML page. Throws SourceError on timeout, network failure or a
 * non-2xx status.
 */
export async function fetchHtml(url: string, options: FetchOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      throw new SourceError(`Page fetch failed: ${response.status} from ${url}`, {
        url,
        status: response.status,
      });
    }

    const html = await response.text();
    logger.debug({ url, bytes: html.length }, 'Page fetched');
    return html;
  } catch (err) {
    if (err instanceof SourceError) throw err;
    if (err instanceof Error && err.name === 'AbortError') {
      throw new SourceError(`Page fetch timed out after ${options.timeoutMs}ms: ${url}`, {
        url,
        timeout: options.timeoutMs,
      });
    }
    throw new SourceError(`Page fetch failed: ${errorMessage(err)}`, { url });
  } finally {
    clearTimeout(timer);
  }
}
