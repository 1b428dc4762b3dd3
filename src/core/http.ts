import fetch from 'node-fetch';

import { FetchError, errorMessage } from './errors.js';

/**
 * GET a JSON document, mapping transport errors and non-2xx statuses to
 * FetchError tagged with the source name.
 */
export async function getJson(
  source: string,
  url: URL,
  init: { userAgent: string; signal?: AbortSignal }
): Promise<unknown> {
  const response = await fetch(url.toString(), {
    headers: { Accept: 'application/json', 'User-Agent': init.userAgent },
    signal: init.signal,
  }).catch((error: unknown) => {
    throw new FetchError(source, errorMessage(error), { cause: error });
  });
  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new FetchError(
      source,
      `HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`
    );
  }
  try {
    return await response.json();
  } catch (error) {
    throw new FetchError(source, `invalid JSON body: ${errorMessage(error)}`, { cause: error });
  }
}
