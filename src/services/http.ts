import { ScrapeError } from '../errors.js';

export const DEFAULT_TIMEOUT_SECONDS = 10;

const REQUEST_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-IN,en;q=0.9',
};

export type PageFetcher = (url: string, timeoutSeconds: number) => Promise<string>;

export const fetchProductPage: PageFetcher = async (url, timeoutSeconds = DEFAULT_TIMEOUT_SECONDS) => {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: REQUEST_HEADERS,
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutSeconds * 1000),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScrapeError({
      kind: 'transport',
      message: `Network error while fetching ${url}: ${reason}`,
      cause: error,
    });
  }

  if (!response.ok) {
    throw new ScrapeError({
      kind: 'transport',
      message: `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
    });
  }

  return response.text();
};
