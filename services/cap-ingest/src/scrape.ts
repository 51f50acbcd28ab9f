import type { CheerioAPI } from 'cheerio';
import type { Dispatcher } from 'undici';
import { loadHtml } from './html.js';
import { fetchWithRetry } from './http.js';

export type LoadDocument = (url: string) => Promise<CheerioAPI>;

export interface DocumentLoaderOptions {
  userAgent?: string;
  timeoutMs?: number;
  minGapMs?: number;
  maxAttempts?: number;
  backoffMs?: number;
  dispatcher?: Dispatcher;
}

export function createDocumentLoader(options: DocumentLoaderOptions = {}): LoadDocument {
  const { userAgent, dispatcher, ...retry } = options;
  return async (url) => {
    const { body, status } = await fetchWithRetry(url, {
      ...retry,
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      dispatcher,
    });
    console.debug(`[http] GET ${url} status=${status} bytes=${body.length}`);
    return loadHtml(body);
  };
}
