import axios from 'axios';
import { HEADERS } from '@/scraper/config/source.js';
import { describeError } from '@/utils/errors.js';

export interface FetchOptions {
  timeoutMs: number;
}

/**
 * Fetch HTML from a URL with error handling
 *
 * @returns the response body, or null when the request failed
 */
export async function fetchHTML(url: string, options: FetchOptions): Promise<string | null> {
  try {
    const response = await axios.get<string>(url, {
      headers: HEADERS,
      timeout: options.timeoutMs,
      responseType: 'text',
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  } catch (error) {
    console.error(`[fetchHTML] Failed to fetch ${url}:`, describeError(error));
    return null;
  }
}
