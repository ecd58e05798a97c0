import axios from 'axios';

/**
 * Turn any thrown value into a one-line message for logging.
 * HTTP errors carry their status code when the server answered.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status} (${error.message})` : error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
