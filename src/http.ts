import axios, { AxiosInstance, AxiosResponse } from 'axios';

export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Builds the one HTTP client shared by the dependents feed and the scanner.
 * It is never reconfigured after construction.
 */
export function createHttpClient(options: { timeoutMs?: number } = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  });
}

/**
 * Path of the last request made for a response, after redirects were
 * followed. The node adapter exposes it on the final ClientRequest.
 */
export function finalRequestPath(response: AxiosResponse): string | undefined {
  const request: unknown = response.request;
  if (typeof request !== 'object' || request === null || !('path' in request)) {
    return undefined;
  }
  const { path } = request;
  if (typeof path !== 'string') {
    return undefined;
  }
  return path.split('?')[0];
}
