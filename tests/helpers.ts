import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { PackageRecord } from '../src/types';

export interface StubReply {
  status?: number;
  data?: unknown;
  /** Path of the final request, as if redirects had been followed. */
  path?: string;
  error?: Error;
}

/**
 * An axios client whose adapter answers in-process, so no request ever
 * leaves the test.
 */
export function createStubClient(route: (url: string) => StubReply): {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(config);
      const url = config.url ?? '';
      const reply = route(url);
      if (reply.error) {
        throw reply.error;
      }
      return {
        data: reply.data ?? '',
        status: reply.status ?? 200,
        statusText: '',
        headers: {},
        config,
        request: { path: reply.path ?? new URL(url).pathname }
      };
    }
  });
  return { client, requests };
}

export function record(name: string, publishedAt: number): PackageRecord {
  return { name, publishedAt, maintainers: [] };
}

export function dependentJson(name: string, ts: number) {
  return {
    name,
    description: `${name} description`,
    maintainers: ['someone'],
    publisher: { name: 'someone', avatars: { small: '/avatar.png' } },
    date: { ts, rel: '2 hours ago' },
    version: '1.0.0'
  };
}
