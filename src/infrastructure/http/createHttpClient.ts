import axios, { type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  baseURL: string;
  timeout: number;
  bearerToken?: string;
  headers?: Record<string, string>;
}

/**
 * Creates the pooled transport owned by one client
 * Status codes are never turned into exceptions here; callers inspect them
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...options.headers
  };

  if (options.bearerToken) {
    headers.Authorization = `Bearer ${options.bearerToken}`;
  }

  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers,
    validateStatus: () => true
  });
}
