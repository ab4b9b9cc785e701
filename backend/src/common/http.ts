/**
 * HTTP CLIENT FACTORY
 * ===================
 *
 * All outbound providers (price data, news, narrative models) get their
 * axios instance from here so every call carries an explicit timeout.
 * No retry interceptor: a failed call surfaces to the caller.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { RemoteServiceError } from './errors.js';

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const config: AxiosRequestConfig = {
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': 'Mozilla/5.0 (compatible; EquityInsight/0.1)',
      ...options.headers,
    },
  };
  return axios.create(config);
}

export function httpStatusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * Wraps any transport/HTTP failure. The axios message ("timeout of 5000ms
 * exceeded", "Request failed with status code 503") is kept in the result.
 */
export function toRemoteServiceError(service: string, error: unknown): RemoteServiceError {
  if (error instanceof RemoteServiceError) return error;
  return new RemoteServiceError(service, error);
}
