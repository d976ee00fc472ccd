import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { AuthError, TransportError } from '../common/errors';

export interface HttpClientOptions {
  baseURL?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  auth?: AxiosRequestConfig['auth'];
  /** Replaces the network layer; tests pass an in-process adapter here. */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    auth: options.auth,
    adapter: options.adapter,
    headers: {
      'Content-Type': 'application/json',
      ...options.headers
    }
  });
}

/**
 * Maps an axios failure onto {@link TransportError}, keeping the HTTP status
 * when the server answered.
 */
export function toTransportError(operation: string, error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const detail = status !== undefined
      ? `HTTP ${status}${error.response?.statusText ? ` ${error.response.statusText}` : ''}`
      : error.code ?? error.message;
    return new TransportError(operation, `${operation} failed: ${detail}`, status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(operation, `${operation} failed: ${message}`);
}

export function isAuthRejection(error: unknown): error is TransportError {
  return error instanceof TransportError && (error.status === 401 || error.status === 403);
}

export function toAuthError(service: string, error: TransportError): AuthError {
  return new AuthError(`Invalid ${service} credentials: ${error.message}`, error.status);
}
