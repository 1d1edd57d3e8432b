/**
 * HTTP API client wrapper around axios
 * Handles request/response, error mapping, and streaming
 */

import axios, { AxiosInstance, AxiosError, AxiosResponse } from 'axios';
import {
  ProviderError,
  NetworkError,
  RateLimitError,
  RequestCancelledError,
} from './errors.js';

export interface APIClientConfig {
  baseURL: string;
  headers?: Record<string, string>;
  timeout?: number;
  /** Used in error messages; defaults to the base URL's hostname */
  name?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
  params?: Record<string, string>;
}

export class APIClient {
  private axiosInstance: AxiosInstance;
  private providerName: string;

  constructor(config: APIClientConfig) {
    this.axiosInstance = axios.create({
      baseURL: config.baseURL,
      headers: {
        'Content-Type': 'application/json',
        ...config.headers,
      },
      timeout: config.timeout ?? 60000,
    });

    this.providerName = config.name ?? this.extractHostname(config.baseURL);
  }

  get name(): string {
    return this.providerName;
  }

  /**
   * POST request with JSON payload
   */
  async post<T>(endpoint: string, data: unknown, options: RequestOptions = {}): Promise<T> {
    try {
      const response: AxiosResponse<T> = await this.axiosInstance.post(endpoint, data, {
        signal: options.signal,
        params: options.params,
      });
      return response.data;
    } catch (error) {
      throw this.mapError(error);
    }
  }

  /**
   * Stream request for Server-Sent Events (SSE)
   * Returns async iterable of string chunks; aborting the signal destroys the
   * underlying response stream
   */
  async *stream(
    endpoint: string,
    data: unknown,
    options: RequestOptions = {}
  ): AsyncGenerator<string, void, unknown> {
    try {
      const response = await this.axiosInstance.post<AsyncIterable<Buffer | string>>(
        endpoint,
        data,
        {
          responseType: 'stream',
          headers: {
            Accept: 'text/event-stream',
          },
          signal: options.signal,
          params: options.params,
        }
      );

      // One decoder per stream: a multi-byte character may straddle two chunks
      const decoder = new TextDecoder('utf-8');
      for await (const chunk of response.data) {
        if (options.signal?.aborted) {
          throw new RequestCancelledError();
        }
        const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
        if (text) {
          yield text;
        }
      }
      const rest = decoder.decode();
      if (rest) {
        yield rest;
      }
    } catch (error) {
      throw this.mapError(error, options.signal);
    }
  }

  /**
   * Map axios errors to custom error types
   */
  private mapError(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof RequestCancelledError || axios.isCancel(error) || signal?.aborted) {
      return error instanceof RequestCancelledError
        ? error
        : new RequestCancelledError(`${this.providerName} request cancelled`);
    }

    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;
    const status = axiosError.response?.status;
    const message = this.extractMessage(axiosError);

    if (status === 429) {
      const retryAfter = Number.parseInt(
        String(axiosError.response?.headers['retry-after'] ?? '60'),
        10
      );
      return new RateLimitError(`${this.providerName} rate limit exceeded: ${message}`, retryAfter);
    }

    if (status === 401 || status === 403) {
      return new ProviderError(
        `${this.providerName} authentication failed: ${message}`,
        this.providerName
      );
    }

    if (status && status >= 500) {
      return new NetworkError(`${this.providerName} server error: ${message}`, status);
    }

    if (status && status >= 400) {
      return new ProviderError(`${this.providerName} request error: ${message}`, this.providerName);
    }

    // No response at all: timeout, refused connection, DNS failure
    return new NetworkError(`${this.providerName} unreachable: ${message}`);
  }

  private extractMessage(error: AxiosError): string {
    const data: unknown = error.response?.data;
    if (data && typeof data === 'object') {
      if (
        'error' in data &&
        data.error &&
        typeof data.error === 'object' &&
        'message' in data.error &&
        typeof data.error.message === 'string'
      ) {
        return data.error.message;
      }
      if ('message' in data && typeof data.message === 'string') return data.message;
    }
    return error.message;
  }

  private extractHostname(baseURL: string): string {
    try {
      return new URL(baseURL).hostname;
    } catch {
      return 'Unknown Provider';
    }
  }
}
