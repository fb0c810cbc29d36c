import axios, { AxiosError, AxiosInstance, AxiosRequestConfig } from 'axios';
import logger from './logger';
import { FetchError } from './errors';

/**
 * The slice of an axios instance the provider clients use. Bodies are
 * left unknown and validated by the caller.
 */
export interface HttpGetter {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

/**
 * Provider-specific reading of an error response body. Returns null to
 * fall back to status-based classification.
 */
export type BodyClassifier = (body: unknown) => FetchError | null;

export interface HttpClientOptions {
  timeoutMs: number;
  /** Label used in log lines, e.g. the provider name */
  name: string;
  classifyBody?: BodyClassifier;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const parseRetryAfter = (value: unknown): number | null => {
  if (value === undefined || value === null) {
    return null;
  }
  const parsed = parseInt(String(value), 10);
  return Number.isNaN(parsed) || parsed <= 0 ? null : parsed;
};

/**
 * Maps an axios failure onto the fetch error taxonomy.
 * A provider body classifier gets the first say; then
 * 429 → RateLimited, 404 → NotFound, 401/403 → ConfigError,
 * everything else (timeouts, DNS, resets, other statuses) → Unavailable.
 */
export function classifyHttpError(error: unknown, classifyBody?: BodyClassifier): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError('Unavailable', message);
  }

  if (error.response && classifyBody) {
    const fromBody = classifyBody(error.response.data);
    if (fromBody) {
      return fromBody;
    }
  }

  const status = error.response?.status;
  if (status === 429 && error.response) {
    const { headers } = error.response;
    const retryAfter = parseRetryAfter(headers['x-rate-limit-retry-after-seconds'])
      ?? parseRetryAfter(headers['retry-after']);
    return new FetchError('RateLimited', 'Upstream rate limit exceeded', retryAfter);
  }
  if (status === 404) {
    return new FetchError('NotFound', 'Upstream has no record');
  }
  if (status === 401 || status === 403) {
    return new FetchError('ConfigError', `Upstream rejected credentials (HTTP ${status})`);
  }
  if (status !== undefined) {
    return new FetchError('Unavailable', `Upstream responded with HTTP ${status}`);
  }
  if (error.code && TIMEOUT_CODES.has(error.code)) {
    return new FetchError('Unavailable', 'Upstream request timed out');
  }
  return new FetchError('Unavailable', error.message || 'Network error');
}

/**
 * Creates an axios instance whose rejections are always FetchError.
 */
export function createHttpClient({ timeoutMs, name, classifyBody }: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    timeout: timeoutMs,
    maxRedirects: 0,
    validateStatus: (status) => status >= 200 && status < 300,
  });

  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      const classified = classifyHttpError(error, classifyBody);
      logger.debug('Upstream request failed', {
        client: name,
        url: error.config?.url,
        kind: classified.kind,
        status: error.response?.status,
        code: error.code,
      });
      return Promise.reject(classified);
    },
  );

  return client;
}
