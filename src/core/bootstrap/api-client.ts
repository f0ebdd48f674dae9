import type { z } from 'zod';
import {
  ApiRequestError,
  BackendUnreachableError,
  NetworkTimeoutError,
  UnauthorizedError,
} from '../errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = 'GET' | 'POST';

export interface ApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

export interface ApiRequest<T> {
  stage: string;
  method: HttpMethod;
  path: string;
  schema: z.ZodType<T>;
  body?: unknown;
  /** Map specific statuses to domain errors before the generic handling. */
  onStatus?: Partial<Record<number, (body: string) => Error>>;
}

export interface ApiClient {
  readonly baseUrl: string;
  request: <T>(request: ApiRequest<T>) => Promise<T>;
}

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * Thin JSON client over fetch. One attempt per call, bounded by `timeoutMs`;
 * every response body is validated before it is returned.
 */
export const createApiClient = ({
  baseUrl,
  timeoutMs,
  apiKey,
  fetchImpl = fetch,
}: ApiClientOptions): ApiClient => {
  const root = baseUrl.replace(/\/+$/, '');

  const request = async <T>({
    stage,
    method,
    path,
    schema,
    body,
    onStatus = {},
  }: ApiRequest<T>): Promise<T> => {
    const url = `${root}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (apiKey !== undefined) headers.Authorization = `Bearer ${apiKey}`;

    let response: Response;
    try {
      response = await fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) throw new NetworkTimeoutError(stage, url, timeoutMs);
      throw new BackendUnreachableError(stage, url, error);
    }

    const text = await response.text();

    if (!response.ok) {
      const mapped = onStatus[response.status];
      if (mapped) throw mapped(text);
      if (response.status === 401 || response.status === 403) {
        throw new UnauthorizedError(stage, `${method} ${path} returned ${response.status}`);
      }
      throw new ApiRequestError(stage, { method, url, status: response.status, body: text });
    }

    let payload: unknown;
    try {
      payload = text === '' ? null : JSON.parse(text);
    } catch (error) {
      throw new ApiRequestError(stage, {
        method,
        url,
        status: response.status,
        body: `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ApiRequestError(stage, {
        method,
        url,
        status: response.status,
        body: `unexpected response shape (${issues})`,
      });
    }
    return parsed.data;
  };

  return { baseUrl: root, request };
};
