/**
 * Shared HTTP plumbing for the Confluence operations
 */

import { Effect, pipe, Schema } from 'effect';
import { ApiError, NetworkError } from '../errors.js';

/**
 * Everything an operation needs to reach the REST root
 */
export interface RequestContext {
  /** REST root without trailing slash, e.g. https://wiki.example.com/rest/api */
  baseUrl: string;
  /** Authorization plus caller-supplied headers, sent with every request */
  headers: Readonly<Record<string, string>>;
}

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  query?: Record<string, string>;
  json?: unknown;
  form?: FormData;
  headers?: Record<string, string>;
}

export const USER_AGENT = 'md2cf';

/**
 * Merge header sets case-insensitively; a later set wins on a repeated name.
 * Names in the result are lower-cased.
 */
export function mergeHeaders(
  ...sources: Array<Readonly<Record<string, string>> | undefined>
): Record<string, string> {
  const merged = new Headers();
  for (const source of sources) {
    for (const [name, value] of Object.entries(source ?? {})) {
      merged.set(name, value);
    }
  }
  const headers: Record<string, string> = {};
  merged.forEach((value, name) => {
    headers[name] = value;
  });
  return headers;
}

export function buildUrl(baseUrl: string, path: string, query?: Record<string, string>): string {
  const url = new URL(`${baseUrl}/${path.replace(/^\/+/, '')}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Issue a single request. Non-2xx responses fail with ApiError carrying the
 * status and raw body; transport failures become NetworkError.
 */
export function sendEffect(
  context: RequestContext,
  path: string,
  options: RequestOptions = {},
): Effect.Effect<Response, ApiError | NetworkError> {
  const method = options.method ?? 'GET';
  const url = buildUrl(context.baseUrl, path, options.query);

  return Effect.tryPromise({
    try: async () => {
      if (process.env.MD2CF_DEBUG === '1') process.stderr.write(`[debug] ${method} ${url}\n`);

      const defaults: Record<string, string> = {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      };
      if (options.json !== undefined) {
        defaults['Content-Type'] = 'application/json';
      }

      const response = await fetch(url, {
        method,
        headers: mergeHeaders(defaults, options.headers, context.headers),
        body: options.form ?? (options.json !== undefined ? JSON.stringify(options.json) : undefined),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new ApiError(`API request failed: ${method} ${url}: ${response.status} ${errorText}`, response.status, errorText);
      }

      return response;
    },
    catch: (error) => {
      if (error instanceof ApiError) {
        return error;
      }
      return new NetworkError(`Network error: ${error}`);
    },
  });
}

/**
 * Issue a request and decode the JSON response with the given schema
 */
export function requestJsonEffect<A, I>(
  context: RequestContext,
  path: string,
  schema: Schema.Schema<A, I>,
  options: RequestOptions = {},
): Effect.Effect<A, ApiError | NetworkError> {
  return pipe(
    sendEffect(context, path, options),
    Effect.flatMap((response) =>
      Effect.tryPromise({
        try: (): Promise<unknown> => response.json(),
        catch: (error) => new ApiError(`Invalid JSON response: ${error}`, response.status),
      }),
    ),
    Effect.flatMap((data) =>
      Schema.decodeUnknown(schema)(data).pipe(
        Effect.mapError((e) => new ApiError(`Invalid response: ${e.message}`, 500)),
      ),
    ),
  );
}
