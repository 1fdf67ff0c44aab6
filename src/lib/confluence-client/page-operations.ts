/**
 * Page operations for Confluence
 */

import { Effect, pipe } from 'effect';
import { ApiError, NetworkError, VersionConflictError } from '../errors.js';
import { requestJsonEffect, sendEffect, type RequestContext } from './request.js';
import {
  PageSchema,
  PagesResponseSchema,
  type CreatePageInput,
  type CreatePageRequest,
  type Page,
  type UpdatePageInput,
  type UpdatePageRequest,
} from './types.js';

/**
 * Find a page by exact title within a space (Effect version)
 * Uses GET content?spaceKey=&title=&expand=version
 */
export function findPageByTitleEffect(
  context: RequestContext,
  space: string,
  title: string,
): Effect.Effect<Page | null, ApiError | NetworkError> {
  return pipe(
    requestJsonEffect(context, 'content', PagesResponseSchema, {
      query: { spaceKey: space, title, type: 'page', expand: 'version' },
    }),
    Effect.map((response) => response.results[0] ?? null),
  );
}

export function buildCreatePageRequest(input: CreatePageInput): CreatePageRequest {
  return {
    type: 'page',
    title: input.title,
    space: { key: input.space },
    ancestors: [{ id: input.ancestorId }],
    body: {
      storage: {
        value: input.body,
        representation: 'storage',
      },
    },
  };
}

export function buildUpdatePageRequest(input: UpdatePageInput): UpdatePageRequest {
  return {
    id: input.pageId,
    type: 'page',
    title: input.title,
    body: {
      storage: {
        value: input.body,
        representation: 'storage',
      },
    },
    // Confluence expects the number of the version being written
    version: { number: input.currentVersion + 1 },
  };
}

/**
 * Create a new page under the given ancestor (Effect version)
 * Uses POST content
 */
export function createPageEffect(
  context: RequestContext,
  input: CreatePageInput,
): Effect.Effect<Page, ApiError | NetworkError> {
  return requestJsonEffect(context, 'content', PageSchema, {
    method: 'POST',
    json: buildCreatePageRequest(input),
  });
}

/**
 * Update a page in place (Effect version)
 * Uses PUT content/{id}; a 409 means the supplied version is stale
 */
export function updatePageEffect(
  context: RequestContext,
  input: UpdatePageInput,
): Effect.Effect<Page, ApiError | NetworkError | VersionConflictError> {
  return pipe(
    requestJsonEffect(context, `content/${encodeURIComponent(input.pageId)}`, PageSchema, {
      method: 'PUT',
      json: buildUpdatePageRequest(input),
    }),
    Effect.mapError((error) =>
      error instanceof ApiError && error.statusCode === 409
        ? new VersionConflictError(input.pageId, input.currentVersion, error.body)
        : error,
    ),
  );
}

/**
 * Check that the ancestor page exists (Effect version)
 * Uses GET content/{id}; 404 maps to false
 */
export function validateAncestorEffect(
  context: RequestContext,
  ancestorId: string,
): Effect.Effect<boolean, ApiError | NetworkError> {
  return pipe(
    sendEffect(context, `content/${encodeURIComponent(ancestorId)}`),
    Effect.map(() => true),
    Effect.catchIf(
      (error) => error instanceof ApiError && error.statusCode === 404,
      () => Effect.succeed(false),
    ),
  );
}
