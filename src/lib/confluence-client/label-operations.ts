/**
 * Label operations for Confluence pages
 */

import { Effect, pipe } from 'effect';
import type { ApiError, NetworkError } from '../errors.js';
import { requestJsonEffect, type RequestContext } from './request.js';
import { LabelsResponseSchema, type AddLabelsRequest } from './types.js';

export function buildLabelsRequest(labels: readonly string[]): AddLabelsRequest {
  return labels.map((name) => ({ prefix: 'global', name }));
}

/**
 * Attach labels to a page (Effect version)
 * Uses POST content/{pageId}/label; existing labels are kept by Confluence
 */
export function setLabelsEffect(
  context: RequestContext,
  pageId: string,
  labels: readonly string[],
): Effect.Effect<void, ApiError | NetworkError> {
  if (labels.length === 0) {
    return Effect.void;
  }

  return pipe(
    requestJsonEffect(context, `content/${encodeURIComponent(pageId)}/label`, LabelsResponseSchema, {
      method: 'POST',
      json: buildLabelsRequest(labels),
    }),
    Effect.asVoid,
  );
}
