/**
 * Attachment operations for Confluence pages
 */

import { Effect, pipe } from 'effect';
import type { ApiError, NetworkError } from '../errors.js';
import { sendEffect, type RequestContext } from './request.js';

export function guessMimeType(filename: string): string {
  const ext = filename.split('.').pop()?.toLowerCase();
  const mimeTypes: Record<string, string> = {
    png: 'image/png',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    gif: 'image/gif',
    svg: 'image/svg+xml',
    webp: 'image/webp',
    pdf: 'application/pdf',
  };
  return mimeTypes[ext ?? ''] ?? 'application/octet-stream';
}

/**
 * Upload an attachment to a page (Effect version)
 * Uses POST content/{pageId}/child/attachment
 * Requires X-Atlassian-Token: nocheck header
 */
export function uploadAttachmentEffect(
  context: RequestContext,
  pageId: string,
  filename: string,
  data: Uint8Array,
  mimeType: string = guessMimeType(filename),
): Effect.Effect<void, ApiError | NetworkError> {
  const formData = new FormData();
  formData.append('file', new Blob([new Uint8Array(data)], { type: mimeType }), filename);

  return pipe(
    sendEffect(context, `content/${encodeURIComponent(pageId)}/child/attachment`, {
      method: 'POST',
      query: { allowDuplicated: 'true' },
      form: formData,
      headers: { 'X-Atlassian-Token': 'nocheck' },
    }),
    Effect.asVoid,
  );
}
