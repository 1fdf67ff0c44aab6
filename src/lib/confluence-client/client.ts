import chalk from 'chalk';
import { Effect, Either } from 'effect';
import type { RunConfig } from '../config.js';
import type { ApiError, NetworkError, VersionConflictError } from '../errors.js';
import { uploadAttachmentEffect as uploadAttachmentEffectFn } from './attachment-operations.js';
import { buildLabelsRequest, setLabelsEffect as setLabelsEffectFn } from './label-operations.js';
import {
  buildCreatePageRequest,
  buildUpdatePageRequest,
  createPageEffect as createPageEffectFn,
  findPageByTitleEffect as findPageByTitleEffectFn,
  updatePageEffect as updatePageEffectFn,
  validateAncestorEffect as validateAncestorEffectFn,
} from './page-operations.js';
import { buildUrl, mergeHeaders, type RequestContext } from './request.js';
import { findUserKeyEffect as findUserKeyEffectFn } from './user-operations.js';
import type { CreatePageInput, Page, UpdatePageInput } from './types.js';

/**
 * Operations the publisher drives. Implemented by ConfluenceClient; tests may
 * substitute their own.
 */
export interface PageClient {
  findPageByTitle(space: string, title: string): Promise<Page | null>;
  createPage(input: CreatePageInput): Promise<Page>;
  updatePage(input: UpdatePageInput): Promise<Page>;
  setLabels(pageId: string, labels: readonly string[]): Promise<void>;
  validateAncestor(ancestorId: string): Promise<boolean>;
  uploadAttachment(pageId: string, filename: string, data: Uint8Array): Promise<void>;
  findUserKey(username: string): Promise<string | null>;
}

/**
 * Build the Authorization header: basic credentials when a username is set,
 * otherwise the password is sent as a bearer token
 */
export function buildAuthHeader(config: Pick<RunConfig, 'username' | 'password'>): string {
  if (config.username) {
    return `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`;
  }
  return `Bearer ${config.password}`;
}

/** Run an Effect, rejecting with its typed failure rather than a FiberFailure */
async function runEffect<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

/**
 * Confluence REST client
 * Mutating calls are printed and skipped in dry-run mode
 */
export class ConfluenceClient implements PageClient {
  private readonly context: RequestContext;
  private readonly dryRun: boolean;

  constructor(config: RunConfig) {
    this.context = {
      baseUrl: config.apiUrl.replace(/\/+$/, ''),
      headers: mergeHeaders({ Authorization: buildAuthHeader(config) }, config.headers),
    };
    this.dryRun = config.dryRun;
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  /** Print a request that dry-run mode will not send */
  private logSkipped(method: string, path: string, payload?: unknown): void {
    console.log(chalk.gray(`[dry-run] ${method} ${buildUrl(this.context.baseUrl, path)}`));
    if (payload !== undefined) {
      console.log(chalk.gray(JSON.stringify(payload, null, 2)));
    }
  }

  // ================== Pages ==================

  /** Find a page by title in a space (Effect version) */
  findPageByTitleEffect(space: string, title: string): Effect.Effect<Page | null, ApiError | NetworkError> {
    return findPageByTitleEffectFn(this.context, space, title);
  }

  /** Find a page by title in a space (async version) */
  async findPageByTitle(space: string, title: string): Promise<Page | null> {
    return runEffect(this.findPageByTitleEffect(space, title));
  }

  /** Create a page under an ancestor (Effect version) */
  createPageEffect(input: CreatePageInput): Effect.Effect<Page, ApiError | NetworkError> {
    if (this.dryRun) {
      return Effect.sync(() => {
        this.logSkipped('POST', 'content', buildCreatePageRequest(input));
        return { id: '', title: input.title, version: { number: 0 } };
      });
    }
    return createPageEffectFn(this.context, input);
  }

  /** Create a page under an ancestor (async version) */
  async createPage(input: CreatePageInput): Promise<Page> {
    return runEffect(this.createPageEffect(input));
  }

  /**
   * Update a page in place (Effect version)
   * currentVersion must be the version read by the most recent lookup
   */
  updatePageEffect(input: UpdatePageInput): Effect.Effect<Page, ApiError | NetworkError | VersionConflictError> {
    if (this.dryRun) {
      return Effect.sync(() => {
        this.logSkipped('PUT', `content/${input.pageId}`, buildUpdatePageRequest(input));
        return { id: input.pageId, title: input.title, version: { number: input.currentVersion + 1 } };
      });
    }
    return updatePageEffectFn(this.context, input);
  }

  /** Update a page in place (async version) */
  async updatePage(input: UpdatePageInput): Promise<Page> {
    return runEffect(this.updatePageEffect(input));
  }

  /** Check that an ancestor page exists (Effect version) */
  validateAncestorEffect(ancestorId: string): Effect.Effect<boolean, ApiError | NetworkError> {
    if (this.dryRun) {
      return Effect.sync(() => {
        this.logSkipped('GET', `content/${ancestorId}`);
        return true;
      });
    }
    return validateAncestorEffectFn(this.context, ancestorId);
  }

  /** Check that an ancestor page exists (async version) */
  async validateAncestor(ancestorId: string): Promise<boolean> {
    return runEffect(this.validateAncestorEffect(ancestorId));
  }

  // ================== Labels ==================

  /** Attach labels to a page (Effect version) */
  setLabelsEffect(pageId: string, labels: readonly string[]): Effect.Effect<void, ApiError | NetworkError> {
    if (this.dryRun) {
      return Effect.sync(() => {
        if (labels.length > 0) {
          this.logSkipped('POST', `content/${pageId}/label`, buildLabelsRequest(labels));
        }
      });
    }
    return setLabelsEffectFn(this.context, pageId, labels);
  }

  /** Attach labels to a page (async version) */
  async setLabels(pageId: string, labels: readonly string[]): Promise<void> {
    return runEffect(this.setLabelsEffect(pageId, labels));
  }

  // ================== Users ==================

  /** Look up the user key of a username; a read, so it runs in dry-run too (Effect version) */
  findUserKeyEffect(username: string): Effect.Effect<string | null, ApiError | NetworkError> {
    return findUserKeyEffectFn(this.context, username);
  }

  /** Look up the user key of a username (async version) */
  async findUserKey(username: string): Promise<string | null> {
    return runEffect(this.findUserKeyEffect(username));
  }

  // ================== Attachments ==================

  /** Upload an attachment to a page (Effect version) */
  uploadAttachmentEffect(
    pageId: string,
    filename: string,
    data: Uint8Array,
  ): Effect.Effect<void, ApiError | NetworkError> {
    if (this.dryRun) {
      return Effect.sync(() => {
        this.logSkipped('POST', `content/${pageId}/child/attachment`, { filename, bytes: data.byteLength });
      });
    }
    return uploadAttachmentEffectFn(this.context, pageId, filename, data);
  }

  /** Upload an attachment to a page (async version) */
  async uploadAttachment(pageId: string, filename: string, data: Uint8Array): Promise<void> {
    return runEffect(this.uploadAttachmentEffect(pageId, filename, data));
  }
}
