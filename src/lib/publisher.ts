import { existsSync, readFileSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import type { RunConfig } from './config.js';
import type { PageClient } from './confluence-client/index.js';
import { ConfigurationError, FileSystemError } from './errors.js';
import {
  documentLabels,
  HtmlConverter,
  isShared,
  parseDocument,
  renderPageLayout,
  resolveTitle,
  type DocumentFrontmatter,
} from './markdown/index.js';

export type SkipReason = 'not-shared' | 'no-frontmatter';

/**
 * Outcome of one document
 */
export type PublishResult =
  | { status: 'created'; path: string; pageId: string; title: string; warnings: string[] }
  | { status: 'updated'; path: string; pageId: string; title: string; version: number; warnings: string[] }
  | { status: 'skipped'; path: string; reason: SkipReason }
  | { status: 'failed'; path: string; error: Error };

export interface RunSummary {
  results: PublishResult[];
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

/**
 * A document read from disk, eligible for publishing
 */
export interface Document {
  path: string;
  content: string;
  frontmatter: DocumentFrontmatter;
  body: string;
}

export interface PublisherOptions {
  converter?: HtmlConverter;
  /** Called before a document is processed */
  onStart?: (path: string) => void;
  /** Called with each result as soon as it is recorded */
  onResult?: (result: PublishResult) => void;
}

export function summarize(results: PublishResult[]): RunSummary {
  const count = (status: PublishResult['status']) => results.filter((result) => result.status === status).length;
  return {
    results,
    created: count('created'),
    updated: count('updated'),
    skipped: count('skipped'),
    failed: count('failed'),
  };
}

export function hasFailures(summary: RunSummary): boolean {
  return summary.failed > 0;
}

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Drives the create-or-update sequence for each document, one at a time.
 * A failing document is recorded and the run moves on.
 */
export class Publisher {
  private readonly converter: HtmlConverter;

  constructor(
    private readonly config: RunConfig,
    private readonly client: PageClient,
    private readonly options: PublisherOptions = {},
  ) {
    this.converter = options.converter ?? new HtmlConverter();
  }

  async publish(paths: readonly string[]): Promise<RunSummary> {
    const results: PublishResult[] = [];
    for (const path of paths) {
      this.options.onStart?.(path);
      const result = await this.publishDocument(path);
      results.push(result);
      this.options.onResult?.(result);
    }
    return summarize(results);
  }

  async publishDocument(path: string): Promise<PublishResult> {
    try {
      const content = readText(path);
      const parsed = parseDocument(content);
      if (!parsed.hasFrontmatter) {
        return { status: 'skipped', path, reason: 'no-frontmatter' };
      }
      if (!isShared(parsed.frontmatter)) {
        return { status: 'skipped', path, reason: 'not-shared' };
      }
      return await this.sync({ path, content, frontmatter: parsed.frontmatter, body: parsed.body });
    } catch (error) {
      return { status: 'failed', path, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }

  /**
   * Document-level ancestor_id wins over the run-wide one
   */
  resolveAncestorId(frontmatter: DocumentFrontmatter): string {
    const ancestorId = frontmatter.wiki.ancestorId ?? this.config.ancestorId;
    if (!ancestorId) {
      throw new ConfigurationError('No ancestor id: set wiki.ancestor_id in the front-matter or pass --ancestor_id');
    }
    return ancestorId;
  }

  /**
   * Document labels plus the global label, without duplicates
   */
  resolveLabels(frontmatter: DocumentFrontmatter): string[] {
    const labels = documentLabels(frontmatter);
    if (this.config.globalLabel) {
      labels.push(this.config.globalLabel);
    }
    return [...new Set(labels)];
  }

  /**
   * Title of the page another local document publishes to, when it is shared
   */
  private linkedPageTitle(fromPath: string, href: string): string | undefined {
    const target = resolve(dirname(fromPath), href);
    if (!existsSync(target)) {
      return undefined;
    }
    try {
      const { frontmatter } = parseDocument(readFileSync(target, 'utf-8'));
      return isShared(frontmatter) ? resolveTitle(frontmatter, target) : undefined;
    } catch {
      // Unreadable targets leave the link as a plain anchor
      return undefined;
    }
  }

  /**
   * User keys of the document's authors; an unknown author adds a warning
   */
  private async resolveAuthorKeys(authors: readonly string[], warnings: string[]): Promise<string[]> {
    const keys: string[] = [];
    for (const author of authors) {
      const key = await this.client.findUserKey(author);
      if (key === null) {
        warnings.push(`No Confluence user for author "${author}"`);
      } else {
        keys.push(key);
      }
    }
    return keys;
  }

  private async uploadAttachments(pageId: string, document: Document, attachments: string[]): Promise<string[]> {
    const warnings: string[] = [];
    for (const attachment of attachments) {
      const filePath = resolve(dirname(document.path), attachment.replace(/^\/+/, ''));
      if (!existsSync(filePath)) {
        warnings.push(`Attachment ${attachment} does not exist`);
        continue;
      }
      await this.client.uploadAttachment(pageId, basename(filePath), readFileSync(filePath));
    }
    return warnings;
  }

  private async sync(document: Document): Promise<PublishResult> {
    const { path, frontmatter } = document;
    const ancestorId = this.resolveAncestorId(frontmatter);
    const title = resolveTitle(frontmatter, path);
    const { html, warnings, attachments, hasHeadings } = this.converter.convert(document.body, {
      resolvePageTitle: (href) => this.linkedPageTitle(path, href),
    });
    const authorKeys = await this.resolveAuthorKeys(frontmatter.authors, warnings);
    const body = renderPageLayout(html, { toc: hasHeadings, authorKeys });

    const existing = await this.client.findPageByTitle(this.config.space, title);

    let result: PublishResult;
    if (existing) {
      const currentVersion = existing.version?.number ?? 1;
      const page = await this.client.updatePage({ pageId: existing.id, currentVersion, title, body });
      result = {
        status: 'updated',
        path,
        pageId: existing.id,
        title: page.title,
        version: page.version?.number ?? currentVersion + 1,
        warnings,
      };
    } else {
      if (!(await this.client.validateAncestor(ancestorId))) {
        throw new ConfigurationError(`Ancestor page ${ancestorId} does not exist`);
      }
      const page = await this.client.createPage({ space: this.config.space, ancestorId, title, body });
      result = { status: 'created', path, pageId: page.id, title: page.title, warnings };
    }

    warnings.push(...(await this.uploadAttachments(result.pageId, document, attachments)));
    await this.client.setLabels(result.pageId, this.resolveLabels(frontmatter));

    return result;
  }
}
