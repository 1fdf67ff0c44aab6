import { basename, extname } from 'node:path';
import { Either, Schema } from 'effect';
import matter from 'gray-matter';
import { ParseError } from '../errors.js';

const StringList = Schema.Union(Schema.String, Schema.Array(Schema.String));

/**
 * The `wiki` block controlling publication
 */
const WikiSchema = Schema.Struct({
  share: Schema.optional(Schema.Boolean),
  ancestor_id: Schema.optional(Schema.Union(Schema.String, Schema.Number)),
  labels: Schema.optional(StringList),
});

const TitleField = Schema.NullOr(Schema.Union(Schema.String, Schema.Number));
const ListField = Schema.NullOr(StringList);
const WikiField = Schema.NullOr(WikiSchema);

/**
 * Recognised front-matter keys. Anything else in the YAML is ignored.
 */
const RawFrontmatterSchema = Schema.Struct({
  title: Schema.optional(TitleField),
  tags: Schema.optional(ListField),
  authors: Schema.optional(ListField),
  wiki: Schema.optional(WikiField),
});

type RawFrontmatter = Schema.Schema.Type<typeof RawFrontmatterSchema>;

const isYamlMapping = Schema.is(Schema.Record({ key: Schema.String, value: Schema.Unknown }));
const isShareFlagged = Schema.is(Schema.Struct({ wiki: Schema.Struct({ share: Schema.Literal(true) }) }));
const isTitleField = Schema.is(TitleField);
const isListField = Schema.is(ListField);
const isWikiField = Schema.is(WikiField);

/**
 * Publishing metadata of a document with defaults applied
 */
export interface DocumentFrontmatter {
  title?: string;
  tags: string[];
  /** Confluence usernames credited on the page */
  authors: string[];
  wiki: {
    share: boolean;
    ancestorId?: string;
    labels: string[];
  };
}

export interface ParsedDocument {
  /** Whether the text starts with a --- delimited block */
  hasFrontmatter: boolean;
  frontmatter: DocumentFrontmatter;
  /** Markdown after the front-matter block */
  body: string;
}

const EMPTY_FRONTMATTER: DocumentFrontmatter = { tags: [], authors: [], wiki: { share: false, labels: [] } };

function toList(value: string | readonly string[] | null | undefined): string[] {
  if (value === null || value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

function normalize(raw: RawFrontmatter): DocumentFrontmatter {
  const wiki: NonNullable<RawFrontmatter['wiki']> = raw.wiki ?? {};
  return {
    title: raw.title === undefined || raw.title === null ? undefined : String(raw.title),
    tags: toList(raw.tags),
    authors: toList(raw.authors),
    wiki: {
      share: wiki.share === true,
      ancestorId: wiki.ancestor_id === undefined ? undefined : String(wiki.ancestor_id),
      labels: toList(wiki.labels),
    },
  };
}

/**
 * Fields of an unpublished document: a key whose value has the wrong type is
 * dropped instead of failing the document
 */
function pickWellTyped(data: { readonly [key: string]: unknown }): RawFrontmatter {
  const { title, tags, authors, wiki } = data;
  return {
    title: isTitleField(title) ? title : undefined,
    tags: isListField(tags) ? tags : undefined,
    authors: isListField(authors) ? authors : undefined,
    wiki: isWikiField(wiki) ? wiki : undefined,
  };
}

/**
 * Check whether markdown text starts with a front-matter block
 */
export function hasFrontmatter(markdown: string): boolean {
  return matter.test(markdown);
}

/**
 * Parse front-matter and body from a markdown string.
 * Throws ParseError when the block is not valid YAML, or when a document
 * with wiki.share: true has fields of the wrong type.
 */
export function parseDocument(markdown: string): ParsedDocument {
  if (!hasFrontmatter(markdown)) {
    return { hasFrontmatter: false, frontmatter: EMPTY_FRONTMATTER, body: markdown.trim() };
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    // Passing options bypasses gray-matter's per-content cache
    parsed = matter(markdown, {});
  } catch (error) {
    throw new ParseError(`Invalid front-matter: ${error instanceof Error ? error.message : String(error)}`);
  }

  const data: unknown = parsed.data;
  const fields: { readonly [key: string]: unknown } = isYamlMapping(data) ? data : {};
  const body = parsed.content.trim();

  if (!isShareFlagged(fields)) {
    return { hasFrontmatter: true, frontmatter: normalize(pickWellTyped(fields)), body };
  }

  const decoded = Schema.decodeUnknownEither(RawFrontmatterSchema)(fields);
  if (Either.isLeft(decoded)) {
    throw new ParseError(`Invalid front-matter: ${decoded.left.message}`);
  }

  return { hasFrontmatter: true, frontmatter: normalize(decoded.right), body };
}

/**
 * A document is published only when wiki.share is exactly true
 */
export function isShared(frontmatter: DocumentFrontmatter): boolean {
  return frontmatter.wiki.share;
}

/**
 * Page title from front-matter, falling back to the filename without extension
 */
export function resolveTitle(frontmatter: DocumentFrontmatter, filePath: string): string {
  const title = frontmatter.title?.trim();
  if (title) {
    return title;
  }
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length) || name;
}

/**
 * Labels declared by the document: wiki.labels then tags, without duplicates
 */
export function documentLabels(frontmatter: DocumentFrontmatter): string[] {
  return [...new Set([...frontmatter.wiki.labels, ...frontmatter.tags].map((label) => label.trim()))].filter(
    (label) => label !== '',
  );
}
