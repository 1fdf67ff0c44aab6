import { Schema } from 'effect';

/**
 * Confluence REST (v1 content API) type definitions
 * These schemas are used for both validation and type inference
 */

/**
 * Page version information
 */
export const VersionSchema = Schema.Struct({
  number: Schema.Number,
  when: Schema.optional(Schema.String),
  message: Schema.optional(Schema.String),
});
export type Version = Schema.Schema.Type<typeof VersionSchema>;

/**
 * Page (content) information
 */
export const PageSchema = Schema.Struct({
  id: Schema.String,
  type: Schema.optional(Schema.String),
  status: Schema.optional(Schema.String),
  title: Schema.String,
  space: Schema.optional(
    Schema.Struct({
      key: Schema.String,
    }),
  ),
  version: Schema.optional(VersionSchema),
  _links: Schema.optional(
    Schema.Struct({
      webui: Schema.optional(Schema.String),
      tinyui: Schema.optional(Schema.String),
    }),
  ),
});
export type Page = Schema.Schema.Type<typeof PageSchema>;

/**
 * Content listing (GET content?spaceKey=&title=)
 */
export const PagesResponseSchema = Schema.Struct({
  results: Schema.Array(PageSchema),
  size: Schema.optional(Schema.Number),
});
export type PagesResponse = Schema.Schema.Type<typeof PagesResponseSchema>;

/**
 * Label information
 */
export const LabelSchema = Schema.Struct({
  id: Schema.optional(Schema.String),
  name: Schema.String,
  prefix: Schema.optional(Schema.String),
});
export type Label = Schema.Schema.Type<typeof LabelSchema>;

/**
 * Labels response (POST content/{id}/label returns the page's full label list)
 */
export const LabelsResponseSchema = Schema.Struct({
  results: Schema.Array(LabelSchema),
  size: Schema.optional(Schema.Number),
});
export type LabelsResponse = Schema.Schema.Type<typeof LabelsResponseSchema>;

/**
 * User profile (GET user?username=)
 */
export const UserSchema = Schema.Struct({
  userKey: Schema.optional(Schema.String),
  username: Schema.optional(Schema.String),
  displayName: Schema.optional(Schema.String),
});
export type User = Schema.Schema.Type<typeof UserSchema>;

/**
 * Storage-format body sent on create and update
 */
export interface StorageBody {
  storage: {
    value: string;
    representation: 'storage';
  };
}

/**
 * Request body for creating a new page (POST content)
 */
export interface CreatePageRequest {
  type: 'page';
  title: string;
  space: { key: string };
  ancestors: Array<{ id: string }>;
  body: StorageBody;
}

/**
 * Request body for updating a page (PUT content/{id})
 */
export interface UpdatePageRequest {
  id: string;
  type: 'page';
  title: string;
  body: StorageBody;
  version: { number: number };
}

/**
 * Request body for adding labels (POST content/{id}/label)
 */
export type AddLabelsRequest = Array<{ prefix: 'global'; name: string }>;

/**
 * Arguments accepted by ConfluenceClient.createPage
 */
export interface CreatePageInput {
  space: string;
  ancestorId: string;
  title: string;
  body: string;
}

/**
 * Arguments accepted by ConfluenceClient.updatePage
 */
export interface UpdatePageInput {
  pageId: string;
  /** Version read during the most recent lookup */
  currentVersion: number;
  title: string;
  body: string;
}
