export { buildAuthHeader, ConfluenceClient, type PageClient } from './client.js';
export type { CreatePageInput, Page, UpdatePageInput } from './types.js';
