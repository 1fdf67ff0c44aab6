/**
 * Page chrome around a converted body: a sidebar column with the table of
 * contents and the authors, next to a column holding the content
 */

export interface PageLayoutOptions {
  /** Emit a table of contents; only useful when the body has headings */
  toc: boolean;
  /** Confluence user keys credited on the page */
  authorKeys: readonly string[];
}

export const SIDEBAR_WIDTH = '30%';
export const CONTENT_WIDTH = '800px';

// The sidebar's own headings stay out of the generated contents
const TABLE_OF_CONTENTS =
  '<h1>Table of Contents</h1><p><ac:structured-macro ac:name="toc" ac:schema-version="1"><ac:parameter ac:name="exclude">^(Authors|Table of Contents)$</ac:parameter></ac:structured-macro></p>';

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function renderColumn(width: string, content: string): string {
  return `<ac:structured-macro ac:name="column" ac:schema-version="1"><ac:parameter ac:name="width">${width}</ac:parameter><ac:rich-text-body>${content}</ac:rich-text-body></ac:structured-macro>`;
}

/**
 * Profile picture and user link for each author, one per line
 */
export function renderAuthors(authorKeys: readonly string[]): string {
  const authors = authorKeys.map((key) => {
    const user = `<ri:user ri:userkey="${escapeAttribute(key)}" />`;
    return `<ac:structured-macro ac:name="profile-picture" ac:schema-version="1"><ac:parameter ac:name="User">${user}</ac:parameter></ac:structured-macro>&nbsp;<ac:link>${user}</ac:link>`;
  });
  return `<h1>Authors</h1><p>${authors.join('<br />')}</p>`;
}

/**
 * Wrap the body in a two-column layout. With nothing to show in the sidebar
 * the body is returned unchanged.
 */
export function renderPageLayout(content: string, options: PageLayoutOptions): string {
  const toc = options.toc ? TABLE_OF_CONTENTS : '';
  const authors = options.authorKeys.length > 0 ? renderAuthors(options.authorKeys) : '';
  const sidebar = toc + authors;
  if (sidebar === '') {
    return content;
  }
  return renderColumn(SIDEBAR_WIDTH, sidebar) + renderColumn(CONTENT_WIDTH, content);
}
