export { ALERT_MACROS, AlertMacroCollector, renderAlertMacro, type AlertMacro } from './alert-macros.js';
export { HtmlConverter, isExternalReference, type ConvertOptions, type ConvertResult } from './html-converter.js';
export {
  documentLabels,
  hasFrontmatter,
  isShared,
  parseDocument,
  resolveTitle,
  type DocumentFrontmatter,
  type ParsedDocument,
} from './frontmatter.js';
export { renderAuthors, renderPageLayout, type PageLayoutOptions } from './page-layout.js';
