import { basename } from 'node:path';
import { Marked, type Renderer, type RendererObject, type TokenizerObject, type Tokens } from 'marked';
import { AlertMacroCollector } from './alert-macros.js';

export interface ConvertOptions {
  /**
   * Resolve a relative link to another Markdown document (path without the
   * #fragment, as written) to the title of its Confluence page. Returning
   * undefined leaves the link as a plain anchor.
   */
  resolvePageTitle?: (href: string) => string | undefined;
}

export interface ConvertResult {
  html: string;
  warnings: string[];
  /** Local image paths, as written in the document, to upload as attachments */
  attachments: string[];
  /** Whether the body has any heading, i.e. a table of contents has entries */
  hasHeadings: boolean;
}

const MARKDOWN_LINK = /\.(md|markdown)$/i;

/**
 * True for absolute URLs (any scheme), protocol-relative URLs and in-page anchors
 */
export function isExternalReference(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith('//') || href.startsWith('#');
}

function decodePath(href: string): string {
  try {
    return decodeURI(href);
  } catch {
    return href;
  }
}

/**
 * HTML converter that transforms Markdown to Confluence Storage Format
 */
export class HtmlConverter {
  private warnings: string[] = [];
  private attachments: string[] = [];
  private hasHeadings = false;
  private readonly alerts = new AlertMacroCollector();

  /**
   * Escape special XML characters for use in attributes
   * Converts: & < > " ' to their XML entity equivalents
   */
  private escapeXml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&apos;');
  }

  /**
   * Escape CDATA sections by replacing ]]> with ]]]]><![CDATA[>
   */
  private escapeCdata(text: string): string {
    return text.replace(/]]>/g, ']]]]><![CDATA[>');
  }

  /**
   * Only allows alphanumeric, dash, underscore, and plus
   */
  private sanitizeLanguage(lang: string | undefined): string {
    if (!lang) return '';
    return lang.replace(/[^a-zA-Z0-9\-_+]/g, '');
  }

  /**
   * Create a configured Marked instance with custom renderer
   */
  private createMarkedInstance(options: ConvertOptions): Marked {
    const self = this;

    const renderer: RendererObject = {
      // Code blocks - use Confluence code macro for syntax highlighting
      code(this: Renderer, token: Tokens.Code): string {
        const language = self.sanitizeLanguage(token.lang);
        const escapedCode = self.escapeCdata(token.text);
        return `<ac:structured-macro ac:name="code" ac:schema-version="1">
<ac:parameter ac:name="language">${language}</ac:parameter>
<ac:plain-text-body><![CDATA[${escapedCode}]]></ac:plain-text-body>
</ac:structured-macro>\n`;
      },

      blockquote(this: Renderer, token: Tokens.Blockquote): string {
        return `<blockquote>${this.parser.parse(token.tokens)}</blockquote>\n`;
      },

      // Tables - standard XHTML tables work in Confluence
      table(this: Renderer, token: Tokens.Table): string {
        let header = '<tr>';
        for (const cell of token.header) {
          const align = cell.align ? ` style="text-align:${cell.align}"` : '';
          header += `<th${align}>${this.parser.parseInline(cell.tokens)}</th>`;
        }
        header += '</tr>\n';

        let body = '';
        for (const row of token.rows) {
          body += '<tr>';
          for (const cell of row) {
            const align = cell.align ? ` style="text-align:${cell.align}"` : '';
            body += `<td${align}>${this.parser.parseInline(cell.tokens)}</td>`;
          }
          body += '</tr>\n';
        }

        return `<table>
<thead>${header}</thead>
<tbody>${body}</tbody>
</table>\n`;
      },

      // Links to sibling documents become page links; everything else stays an anchor
      link(this: Renderer, token: Tokens.Link): string {
        const text = this.parser.parseInline(token.tokens);
        const [path, anchor] = token.href.split('#', 2);

        if (!isExternalReference(token.href) && MARKDOWN_LINK.test(path)) {
          const title = options.resolvePageTitle?.(decodePath(path));
          if (title) {
            const anchorAttr = anchor ? ` ac:anchor="${self.escapeXml(anchor)}"` : '';
            return `<ac:link${anchorAttr}><ri:page ri:content-title="${self.escapeXml(title)}" /><ac:link-body>${text}</ac:link-body></ac:link>`;
          }
          self.warnings.push(`Link to "${token.href}" could not be resolved to a page and was left as-is.`);
        }

        const titleAttr = token.title ? ` title="${self.escapeXml(token.title)}"` : '';
        return `<a href="${self.escapeXml(token.href)}"${titleAttr}>${text}</a>`;
      },

      // Images - remote URLs by reference, local files as page attachments
      image(this: Renderer, token: Tokens.Image): string {
        const alt = token.text ? ` ac:alt="${self.escapeXml(token.text)}"` : '';
        const titleAttr = token.title ? ` ac:title="${self.escapeXml(token.title)}"` : '';
        if (isExternalReference(token.href)) {
          return `<ac:image${alt}${titleAttr}><ri:url ri:value="${self.escapeXml(token.href)}" /></ac:image>`;
        }
        const localPath = decodePath(token.href);
        if (!self.attachments.includes(localPath)) {
          self.attachments.push(localPath);
        }
        return `<ac:image${alt}${titleAttr}><ri:attachment ri:filename="${self.escapeXml(basename(localPath))}" /></ac:image>`;
      },

      paragraph(this: Renderer, token: Tokens.Paragraph): string {
        return `<p>${this.parser.parseInline(token.tokens)}</p>\n`;
      },

      heading(this: Renderer, token: Tokens.Heading): string {
        self.hasHeadings = true;
        return `<h${token.depth}>${this.parser.parseInline(token.tokens)}</h${token.depth}>\n`;
      },

      strong(this: Renderer, token: Tokens.Strong): string {
        return `<strong>${this.parser.parseInline(token.tokens)}</strong>`;
      },

      em(this: Renderer, token: Tokens.Em): string {
        return `<em>${this.parser.parseInline(token.tokens)}</em>`;
      },

      del(this: Renderer, token: Tokens.Del): string {
        return `<del>${this.parser.parseInline(token.tokens)}</del>`;
      },

      codespan(this: Renderer, token: Tokens.Codespan): string {
        return `<code>${self.escapeXml(token.text)}</code>`;
      },

      br(this: Renderer): string {
        return '<br />';
      },

      hr(this: Renderer): string {
        return '<hr />\n';
      },

      list(this: Renderer, token: Tokens.List): string {
        const tag = token.ordered ? 'ol' : 'ul';
        const startAttr = token.ordered && token.start !== 1 && token.start !== '' ? ` start="${token.start}"` : '';
        let body = '';
        for (const item of token.items) {
          // Remove wrapping <p> tags for simple list items
          const itemContent = this.parser.parse(item.tokens).replace(/^<p>(.*)<\/p>\n?$/s, '$1');
          body += `<li>${itemContent}</li>\n`;
        }
        return `<${tag}${startAttr}>\n${body}</${tag}>\n`;
      },

      // HTML passthrough - sanitize dangerous elements
      html(token): string {
        const original = token.raw;
        const html = original
          .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
          .replace(/<iframe\b[^<]*(?:(?!<\/iframe>)<[^<]*)*<\/iframe>/gi, '')
          .replace(/<object\b[^<]*(?:(?!<\/object>)<[^<]*)*<\/object>/gi, '')
          .replace(/<embed\b[^>]*>/gi, '')
          .replace(/\son\w+\s*=\s*["'][^"']*["']/gi, '')
          .replace(/href\s*=\s*["']javascript:[^"']*["']/gi, 'href="#"')
          .replace(/src\s*=\s*["'](?:javascript|data):[^"']*["']/gi, 'src=""');

        if (html !== original) {
          self.warnings.push(
            'Potentially unsafe HTML was sanitized (scripts, iframes, event handlers, or dangerous URLs removed).',
          );
        }
        return html;
      },

      text(token): string {
        if ('tokens' in token && token.tokens && token.tokens.length > 0) {
          return this.parser.parseInline(token.tokens);
        }
        if ('escaped' in token && token.escaped) {
          return token.text;
        }
        // Existing entities pass through untouched
        return token.text.replace(/&(?!#?\w+;)/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
      },
    };

    // A single tilde opens an alert (~: ... :~), so only ~~ strikes through
    const tokenizer: TokenizerObject = {
      del(src: string) {
        return src.startsWith('~~') ? false : undefined;
      },
    };

    return new Marked({
      gfm: true,
      breaks: false,
      renderer,
      tokenizer,
      extensions: [this.alerts.extension()],
    });
  }

  /**
   * Detect unsupported markdown features and add warnings
   */
  private detectUnsupportedFeatures(markdown: string): void {
    if (/^\s*-\s*\[[x ]\]/im.test(markdown)) {
      this.warnings.push('Task list checkboxes (- [x]) will be converted to regular list items.');
    }

    if (/\[\^.+\]/.test(markdown)) {
      this.warnings.push('Footnotes are not supported and will render as plain text.');
    }
  }

  /**
   * Ensure XHTML compliance (self-closing tags, etc.)
   */
  private ensureXhtmlCompliance(html: string): string {
    return html
      .replace(/<br\s*>/gi, '<br />')
      .replace(/<hr\s*>/gi, '<hr />')
      .replace(/<img([^>]+)(?<!\/)>/gi, '<img$1 />')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Convert Markdown to Confluence Storage Format
   */
  convert(markdown: string, options: ConvertOptions = {}): ConvertResult {
    this.warnings = [];
    this.attachments = [];
    this.hasHeadings = false;
    this.alerts.reset();

    this.detectUnsupportedFeatures(markdown);

    const rawHtml = this.createMarkedInstance(options).parse(markdown, { async: false });
    const html = this.ensureXhtmlCompliance(this.alerts.lift(rawHtml));

    return {
      html,
      warnings: [...this.warnings],
      attachments: [...this.attachments],
      hasHeadings: this.hasHeadings,
    };
  }
}
