import type { TokenizerAndRendererExtension, Tokens } from 'marked';

/**
 * Alert delimiters and the Confluence macro each one produces.
 * `~: text :~` opens with the tilde and closes with the same character.
 */
export const ALERT_MACROS = {
  ':': 'info',
  '%': 'tip',
  '?': 'note',
  '!': 'warning',
} as const;

export type AlertMacro = (typeof ALERT_MACROS)[keyof typeof ALERT_MACROS];

const ALERT_OPENING = /~[:%?!]/;
const ALERT_PATTERN = /^~([:%?!])([\s\S]+?)\1~/;
const PLACEHOLDER = /\u0000ALERT(\d+)\u0000/;
const PLACEHOLDERS = /\u0000ALERT(\d+)\u0000/g;

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function isAlertKey(key: string): key is keyof typeof ALERT_MACROS {
  return Object.hasOwn(ALERT_MACROS, key);
}

export function renderAlertMacro(macro: AlertMacro, bodyHtml: string): string {
  return `<ac:structured-macro ac:name="${macro}" ac:schema-version="1"><ac:rich-text-body><p>${bodyHtml}</p></ac:rich-text-body></ac:structured-macro>`;
}

/**
 * Collects rendered alert macros during one conversion. The inline renderer
 * leaves a placeholder in the paragraph; lift() later swaps placeholders for
 * the macros, moving them out of their enclosing <p>.
 */
export class AlertMacroCollector {
  private macros: string[] = [];
  /** Source text of each macro, restored where a macro cannot stand */
  private sources: string[] = [];

  reset(): void {
    this.macros = [];
    this.sources = [];
  }

  /**
   * marked inline extension for `~X ... X~` spans. Inline tokens never cross
   * a blank line, so neither does a span. Code spans and fenced code are
   * tokenized elsewhere and never reach this.
   */
  extension(): TokenizerAndRendererExtension {
    const collector = this;
    return {
      name: 'alertMacro',
      level: 'inline',
      start(src: string): number | undefined {
        const index = src.search(ALERT_OPENING);
        return index === -1 ? undefined : index;
      },
      tokenizer(src: string): Tokens.Generic | undefined {
        const match = ALERT_PATTERN.exec(src);
        if (!match) return undefined;
        const [raw, key, inner] = match;
        const text = inner.trim();
        if (!isAlertKey(key) || text === '') return undefined;
        return {
          type: 'alertMacro',
          raw,
          macro: ALERT_MACROS[key],
          tokens: this.lexer.inlineTokens(text),
        };
      },
      renderer(token: Tokens.Generic): string {
        const macro: AlertMacro = Object.values(ALERT_MACROS).find((name) => name === token.macro) ?? 'info';
        const body = this.parser.parseInline(token.tokens ?? []);
        collector.macros.push(renderAlertMacro(macro, body));
        collector.sources.push(token.raw);
        return `\u0000ALERT${collector.macros.length - 1}\u0000`;
      },
    };
  }

  /**
   * Post-processing pass: a paragraph holding alerts is split so each macro
   * stands on its own, with any surrounding text kept as paragraphs. Headings
   * cannot hold a macro, so there the alert stays literal text. Alerts
   * elsewhere (list items, table cells) are substituted in place.
   */
  lift(html: string): string {
    const literalInHeadings = html.replace(/<h([1-6])>[\s\S]*?<\/h\1>/g, (heading: string) =>
      heading.replace(PLACEHOLDERS, (_placeholder: string, index: string) =>
        escapeText(this.sources[Number(index)] ?? ''),
      ),
    );
    const lifted = literalInHeadings.replace(/<p>([\s\S]*?)<\/p>/g, (paragraph: string, inner: string) => {
      if (!PLACEHOLDER.test(inner)) return paragraph;
      return inner
        .split(PLACEHOLDERS)
        .map((part, index) => {
          if (index % 2 === 1) return this.macros[Number(part)] ?? '';
          const text = part.trim();
          return text === '' ? '' : `<p>${text}</p>`;
        })
        .join('');
    });
    return lifted.replace(PLACEHOLDERS, (_placeholder: string, index: string) => this.macros[Number(index)] ?? '');
  }
}
