import { describe, expect, test } from 'vitest';
import { HtmlConverter, isExternalReference, renderAlertMacro } from '../lib/markdown/index.js';

const macro = (name: string, body: string) =>
  `<ac:structured-macro ac:name="${name}" ac:schema-version="1"><ac:rich-text-body><p>${body}</p></ac:rich-text-body></ac:structured-macro>`;

describe('HtmlConverter', () => {
  const converter = new HtmlConverter();

  describe('basic elements', () => {
    test('converts headings', () => {
      expect(converter.convert('# Title').html).toBe('<h1>Title</h1>');
    });

    test('reports whether the body has headings', () => {
      expect(converter.convert('text\n\n### Details').hasHeadings).toBe(true);
      expect(converter.convert('text only').hasHeadings).toBe(false);
    });

    test('escapes text content', () => {
      expect(converter.convert('Fish & chips < 5').html).toBe('<p>Fish &amp; chips &lt; 5</p>');
    });

    test('converts code blocks to the code macro', () => {
      const { html } = converter.convert('```ts\nconst a = 1;\n```');
      expect(html).toBe(
        '<ac:structured-macro ac:name="code" ac:schema-version="1">\n' +
          '<ac:parameter ac:name="language">ts</ac:parameter>\n' +
          '<ac:plain-text-body><![CDATA[const a = 1;]]></ac:plain-text-body>\n' +
          '</ac:structured-macro>',
      );
    });

    test('escapes inline code', () => {
      expect(converter.convert('Use `a<b`').html).toBe('<p>Use <code>a&lt;b</code></p>');
    });

    test('renders simple list items without paragraphs', () => {
      expect(converter.convert('- one\n- two').html).toBe('<ul>\n<li>one</li>\n<li>two</li>\n</ul>');
    });

    test('keeps column alignment in tables', () => {
      const { html } = converter.convert('| A | B |\n|---|:-:|\n| 1 | 2 |');
      expect(html).toContain('<th style="text-align:center">B</th>');
      expect(html).toContain('<td>1</td>');
    });
  });

  describe('alert macros', () => {
    test('maps each delimiter to its macro', () => {
      expect(converter.convert('~: Heads up :~').html).toBe(macro('info', 'Heads up'));
      expect(converter.convert('~% Try this %~').html).toBe(macro('tip', 'Try this'));
      expect(converter.convert('~? Remember this ?~').html).toBe(macro('note', 'Remember this'));
      expect(converter.convert('~! Careful !~').html).toBe(macro('warning', 'Careful'));
    });

    test('splits the surrounding paragraph', () => {
      expect(converter.convert('Before ~: Info here :~ after').html).toBe(
        `<p>Before</p>${macro('info', 'Info here')}<p>after</p>`,
      );
    });

    test('renders inline formatting inside the macro', () => {
      expect(converter.convert('~! Do **not** delete !~').html).toBe(macro('warning', 'Do <strong>not</strong> delete'));
    });

    test('leaves unmatched delimiters literal', () => {
      expect(converter.convert('Costs ~: 5 dollars').html).toBe('<p>Costs ~: 5 dollars</p>');
    });

    test('does not touch code spans', () => {
      expect(converter.convert('`~: x :~`').html).toBe('<p><code>~: x :~</code></p>');
    });

    test('does not span a paragraph break', () => {
      expect(converter.convert('~: a\n\nb :~').html).toBe('<p>~: a</p>\n<p>b :~</p>');
    });

    test('stays literal inside a heading', () => {
      expect(converter.convert('# ~: x :~').html).toBe('<h1>~: x :~</h1>');
      expect(converter.convert('## Fix ~! a & b !~').html).toBe('<h2>Fix ~! a &amp; b !~</h2>');
    });

    test('still supports double-tilde strikethrough', () => {
      expect(converter.convert('~~gone~~').html).toBe('<p><del>gone</del></p>');
      expect(converter.convert('~gone~').html).toBe('<p>~gone~</p>');
    });
  });

  describe('links', () => {
    test('turns links to shared documents into page links', () => {
      const { html, warnings } = converter.convert('[Setup](setup.md#install)', {
        resolvePageTitle: (href) => (href === 'setup.md' ? 'Setup Guide' : undefined),
      });
      expect(html).toBe(
        '<p><ac:link ac:anchor="install"><ri:page ri:content-title="Setup Guide" /><ac:link-body>Setup</ac:link-body></ac:link></p>',
      );
      expect(warnings).toEqual([]);
    });

    test('keeps unresolved document links and warns', () => {
      const { html, warnings } = converter.convert('[Other](other.md)', { resolvePageTitle: () => undefined });
      expect(html).toBe('<p><a href="other.md">Other</a></p>');
      expect(warnings).toEqual(['Link to "other.md" could not be resolved to a page and was left as-is.']);
    });

    test('leaves external links alone', () => {
      const { html, warnings } = converter.convert('[Site](https://example.com)');
      expect(html).toBe('<p><a href="https://example.com">Site</a></p>');
      expect(warnings).toEqual([]);
    });
  });

  describe('images', () => {
    test('references remote images by URL', () => {
      const { html, attachments } = converter.convert('![Logo](https://example.com/logo.png)');
      expect(html).toBe('<p><ac:image ac:alt="Logo"><ri:url ri:value="https://example.com/logo.png" /></ac:image></p>');
      expect(attachments).toEqual([]);
    });

    test('collects local images as attachments', () => {
      const { html, attachments } = converter.convert('![Diagram](images/flow.png)\n\n![Again](images/flow.png)');
      expect(html).toContain('<ac:image ac:alt="Diagram"><ri:attachment ri:filename="flow.png" /></ac:image>');
      expect(attachments).toEqual(['images/flow.png']);
    });
  });

  describe('HTML passthrough', () => {
    test('removes script tags and warns', () => {
      const { html, warnings } = converter.convert('<script>alert(1)</script>');
      expect(html).toBe('');
      expect(warnings).toEqual([
        'Potentially unsafe HTML was sanitized (scripts, iframes, event handlers, or dangerous URLs removed).',
      ]);
    });
  });

  test('starts each conversion with fresh warnings', () => {
    converter.convert('[Other](other.md)');
    expect(converter.convert('plain').warnings).toEqual([]);
  });
});

describe('renderAlertMacro', () => {
  test('wraps the body in a rich-text macro', () => {
    expect(renderAlertMacro('tip', 'x')).toBe(macro('tip', 'x'));
  });
});

describe('isExternalReference', () => {
  test('classifies references', () => {
    expect(isExternalReference('https://example.com')).toBe(true);
    expect(isExternalReference('mailto:someone@example.com')).toBe(true);
    expect(isExternalReference('//cdn.example.com/a.png')).toBe(true);
    expect(isExternalReference('#section')).toBe(true);
    expect(isExternalReference('docs/setup.md')).toBe(false);
  });
});
