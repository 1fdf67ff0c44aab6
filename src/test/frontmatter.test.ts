import { describe, expect, test } from 'vitest';
import { ParseError } from '../lib/errors.js';
import { documentLabels, hasFrontmatter, isShared, parseDocument, resolveTitle } from '../lib/markdown/index.js';

describe('hasFrontmatter', () => {
  test('detects a leading --- block', () => {
    expect(hasFrontmatter('---\ntitle: A\n---\nbody')).toBe(true);
  });

  test('is false for plain markdown', () => {
    expect(hasFrontmatter('# Title\n\n---\n')).toBe(false);
  });
});

describe('parseDocument', () => {
  test('reads title, tags and the wiki block', () => {
    const parsed = parseDocument(`---
title: Getting Started
tags: [guide, intro]
author: someone
wiki:
  share: true
  ancestor_id: 123456
  labels: onboarding
---

# Body
`);

    expect(parsed.hasFrontmatter).toBe(true);
    expect(parsed.frontmatter).toEqual({
      title: 'Getting Started',
      tags: ['guide', 'intro'],
      authors: [],
      wiki: { share: true, ancestorId: '123456', labels: ['onboarding'] },
    });
    expect(parsed.body).toBe('# Body');
  });

  test('returns the whole text when there is no front-matter', () => {
    const parsed = parseDocument('# Hello\n\nWorld\n');
    expect(parsed.hasFrontmatter).toBe(false);
    expect(parsed.body).toBe('# Hello\n\nWorld');
    expect(isShared(parsed.frontmatter)).toBe(false);
  });

  test('defaults share to false when wiki is missing', () => {
    const parsed = parseDocument('---\ntitle: Notes\n---\ntext');
    expect(parsed.frontmatter.wiki).toEqual({ share: false, ancestorId: undefined, labels: [] });
    expect(isShared(parsed.frontmatter)).toBe(false);
  });

  test('accepts an empty block', () => {
    const parsed = parseDocument('---\n---\ntext');
    expect(parsed.hasFrontmatter).toBe(true);
    expect(parsed.body).toBe('text');
  });

  test('keeps a string ancestor id', () => {
    const parsed = parseDocument('---\nwiki:\n  share: true\n  ancestor_id: "0042"\n---\n');
    expect(parsed.frontmatter.wiki.ancestorId).toBe('0042');
  });

  test('reads authors as a list', () => {
    const parsed = parseDocument('---\nauthors:\n  - alice\n  - bob\nwiki:\n  share: true\n---\n');
    expect(parsed.frontmatter.authors).toEqual(['alice', 'bob']);
  });

  test('treats a share flag that is not the boolean true as not shared', () => {
    const parsed = parseDocument('---\nwiki:\n  share: "true"\n---\n');
    expect(isShared(parsed.frontmatter)).toBe(false);
  });

  test('drops fields of the wrong type from a document that is not shared', () => {
    const parsed = parseDocument('---\ntitle: 2020-01-01\ntags: [2019, golang]\nauthors: alice\n---\ntext');
    expect(parsed.frontmatter).toEqual({
      title: undefined,
      tags: [],
      authors: ['alice'],
      wiki: { share: false, ancestorId: undefined, labels: [] },
    });
    expect(parsed.body).toBe('text');
  });

  test('rejects fields of the wrong type on a shared document', () => {
    expect(() => parseDocument('---\ntags: [2019, golang]\nwiki:\n  share: true\n---\n')).toThrow(ParseError);
  });

  test('rejects malformed YAML', () => {
    expect(() => parseDocument('---\ntitle: [unclosed\n---\n')).toThrow(ParseError);
  });
});

describe('resolveTitle', () => {
  test('prefers the front-matter title', () => {
    const { frontmatter } = parseDocument('---\ntitle: 2024 Roadmap\n---\n');
    expect(resolveTitle(frontmatter, '/docs/roadmap.md')).toBe('2024 Roadmap');
  });

  test('converts a numeric title to a string', () => {
    const { frontmatter } = parseDocument('---\ntitle: 2024\n---\n');
    expect(resolveTitle(frontmatter, '/docs/roadmap.md')).toBe('2024');
  });

  test('falls back to the file name without extension', () => {
    const { frontmatter } = parseDocument('---\nwiki:\n  share: true\n---\n');
    expect(resolveTitle(frontmatter, '/docs/getting-started.md')).toBe('getting-started');
  });
});

describe('documentLabels', () => {
  test('merges wiki labels and tags without duplicates', () => {
    const { frontmatter } = parseDocument('---\ntags: [b, c]\nwiki:\n  labels: [a, b]\n---\n');
    expect(documentLabels(frontmatter)).toEqual(['a', 'b', 'c']);
  });
});
