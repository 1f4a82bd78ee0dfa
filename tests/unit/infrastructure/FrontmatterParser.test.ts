import { describe, it, expect } from 'vitest';
import { FrontmatterParser } from '../../../src/infrastructure/markdown/FrontmatterParser.js';

describe('FrontmatterParser', () => {
  const parser = new FrontmatterParser();

  it('should extract frontmatter and body', () => {
    const md = `---
title: Test Doc
tags: [auth, jwt]
---

# Heading One

Body text here.`;

    const result = parser.parse(md);
    expect(result.frontmatter).toEqual({ title: 'Test Doc', tags: ['auth', 'jwt'] });
    expect(result.body).toContain('# Heading One');
    expect(result.body).not.toContain('title: Test Doc');
    expect(result.frontmatterError).toBeUndefined();
  });

  it('should return null metadata when there is no frontmatter', () => {
    const md = '# Just a heading\n\nSome content.';
    const result = parser.parse(md);
    expect(result.frontmatter).toBeNull();
    expect(result.body).toBe(md);
  });

  it('should handle empty content', () => {
    const result = parser.parse('');
    expect(result.frontmatter).toBeNull();
    expect(result.body).toBe('');
  });

  it('should return null metadata for an empty frontmatter block', () => {
    const result = parser.parse('---\n---\n# Title\n');
    expect(result.frontmatter).toBeNull();
    expect(result.body).toContain('# Title');
  });

  it('should keep the whole text as body when the YAML is invalid', () => {
    const md = '---\ntitle: [unclosed\n---\n# Title\n';
    const result = parser.parse(md);
    expect(result.frontmatter).toBeNull();
    expect(result.body).toBe(md);
    expect(result.frontmatterError).toEqual(expect.any(String));
  });

  it('should leave the text alone when the opening delimiter is never closed', () => {
    const md = '---\n# Deploy Guide\n\nRun the script.\n';
    expect(parser.parse(md)).toEqual({ frontmatter: null, body: md });
  });

  it('should accept a closing delimiter at the end of the text', () => {
    const result = parser.parse('---\nstatus: draft\n---');
    expect(result.frontmatter).toEqual({ status: 'draft' });
  });

  it('should reject scalar frontmatter and keep the whole text as body', () => {
    const md = '---\njust a note\n---\n# Hi\n';
    expect(parser.parse(md)).toEqual({
      frontmatter: null,
      body: md,
      frontmatterError: 'frontmatter is not a mapping',
    });
  });

  it('should reject list frontmatter and keep the whole text as body', () => {
    const md = '---\n- a\n- b\n---\n# Hi\n';
    expect(parser.parse(md)).toEqual({
      frontmatter: null,
      body: md,
      frontmatterError: 'frontmatter is not a mapping',
    });
  });

  it('should not share parsed data between calls with identical input', () => {
    const md = '---\nstatus: draft\n---\nBody\n';
    const first = parser.parse(md);
    const second = parser.parse(md);
    expect(first.frontmatter).toEqual({ status: 'draft' });
    expect(second.frontmatter).not.toBe(first.frontmatter);
  });
});
