import { describe, expect, it } from 'vitest';
import { escapeHtml } from '../../src/runtime/utils';

describe('escapeHtml', () => {
  it('escapes the four HTML-significant characters', () => {
    expect(escapeHtml('<b>"&"</b>')).toBe('&lt;b&gt;&quot;&amp;&quot;&lt;/b&gt;');
  });

  it('uses the named entity for double quotes', () => {
    expect(escapeHtml('"')).toBe('&quot;');
  });

  it('leaves single quotes and other characters alone', () => {
    expect(escapeHtml("it's = `fine`")).toBe("it's = `fine`");
  });

  it('returns text without special characters unchanged', () => {
    expect(escapeHtml('plain text')).toBe('plain text');
    expect(escapeHtml('')).toBe('');
  });

  it('escapes already-escaped entities again', () => {
    expect(escapeHtml('&amp;')).toBe('&amp;amp;');
  });

  it('handles repeated calls', () => {
    // The replace pattern is global; a stale lastIndex must not skip matches
    expect(escapeHtml('a<b')).toBe('a&lt;b');
    expect(escapeHtml('a<b')).toBe('a&lt;b');
  });
});
