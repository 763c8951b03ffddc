/**
 * Standalone Line Detection
 *
 * A non-interpolating tag that is alone on its line (apart from spaces, tabs
 * and carriage returns) removes that whole line from the output, trailing
 * newline included. The decision is taken once, from the unmodified template source.
 */

import type { SourceLocation } from '../lexer/token';

export interface Standalone {
  indent: string; // Whitespace between the start of the line and the tag
  suppressUntil: number; // Offset up to which following text is dropped
}

/**
 * Check whether a span contains only spaces, tabs and carriage returns
 */
export function isLineWhitespace(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char !== ' ' && char !== '\t' && char !== '\r') {
      return false;
    }
  }
  return true;
}

/**
 * Decide whether the tag at `loc` stands alone on its source line
 *
 * @returns The captured indent and suppression end, or null if the line has other content
 */
export function detectStandalone(template: string, loc: SourceLocation): Standalone | null {
  const tagStart = loc.start.index;
  const tagEnd = loc.end.index;

  const lineStart = tagStart === 0 ? 0 : template.lastIndexOf('\n', tagStart - 1) + 1;
  const indent = template.slice(lineStart, tagStart);
  if (!isLineWhitespace(indent)) {
    return null;
  }

  let lineEnd = template.indexOf('\n', tagEnd);
  if (lineEnd === -1) {
    lineEnd = template.length;
  }
  if (!isLineWhitespace(template.slice(tagEnd, lineEnd))) {
    return null;
  }

  return {
    indent,
    // Swallow the newline too when there is one
    suppressUntil: lineEnd < template.length ? lineEnd + 1 : lineEnd,
  };
}
