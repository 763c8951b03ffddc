import { DEFAULT_DELIMITERS, isDefaultOpen, type Delimiters } from './delimiters';
import { LexerError } from './lexer-error';
import { LineMap } from './line-map';
import type { Position, SourceLocation, Token } from './token';
import { TokenType } from './token-types';

/**
 * Triple-brace form recognised only while the open marker is the default `{{`
 */
const TRIPLE_OPEN = '{{{';
const TRIPLE_CLOSE = '}}}';

/**
 * Lexer for tag-based templates
 *
 * Scans a template into a flat token stream. Every token carries its start and
 * end offsets so the parser can decide standalone lines and slice out the raw
 * text of sections later on.
 *
 * The delimiter pair is lexer state: a set-delimiters tag swaps it for the
 * remainder of the current pass. Each call to `setInput()` starts a fresh pass.
 */
export class Lexer {
  private input: string = '';
  private index: number = 0;
  private delimiters: Delimiters = DEFAULT_DELIMITERS;
  private lines: LineMap = new LineMap('');

  /**
   * Initialize lexer with template string
   *
   * @param template - Template source
   * @param delimiters - Pair to start scanning with (default `{{` / `}}`)
   */
  setInput(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): void {
    this.input = template;
    this.index = 0;
    this.delimiters = delimiters;
    this.lines = new LineMap(template);
  }

  /**
   * Get the delimiter pair currently in effect
   */
  getDelimiters(): Delimiters {
    return this.delimiters;
  }

  /**
   * Check if we've reached end of input
   */
  isEOF(): boolean {
    return this.index >= this.input.length;
  }

  /**
   * Extract next token from input
   *
   * @returns The next token, or null once the input is exhausted
   * @throws {LexerError} On an unclosed tag or a malformed set-delimiters tag
   */
  lex(): Token | null {
    while (!this.isEOF()) {
      const openIndex = this.input.indexOf(this.delimiters.open, this.index);

      // No more tags: the rest is text
      if (openIndex === -1) {
        return this.scanText(this.input.length);
      }

      if (openIndex > this.index) {
        return this.scanText(openIndex);
      }

      // Empty tags produce no token, keep scanning
      const tag = this.scanTag();
      if (tag) {
        return tag;
      }
    }

    return null;
  }

  /**
   * Convenience method to tokenize an entire template string
   *
   * @param template - The template string to tokenize
   * @param delimiters - Pair to start scanning with
   * @returns Array of all tokens
   */
  tokenize(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Token[] {
    this.setInput(template, delimiters);
    const tokens: Token[] = [];

    let token = this.lex();
    while (token) {
      tokens.push(token);
      token = this.lex();
    }

    return tokens;
  }

  /**
   * Get the line/column position of a character offset
   */
  positionAt(index: number): Position {
    return this.lines.positionAt(index);
  }

  /**
   * Scan literal text up to (not including) the given offset
   */
  private scanText(end: number): Token {
    const start = this.index;
    this.index = end;
    return {
      type: TokenType.TEXT,
      value: this.input.slice(start, end),
      loc: this.getLocation(start, end),
    };
  }

  /**
   * Scan a tag starting at the current open delimiter
   *
   * Returns null when the tag body is empty or whitespace-only.
   */
  private scanTag(): Token | null {
    const start = this.index;

    if (isDefaultOpen(this.delimiters) && this.input.startsWith(TRIPLE_OPEN, start)) {
      return this.scanTripleBrace();
    }

    const { open, close } = this.delimiters;
    const bodyStart = start + open.length;
    const closeIndex = this.input.indexOf(close, bodyStart);

    if (closeIndex === -1) {
      throw new LexerError(`Unclosed tag: expected closing '${close}'`, this.positionAt(start));
    }

    const end = closeIndex + close.length;
    const body = this.input.slice(bodyStart, closeIndex).trim();
    this.index = end;

    if (body.length === 0) {
      return null;
    }

    return this.classifyTag(body, start, end);
  }

  /**
   * Scan `{{{name}}}` as an unescaped variable
   */
  private scanTripleBrace(): Token {
    const start = this.index;
    const closeIndex = this.input.indexOf(TRIPLE_CLOSE, start + TRIPLE_OPEN.length);

    if (closeIndex === -1) {
      throw new LexerError(
        `Unclosed unescaped tag: expected closing '${TRIPLE_CLOSE}'`,
        this.positionAt(start),
      );
    }

    const end = closeIndex + TRIPLE_CLOSE.length;
    this.index = end;

    return {
      type: TokenType.VARIABLE,
      name: this.input.slice(start + TRIPLE_OPEN.length, closeIndex).trim(),
      escaped: false,
      loc: this.getLocation(start, end),
    };
  }

  /**
   * Classify a trimmed tag body by its leading sigil
   */
  private classifyTag(body: string, start: number, end: number): Token {
    const loc = this.getLocation(start, end);
    const sigil = body[0];
    const rest = body.slice(1).trim();

    if (sigil === '!') {
      return { type: TokenType.COMMENT, value: body.slice(1), loc };
    }

    if (sigil === '=' && body.endsWith('=')) {
      const delimiters = this.parseDelimiters(body, start);
      // Takes effect for everything scanned after this tag
      this.delimiters = delimiters;
      return { type: TokenType.SET_DELIMITERS, delimiters, loc };
    }

    switch (sigil) {
      case '#':
        return { type: TokenType.SECTION_START, name: rest, delimiters: this.delimiters, loc };
      case '^':
        return {
          type: TokenType.INVERTED_SECTION_START,
          name: rest,
          delimiters: this.delimiters,
          loc,
        };
      case '/':
        return { type: TokenType.SECTION_END, name: rest, loc };
      case '>':
        return { type: TokenType.PARTIAL, name: rest, loc };
      case '&':
        return { type: TokenType.VARIABLE, name: rest, escaped: false, loc };
    }

    if (sigil === '{' && body.endsWith('}')) {
      return { type: TokenType.VARIABLE, name: body.slice(1, -1).trim(), escaped: false, loc };
    }

    return { type: TokenType.VARIABLE, name: body, escaped: true, loc };
  }

  /**
   * Parse the body of `=OPEN CLOSE=` into a delimiter pair
   */
  private parseDelimiters(body: string, start: number): Delimiters {
    const parts = body
      .slice(1, -1)
      .trim()
      .split(/\s+/)
      .filter((part) => part.length > 0);

    if (parts.length !== 2) {
      throw new LexerError(
        `Invalid set delimiters tag: expected two delimiters in '${body}'`,
        this.positionAt(start),
      );
    }

    return { open: parts[0], close: parts[1] };
  }

  /**
   * Create a SourceLocation spanning two offsets
   */
  private getLocation(start: number, end: number): SourceLocation {
    return {
      start: this.positionAt(start),
      end: this.positionAt(end),
    };
  }
}
