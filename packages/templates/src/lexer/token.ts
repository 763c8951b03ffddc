import type { Delimiters } from './delimiters';
import type { TokenType } from './token-types';

/**
 * Position in source code
 */
export interface Position {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character offset into the template (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position; // First character of the token
  end: Position; // One past the last character of the token
}

interface BaseToken {
  loc: SourceLocation;
}

export interface TextToken extends BaseToken {
  type: typeof TokenType.TEXT;
  value: string;
}

export interface VariableToken extends BaseToken {
  type: typeof TokenType.VARIABLE;
  name: string;
  escaped: boolean;
}

export interface SectionStartToken extends BaseToken {
  type: typeof TokenType.SECTION_START | typeof TokenType.INVERTED_SECTION_START;
  name: string;
  delimiters: Delimiters; // Pair in effect when the tag was scanned
}

export interface SectionEndToken extends BaseToken {
  type: typeof TokenType.SECTION_END;
  name: string;
}

export interface PartialToken extends BaseToken {
  type: typeof TokenType.PARTIAL;
  name: string;
}

export interface CommentToken extends BaseToken {
  type: typeof TokenType.COMMENT;
  value: string;
}

export interface SetDelimitersToken extends BaseToken {
  type: typeof TokenType.SET_DELIMITERS;
  delimiters: Delimiters;
}

/**
 * Token produced by lexer
 */
export type Token =
  | TextToken
  | VariableToken
  | SectionStartToken
  | SectionEndToken
  | PartialToken
  | CommentToken
  | SetDelimitersToken;

/**
 * Tokens that may occupy a line on their own and have that line removed
 */
export type StandaloneCandidate = Exclude<Token, TextToken | VariableToken>;
