/**
 * AST Node Types for Template Parser
 *
 * Nodes own their children outright; there are no back-references, so a
 * parsed Program can be rendered any number of times concurrently.
 */

import type { Delimiters } from '../lexer/delimiters';
import type { SourceLocation } from '../lexer/token';

/**
 * Base interface for all AST nodes
 */
export interface Node {
  type: string; // Node type discriminator
  loc: SourceLocation | null; // Position information (null for synthetic nodes)
}

/**
 * ContentStatement - literal text between tags
 */
export interface ContentStatement extends Node {
  type: 'ContentStatement';
  value: string; // Text after standalone-line trimming
}

/**
 * MustacheStatement - variable interpolation {{name}}, {{{name}}} or {{&name}}
 */
export interface MustacheStatement extends Node {
  type: 'MustacheStatement';
  name: string; // Dotted name or '.'
  escaped: boolean; // true for {{}}, false for {{{}}} and {{&}}
}

/**
 * SectionStatement - {{#name}}...{{/name}} or {{^name}}...{{/name}}
 */
export interface SectionStatement extends Node {
  type: 'SectionStatement';
  name: string;
  inverted: boolean; // true for {{^name}}
  body: Statement[]; // Children between the open and close tags
  raw: string; // Exact source between the open and close tags, handed to lambdas
  delimiters: Delimiters; // Pair in effect at the open tag
}

/**
 * PartialStatement - {{>name}}
 */
export interface PartialStatement extends Node {
  type: 'PartialStatement';
  name: string;
  indent: string; // Leading whitespace of a standalone partial tag, '' otherwise
}

/**
 * Statement - union of all statement types
 */
export type Statement = ContentStatement | MustacheStatement | SectionStatement | PartialStatement;

/**
 * Program node - root of the AST
 *
 * Every parsed template returns a Program containing an ordered list of statements.
 */
export interface Program extends Node {
  type: 'Program';
  body: Statement[];
}
