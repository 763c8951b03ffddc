/**
 * Token types produced by the template lexer
 */

export const TokenType = {
  TEXT: 'TEXT', // Literal text between tags
  VARIABLE: 'VARIABLE', // {{name}}, {{{name}}}, {{&name}}
  SECTION_START: 'SECTION_START', // {{#name}}
  INVERTED_SECTION_START: 'INVERTED_SECTION_START', // {{^name}}
  SECTION_END: 'SECTION_END', // {{/name}}
  PARTIAL: 'PARTIAL', // {{>name}}
  COMMENT: 'COMMENT', // {{! text}}
  SET_DELIMITERS: 'SET_DELIMITERS', // {{=<% %>=}}
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
