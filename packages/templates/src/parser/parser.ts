import { DEFAULT_DELIMITERS, type Delimiters } from '../lexer/delimiters';
import { Lexer } from '../lexer/lexer';
import { LineMap } from '../lexer/line-map';
import type {
  SectionEndToken,
  SectionStartToken,
  SourceLocation,
  StandaloneCandidate,
  TextToken,
  Token,
} from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import type { Program, SectionStatement, Statement } from './ast-nodes';
import { ParserError } from './parser-error';
import { detectStandalone } from './standalone';

/**
 * A section whose end tag has not been seen yet
 */
interface OpenSection {
  token: SectionStartToken;
  body: Statement[];
}

/**
 * Parser for tag-based templates
 *
 * Transforms the lexer's flat token stream into a Program tree.
 *
 * ## Standalone lines
 *
 * Comment, partial, set-delimiters and section tags that sit alone on a line
 * remove that line from the output. When such a tag is met, the parser:
 *
 * 1. Cuts the indentation off the text node just before the tag, by replacing
 *    the last node of the list being built.
 * 2. Records an offset up to which following text is dropped, covering the
 *    rest of the line and its newline.
 *
 * Both decisions read the unmodified template source only, never rendered output.
 */
export class Parser {
  private lexer: Lexer;
  private template: string = '';
  private tokens: Token[] = [];
  private lines: LineMap = new LineMap('');
  private root: Statement[] = [];
  private openSections: OpenSection[] = [];
  private suppressUntil: number = -1;

  /**
   * Initialize parser with lexer instance
   *
   * @param lexer - Lexer instance to read tokens from
   */
  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  /**
   * Get the current lexer instance
   */
  getLexer(): Lexer {
    return this.lexer;
  }

  /**
   * Initialize parser with tokens from template
   *
   * @param template - Template string to parse
   * @param delimiters - Pair to start lexing with
   * @throws {LexerError} If the template cannot be tokenized
   */
  setInput(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): void {
    this.setTokens(template, this.lexer.tokenize(template, delimiters));
  }

  /**
   * Initialize parser with an already tokenized template
   *
   * @param template - Source the tokens were scanned from
   * @param tokens - Token stream for that source
   */
  setTokens(template: string, tokens: Token[]): void {
    this.template = template;
    this.tokens = tokens;
    this.lines = new LineMap(template);
  }

  /**
   * Parse the current input into a Program AST node
   *
   * @returns Program node representing the entire template
   * @throws {ParserError} If sections are unbalanced
   */
  parse(): Program {
    this.root = [];
    this.openSections = [];
    this.suppressUntil = -1;

    for (const token of this.tokens) {
      this.parseToken(token);
    }

    const unclosed = this.openSections[this.openSections.length - 1];
    if (unclosed) {
      throw ParserError.fromToken(
        `Unclosed section: ${unclosed.token.name} opened at line ${unclosed.token.loc.start.line} was never closed`,
        unclosed.token,
        this.template,
      );
    }

    return {
      type: 'Program',
      body: this.root,
      loc: {
        start: this.lines.positionAt(0),
        end: this.lines.positionAt(this.template.length),
      },
    };
  }

  /**
   * Static convenience method to parse a template string
   *
   * @example
   * ```typescript
   * const ast = Parser.parse('Hello {{name}}!');
   * ```
   */
  static parse(template: string, delimiters: Delimiters = DEFAULT_DELIMITERS): Program {
    const parser = new Parser(new Lexer());
    parser.setInput(template, delimiters);
    return parser.parse();
  }

  /**
   * Dispatch a single token
   */
  private parseToken(token: Token): void {
    switch (token.type) {
      case TokenType.TEXT:
        this.parseContent(token);
        return;
      case TokenType.VARIABLE:
        this.currentBody().push({
          type: 'MustacheStatement',
          name: token.name,
          escaped: token.escaped,
          loc: token.loc,
        });
        return;
      default:
        this.parseTag(token);
    }
  }

  /**
   * Append text, minus whatever a preceding standalone tag suppressed
   */
  private parseContent(token: TextToken): void {
    const start = token.loc.start.index;
    const end = token.loc.end.index;

    if (end <= this.suppressUntil) {
      return;
    }

    if (start >= this.suppressUntil) {
      this.currentBody().push({ type: 'ContentStatement', value: token.value, loc: token.loc });
      return;
    }

    this.currentBody().push({
      type: 'ContentStatement',
      value: token.value.slice(this.suppressUntil - start),
      loc: { start: this.lines.positionAt(this.suppressUntil), end: token.loc.end },
    });
  }

  /**
   * Handle a tag that may stand alone on its line
   */
  private parseTag(token: StandaloneCandidate): void {
    const standalone = detectStandalone(this.template, token.loc);
    if (standalone) {
      this.trimIndent();
      this.suppressUntil = standalone.suppressUntil;
    }

    switch (token.type) {
      case TokenType.COMMENT:
      case TokenType.SET_DELIMITERS:
        // Delimiter changes already happened during lexing
        return;
      case TokenType.PARTIAL:
        this.currentBody().push({
          type: 'PartialStatement',
          name: token.name,
          indent: standalone?.indent ?? '',
          loc: token.loc,
        });
        return;
      case TokenType.SECTION_START:
      case TokenType.INVERTED_SECTION_START:
        this.openSections.push({ token, body: [] });
        return;
      case TokenType.SECTION_END:
        this.closeSection(token);
        return;
    }
  }

  /**
   * Pop the innermost open section and attach it to its parent
   */
  private closeSection(token: SectionEndToken): void {
    const open = this.openSections.pop();

    if (!open) {
      throw ParserError.fromToken(
        `Unexpected section end: {{/${token.name}}} has no open section`,
        token,
        this.template,
      );
    }

    if (open.token.name !== token.name) {
      throw ParserError.fromToken(
        `Section mismatch: expected {{/${open.token.name}}} but found {{/${token.name}}} (section opened at line ${open.token.loc.start.line})`,
        token,
        this.template,
      );
    }

    const loc: SourceLocation = { start: open.token.loc.start, end: token.loc.end };
    const section: SectionStatement = {
      type: 'SectionStatement',
      name: open.token.name,
      inverted: open.token.type === TokenType.INVERTED_SECTION_START,
      body: open.body,
      raw: this.template.slice(open.token.loc.end.index, token.loc.start.index),
      delimiters: open.token.delimiters,
      loc,
    };

    this.currentBody().push(section);
  }

  /**
   * Cut the last text node back to just after its final newline
   *
   * The removed part is the indentation in front of a standalone tag.
   */
  private trimIndent(): void {
    const body = this.currentBody();
    const last = body[body.length - 1];

    if (!last || last.type !== 'ContentStatement') {
      return;
    }

    const newline = last.value.lastIndexOf('\n');
    if (newline === -1) {
      body.pop();
      return;
    }

    const value = last.value.slice(0, newline + 1);
    const loc = last.loc && {
      start: last.loc.start,
      end: this.lines.positionAt(last.loc.start.index + value.length),
    };
    body[body.length - 1] = { type: 'ContentStatement', value, loc };
  }

  /**
   * Statement list currently being built (root or innermost open section)
   */
  private currentBody(): Statement[] {
    const open = this.openSections[this.openSections.length - 1];
    return open ? open.body : this.root;
  }
}
