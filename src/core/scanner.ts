/**
 * Markdown scanner.
 *
 * Pull-model lexer: every call to {@link Scanner.next} classifies the text at
 * the cursor and returns exactly one token. Ambiguous prefixes (`#`, `*`,
 * `[`, `!`, `-`) are matched with lookahead; when a structured match fails
 * the consumed characters come back verbatim as a text token, so the scanner
 * never throws.
 *
 * @module core/scanner
 */
import type {
  EndOfStreamToken,
  HeadingLevel,
  HeadingToken,
  ImageToken,
  LinkToken,
  ScanResult,
  TextToken,
  Token,
} from './types.js';

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

/** `charAt` past the end of the source. */
const EOF = '';
const NEWLINE = '\n';

/** Characters that start a structured construct. */
const TRIGGER_CHARS: ReadonlySet<string> = new Set(['#', '*', '[', '!', '-']);

const WHITESPACE_CHARS: ReadonlySet<string> = new Set([' ', '\t', '\r', '\v', '\f']);

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];
const MAX_HEADING_LEVEL = HEADING_LEVELS.length;

const END_OF_STREAM: EndOfStreamToken = { kind: 'endOfStream' };

/** Whitespace within a line. The line terminator is not included. */
function isLineWhitespace(ch: string): boolean {
  return WHITESPACE_CHARS.has(ch);
}

/**
 * Whether `ch` may follow a heading or list marker. A line terminator counts,
 * so a bare `#` or `-` line still opens an empty construct.
 */
function isSeparator(ch: string): boolean {
  return ch === NEWLINE || isLineWhitespace(ch);
}

function textToken(text: string): TextToken {
  return { kind: 'text', text };
}

// ---------------------------------------------------------------------------
// Scanner
// ---------------------------------------------------------------------------

/**
 * Character-stream scanner over a single Markdown document.
 *
 * @example
 * ```ts
 * const scanner = new Scanner('# Title\nSome **bold** text');
 * scanner.next(); // { kind: 'heading', level: 1, text: 'Title' }
 * scanner.next(); // { kind: 'text', text: 'Some ' }
 * ```
 */
export class Scanner {
  private readonly source: string;
  private pos = 0;
  private current: string;

  constructor(source: string) {
    this.source = source;
    this.current = source.charAt(0);
  }

  /** Offset of the next unread character. */
  get position(): number {
    return this.pos;
  }

  /**
   * Scan the next token.
   *
   * Blank lines between constructs produce no token. Once the input is
   * exhausted every call returns the end-of-stream marker.
   */
  next(): ScanResult {
    while (this.current === NEWLINE) {
      this.advance();
    }

    switch (this.current) {
      case EOF:
        return END_OF_STREAM;
      case '#':
        return this.scanHeading();
      case '*':
        return this.scanEmphasis();
      case '[':
        return this.scanLink();
      case '!':
        return this.scanImage();
      case '-':
        return this.scanListItem();
      default:
        return this.scanText();
    }
  }

  // -------------------------------------------------------------------------
  // Cursor helpers
  // -------------------------------------------------------------------------

  /** Move one character forward and return the new current character. */
  private advance(): string {
    if (this.pos < this.source.length) {
      this.pos++;
    }
    this.current = this.source.charAt(this.pos);
    return this.current;
  }

  private peek(): string {
    return this.source.charAt(this.pos + 1);
  }

  /**
   * Consume characters up to (not including) `delimiter`, the line
   * terminator or the end of input.
   */
  private collectUntil(delimiter?: string): string {
    const start = this.pos;
    while (
      this.current !== EOF &&
      this.current !== NEWLINE &&
      this.current !== delimiter
    ) {
      this.advance();
    }
    return this.source.slice(start, this.pos);
  }

  /** Consume the rest of the current line, terminator included. */
  private collectLine(): string {
    const line = this.collectUntil();
    if (this.current === NEWLINE) {
      this.advance();
    }
    return line;
  }

  // -------------------------------------------------------------------------
  // Constructs
  // -------------------------------------------------------------------------

  private scanHeading(): HeadingToken | TextToken {
    let count = 1;
    this.advance();
    while (this.current === '#' && count < MAX_HEADING_LEVEL) {
      count++;
      this.advance();
    }

    if (!isSeparator(this.current)) {
      return textToken('#'.repeat(count) + this.collectLine());
    }

    while (isLineWhitespace(this.current)) {
      this.advance();
    }

    return {
      kind: 'heading',
      level: HEADING_LEVELS[count - 1],
      text: this.collectLine(),
    };
  }

  private scanEmphasis(): Token {
    this.advance();

    if (this.current === '*') {
      this.advance();
      const content = this.collectUntil('*');
      if (this.current === '*' && this.peek() === '*') {
        this.advance();
        this.advance();
        return { kind: 'bold', text: content };
      }
      // A lone closing `*` is echoed but left unconsumed, so the next call
      // scans it again as the start of emphasis.
      return textToken(this.current === '*' ? `**${content}*` : `**${content}`);
    }

    const content = this.collectUntil('*');
    if (this.current === '*') {
      this.advance();
      return { kind: 'italic', text: content };
    }
    return textToken(`*${content}`);
  }

  private scanLink(): LinkToken | TextToken {
    this.advance();
    let label = '';
    let depth = 1;

    while (this.current !== EOF) {
      if (this.current === '\\' && this.peek() === '[') {
        label += '[';
        this.advance();
        this.advance();
        continue;
      }

      if (this.current === '[') {
        depth++;
      } else if (this.current === ']') {
        depth--;
        if (depth === 0) {
          break;
        }
      }
      label += this.current;
      this.advance();
    }

    if (depth > 0) {
      return textToken(`[${label}`);
    }

    if (this.advance() !== '(') {
      return textToken(`[${label}]`);
    }

    this.advance();
    const href = this.collectUntil(')');
    const closer: string = this.current;
    if (closer !== ')') {
      return textToken(`[${label}](${href}`);
    }
    this.advance();

    return { kind: 'link', text: label, href };
  }

  private scanImage(): ImageToken | TextToken {
    this.advance();
    if (this.current !== '[') {
      return textToken('!');
    }

    const link = this.scanLink();
    if (link.kind === 'link') {
      return { kind: 'image', alt: link.text, src: link.href };
    }
    return textToken(`!${link.text}`);
  }

  private scanListItem(): Token {
    this.advance();

    if (!isSeparator(this.current)) {
      return textToken(`-${this.collectLine()}`);
    }

    // Exactly one separator; any further indentation belongs to the content.
    this.advance();
    return { kind: 'listItem', text: this.collectLine() };
  }

  private scanText(): TextToken {
    const start = this.pos;
    while (this.current !== EOF && !TRIGGER_CHARS.has(this.current)) {
      if (this.current === NEWLINE && this.peek() === NEWLINE) {
        break;
      }
      this.advance();
    }
    return textToken(this.source.slice(start, this.pos).replace(/\n+$/, ''));
  }
}

/**
 * Scan a whole document into an ordered token sequence.
 *
 * @param markdown - Markdown source.
 * @returns Every token up to, but not including, the end-of-stream marker.
 */
export function tokenize(markdown: string): Token[] {
  const scanner = new Scanner(markdown);
  const tokens: Token[] = [];
  for (;;) {
    const token = scanner.next();
    if (token.kind === 'endOfStream') {
      return tokens;
    }
    tokens.push(token);
  }
}
