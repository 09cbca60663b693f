/**
 * Core type definitions for the scanner, parser and renderer.
 *
 * Tokens are a discriminated union on `kind`. String payloads hold the raw
 * characters taken from the source; escaping happens at render time.
 */

/** Heading depth, `#` through `######`. */
export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface TextToken {
  readonly kind: 'text';
  readonly text: string;
}

export interface HeadingToken {
  readonly kind: 'heading';
  readonly level: HeadingLevel;
  readonly text: string;
}

export interface BoldToken {
  readonly kind: 'bold';
  readonly text: string;
}

export interface ItalicToken {
  readonly kind: 'italic';
  readonly text: string;
}

export interface LinkToken {
  readonly kind: 'link';
  /** Label between the brackets. */
  readonly text: string;
  readonly href: string;
}

export interface ImageToken {
  readonly kind: 'image';
  readonly alt: string;
  readonly src: string;
}

export interface ListItemToken {
  readonly kind: 'listItem';
  readonly text: string;
}

/**
 * Returned by the scanner once the input is exhausted.
 *
 * Kept apart from {@link Token} so that an empty text token can never be
 * mistaken for the end of the stream.
 */
export interface EndOfStreamToken {
  readonly kind: 'endOfStream';
}

/** A classified unit of parsed Markdown. */
export type Token =
  | TextToken
  | HeadingToken
  | BoldToken
  | ItalicToken
  | LinkToken
  | ImageToken
  | ListItemToken;

export type TokenKind = Token['kind'];

/** Everything {@link Scanner.next} can return. */
export type ScanResult = Token | EndOfStreamToken;

/** Tokens that render as standalone containers. */
export type BlockToken = HeadingToken | ListItemToken;

/** Tokens that render inside a paragraph. */
export type InlineToken = Exclude<Token, BlockToken>;

/**
 * Options that control how Markdown source is parsed.
 */
export interface ParserOptions {
  /** Called with every token in scan order, as soon as it is produced. */
  onToken?: (token: Token) => void;
}

/**
 * Metadata collected while draining the scanner.
 */
export interface ParseMetadata {
  /** Number of heading tokens, any level. */
  headingCount: number;

  /** Whether the document contains any list items. */
  hasLists: boolean;

  /** Whether the document contains any links. */
  hasLinks: boolean;

  /** Whether the document contains any images. */
  hasImages: boolean;
}

/**
 * The result of parsing a Markdown string.
 */
export interface ParseResult {
  /** The ordered token sequence, without the end-of-stream marker. */
  tokens: Token[];

  /** Metadata extracted from the token sequence. */
  metadata: ParseMetadata;
}
