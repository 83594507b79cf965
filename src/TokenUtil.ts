export const LINE_TOKEN_KINDS = [
  'AbsoluteIri',
  'RelativeIri',
  'BlankNodeLabel',
  'Literal',
  'LanguageTag',
  'DatatypeMarker',
  'Dot',
  'EndOfLine',
  'EndOfInput',
  'Error',
] as const;

export const TURTLE_TOKEN_KINDS = [
  'PrefixedName',
  'PrefixDirective',
  'BaseDirective',
  'SparqlPrefix',
  'SparqlBase',
  'TypeKeyword',
  'Semicolon',
  'Comma',
  'OpenBracket',
  'CloseBracket',
  'OpenParen',
  'CloseParen',
  'Integer',
  'Decimal',
  'Double',
  'Boolean',
] as const;

export type TokenKind = typeof LINE_TOKEN_KINDS[number] | typeof TURTLE_TOKEN_KINDS[number];

/**
 * A single lexeme with the 1-based position of its first character.
 *
 * `text` is the content without delimiters and with escapes decoded,
 * e.g. the IRI without `<>` or the literal without its quotes.
 * For `Error` tokens it is the diagnostic, including the offending input.
 */
export type Token = {
  readonly kind: TokenKind;
  readonly text: string;
  readonly line: number;
  readonly col: number;
};

/**
 * Anything that produces tokens one at a time.
 * It never rewinds and ends with a single `EndOfInput` token.
 */
export type TokenSource = {
  nextToken: () => Token;
};

export function createToken(kind: TokenKind, text: string, line: number, col: number): Token {
  return Object.freeze({ kind, text, line, col });
}

export function stringifyToken(token: Token): string {
  return `${token.kind}(${JSON.stringify(token.text)}) at ${token.line}:${token.col}`;
}
