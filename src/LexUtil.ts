import type { Token, TokenKind, TokenSource } from './TokenUtil';
import { createToken } from './TokenUtil';

/**
 * `line` is for N-Triples and N-Quads: newlines produce `EndOfLine` tokens and only their terminals are known.
 * `turtle` treats newlines as whitespace and knows all Turtle terminals.
 */
export type LexerMode = 'line' | 'turtle';

const ABSOLUTE_IRI = /^[A-Za-z][\d+.A-Za-z-]*:/u;
const PN_CHARS_BASE = new RegExp([
  '^[A-Za-z\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u02FF\\u0370-\\u037D\\u037F-\\u1FFF\\u200C\\u200D',
  '\\u2070-\\u218F\\u2C00-\\u2FEF\\u3001-\\uD7FF\\uF900-\\uFDCF\\uFDF0-\\uFFFD\\u{10000}-\\u{EFFFF}]$',
].join(''), 'u');
const PN_CHARS_EXTRA = /^[-\d\u00B7\u0300-\u036F\u203F\u2040]$/u;
const IRI_FORBIDDEN = /^[\u0000- "<>\\^`{|}]$/u;
const HEX = /^[\dA-Fa-f]$/u;
const LANGUAGE_CHAR = /^[\dA-Za-z-]$/u;
const LANGUAGE_TAG = /^[A-Za-z]+(?:-[\dA-Za-z]+)*$/u;
const LOCAL_ESCAPES = '_~.-!$&\'()*+,;=/?#@%';

const STRING_ESCAPES: Record<string, string | undefined> = {
  t: '\t',
  b: '\b',
  n: '\n',
  r: '\r',
  f: '\f',
  '"': '"',
  '\'': '\'',
  '\\': '\\',
};

const PUNCTUATION: Record<string, TokenKind | undefined> = {
  ';': 'Semicolon',
  ',': 'Comma',
  '[': 'OpenBracket',
  ']': 'CloseBracket',
  '(': 'OpenParen',
  ')': 'CloseParen',
};

export function isAbsoluteIri(iri: string): boolean {
  return ABSOLUTE_IRI.test(iri);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isPnCharsBase(char: string | undefined): boolean {
  return char !== undefined && PN_CHARS_BASE.test(char);
}

function isPnCharsU(char: string | undefined): boolean {
  return char === '_' || isPnCharsBase(char);
}

function isPnChars(char: string | undefined): boolean {
  return isPnCharsU(char) || (char !== undefined && PN_CHARS_EXTRA.test(char));
}

function isLocalChar(char: string | undefined): boolean {
  return isPnChars(char) || char === ':' || char === '%' || char === '\\';
}

/**
 * Turns a string into tokens on demand.
 *
 * Columns count code points, so a character outside the BMP takes a single column.
 * After an `Error` token the lexer only produces `EndOfInput`.
 */
export class Lexer implements TokenSource {
  private readonly chars: string[];
  private pos = 0;
  private line = 1;
  private col = 1;
  private done = false;
  private previous?: TokenKind;

  public constructor(input: string, private readonly mode: LexerMode = 'line') {
    this.chars = Array.from(input);
    if (this.chars[0] === '\uFEFF') {
      this.pos = 1;
    }
  }

  public nextToken(): Token {
    const token = this.done ? createToken('EndOfInput', '', this.line, this.col) : this.scan();
    if (token.kind === 'EndOfInput' || token.kind === 'Error') {
      this.done = true;
    }
    this.previous = token.kind;
    return token;
  }

  private scan(): Token {
    this.skipWhitespace();
    const line = this.line;
    const col = this.col;
    const char = this.peekChar();

    if (char === undefined) {
      return createToken('EndOfInput', '', line, col);
    }
    // Only reachable in line mode, turtle mode skips newlines as whitespace
    if (char === '\n' || char === '\r') {
      this.advance();
      if (char === '\r' && this.peekChar() === '\n') {
        this.advance();
      }
      return createToken('EndOfLine', '', line, col);
    }
    if (char === '<') {
      return this.scanIri(line, col);
    }
    if (char === '_' && this.peekChar(1) === ':') {
      return this.scanBlankNodeLabel(line, col);
    }
    if (char === '"' || (char === '\'' && this.mode === 'turtle')) {
      return this.scanString(line, col);
    }
    if (char === '@') {
      return this.scanAt(line, col);
    }
    if (char === '^' && this.peekChar(1) === '^') {
      this.advance();
      this.advance();
      return createToken('DatatypeMarker', '^^', line, col);
    }

    if (this.mode === 'turtle') {
      if (isDigit(char) || char === '+' || char === '-' || (char === '.' && isDigit(this.peekChar(1)))) {
        return this.scanNumber(line, col);
      }
      const punctuation = PUNCTUATION[char];
      if (punctuation) {
        this.advance();
        return createToken(punctuation, char, line, col);
      }
      if (char === ':' || isPnCharsBase(char)) {
        return this.scanName(line, col);
      }
    }

    if (char === '.') {
      this.advance();
      return createToken('Dot', '.', line, col);
    }

    return this.fail(`unexpected character ${JSON.stringify(char)}`, line, col);
  }

  private skipWhitespace(): void {
    for (;;) {
      const char = this.peekChar();
      if (char === ' ' || char === '\t' || (this.mode === 'turtle' && (char === '\n' || char === '\r'))) {
        this.advance();
      } else if (char === '#') {
        while (this.peekChar() !== undefined && this.peekChar() !== '\n' && this.peekChar() !== '\r') {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private scanIri(line: number, col: number): Token {
    this.advance();
    let value = '';
    for (;;) {
      const char = this.peekChar();
      if (char === undefined || char === '\n' || char === '\r') {
        return this.fail(`unterminated IRI: <${value}`, line, col);
      }
      this.advance();
      if (char === '>') {
        break;
      }
      if (char === '\\') {
        const decoded = this.readUnicodeEscape();
        if (decoded === undefined) {
          return this.fail(`invalid escape sequence in IRI: <${value}\\`, line, col);
        }
        value += decoded;
      } else if (IRI_FORBIDDEN.test(char)) {
        return this.fail(`invalid character ${JSON.stringify(char)} in IRI: <${value}`, line, col);
      } else {
        value += char;
      }
    }
    return createToken(isAbsoluteIri(value) ? 'AbsoluteIri' : 'RelativeIri', value, line, col);
  }

  private scanBlankNodeLabel(line: number, col: number): Token {
    this.advance();
    this.advance();
    const first = this.peekChar();
    if (!isPnCharsU(first) && !isDigit(first)) {
      return this.fail(`invalid blank node label: _:${first ?? ''}`, line, col);
    }
    const label = this.advance() + this.readNameChars(isPnChars);
    return createToken('BlankNodeLabel', label, line, col);
  }

  private scanString(line: number, col: number): Token {
    const quote = this.advance();
    const long = this.mode === 'turtle' && this.peekChar() === quote && this.peekChar(1) === quote;
    let delimiter = quote;
    if (long) {
      delimiter = quote.repeat(3);
      this.advance();
      this.advance();
    }

    let value = '';
    for (;;) {
      const char = this.peekChar();
      if (char === undefined || (!long && (char === '\n' || char === '\r'))) {
        return this.fail(`unterminated string literal: ${delimiter}${value}`, line, col);
      }
      if (char === quote && (!long || (this.peekChar(1) === quote && this.peekChar(2) === quote))) {
        for (let i = 0; i < delimiter.length; ++i) {
          this.advance();
        }
        return createToken('Literal', value, line, col);
      }
      this.advance();
      if (char === '\\') {
        const decoded = this.readStringEscape();
        if (decoded === undefined) {
          return this.fail(`invalid escape sequence in string literal: ${delimiter}${value}\\`, line, col);
        }
        value += decoded;
      } else {
        value += char;
      }
    }
  }

  private scanAt(line: number, col: number): Token {
    this.advance();
    let name = '';
    while (LANGUAGE_CHAR.test(this.peekChar() ?? '')) {
      name += this.advance();
    }
    if (this.mode === 'turtle' && this.previous !== 'Literal') {
      if (name === 'prefix') {
        return createToken('PrefixDirective', name, line, col);
      }
      if (name === 'base') {
        return createToken('BaseDirective', name, line, col);
      }
      return this.fail(`unknown directive: @${name}`, line, col);
    }
    if (!LANGUAGE_TAG.test(name)) {
      return this.fail(`invalid language tag: @${name}`, line, col);
    }
    return createToken('LanguageTag', name, line, col);
  }

  private scanNumber(line: number, col: number): Token {
    let text = '';
    let kind: TokenKind = 'Integer';
    const sign = this.peekChar();
    if (sign === '+' || sign === '-') {
      text += this.advance();
    }
    text += this.readDigits();
    if (this.peekChar() === '.' && (isDigit(this.peekChar(1)) || this.isExponentAt(1))) {
      text += this.advance() + this.readDigits();
      kind = 'Decimal';
    }
    if (this.isExponentAt(0)) {
      text += this.advance();
      const expSign = this.peekChar();
      if (expSign === '+' || expSign === '-') {
        text += this.advance();
      }
      text += this.readDigits();
      kind = 'Double';
    }
    if (!/\d/u.test(text)) {
      return this.fail(`invalid number: ${text}`, line, col);
    }
    return createToken(kind, text, line, col);
  }

  private scanName(line: number, col: number): Token {
    let prefix = '';
    if (this.peekChar() !== ':') {
      prefix = this.advance() + this.readNameChars(isPnChars);
    }

    if (this.peekChar() !== ':') {
      if (prefix === 'a') {
        return createToken('TypeKeyword', prefix, line, col);
      }
      if (prefix === 'true' || prefix === 'false') {
        return createToken('Boolean', prefix, line, col);
      }
      if (prefix.toLowerCase() === 'prefix') {
        return createToken('SparqlPrefix', prefix, line, col);
      }
      if (prefix.toLowerCase() === 'base') {
        return createToken('SparqlBase', prefix, line, col);
      }
      return this.fail(`unexpected name: ${prefix}`, line, col);
    }

    this.advance();
    const local = this.readLocalName();
    if (local === undefined) {
      return this.fail(`invalid escape in prefixed name: ${prefix}:`, line, col);
    }
    return createToken('PrefixedName', `${prefix}:${local}`, line, col);
  }

  /**
   * Reads the local part of a prefixed name, decoding `\` escapes and keeping `%` escapes as written.
   * Returns `undefined` for a malformed escape.
   */
  private readLocalName(): string | undefined {
    let local = '';
    for (;;) {
      const char = this.peekChar();
      if (char === '%') {
        if (!HEX.test(this.peekChar(1) ?? '') || !HEX.test(this.peekChar(2) ?? '')) {
          return;
        }
        local += this.advance() + this.advance() + this.advance();
      } else if (char === '\\') {
        this.advance();
        const escaped = this.peekChar();
        if (escaped === undefined || !LOCAL_ESCAPES.includes(escaped)) {
          return;
        }
        local += this.advance();
      } else if (char === ':' || isPnCharsU(char) || isDigit(char) || (local.length > 0 && isPnChars(char))) {
        local += this.advance();
      } else if (char === '.' && local.length > 0 && this.dotsFollowedBy(isLocalChar)) {
        local += this.advance();
      } else {
        return local;
      }
    }
  }

  /**
   * Reads characters accepted by `accept`, including dots as long as they are not the last character.
   */
  private readNameChars(accept: (char: string | undefined) => boolean): string {
    let result = '';
    for (;;) {
      const char = this.peekChar();
      if (accept(char) || (char === '.' && this.dotsFollowedBy(accept))) {
        result += this.advance();
      } else {
        return result;
      }
    }
  }

  private dotsFollowedBy(accept: (char: string | undefined) => boolean): boolean {
    let offset = 0;
    while (this.peekChar(offset) === '.') {
      offset += 1;
    }
    return accept(this.peekChar(offset));
  }

  private readDigits(): string {
    let digits = '';
    while (isDigit(this.peekChar())) {
      digits += this.advance();
    }
    return digits;
  }

  private isExponentAt(offset: number): boolean {
    const marker = this.peekChar(offset);
    if (marker !== 'e' && marker !== 'E') {
      return false;
    }
    const next = this.peekChar(offset + 1);
    return isDigit(next) || ((next === '+' || next === '-') && isDigit(this.peekChar(offset + 2)));
  }

  private readStringEscape(): string | undefined {
    const char = this.peekChar();
    if (char === 'u' || char === 'U') {
      return this.readUnicodeEscape();
    }
    const decoded = char === undefined ? undefined : STRING_ESCAPES[char];
    if (decoded !== undefined) {
      this.advance();
    }
    return decoded;
  }

  /**
   * Decodes `uXXXX` or `UXXXXXXXX`, the backslash having been consumed already.
   */
  private readUnicodeEscape(): string | undefined {
    const marker = this.peekChar();
    const length = marker === 'u' ? 4 : marker === 'U' ? 8 : 0;
    if (length === 0) {
      return;
    }
    this.advance();
    let hex = '';
    for (let i = 0; i < length; ++i) {
      if (!HEX.test(this.peekChar() ?? '')) {
        return;
      }
      hex += this.advance();
    }
    const codePoint = Number.parseInt(hex, 16);
    // Surrogates are not characters on their own
    if (codePoint > 0x10FFFF || (codePoint >= 0xD800 && codePoint <= 0xDFFF)) {
      return;
    }
    return String.fromCodePoint(codePoint);
  }

  private peekChar(offset = 0): string | undefined {
    return this.chars[this.pos + offset];
  }

  private advance(): string {
    const char = this.chars[this.pos];
    this.pos += 1;
    if (char === '\n' || (char === '\r' && this.chars[this.pos] !== '\n')) {
      this.line += 1;
      this.col = 1;
    } else {
      this.col += 1;
    }
    return char;
  }

  private fail(message: string, line: number, col: number): Token {
    return createToken('Error', message, line, col);
  }
}
