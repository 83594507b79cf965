import type { Token, TokenKind } from './TokenUtil';

/**
 * A problem with the input being decoded.
 * Every message starts with the 1-based `line:col` of the offending lexeme.
 */
export abstract class DecodeFault extends Error {
  public readonly line: number;
  public readonly col: number;

  protected constructor(message: string, line: number, col: number) {
    super(`${line}:${col}: ${message}`);
    this.line = line;
    this.col = col;
  }
}

/**
 * The lexer could not make a token out of the input, e.g., an unterminated string literal.
 */
export class LexicalFault extends DecodeFault {
  public readonly text: string;

  public constructor(token: Token) {
    super(`lexical error: ${token.text}`, token.line, token.col);
    this.name = 'LexicalFault';
    this.text = token.text;
  }
}

/**
 * A token of the wrong kind for its position in the grammar.
 */
export class SyntaxFault extends DecodeFault {
  public readonly kind: TokenKind;
  public readonly context: string;
  public readonly reason?: string;

  public constructor(token: Token, context: string, reason?: string) {
    super(`unexpected ${token.kind} while expecting ${context}${reason ? `: ${reason}` : ''}`, token.line, token.col);
    this.name = 'SyntaxFault';
    this.kind = token.kind;
    this.context = context;
    this.reason = reason;
  }
}

/**
 * A decoder was requested for a serialization format that has none.
 */
export class ConfigurationFault extends Error {
  public readonly format: string;

  public constructor(format: string) {
    super(`Decoder for serialization format ${format} not implemented`);
    this.name = 'ConfigurationFault';
    this.format = format;
  }
}
