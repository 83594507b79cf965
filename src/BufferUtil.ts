import type { Token, TokenSource } from './TokenUtil';

/**
 * Number of tokens a grammar can look ahead of the parse cursor.
 */
export const MAX_LOOKAHEAD = 3;

/**
 * FIFO between a {@link TokenSource} and a parser, allowing it to look at tokens before consuming them.
 */
export class TokenBuffer {
  private readonly source: TokenSource;
  private readonly tokens: Token[] = [];
  private end?: Token;

  public constructor(source: TokenSource) {
    this.source = source;
  }

  /**
   * Consumes and returns the next token.
   */
  public next(): Token {
    return this.tokens.shift() ?? this.pull();
  }

  /**
   * Returns the token `offset` positions ahead without consuming anything.
   */
  public peek(offset = 0): Token {
    if (!Number.isInteger(offset) || offset < 0 || offset >= MAX_LOOKAHEAD) {
      throw new RangeError(`Lookahead of ${offset} is outside of [0, ${MAX_LOOKAHEAD})`);
    }
    while (this.tokens.length <= offset) {
      this.tokens.push(this.pull());
    }
    return this.tokens[offset];
  }

  // The source is never asked again once it produced its end token
  private pull(): Token {
    if (this.end) {
      return this.end;
    }
    const token = this.source.nextToken();
    if (token.kind === 'EndOfInput') {
      this.end = token;
    }
    return token;
  }
}
