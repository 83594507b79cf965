import { TokenBuffer } from '../BufferUtil';
import type { DecoderOptions } from '../DecodeUtil';
import { BaseDecoder } from '../DecodeUtil';
import type { Format } from '../FormatUtil';
import { Lexer } from '../LexUtil';
import type { ObjectTerm, Predicate, Subject, Triple } from '../TermUtil';
import { createIri, createLiteral } from '../TermUtil';

/**
 * Productions shared by the line-based formats, N-Triples and N-Quads.
 * Every statement is on its own line and all IRIs are absolute.
 */
export abstract class LineDecoder<T extends Triple> extends BaseDecoder<T> {
  protected constructor(format: Format, input: string, options: DecoderOptions) {
    super(format, new TokenBuffer(new Lexer(input, 'line')), options);
  }

  /**
   * Consumes empty lines, returns `false` if nothing but empty lines remained.
   */
  protected skipEmptyLines(): boolean {
    while (this.tokens.peek().kind === 'EndOfLine') {
      this.tokens.next();
    }
    return this.tokens.peek().kind !== 'EndOfInput';
  }

  protected parseSubject(): Subject {
    const token = this.expect('subject', 'AbsoluteIri', 'BlankNodeLabel');
    return token.kind === 'AbsoluteIri' ? createIri(token.text) : this.createBlankNode(token.text);
  }

  protected parsePredicate(): Predicate {
    return createIri(this.expect('predicate', 'AbsoluteIri').text);
  }

  protected parseObject(): ObjectTerm {
    const token = this.expect('object', 'AbsoluteIri', 'BlankNodeLabel', 'Literal');
    if (token.kind === 'AbsoluteIri') {
      return createIri(token.text);
    }
    if (token.kind === 'BlankNodeLabel') {
      return this.createBlankNode(token.text);
    }

    // Language tag or datatype, never both
    const suffix = this.tokens.peek();
    if (suffix.kind === 'LanguageTag') {
      this.tokens.next();
      return createLiteral(token.text, { language: suffix.text });
    }
    if (suffix.kind === 'DatatypeMarker') {
      this.tokens.next();
      const datatype = this.expect('literal datatype', 'AbsoluteIri');
      return createLiteral(token.text, { datatype: createIri(datatype.text) });
    }
    return createLiteral(token.text);
  }

  protected parseGraphLabel(): Subject {
    const token = this.expect('graph', 'AbsoluteIri', 'BlankNodeLabel');
    return token.kind === 'AbsoluteIri' ? createIri(token.text) : this.createBlankNode(token.text);
  }

  /**
   * A statement ends with a dot, after which the line has to end.
   */
  protected expectStatementEnd(): void {
    this.expect('dot (.)', 'Dot');
    this.expect('end of line', 'EndOfLine', 'EndOfInput');
  }
}
