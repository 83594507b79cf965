import { randomBytes } from 'node:crypto';
import type { BlankNode } from '@rdfjs/types';
import type { TokenBuffer } from './BufferUtil';
import { DecodeFault, LexicalFault, SyntaxFault } from './FaultUtil';
import type { Format } from './FormatUtil';
import { getLogger } from './LogUtil';
import type { GraphLabel, Triple } from './TermUtil';
import { createBlank, stringifyStatement } from './TermUtil';
import type { Token, TokenKind } from './TokenUtil';
import { stringifyToken } from './TokenUtil';

const logger = getLogger('Decoder');

export type DecoderOptions = {
  /**
   * Base IRI to resolve relative IRIs against, for formats that have them.
   */
  baseIri?: string;
  /**
   * Graph of quads that do not name one. Defaults to the RDF/JS default graph.
   */
  defaultGraph?: GraphLabel;
  /**
   * Prepended to every blank node label read from the input.
   * Decoders given the same prefix share the blank nodes of equal labels.
   * Without one, every decoder uses a prefix of its own so its blank nodes equal no other decoder's.
   */
  blankNodePrefix?: string;
};

export type DecodeResult<T> =
  { type: 'statement'; value: T } |
  { type: 'end' } |
  { type: 'fault'; fault: DecodeFault };

export type DecodeAllResult<T> =
  { type: 'statements'; values: T[] } |
  { type: 'fault'; fault: DecodeFault };

/**
 * Decodes statements of a single serialization format one at a time.
 * Iterating over a decoder yields all statements and throws the first fault.
 */
export type Decoder<T extends Triple = Triple> = Iterable<T> & {
  readonly format: Format;
  /**
   * Decodes the next statement, or reports that there are none left.
   */
  decode: () => DecodeResult<T>;
  /**
   * Decodes all remaining statements. Nothing is returned if any of them is malformed.
   */
  decodeAll: () => DecodeAllResult<T>;
  /**
   * Sets the IRI relative IRIs are resolved against from now on.
   * Does nothing for formats without relative IRIs.
   */
  setBase: (iri: string) => void;
};

/**
 * Shared implementation of the {@link Decoder} contract.
 *
 * Grammars implement {@link parseStatement} by consuming tokens from {@link tokens}
 * and throw a {@link DecodeFault} as soon as the input is malformed.
 * That fault is caught here and turned into a result; anything else that is thrown is a bug and is not caught.
 */
export abstract class BaseDecoder<T extends Triple> implements Decoder<T> {
  public readonly format: Format;
  protected readonly tokens: TokenBuffer;
  private readonly session: string;
  private readonly blankNodePrefix: string;
  private generated = 0;
  private fault?: DecodeFault;
  private count = 0;

  protected constructor(format: Format, tokens: TokenBuffer, options: DecoderOptions) {
    this.format = format;
    this.tokens = tokens;
    this.session = randomBytes(4).toString('hex');
    this.blankNodePrefix = options.blankNodePrefix ?? `b${this.session}_`;
  }

  public decode(): DecodeResult<T> {
    // A decoder that faulted stays in that state
    if (this.fault) {
      return { type: 'fault', fault: this.fault };
    }

    let value: T | undefined;
    try {
      value = this.parseStatement();
    } catch (error: unknown) {
      if (!(error instanceof DecodeFault)) {
        throw error;
      }
      logger.debug(`Stopped decoding ${this.format} after ${this.count} statements: ${error.message}`);
      this.fault = error;
      return { type: 'fault', fault: error };
    }

    if (!value) {
      logger.debug(`Finished decoding ${this.count} ${this.format} statements`);
      return { type: 'end' };
    }
    this.count += 1;
    logger.silly(`Decoded ${stringifyStatement(value)}`);
    return { type: 'statement', value };
  }

  public decodeAll(): DecodeAllResult<T> {
    const values: T[] = [];
    for (;;) {
      const result = this.decode();
      if (result.type === 'fault') {
        return result;
      }
      if (result.type === 'end') {
        return { type: 'statements', values };
      }
      values.push(result.value);
    }
  }

  public setBase(iri: string): void {
    logger.debug(`Ignoring base IRI ${iri}, ${this.format} has no relative IRIs`);
  }

  public* [Symbol.iterator](): IterableIterator<T> {
    for (;;) {
      const result = this.decode();
      if (result.type === 'end') {
        return;
      }
      if (result.type === 'fault') {
        throw result.fault;
      }
      yield result.value;
    }
  }

  /**
   * Parses the next statement, returns `undefined` if the input has no more statements.
   */
  protected abstract parseStatement(): T | undefined;

  /**
   * Consumes the next token and guarantees it is of one of the expected kinds.
   */
  protected expect(context: string, ...expected: TokenKind[]): Token {
    const token = this.tokens.next();
    if (!expected.includes(token.kind)) {
      this.unexpected(token, context);
    }
    return token;
  }

  /**
   * Complains about the given token and terminates parsing.
   */
  protected unexpected(token: Token, context: string, reason?: string): never {
    logger.silly(`Rejecting ${stringifyToken(token)} in ${context}`);
    if (token.kind === 'Error') {
      throw new LexicalFault(token);
    }
    throw new SyntaxFault(token, context, reason);
  }

  protected createBlankNode(label: string): BlankNode {
    return createBlank(`${this.blankNodePrefix}${label}`);
  }

  /**
   * Creates a blank node for input that has no label.
   * Labels never start with a dot, so no label can produce the same identifier.
   */
  protected generateBlankNode(): BlankNode {
    const id = `${this.blankNodePrefix}.${this.session}-${this.generated}`;
    this.generated += 1;
    return createBlank(id);
  }
}
