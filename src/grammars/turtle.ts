import type { BlankNode } from '@rdfjs/types';
import { TokenBuffer } from '../BufferUtil';
import type { DecoderOptions } from '../DecodeUtil';
import { BaseDecoder } from '../DecodeUtil';
import { isAbsoluteIri, Lexer } from '../LexUtil';
import { getLogger } from '../LogUtil';
import type { ObjectTerm, Predicate, Subject, Triple } from '../TermUtil';
import {
  createIri,
  createLiteral,
  RDF_FIRST,
  RDF_NIL,
  RDF_REST,
  RDF_TYPE,
  XSD_BOOLEAN,
  XSD_DECIMAL,
  XSD_DOUBLE,
  XSD_INTEGER,
} from '../TermUtil';
import type { Token, TokenKind } from '../TokenUtil';

const logger = getLogger('Turtle');

const VERB_KINDS: TokenKind[] = [ 'AbsoluteIri', 'RelativeIri', 'PrefixedName', 'TypeKeyword' ];

const KEYWORD_DATATYPES: Record<'Integer' | 'Decimal' | 'Double' | 'Boolean', string> = {
  Integer: XSD_INTEGER,
  Decimal: XSD_DECIMAL,
  Double: XSD_DOUBLE,
  Boolean: XSD_BOOLEAN,
};

/**
 * Decodes Turtle documents.
 *
 * A single Turtle statement can contain several triples,
 * these are buffered and returned one per `decode` call once the whole statement has been parsed.
 * Blank nodes without a label, such as `[]` and collection nodes, get identifiers generated by this decoder.
 */
export class TurtleDecoder extends BaseDecoder<Triple> {
  private readonly prefixes: Record<string, string | undefined> = {};
  private readonly pending: Triple[] = [];
  private base?: string;

  public constructor(input: string, options: DecoderOptions = {}) {
    super('turtle', new TokenBuffer(new Lexer(input, 'turtle')), options);
    this.base = options.baseIri;
  }

  public setBase(iri: string): void {
    logger.debug(`Setting base IRI to ${iri}`);
    this.base = iri;
  }

  protected parseStatement(): Triple | undefined {
    while (this.pending.length === 0) {
      if (this.tokens.peek().kind === 'EndOfInput') {
        return;
      }
      this.pending.push(...this.parseDirectiveOrTriples());
    }
    return this.pending.shift();
  }

  private parseDirectiveOrTriples(): Triple[] {
    const statement: Triple[] = [];
    const token = this.tokens.peek();
    switch (token.kind) {
      case 'PrefixDirective':
        this.tokens.next();
        this.parsePrefixDeclaration();
        this.expect('dot (.)', 'Dot');
        break;
      case 'BaseDirective':
        this.tokens.next();
        this.parseBaseDeclaration();
        this.expect('dot (.)', 'Dot');
        break;
      case 'SparqlPrefix':
        this.tokens.next();
        this.parsePrefixDeclaration();
        break;
      case 'SparqlBase':
        this.tokens.next();
        this.parseBaseDeclaration();
        break;
      default:
        this.parseTriples(statement);
        this.expect('dot (.)', 'Dot');
    }
    return statement;
  }

  private parsePrefixDeclaration(): void {
    const name = this.expect('prefix name', 'PrefixedName');
    if (!name.text.endsWith(':') || name.text.indexOf(':') !== name.text.length - 1) {
      this.unexpected(name, 'prefix name', `${name.text} has a local part`);
    }
    const iri = this.expect('prefix IRI', 'AbsoluteIri', 'RelativeIri');
    const prefix = name.text.slice(0, -1);
    this.prefixes[prefix] = this.toIri(iri, 'prefix IRI');
    logger.debug(`Prefix ${prefix}: is ${this.prefixes[prefix]}`);
  }

  private parseBaseDeclaration(): void {
    const iri = this.expect('base IRI', 'AbsoluteIri', 'RelativeIri');
    this.setBase(this.toIri(iri, 'base IRI'));
  }

  private parseTriples(statement: Triple[]): void {
    // `[ ... ]` followed by an optional predicate object list, `[]` is a normal subject
    if (this.tokens.peek().kind === 'OpenBracket' && this.tokens.peek(1).kind !== 'CloseBracket') {
      this.tokens.next();
      const subject = this.parseBlankNodePropertyList(statement);
      if (this.tokens.peek().kind !== 'Dot') {
        this.parsePredicateObjectList(subject, statement);
      }
      return;
    }
    const subject = this.parseSubject(statement);
    this.parsePredicateObjectList(subject, statement);
  }

  private parseSubject(statement: Triple[]): Subject {
    const token = this.tokens.next();
    switch (token.kind) {
      case 'BlankNodeLabel':
        return this.createBlankNode(token.text);
      case 'OpenBracket':
        this.expect('anonymous blank node (])', 'CloseBracket');
        return this.generateBlankNode();
      case 'OpenParen':
        return this.parseCollection(statement);
      default:
        return createIri(this.toIri(token, 'subject'));
    }
  }

  private parsePredicateObjectList(subject: Subject, statement: Triple[]): void {
    for (;;) {
      const predicate = this.parseVerb();
      this.parseObjectList(subject, predicate, statement);
      if (this.tokens.peek().kind !== 'Semicolon') {
        return;
      }
      while (this.tokens.peek().kind === 'Semicolon') {
        this.tokens.next();
      }
      // Trailing semicolons are allowed
      if (!VERB_KINDS.includes(this.tokens.peek().kind)) {
        return;
      }
    }
  }

  private parseVerb(): Predicate {
    const token = this.tokens.next();
    if (token.kind === 'TypeKeyword') {
      return createIri(RDF_TYPE);
    }
    return createIri(this.toIri(token, 'predicate'));
  }

  private parseObjectList(subject: Subject, predicate: Predicate, statement: Triple[]): void {
    for (;;) {
      const object = this.parseObject(statement);
      statement.push({ subject, predicate, object });
      if (this.tokens.peek().kind !== 'Comma') {
        return;
      }
      this.tokens.next();
    }
  }

  private parseObject(statement: Triple[]): ObjectTerm {
    const token = this.tokens.next();
    switch (token.kind) {
      case 'BlankNodeLabel':
        return this.createBlankNode(token.text);
      case 'OpenBracket':
        if (this.tokens.peek().kind === 'CloseBracket') {
          this.tokens.next();
          return this.generateBlankNode();
        }
        return this.parseBlankNodePropertyList(statement);
      case 'OpenParen':
        return this.parseCollection(statement);
      case 'Literal':
        return this.parseLiteralSuffix(token);
      case 'Integer':
      case 'Decimal':
      case 'Double':
      case 'Boolean':
        return createLiteral(token.text, { datatype: createIri(KEYWORD_DATATYPES[token.kind]) });
      default:
        return createIri(this.toIri(token, 'object'));
    }
  }

  private parseLiteralSuffix(literal: Token): ObjectTerm {
    const suffix = this.tokens.peek();
    if (suffix.kind === 'LanguageTag') {
      this.tokens.next();
      return createLiteral(literal.text, { language: suffix.text });
    }
    if (suffix.kind === 'DatatypeMarker') {
      this.tokens.next();
      const datatype = this.tokens.next();
      return createLiteral(literal.text, { datatype: createIri(this.toIri(datatype, 'literal datatype')) });
    }
    return createLiteral(literal.text);
  }

  /**
   * Parses the contents of `[ ... ]`, the opening bracket having been consumed already.
   */
  private parseBlankNodePropertyList(statement: Triple[]): BlankNode {
    const node = this.generateBlankNode();
    this.parsePredicateObjectList(node, statement);
    this.expect('end of blank node property list (])', 'CloseBracket');
    return node;
  }

  /**
   * Parses the contents of `( ... )`, the opening parenthesis having been consumed already,
   * and adds the `rdf:first`/`rdf:rest` chain to the statement.
   */
  private parseCollection(statement: Triple[]): Subject {
    const items: ObjectTerm[] = [];
    while (this.tokens.peek().kind !== 'CloseParen') {
      items.push(this.parseObject(statement));
    }
    this.tokens.next();

    if (items.length === 0) {
      return createIri(RDF_NIL);
    }
    const nodes = items.map((): BlankNode => this.generateBlankNode());
    for (const [ i, node ] of nodes.entries()) {
      statement.push({ subject: node, predicate: createIri(RDF_FIRST), object: items[i] });
      statement.push({
        subject: node,
        predicate: createIri(RDF_REST),
        object: i + 1 < nodes.length ? nodes[i + 1] : createIri(RDF_NIL),
      });
    }
    return nodes[0];
  }

  /**
   * Converts an IRI or prefixed name token to an absolute IRI where possible.
   * Any other token kind is a syntax fault for the given context.
   */
  private toIri(token: Token, context: string): string {
    if (token.kind === 'AbsoluteIri') {
      return token.text;
    }
    if (token.kind === 'RelativeIri') {
      return this.resolve(token, context);
    }
    if (token.kind === 'PrefixedName') {
      const idx = token.text.indexOf(':');
      const prefix = token.text.slice(0, idx);
      const namespace = this.prefixes[prefix];
      if (namespace === undefined) {
        return this.unexpected(token, context, `undefined prefix "${prefix}"`);
      }
      return `${namespace}${token.text.slice(idx + 1)}`;
    }
    return this.unexpected(token, context);
  }

  // Without a base the reference is kept as written
  private resolve(token: Token, context: string): string {
    if (!this.base || isAbsoluteIri(token.text)) {
      return token.text;
    }
    if (!URL.canParse(token.text, this.base)) {
      this.unexpected(token, context, `unable to resolve against base ${this.base}`);
    }
    return new URL(token.text, this.base).href;
  }
}
