import type * as RDF from '@rdfjs/types';
import { DataFactory } from 'n3';
import { termToString } from 'rdf-string';

const DF = DataFactory;

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';

export const RDF_TYPE = `${RDF_NS}type`;
export const RDF_FIRST = `${RDF_NS}first`;
export const RDF_REST = `${RDF_NS}rest`;
export const RDF_NIL = `${RDF_NS}nil`;
export const XSD_INTEGER = `${XSD_NS}integer`;
export const XSD_DECIMAL = `${XSD_NS}decimal`;
export const XSD_DOUBLE = `${XSD_NS}double`;
export const XSD_BOOLEAN = `${XSD_NS}boolean`;

export type Subject = RDF.NamedNode | RDF.BlankNode;
export type Predicate = RDF.NamedNode;
export type ObjectTerm = RDF.NamedNode | RDF.BlankNode | RDF.Literal;
export type GraphLabel = RDF.NamedNode | RDF.BlankNode | RDF.DefaultGraph;

export type Triple = {
  subject: Subject;
  predicate: Predicate;
  object: ObjectTerm;
};

export type Quad = Triple & {
  graph: GraphLabel;
};

export const TRIPLE_POSITIONS = [ 'subject', 'predicate', 'object' ] as const;

export function createIri(iri: string): RDF.NamedNode {
  return DF.namedNode(iri);
}

export function createBlank(label: string): RDF.BlankNode {
  return DF.blankNode(label);
}

/**
 * Creates a literal with either a language tag or a datatype.
 * A literal with neither is an `xsd:string`.
 */
export function createLiteral(value: string, suffix?: { language: string } | { datatype: RDF.NamedNode }): RDF.Literal {
  if (!suffix) {
    return DF.literal(value);
  }
  if ('language' in suffix) {
    return DF.literal(value, suffix.language);
  }
  return DF.literal(value, suffix.datatype);
}

/**
 * The graph assigned to quads that do not name one.
 * Its term type is `DefaultGraph`, so no IRI or blank node read from input can equal it.
 */
export function defaultGraph(): RDF.DefaultGraph {
  return DF.defaultGraph();
}

export function isQuad(statement: Triple | Quad): statement is Quad {
  return 'graph' in statement;
}

export function toRdfQuad(statement: Triple | Quad, graph: GraphLabel = defaultGraph()): RDF.Quad {
  return DF.quad(statement.subject, statement.predicate, statement.object, isQuad(statement) ? statement.graph : graph);
}

export function stringifyStatement(statement: Triple | Quad): string {
  const terms = TRIPLE_POSITIONS.map((pos): string => termToString(statement[pos]));
  if (isQuad(statement) && statement.graph.termType !== 'DefaultGraph') {
    terms.push(termToString(statement.graph));
  }
  return terms.join(' ');
}
