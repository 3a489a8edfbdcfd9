/**
 * Term & triple model
 *
 * Terms are RDF/JS terms discriminated by `termType`. Only IRIs, blank nodes
 * and literals are ever stored; variables live in patterns and templates.
 */

import type {
  BlankNode,
  DefaultGraph,
  Literal,
  NamedNode,
  Term,
} from '@rdfjs/types';
import { termToId } from 'n3';
import { DataFactory } from 'rdf-data-factory';

import { InvalidTripleError } from '../errors/QueryErrors';

export const dataFactory = new DataFactory();

const XSD = 'http://www.w3.org/2001/XMLSchema#';
const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';

export const XSD_STRING = `${XSD}string`;
export const XSD_BOOLEAN = `${XSD}boolean`;
export const XSD_INTEGER = `${XSD}integer`;
export const XSD_DECIMAL = `${XSD}decimal`;
export const XSD_DOUBLE = `${XSD}double`;

export const NUMERIC_TYPES = new Set([
  XSD_INTEGER,
  XSD_DECIMAL,
  `${XSD}float`,
  XSD_DOUBLE,
  `${XSD}nonPositiveInteger`,
  `${XSD}negativeInteger`,
  `${XSD}long`,
  `${XSD}int`,
  `${XSD}short`,
  `${XSD}byte`,
  `${XSD}nonNegativeInteger`,
  `${XSD}unsignedLong`,
  `${XSD}unsignedInt`,
  `${XSD}unsignedShort`,
  `${XSD}unsignedByte`,
  `${XSD}positiveInteger`,
]);

/** A value that can be stored in a graph or bound to a variable. */
export type GroundTerm = NamedNode | BlankNode | Literal;
export type SubjectTerm = NamedNode | BlankNode;
export type GraphName = NamedNode | DefaultGraph;

export interface Triple {
  subject: SubjectTerm;
  predicate: NamedNode;
  object: GroundTerm;
}

export function isIRI(term: Term | undefined | null): term is NamedNode {
  return term?.termType === 'NamedNode';
}

export function isBlankNode(term: Term | undefined | null): term is BlankNode {
  return term?.termType === 'BlankNode';
}

export function isLiteral(term: Term | undefined | null): term is Literal {
  return term?.termType === 'Literal';
}

export function isGround(term: Term | undefined | null): term is GroundTerm {
  return isIRI(term) || isBlankNode(term) || isLiteral(term);
}

export function isSubjectTerm(term: Term | undefined | null): term is SubjectTerm {
  return isIRI(term) || isBlankNode(term);
}

export function isNumericLiteral(term: Term | undefined | null): term is Literal {
  return isLiteral(term) && NUMERIC_TYPES.has(term.datatype.value);
}

/**
 * Structural equality: literals are equal iff lexical form, datatype and
 * language tag all match.
 */
export function termsEqual(left: Term, right: Term): boolean {
  if (left.termType !== right.termType || left.value !== right.value) {
    return false;
  }
  if (left.termType === 'Literal' && right.termType === 'Literal') {
    return left.language === right.language && left.datatype.value === right.datatype.value;
  }
  return true;
}

/**
 * Stable string key for hashing and dedup.
 */
export function termKey(term: Term): string {
  return termToId(term);
}

export function tripleKey(triple: Triple): string {
  return `${termKey(triple.subject)} ${termKey(triple.predicate)} ${termKey(triple.object)}`;
}

export function graphKey(graph: GraphName): string {
  return graph.termType === 'DefaultGraph' ? '' : graph.value;
}

export function numericValue(term: Term | undefined): number | undefined {
  if (!isNumericLiteral(term)) {
    return undefined;
  }
  const value = Number(term.value);
  return Number.isNaN(value) ? undefined : value;
}

function kindRank(term: GroundTerm | undefined): number {
  if (!term) return 0;
  switch (term.termType) {
    case 'BlankNode': return 1;
    case 'NamedNode': return 2;
    case 'Literal': return 3;
  }
}

function compareStrings(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Total order used for ORDER BY and deterministic output:
 * unbound < blank nodes < IRIs < literals. Numeric literals compare by value,
 * other literals by lexical form, then datatype, then language.
 */
export function compareTerms(left: GroundTerm | undefined, right: GroundTerm | undefined): number {
  const rank = kindRank(left) - kindRank(right);
  if (rank !== 0 || !left || !right) {
    return rank;
  }
  if (left.termType === 'Literal' && right.termType === 'Literal') {
    const l = numericValue(left);
    const r = numericValue(right);
    if (l !== undefined && r !== undefined && l !== r) {
      return l < r ? -1 : 1;
    }
    return compareStrings(left.value, right.value) ||
      compareStrings(left.datatype.value, right.datatype.value) ||
      compareStrings(left.language, right.language);
  }
  return compareStrings(left.value, right.value);
}

export function stringLiteral(value: string): Literal {
  return dataFactory.literal(value);
}

export function integerLiteral(value: number): Literal {
  return dataFactory.literal(Math.trunc(value).toString(), dataFactory.namedNode(XSD_INTEGER));
}

export function decimalLiteral(value: number): Literal {
  return dataFactory.literal(value.toString(), dataFactory.namedNode(XSD_DECIMAL));
}

export function booleanLiteral(value: boolean): Literal {
  return dataFactory.literal(value ? 'true' : 'false', dataFactory.namedNode(XSD_BOOLEAN));
}

/** True for simple literals and xsd:string / language-tagged strings. */
export function isStringLiteral(term: Term | undefined): term is Literal {
  return isLiteral(term) &&
    (term.datatype.value === XSD_STRING || term.datatype.value === RDF_LANG_STRING || term.language.length > 0);
}

/**
 * Validates quad positions and narrows it to a {@link Triple}.
 */
export function toTriple(quad: { subject: Term; predicate: Term; object: Term }): Triple {
  const { subject, predicate, object } = quad;
  if (!isSubjectTerm(subject)) {
    throw new InvalidTripleError(`Subject must be an IRI or blank node, got ${subject.termType}`);
  }
  if (!isIRI(predicate)) {
    throw new InvalidTripleError(`Predicate must be an IRI, got ${predicate.termType}`);
  }
  if (!isGround(object)) {
    throw new InvalidTripleError(`Object must be an IRI, blank node or literal, got ${object.termType}`);
  }
  return { subject, predicate, object };
}

export function formatTerm(term: Term): string {
  switch (term.termType) {
    case 'NamedNode': return `<${term.value}>`;
    case 'BlankNode': return `_:${term.value}`;
    case 'Variable': return `?${term.value}`;
    case 'DefaultGraph': return 'DEFAULT';
    default: return termToId(term);
  }
}
