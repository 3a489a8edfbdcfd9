import type { Quad, Term } from '@rdfjs/types';
import { DataFactory } from 'n3';

import { Dataset } from '../../src/storage/dataset/Dataset';
import type { SelectRow } from '../../src/storage/sparql/OntologyQueryEngine';
import type { Triple } from '../../src/rdf/terms';
import { OWL, RDF, RDFS, SKOS, XSD } from '../../src/vocab/external';

const { namedNode, literal, quad } = DataFactory;

export const EX = 'http://example.org/onto#';

export const PREFIXES = {
  ex: EX,
  rdf: RDF.uri,
  rdfs: RDFS.uri,
  owl: OWL.uri,
  skos: SKOS.uri,
  xsd: XSD.uri,
};

export function ex(local: string): ReturnType<typeof namedNode> {
  return namedNode(`${EX}${local}`);
}

export function integer(value: number): ReturnType<typeof literal> {
  return literal(String(value), namedNode(XSD.integer));
}

export const TRUE = literal('true', namedNode(XSD.boolean));

export function subClassOf(child: string, parent: string, graph?: string): Quad {
  return graph ?
    quad(ex(child), namedNode(RDFS.subClassOf), ex(parent), ex(graph)) :
    quad(ex(child), namedNode(RDFS.subClassOf), ex(parent));
}

export function typed(subject: string, type: string, graph?: string): Quad {
  return graph ?
    quad(ex(subject), namedNode(RDF.type), namedNode(type), ex(graph)) :
    quad(ex(subject), namedNode(RDF.type), namedNode(type));
}

export function datasetOf(...quads: Quad[]): Dataset {
  return new Dataset(quads);
}

/** Lexical values of a result row, for readable assertions. */
export function rowValues(row: SelectRow): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [ name, term ] of Object.entries(row)) {
    values[name] = term.value;
  }
  return values;
}

/** `subject predicate object` with full IRIs, sorted. */
export function tripleLines(triples: readonly Triple[]): string[] {
  return triples.map((triple) => `${show(triple.subject)} ${show(triple.predicate)} ${show(triple.object)}`).sort();
}

function show(term: Term): string {
  return term.termType === 'BlankNode' ? `_:${term.value}` : term.value;
}
