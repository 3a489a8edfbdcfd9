/**
 * External Vocabularies
 *
 * The standard vocabularies an OWL to SKOS migration touches.
 */

// ============================================
// Namespace Builder
// ============================================

export type NamespaceObject<T extends Record<string, string>> = ((term: string) => string) & {
  prefix: string;
  uri: string;
} & { [K in keyof T]: string };

const ABSOLUTE_IRI = /^[a-zA-Z][a-zA-Z\d+.-]*:/;

export function createNamespace<T extends Record<string, string>>(
  prefix: string,
  baseUri: string,
  terms: T,
): NamespaceObject<T> {
  const builder = ((term: string) =>
    ABSOLUTE_IRI.test(term) ? term : `${baseUri}${term}`) as NamespaceObject<T>;

  builder.prefix = prefix;
  builder.uri = baseUri;

  for (const [ key, local ] of Object.entries(terms)) {
    Object.defineProperty(builder, key, {
      value: builder(local),
      enumerable: true,
    });
  }

  return builder;
}

// ============================================
// RDF / RDFS / XSD
// ============================================

export const RDF = createNamespace('rdf', 'http://www.w3.org/1999/02/22-rdf-syntax-ns#', {
  type: 'type',
  Property: 'Property',
  langString: 'langString',
});

export const RDFS = createNamespace('rdfs', 'http://www.w3.org/2000/01/rdf-schema#', {
  Class: 'Class',
  subClassOf: 'subClassOf',
  subPropertyOf: 'subPropertyOf',
  label: 'label',
  comment: 'comment',
  domain: 'domain',
  range: 'range',
  seeAlso: 'seeAlso',
  isDefinedBy: 'isDefinedBy',
});

export const XSD = createNamespace('xsd', 'http://www.w3.org/2001/XMLSchema#', {
  string: 'string',
  boolean: 'boolean',
  integer: 'integer',
  decimal: 'decimal',
  double: 'double',
  dateTime: 'dateTime',
});

// ============================================
// OWL
// ============================================

/**
 * Web Ontology Language
 * @see https://www.w3.org/TR/owl2-syntax/
 */
export const OWL = createNamespace('owl', 'http://www.w3.org/2002/07/owl#', {
  Class: 'Class',
  Thing: 'Thing',
  Ontology: 'Ontology',
  ObjectProperty: 'ObjectProperty',
  DatatypeProperty: 'DatatypeProperty',
  equivalentClass: 'equivalentClass',
  sameAs: 'sameAs',
  deprecated: 'deprecated',
  versionInfo: 'versionInfo',
});

// ============================================
// SKOS
// ============================================

/**
 * Simple Knowledge Organization System
 * @see https://www.w3.org/TR/skos-reference/
 */
export const SKOS = createNamespace('skos', 'http://www.w3.org/2004/02/skos/core#', {
  // Classes
  Concept: 'Concept',
  ConceptScheme: 'ConceptScheme',
  Collection: 'Collection',

  // Semantic relations
  broader: 'broader',
  narrower: 'narrower',
  related: 'related',
  broaderTransitive: 'broaderTransitive',
  narrowerTransitive: 'narrowerTransitive',

  // Mapping relations
  exactMatch: 'exactMatch',
  closeMatch: 'closeMatch',
  broadMatch: 'broadMatch',
  narrowMatch: 'narrowMatch',

  // Labels and notes
  prefLabel: 'prefLabel',
  altLabel: 'altLabel',
  hiddenLabel: 'hiddenLabel',
  definition: 'definition',
  scopeNote: 'scopeNote',
  note: 'note',
  notation: 'notation',

  // Schemes
  inScheme: 'inScheme',
  hasTopConcept: 'hasTopConcept',
  topConceptOf: 'topConceptOf',
});

/**
 * SKOS eXtension for Labels
 * @see https://www.w3.org/TR/skos-reference/skos-xl.html
 */
export const SKOSXL = createNamespace('skosxl', 'http://www.w3.org/2008/05/skos-xl#', {
  Label: 'Label',
  prefLabel: 'prefLabel',
  altLabel: 'altLabel',
  hiddenLabel: 'hiddenLabel',
  literalForm: 'literalForm',
});

// ============================================
// Dublin Core Terms
// ============================================

/**
 * Dublin Core Terms
 * @see https://www.dublincore.org/specifications/dublin-core/dcmi-terms/
 */
export const DCTerms = createNamespace('dcterms', 'http://purl.org/dc/terms/', {
  title: 'title',
  description: 'description',
  creator: 'creator',
  created: 'created',
  modified: 'modified',
  source: 'source',
  subject: 'subject',
});

/** Prefix table covering every namespace above. */
export const STANDARD_PREFIXES: Readonly<Record<string, string>> = Object.freeze({
  [RDF.prefix]: RDF.uri,
  [RDFS.prefix]: RDFS.uri,
  [XSD.prefix]: XSD.uri,
  [OWL.prefix]: OWL.uri,
  [SKOS.prefix]: SKOS.uri,
  [DCTerms.prefix]: DCTerms.uri,
});
