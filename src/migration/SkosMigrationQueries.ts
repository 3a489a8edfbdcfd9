/**
 * SKOS migration query catalogue
 *
 * Builders for the queries an OWL to SKOS migration runs. Each returns the
 * query text together with the prefix table it is written against; the text
 * itself declares no prefixes.
 */

import type { QueryForm } from '../storage/sparql/QueryBinder';
import { OWL, RDF, RDFS, SKOS } from '../vocab/external';

export interface MigrationQuery {
  name: string;
  form: QueryForm;
  query: string;
  prefixes: Record<string, string>;
}

export interface InsertOptions {
  /** Named graph receiving the new triples; the default graph otherwise. */
  graph?: string;
}

export interface ClassToConceptOptions extends InsertOptions {
  /** Concept scheme every new concept is placed in. */
  scheme?: string;
}

const PREFIXES: Record<string, string> = {
  [RDF.prefix]: RDF.uri,
  [RDFS.prefix]: RDFS.uri,
  [OWL.prefix]: OWL.uri,
  [SKOS.prefix]: SKOS.uri,
};

const FORBIDDEN_IRI_CHARACTERS = /[\s<>"{}|\\^`]/u;
const ABSOLUTE_IRI = /^[a-zA-Z][a-zA-Z\d+.-]*:/u;

export function assertIri(iri: string): string {
  if (!ABSOLUTE_IRI.test(iri) || FORBIDDEN_IRI_CHARACTERS.test(iri)) {
    throw new Error(`'${iri}' is not a valid URI`);
  }
  return iri;
}

/**
 * `<iri>` for embedding in query text.
 */
export function iriRef(iri: string): string {
  return `<${assertIri(iri)}>`;
}

/**
 * Double-quoted string literal for embedding in query text.
 */
export function stringRef(value: string): string {
  const escaped = value
    .replace(/\\/gu, '\\\\')
    .replace(/"/gu, '\\"')
    .replace(/\n/gu, '\\n')
    .replace(/\r/gu, '\\r');
  return `"${escaped}"`;
}

function inGraph(template: string, options: InsertOptions): string {
  return options.graph ? `GRAPH ${iriRef(options.graph)} { ${template} }` : template;
}

function pairs(mapping: Readonly<Record<string, string>>): string {
  const rows = Object.entries(mapping).map(([ from, to ]) => `(${iriRef(from)} ${iriRef(to)})`);
  if (rows.length === 0) {
    throw new Error('Mapping must contain at least one entry');
  }
  return rows.join(' ');
}

export const SkosMigrationQueries = {
  /**
   * Each explicit `rdfs:subClassOf` edge between named classes becomes
   * `skos:broader`. No closure is taken.
   */
  subclassToBroader(): MigrationQuery {
    return {
      name: 'subclassToBroader',
      form: 'construct',
      prefixes: PREFIXES,
      query: `CONSTRUCT { ?class skos:broader ?super }
WHERE {
  ?class rdfs:subClassOf ?super .
  FILTER(isURI(?class) && isURI(?super))
}`,
    };
  },

  /** Inverse of {@link subclassToBroader}. */
  subclassToNarrower(): MigrationQuery {
    return {
      name: 'subclassToNarrower',
      form: 'construct',
      prefixes: PREFIXES,
      query: `CONSTRUCT { ?super skos:narrower ?class }
WHERE {
  ?class rdfs:subClassOf ?super .
  FILTER(isURI(?class) && isURI(?super))
}`,
    };
  },

  /**
   * Types every named, non-deprecated `owl:Class` as `skos:Concept`, copying
   * its `rdfs:label` as `skos:prefLabel` where one exists.
   */
  classToConcept(options: ClassToConceptOptions = {}): MigrationQuery {
    const scheme = options.scheme ? `\n  ?class skos:inScheme ${iriRef(options.scheme)} .` : '';
    const template = `
  ?class a skos:Concept .
  ?class skos:prefLabel ?label .${scheme}
`;
    return {
      name: 'classToConcept',
      form: 'insert',
      prefixes: PREFIXES,
      query: `INSERT { ${inGraph(template, options)} }
WHERE {
  ?class a owl:Class .
  FILTER(isURI(?class))
  FILTER NOT EXISTS { ?class owl:deprecated true }
  OPTIONAL { ?class rdfs:label ?label }
}`,
    };
  },

  /**
   * Copies every statement using a mapped predicate to the predicate it maps
   * to, e.g. `rdfs:comment` to `skos:definition`.
   */
  remapMetadata(mapping: Readonly<Record<string, string>>, options: InsertOptions = {}): MigrationQuery {
    return {
      name: 'remapMetadata',
      form: 'insert',
      prefixes: PREFIXES,
      query: `INSERT { ${inGraph('?subject ?to ?value .', options)} }
WHERE {
  VALUES (?from ?to) { ${pairs(mapping)} }
  ?subject ?from ?value .
}`,
    };
  },

  /**
   * Concepts linked by `skos:exactMatch` or `skos:closeMatch` into
   * `modelNamespace`, counted per model (first path segment after the
   * namespace).
   */
  enrichmentCoverage(modelNamespace: string): MigrationQuery {
    const namespace = stringRef(assertIri(modelNamespace));
    return {
      name: 'enrichmentCoverage',
      form: 'select',
      prefixes: PREFIXES,
      query: `SELECT ?model (COUNT(DISTINCT ?concept) AS ?concepts)
WHERE {
  ?concept a skos:Concept .
  ?concept skos:exactMatch|skos:closeMatch ?match .
  FILTER(isURI(?match) && STRSTARTS(STR(?match), ${namespace}))
  BIND(STRBEFORE(CONCAT(STRAFTER(STR(?match), ${namespace}), "/"), "/") AS ?model)
}
GROUP BY ?model
ORDER BY DESC(?concepts) ?model`,
    };
  },

  /**
   * Concepts per tag over the graphs a graph-control source reports for
   * `controlPredicate`.
   */
  controlledGraphCoverage(controlPredicate: string): MigrationQuery {
    return {
      name: 'controlledGraphCoverage',
      form: 'select',
      prefixes: PREFIXES,
      query: `SELECT ?tag (COUNT(DISTINCT ?concept) AS ?concepts)
WHERE {
  ?graph ${iriRef(controlPredicate)} ?tag .
  GRAPH ?graph { ?concept a skos:Concept }
}
GROUP BY ?tag
ORDER BY ?tag`,
    };
  },

  /**
   * IRIs typed `skos:Concept`, directly or through a direct subclass of it,
   * that are not yet under `domainNamespace`.
   */
  publicConcepts(domainNamespace: string, options: InsertOptions = {}): MigrationQuery {
    const namespace = stringRef(assertIri(domainNamespace));
    const pattern = `{ ?concept a skos:Concept }
  UNION
  { ?type rdfs:subClassOf skos:Concept . ?concept a ?type }`;
    return {
      name: 'publicConcepts',
      form: 'select',
      prefixes: PREFIXES,
      query: `SELECT DISTINCT ?concept
WHERE {
  ${inGraph(pattern, options)}
  FILTER(isURI(?concept) && !STRSTARTS(STR(?concept), ${namespace}))
}
ORDER BY ?concept`,
    };
  },

  /**
   * Asserts `owl:equivalentClass` in both directions for each mapped pair
   * whose source class is present in the data.
   */
  insertEquivalence(mapping: Readonly<Record<string, string>>, options: InsertOptions = {}): MigrationQuery {
    return {
      name: 'insertEquivalence',
      form: 'insert',
      prefixes: PREFIXES,
      query: `INSERT { ${inGraph('?source owl:equivalentClass ?target . ?target owl:equivalentClass ?source .', options)} }
WHERE {
  VALUES (?source ?target) { ${pairs(mapping)} }
  FILTER EXISTS { ?source ?p ?o }
}`,
    };
  },
};
