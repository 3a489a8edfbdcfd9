/**
 * Vocabulary exports
 *
 * ```typescript
 * import { SKOS, PrefixMap } from './vocab';
 *
 * SKOS.broader;          // 'http://www.w3.org/2004/02/skos/core#broader'
 * SKOS('exactMatch');    // 'http://www.w3.org/2004/02/skos/core#exactMatch'
 * PrefixMap.standard().compress(SKOS.Concept);  // 'skos:Concept'
 * ```
 */

export { RDF, RDFS, OWL, SKOS, SKOSXL, XSD, DCTerms, STANDARD_PREFIXES, createNamespace } from './external';
export type { NamespaceObject } from './external';
export { PrefixMap } from './PrefixMap';
export type { PrefixMode, PrefixedValueKind } from './PrefixMap';
