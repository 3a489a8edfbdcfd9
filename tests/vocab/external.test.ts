import { describe, it, expect } from 'vitest';

import { DCTerms, OWL, SKOS, STANDARD_PREFIXES, createNamespace } from '../../src/vocab/external';

describe('external vocabularies', () => {
  it('should build terms from the namespace', () => {
    expect(SKOS.broader).toBe('http://www.w3.org/2004/02/skos/core#broader');
    expect(SKOS('hiddenLabel')).toBe('http://www.w3.org/2004/02/skos/core#hiddenLabel');
    expect(OWL.deprecated).toBe('http://www.w3.org/2002/07/owl#deprecated');
  });

  it('should pass absolute IRIs through', () => {
    expect(SKOS('http://example.org/other')).toBe('http://example.org/other');
  });

  it('should support custom namespaces', () => {
    const EX = createNamespace('ex', 'http://example.org/onto#', { Heart: 'Heart' });

    expect(EX.prefix).toBe('ex');
    expect(EX.Heart).toBe('http://example.org/onto#Heart');
  });

  it('should list every namespace in the standard prefixes', () => {
    expect(Object.keys(STANDARD_PREFIXES)).toEqual([ 'rdf', 'rdfs', 'xsd', 'owl', 'skos', 'dcterms' ]);
    expect(STANDARD_PREFIXES.dcterms).toBe(DCTerms.uri);
  });
});
