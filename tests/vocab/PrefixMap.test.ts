import { describe, it, expect } from 'vitest';

import { UnknownPrefixError } from '../../src/errors/QueryErrors';
import { SKOS } from '../../src/vocab/external';
import { PrefixMap } from '../../src/vocab/PrefixMap';

describe('PrefixMap', () => {
  const standard = PrefixMap.standard();

  it('should expand and compress standard terms', () => {
    expect(standard.expand('skos:Concept')).toBe(SKOS.Concept);
    expect(standard.compress(SKOS.broader)).toBe('skos:broader');
    expect(standard.standardize(SKOS.Concept)).toBe('skos:Concept');
    expect(standard.standardize('skos:Concept')).toBe('skos:Concept');
  });

  it('should tell IRIs from CURIEs', () => {
    expect(standard.validate(SKOS.Concept)).toBe('iri');
    expect(standard.validate('skos:Concept')).toBe('curie');
    expect(standard.parse(SKOS.Concept)).toEqual([ 'skos', 'Concept' ]);
  });

  it('should raise on unknown prefixes in safe mode only', () => {
    expect(() => standard.expand('schema:Thing')).toThrow(UnknownPrefixError);
    expect(() => standard.compress('http://example.org/x')).toThrow("Missing prefix for 'http://example.org/x'");
    expect(standard.expand('schema:Thing', 'fast')).toBe('schema:Thing');
    expect(standard.compress('http://example.org/x', 'fast')).toBe('http://example.org/x');
  });

  it('should prefer the longest namespace', () => {
    const prefixes = new PrefixMap({ ex: 'http://example.org/', exo: 'http://example.org/onto#' });

    expect(prefixes.compress('http://example.org/onto#A')).toBe('exo:A');
    expect(prefixes.compress('http://example.org/B')).toBe('ex:B');
  });

  it('should not read an IRI authority as a local name', () => {
    const prefixes = new PrefixMap([[ 'http', 'http://example.org/' ]]);

    expect(() => prefixes.validate('http://other.org/x')).toThrow(UnknownPrefixError);
    expect(prefixes.expand('http:x')).toBe('http://example.org/x');
  });

  it('should validate entries', () => {
    const prefixes = new PrefixMap();

    expect(() => prefixes.set('1bad', 'http://example.org/')).toThrow("'1bad' is not a valid prefix name");
    expect(() => prefixes.set('ok', 'not a namespace')).toThrow("'not a namespace' is not a valid URI");
    expect(prefixes.size).toBe(0);
  });

  it('should let merged entries win', () => {
    const merged = new PrefixMap({ ex: 'http://example.org/a#' }).merge({ ex: 'http://example.org/b#', skos: SKOS.uri });

    expect(merged.toRecord()).toEqual({ ex: 'http://example.org/b#', skos: SKOS.uri });
    expect(merged.has('skos')).toBe(true);
  });
});
