import { describe, it, expect } from 'vitest';

import { QuerySyntaxError, UnknownPrefixError, UnsupportedQueryError } from '../../../src/errors/QueryErrors';
import { QueryBinder } from '../../../src/storage/sparql/QueryBinder';
import { PrefixMap } from '../../../src/vocab/PrefixMap';
import { PREFIXES } from '../../helpers/ontology';

describe('QueryBinder', () => {
  const binder = new QueryBinder();

  describe('form detection', () => {
    it('should bind a SELECT with its projected variables', () => {
      const bound = binder.bind('SELECT ?c ?s WHERE { ?c rdfs:subClassOf ?s }', PREFIXES);

      expect(bound.form).toBe('select');
      expect(bound.variables).toEqual([ 'c', 's' ]);
      expect(bound.where).toBeDefined();
    });

    it('should bind CONSTRUCT, ASK and INSERT', () => {
      const construct = binder.bind('CONSTRUCT { ?c skos:broader ?s } WHERE { ?c rdfs:subClassOf ?s }', PREFIXES);
      const ask = binder.bind('ASK { ?c rdfs:subClassOf ?s }', PREFIXES);
      const insert = binder.bind('INSERT { ?c skos:broader ?s } WHERE { ?c rdfs:subClassOf ?s }', PREFIXES);

      expect([ construct.form, ask.form, insert.form ]).toEqual([ 'construct', 'ask', 'insert' ]);
      expect(construct.template).toHaveLength(1);
      expect(insert.template).toHaveLength(1);
    });

    it('should have no pattern for INSERT DATA', () => {
      const bound = binder.bind('INSERT DATA { ex:a skos:broader ex:b . ex:b skos:broader ex:c }', PREFIXES);

      expect(bound.form).toBe('insert');
      expect(bound.where).toBeUndefined();
      expect(bound.template).toHaveLength(2);
    });

    it('should accept a prefix map', () => {
      const bound = binder.bind('SELECT ?x WHERE { ?x skos:broader ?y }', PrefixMap.standard());

      expect(bound.variables).toEqual([ 'x' ]);
    });
  });

  describe('rejections', () => {
    it('should report the missing prefix', () => {
      expect(() => binder.bind('SELECT ?x WHERE { ?x unknown:p ?y }', PREFIXES)).toThrow(UnknownPrefixError);
      expect(() => binder.bind('SELECT ?x WHERE { ?x unknown:p ?y }', PREFIXES)).toThrow("Missing prefix for 'unknown'");
    });

    it('should report syntax errors', () => {
      expect(() => binder.bind('SELECT ?x WHERE { ?x ', PREFIXES)).toThrow(QuerySyntaxError);
    });

    it.each([
      [ 'DELETE', 'DELETE { ?s ?p ?o } WHERE { ?s ?p ?o }' ],
      [ 'several updates', 'INSERT DATA { ex:a ex:p ex:b } ; INSERT DATA { ex:a ex:p ex:c }' ],
      [ 'DESCRIBE', 'DESCRIBE ex:a' ],
      [ 'negated property sets', 'SELECT ?o WHERE { ?s !rdfs:label ?o }' ],
      [ 'SERVICE', 'SELECT ?s WHERE { SERVICE <http://example.org/sparql> { ?s ?p ?o } }' ],
      [ 'unknown functions', 'SELECT ?s WHERE { ?s ?p ?o FILTER(SHA256(STR(?o)) = "x") }' ],
    ])('should reject %s', (_name, query) => {
      expect(() => binder.bind(query, PREFIXES)).toThrow(UnsupportedQueryError);
    });

    it('should check patterns nested in EXISTS', () => {
      expect(() => binder.bind('SELECT ?s WHERE { ?s ?p ?o FILTER EXISTS { ?s !rdfs:label ?x } }', PREFIXES))
        .toThrow('Negated property sets are not supported');
    });
  });
});
