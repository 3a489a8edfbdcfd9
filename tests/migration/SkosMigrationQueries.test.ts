import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';

import { Dataset } from '../../src/storage/dataset/Dataset';
import { StaticGraphControlSource } from '../../src/storage/dataset/GraphControlSource';
import { OntologyQueryEngine } from '../../src/storage/sparql/OntologyQueryEngine';
import { QueryBinder } from '../../src/storage/sparql/QueryBinder';
import { SkosMigrationQueries, iriRef, stringRef } from '../../src/migration/SkosMigrationQueries';
import { OWL, RDF, RDFS, SKOS } from '../../src/vocab/external';
import { EX, TRUE, datasetOf, ex, rowValues, subClassOf, tripleLines, typed } from '../helpers/ontology';

const { namedNode, literal, quad } = DataFactory;

function ontology(): ReturnType<typeof datasetOf> {
  return datasetOf(
    typed('A', OWL.Class),
    typed('B', OWL.Class),
    typed('C', OWL.Class),
    subClassOf('A', 'B'),
    subClassOf('B', 'C'),
    quad(ex('A'), namedNode(RDFS.label), literal('Alpha')),
    quad(ex('C'), namedNode(OWL.deprecated), TRUE),
  );
}

describe('SkosMigrationQueries', () => {
  it('should produce queries that bind against their own prefixes', () => {
    const binder = new QueryBinder();
    const queries = [
      SkosMigrationQueries.subclassToBroader(),
      SkosMigrationQueries.subclassToNarrower(),
      SkosMigrationQueries.classToConcept({ scheme: `${EX}scheme`, graph: `${EX}skos` }),
      SkosMigrationQueries.remapMetadata({ [RDFS.comment]: SKOS.definition }),
      SkosMigrationQueries.enrichmentCoverage('http://models.example.org/'),
      SkosMigrationQueries.controlledGraphCoverage(`${EX}controlledBy`),
      SkosMigrationQueries.insertEquivalence({ [`${EX}A`]: 'http://external.example.org/Alpha' }),
    ];

    for (const query of queries) {
      expect(binder.bind(query.query, query.prefixes).form).toBe(query.form);
    }
  });

  it('should map subclass edges to broader and narrower', async () => {
    const engine = new OntologyQueryEngine(ontology());
    const { query, prefixes } = SkosMigrationQueries.subclassToNarrower();

    expect(tripleLines(await engine.construct(query, { prefixes }))).toEqual([
      `${EX}B ${SKOS.narrower} ${EX}A`,
      `${EX}C ${SKOS.narrower} ${EX}B`,
    ]);
  });

  it('should type live classes as concepts', async () => {
    const dataset = ontology();
    const engine = new OntologyQueryEngine(dataset);
    const { query, prefixes } = SkosMigrationQueries.classToConcept({ graph: `${EX}skos` });

    const report = await engine.insert(query, { prefixes });

    expect(report).toEqual({ inserted: 3, graphs: { [`${EX}skos`]: 3 }});
    expect(tripleLines(dataset.snapshot(ex('skos')))).toEqual([
      `${EX}A ${RDF.type} ${SKOS.Concept}`,
      `${EX}A ${SKOS.prefLabel} Alpha`,
      `${EX}B ${RDF.type} ${SKOS.Concept}`,
    ]);
  });

  it('should count enriched concepts per model', async () => {
    const models = 'http://models.example.org/';
    const engine = new OntologyQueryEngine(datasetOf(
      ...[ 'k1', 'k2', 'k3', 'k4', 'k5', 'k6' ].map((name) => typed(name, SKOS.Concept)),
      quad(ex('k1'), namedNode(SKOS.exactMatch), namedNode(`${models}X/1`)),
      quad(ex('k2'), namedNode(SKOS.exactMatch), namedNode(`${models}X/2`)),
      quad(ex('k3'), namedNode(SKOS.closeMatch), namedNode(`${models}X/3`)),
      quad(ex('k3'), namedNode(SKOS.exactMatch), namedNode(`${models}X/4`)),
      quad(ex('k4'), namedNode(SKOS.exactMatch), namedNode(`${models}Y/1`)),
      quad(ex('k5'), namedNode(SKOS.exactMatch), namedNode(`${models}Y/2`)),
      quad(ex('k6'), namedNode(SKOS.exactMatch), namedNode('http://other.example.org/Z/1')),
    ));
    const { query, prefixes } = SkosMigrationQueries.enrichmentCoverage(models);

    const result = await engine.select(query, { prefixes });

    expect(result.rows.map(rowValues)).toEqual([
      { model: 'X', concepts: '3' },
      { model: 'Y', concepts: '2' },
    ]);
  });

  it('should count concepts per controlled graph tag', async () => {
    const engine = new OntologyQueryEngine(datasetOf(
      typed('k1', SKOS.Concept, 'g1'),
      typed('k2', SKOS.Concept, 'g1'),
      typed('k3', SKOS.Concept, 'g2'),
      typed('k4', SKOS.Concept, 'g3'),
    ), {
      graphControl: {
        predicate: ex('controlledBy'),
        source: new StaticGraphControlSource([
          { graph: `${EX}g2`, tag: 'Y' },
          { graph: `${EX}g1`, tag: 'X' },
        ]),
      },
    });
    const { query, prefixes } = SkosMigrationQueries.controlledGraphCoverage(`${EX}controlledBy`);

    const result = await engine.select(query, { prefixes });

    expect(result.rows.map(rowValues)).toEqual([
      { tag: 'X', concepts: '2' },
      { tag: 'Y', concepts: '1' },
    ]);
  });

  it('should assert equivalence only for classes present in the data', async () => {
    const dataset = ontology();
    const engine = new OntologyQueryEngine(dataset);
    const { query, prefixes } = SkosMigrationQueries.insertEquivalence({
      [`${EX}A`]: 'http://external.example.org/Alpha',
      [`${EX}Missing`]: 'http://external.example.org/Missing',
    });

    const report = await engine.insert(query, { prefixes });

    expect(report.inserted).toBe(2);
    expect(dataset.has(Dataset.defaultGraph(), {
      subject: namedNode('http://external.example.org/Alpha'),
      predicate: namedNode(OWL.equivalentClass),
      object: ex('A'),
    })).toBe(true);
  });

  describe('helpers', () => {
    it('should reject values that are not IRIs', () => {
      expect(() => iriRef('not an iri')).toThrow("'not an iri' is not a valid URI");
      expect(() => SkosMigrationQueries.remapMetadata({})).toThrow('Mapping must contain at least one entry');
    });

    it('should escape string literals', () => {
      expect(stringRef('say "hi"\n')).toBe('"say \\"hi\\"\\n"');
    });
  });
});
