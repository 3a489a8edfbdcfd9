import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';

import { OntologyQueryEngine } from '../../../src/storage/sparql/OntologyQueryEngine';
import { RDFS, SKOS } from '../../../src/vocab/external';
import { PREFIXES, datasetOf, ex, integer, rowValues, typed } from '../../helpers/ontology';

const { namedNode, literal, quad } = DataFactory;

const context = { prefixes: PREFIXES };

function scores(): OntologyQueryEngine {
  return new OntologyQueryEngine(datasetOf(
    quad(ex('i1'), ex('group'), literal('A')),
    quad(ex('i2'), ex('group'), literal('A')),
    quad(ex('i3'), ex('group'), literal('B')),
    quad(ex('i1'), ex('score'), integer(1)),
    quad(ex('i2'), ex('score'), integer(2)),
    quad(ex('i3'), ex('score'), integer(3)),
  ));
}

describe('Aggregator', () => {
  it('should compute aggregates per group', async () => {
    const result = await scores().select(`SELECT ?grp (SUM(?s) AS ?total) (MIN(?s) AS ?lo) (MAX(?s) AS ?hi)
      (AVG(?s) AS ?mean) (COUNT(*) AS ?n)
      WHERE { ?i ex:group ?grp ; ex:score ?s }
      GROUP BY ?grp
      ORDER BY ?grp`, context);

    expect(result.rows.map(rowValues)).toEqual([
      { grp: 'A', total: '3', lo: '1', hi: '2', mean: '1.5', n: '2' },
      { grp: 'B', total: '3', lo: '3', hi: '3', mean: '3', n: '1' },
    ]);
  });

  it('should count zero over an empty input without grouping', async () => {
    const result = await scores().select('SELECT (COUNT(*) AS ?n) WHERE { ?x ex:missing ?y }', context);

    expect(result.rows.map(rowValues)).toEqual([{ n: '0' }]);
  });

  it('should honour DISTINCT inside aggregates', async () => {
    const result = await scores().select(`SELECT (COUNT(DISTINCT ?grp) AS ?n) (GROUP_CONCAT(DISTINCT ?grp; separator="|") AS ?all)
      WHERE { ?i ex:group ?grp }`, context);

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].n.value).toBe('2');
    expect(result.rows[0].all.value.split('|').sort()).toEqual([ 'A', 'B' ]);
  });

  it('should sort unbound keys first and keep ties stable', async () => {
    const engine = new OntologyQueryEngine(datasetOf(
      typed('k1', SKOS.Concept),
      typed('k2', SKOS.Concept),
      typed('k3', SKOS.Concept),
      quad(ex('k1'), namedNode(RDFS.label), literal('b')),
      quad(ex('k3'), namedNode(RDFS.label), literal('a')),
    ));

    const result = await engine.select(
      'SELECT ?c WHERE { ?c a skos:Concept OPTIONAL { ?c rdfs:label ?l } } ORDER BY ?l',
      context,
    );

    expect(result.rows.map((row) => row.c.value.slice(-2))).toEqual([ 'k2', 'k3', 'k1' ]);
  });
});
