import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';

import { InvalidTripleError } from '../../../src/errors/QueryErrors';
import { Dataset } from '../../../src/storage/dataset/Dataset';
import { RDFS } from '../../../src/vocab/external';
import { EX, ex, subClassOf } from '../../helpers/ontology';

const { namedNode, literal, quad, variable } = DataFactory;

describe('Dataset', () => {
  it('should ignore duplicate triples', () => {
    const dataset = new Dataset();
    const triple = { subject: ex('A'), predicate: namedNode(RDFS.label), object: literal('Alpha') };

    expect(dataset.addTriple(Dataset.defaultGraph(), triple)).toBe(true);
    expect(dataset.addTriple(Dataset.defaultGraph(), triple)).toBe(false);
    expect(dataset.size()).toBe(1);
  });

  it('should register named graphs on first insert', () => {
    const dataset = new Dataset([ subClassOf('A', 'B'), subClassOf('B', 'C', 'g1') ]);

    expect(dataset.listGraphs().map((graph) => graph.value)).toEqual([ `${EX}g1` ]);
    expect(dataset.hasGraph(ex('g1'))).toBe(true);
    expect(dataset.hasGraph(ex('g2'))).toBe(false);
    expect(dataset.size(ex('g1'))).toBe(1);
    expect(dataset.size(Dataset.defaultGraph())).toBe(1);
    expect(dataset.size()).toBe(2);
  });

  it('should filter graphs by tag', () => {
    const dataset = new Dataset();
    dataset.createGraph(ex('g1'), [ 'team-a' ]);
    dataset.createGraph(`${EX}g2`, [ 'team-b', 'shared' ]);

    expect(dataset.listGraphs('team-a').map((graph) => graph.value)).toEqual([ `${EX}g1` ]);
    expect(dataset.listGraphs((tags) => tags.includes('shared')).map((graph) => graph.value)).toEqual([ `${EX}g2` ]);
    expect(dataset.tagsOf(ex('g2'))).toEqual([ 'team-b', 'shared' ]);
  });

  it('should match patterns within one graph only', () => {
    const dataset = new Dataset([ subClassOf('A', 'B'), subClassOf('A', 'C'), subClassOf('X', 'Y', 'g1') ]);

    const objects = [ ...dataset.match(Dataset.defaultGraph(), { subject: ex('A') }) ]
      .map((triple) => triple.object.value)
      .sort();
    expect(objects).toEqual([ `${EX}B`, `${EX}C` ]);
    expect([ ...dataset.match(ex('missing')) ]).toEqual([]);
  });

  it('should reject quads that are not valid triples', () => {
    expect(() => new Dataset([ quad(ex('A'), variable('p'), ex('B')) ])).toThrow(InvalidTripleError);
  });

  it('should count only new triples in a batch', () => {
    const dataset = new Dataset([ subClassOf('A', 'B') ]);
    const graph = Dataset.defaultGraph();
    const added = dataset.addAll([
      { graph, triple: { subject: ex('A'), predicate: namedNode(RDFS.subClassOf), object: ex('B') }},
      { graph: ex('g1'), triple: { subject: ex('A'), predicate: namedNode(RDFS.subClassOf), object: ex('B') }},
    ]);

    expect(added).toBe(1);
    expect(dataset.size()).toBe(2);
  });

  it('should keep snapshots independent of later changes', () => {
    const dataset = new Dataset([ subClassOf('A', 'B') ]);
    const snapshot = dataset.snapshot(Dataset.defaultGraph());
    dataset.addTriple(Dataset.defaultGraph(), { subject: ex('B'), predicate: namedNode(RDFS.subClassOf), object: ex('C') });

    expect(snapshot).toHaveLength(1);
    expect(dataset.removeTriple(Dataset.defaultGraph(), snapshot[0])).toBe(true);
    expect(dataset.size()).toBe(1);
  });
});
