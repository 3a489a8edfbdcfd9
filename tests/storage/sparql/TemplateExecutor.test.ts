import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import { Factory } from 'sparqlalgebrajs';

import type { GroundTerm } from '../../../src/rdf/terms';
import { Dataset } from '../../../src/storage/dataset/Dataset';
import type { Solution } from '../../../src/storage/sparql/Solution';
import { TemplateExecutor } from '../../../src/storage/sparql/TemplateExecutor';
import { SKOS } from '../../../src/vocab/external';
import { EX, ex } from '../../helpers/ontology';

const { namedNode, literal, variable, blankNode, defaultGraph } = DataFactory;
const factory = new Factory();

function solution(entries: [string, GroundTerm][]): Solution {
  return new Map(entries);
}

describe('TemplateExecutor', () => {
  const broader = factory.createPattern(variable('c'), namedNode(SKOS.broader), variable('s'), defaultGraph());

  it('should drop instances with unbound or misplaced terms', () => {
    const executor = new TemplateExecutor();
    const instances = executor.instantiate([ broader ], [
      solution([[ 'c', ex('A') ], [ 's', ex('B') ]]),
      solution([[ 'c', ex('A') ]]),
      solution([[ 'c', literal('A') ], [ 's', ex('B') ]]),
    ]);

    expect(instances.map(({ triple }) => [ triple.subject.value, triple.object.value ])).toEqual([
      [ `${EX}A`, `${EX}B` ],
    ]);
  });

  it('should share blank nodes within a solution only', () => {
    const executor = new TemplateExecutor({ blankNodePrefix: 'skos' });
    const template = [
      factory.createPattern(variable('c'), namedNode(SKOS.note), blankNode('n'), defaultGraph()),
      factory.createPattern(blankNode('n'), namedNode(SKOS.prefLabel), variable('l'), defaultGraph()),
    ];

    const triples = executor.construct(template, [
      solution([[ 'c', ex('A') ], [ 'l', literal('Alpha') ]]),
      solution([[ 'c', ex('B') ], [ 'l', literal('Beta') ]]),
    ]);

    expect(triples).toHaveLength(4);
    expect(triples[1].subject.value).toBe(triples[0].object.value);
    expect(triples[3].subject.value).toBe(triples[2].object.value);
    expect(triples[2].object.value).not.toBe(triples[0].object.value);
    expect(triples[0].object.value).toMatch(/^skos\d+_0$/u);
  });

  it('should deduplicate constructed triples', () => {
    const triples = new TemplateExecutor().construct([ broader ], [
      solution([[ 'c', ex('A') ], [ 's', ex('B') ]]),
      solution([[ 'c', ex('A') ], [ 's', ex('B') ], [ 'x', ex('X') ]]),
    ]);

    expect(triples).toHaveLength(1);
  });

  it('should report new triples per graph', () => {
    const dataset = new Dataset();
    dataset.addTriple(ex('skos'), { subject: ex('A'), predicate: namedNode(SKOS.broader), object: ex('B') });
    const template = [
      broader,
      factory.createPattern(variable('c'), namedNode(SKOS.broader), variable('s'), ex('skos')),
    ];

    const report = new TemplateExecutor().insert(dataset, template, [
      solution([[ 'c', ex('A') ], [ 's', ex('B') ]]),
      solution([[ 'c', ex('B') ], [ 's', ex('C') ]]),
    ]);

    expect(report).toEqual({ inserted: 3, graphs: { '': 2, [`${EX}skos`]: 1 }});
  });

  it('should skip blank node labels the dataset already uses', () => {
    const dataset = new Dataset();
    dataset.addTriple(defaultGraph(), { subject: blankNode('n1_0'), predicate: namedNode(SKOS.prefLabel), object: literal('taken') });
    const executor = new TemplateExecutor({ blankNodePrefix: 'n' });
    const template = [ factory.createPattern(variable('c'), namedNode(SKOS.note), blankNode('x'), defaultGraph()) ];

    const [ instance ] = executor.instantiate(template, [ solution([[ 'c', ex('A') ]]) ], dataset);

    expect(instance.triple.object.value).toBe('n1_1');
  });
});
