/**
 * GraphControlSource - external capability listing graphs under team control
 *
 * Some migration queries scope themselves to graphs owned by a team and tagged
 * with a domain model. That ownership metadata is not stored in the dataset;
 * the engine asks this capability for (graph, tag) pairs whenever a pattern
 * uses the configured control predicate, and never interprets the tags itself.
 */

import type { NamedNode } from '@rdfjs/types';

import { dataFactory } from '../../rdf/terms';
import type { Dataset } from './Dataset';

export interface GraphControlEntry {
  graph: NamedNode;
  tag: string;
}

export interface GraphControlSource {
  listControlledGraphs(): Promise<GraphControlEntry[]>;
}

/**
 * Binds a control predicate to the capability answering it.
 */
export interface GraphControlBinding {
  predicate: NamedNode;
  source: GraphControlSource;
}

/**
 * Fixed list of pairs, typically supplied by a platform export.
 */
export class StaticGraphControlSource implements GraphControlSource {
  private readonly entries: GraphControlEntry[];

  public constructor(entries: Iterable<{ graph: string | NamedNode; tag: string }>) {
    this.entries = [ ...entries ].map(({ graph, tag }) => ({
      graph: typeof graph === 'string' ? dataFactory.namedNode(graph) : graph,
      tag,
    }));
  }

  public async listControlledGraphs(): Promise<GraphControlEntry[]> {
    return [ ...this.entries ];
  }
}

/**
 * Answers from the tags attached to the dataset's own named graphs.
 */
export class DatasetGraphControlSource implements GraphControlSource {
  public constructor(private readonly dataset: Dataset) {}

  public async listControlledGraphs(): Promise<GraphControlEntry[]> {
    const entries: GraphControlEntry[] = [];
    for (const graph of this.dataset.listGraphs()) {
      for (const tag of this.dataset.tagsOf(graph)) {
        entries.push({ graph, tag });
      }
    }
    return entries;
  }
}
