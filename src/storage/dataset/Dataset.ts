/**
 * Dataset - default graph plus named graphs, backed by an indexed n3 Store
 *
 * - Set semantics: adding a triple that is already present is a no-op
 * - Named graphs are registered explicitly or on first insert; a graph can
 *   exist without triples and carries optional tags
 * - Lookups against a graph that was never registered yield nothing
 */

import type { NamedNode, Quad, Term } from '@rdfjs/types';
import { getLoggerFor } from 'global-logger-factory';
import { Store } from 'n3';

import {
  dataFactory,
  isGround,
  isIRI,
  isSubjectTerm,
  toTriple,
  type GraphName,
  type Triple,
} from '../../rdf/terms';
import { GraphLocker } from './GraphLocker';

/**
 * Wildcard triple pattern: `undefined`, `null` and variables match anything.
 */
export interface TriplePattern {
  subject?: Term | null;
  predicate?: Term | null;
  object?: Term | null;
}

export type GraphTagFilter = string | ((tags: readonly string[]) => boolean);

export interface GraphTriple {
  graph: GraphName;
  triple: Triple;
}

interface NamedGraphEntry {
  name: NamedNode;
  tags: Set<string>;
}

const DEFAULT_GRAPH = dataFactory.defaultGraph();

export class Dataset {
  protected readonly logger = getLoggerFor(this);
  public readonly locker = new GraphLocker();

  private readonly store = new Store();
  private readonly namedGraphs = new Map<string, NamedGraphEntry>();

  public constructor(quads: Iterable<Quad> = []) {
    for (const quad of quads) {
      const graph = quad.graph;
      if (graph.termType === 'DefaultGraph' || isIRI(graph)) {
        this.addTriple(graph, toTriple(quad));
      }
    }
  }

  public static defaultGraph(): GraphName {
    return DEFAULT_GRAPH;
  }

  // ============================================
  // Graphs
  // ============================================

  public createGraph(name: NamedNode | string, tags: Iterable<string> = []): NamedNode {
    const iri = typeof name === 'string' ? dataFactory.namedNode(name) : name;
    const entry = this.namedGraphs.get(iri.value);
    if (entry) {
      for (const tag of tags) {
        entry.tags.add(tag);
      }
      return entry.name;
    }
    this.namedGraphs.set(iri.value, { name: iri, tags: new Set(tags) });
    return iri;
  }

  public hasGraph(graph: GraphName): boolean {
    return graph.termType === 'DefaultGraph' || this.namedGraphs.has(graph.value);
  }

  /**
   * Named graphs, in registration order, optionally restricted by tag.
   */
  public listGraphs(tagFilter?: GraphTagFilter): NamedNode[] {
    const result: NamedNode[] = [];
    for (const { name, tags } of this.namedGraphs.values()) {
      if (tagFilter === undefined) {
        result.push(name);
      } else if (typeof tagFilter === 'string') {
        if (tags.has(tagFilter)) result.push(name);
      } else if (tagFilter([ ...tags ])) {
        result.push(name);
      }
    }
    return result;
  }

  public tagsOf(graph: NamedNode): string[] {
    return [ ...this.namedGraphs.get(graph.value)?.tags ?? [] ];
  }


  // ============================================
  // Triples
  // ============================================

  /**
   * @returns true if the triple was not present before.
   */
  public addTriple(graph: GraphName, triple: Triple): boolean {
    const checked = toTriple(triple);
    if (graph.termType === 'NamedNode') {
      this.createGraph(graph);
    }
    if (this.has(graph, checked)) {
      return false;
    }
    this.store.addQuad(dataFactory.quad(checked.subject, checked.predicate, checked.object, graph));
    return true;
  }

  /**
   * Adds every entry or none: all triples are validated before the first
   * insert, and no await happens in between, so readers never see a partial
   * batch.
   *
   * @returns number of triples that were actually new.
   */
  public addAll(entries: readonly GraphTriple[]): number {
    const checked = entries.map(({ graph, triple }) => ({ graph, triple: toTriple(triple) }));
    let added = 0;
    for (const { graph, triple } of checked) {
      if (this.addTriple(graph, triple)) {
        added++;
      }
    }
    this.logger.debug(`Committed ${added} of ${entries.length} triples`);
    return added;
  }

  public removeTriple(graph: GraphName, triple: Triple): boolean {
    if (!this.has(graph, triple)) {
      return false;
    }
    this.store.removeQuad(dataFactory.quad(triple.subject, triple.predicate, triple.object, graph));
    return true;
  }

  public has(graph: GraphName, triple: Triple): boolean {
    if (!this.hasGraph(graph)) {
      return false;
    }
    return this.store.countQuads(triple.subject, triple.predicate, triple.object, graph) > 0;
  }

  /** Whether any graph uses the blank node `label` as subject or object. */
  public hasBlankNode(label: string): boolean {
    const node = dataFactory.blankNode(label);
    return this.store.countQuads(node, null, null, null) > 0 || this.store.countQuads(null, null, node, null) > 0;
  }

  /**
   * Triples of `graph` matching the pattern. Unknown graphs match nothing.
   */
  public *match(graph: GraphName, pattern: TriplePattern = {}): IterableIterator<Triple> {
    if (!this.hasGraph(graph)) {
      return;
    }
    const subject = this.position(pattern.subject);
    const predicate = this.position(pattern.predicate);
    const object = this.position(pattern.object);
    for (const quad of this.store.getQuads(subject, predicate, object, graph)) {
      if (isSubjectTerm(quad.subject) && isIRI(quad.predicate) && isGround(quad.object)) {
        yield { subject: quad.subject, predicate: quad.predicate, object: quad.object };
      }
    }
  }

  public triples(graph: GraphName): IterableIterator<Triple> {
    return this.match(graph);
  }

  /** Copy of the graph's current contents. */
  public snapshot(graph: GraphName): Triple[] {
    return [ ...this.match(graph) ];
  }

  public size(graph?: GraphName): number {
    if (graph && !this.hasGraph(graph)) {
      return 0;
    }
    return this.store.countQuads(null, null, null, graph ?? null);
  }

  private position(term: Term | null | undefined): Term | null {
    if (!term || term.termType === 'Variable') {
      return null;
    }
    return term;
  }
}
