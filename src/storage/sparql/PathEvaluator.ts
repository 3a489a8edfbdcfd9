/**
 * PathEvaluator - property path traversal over one graph
 *
 * One traversal function handles every path variant, parameterised by
 * direction. Closures (`*`, `+`) run a breadth-first search where each node
 * is expanded at most once, so cyclic graphs terminate and every reachable
 * node is reported exactly once. Every edge followed is charged to the
 * evaluation budget.
 */

import type { NamedNode } from '@rdfjs/types';
import { getLoggerFor } from 'global-logger-factory';

import { isSubjectTerm, termKey, type GraphName, type GroundTerm } from '../../rdf/terms';
import type { Dataset } from '../dataset/Dataset';
import type { EvaluationBudget } from './EvaluationBudget';
import { formatPath, type PropertyPath } from './PropertyPath';

export type PathDirection = 'forward' | 'backward';

export interface PathMatch {
  subject: GroundTerm;
  object: GroundTerm;
}

/**
 * Insertion-ordered set of terms keyed by term identity.
 */
class TermSet {
  private readonly items = new Map<string, GroundTerm>();

  public add(term: GroundTerm): boolean {
    const key = termKey(term);
    if (this.items.has(key)) {
      return false;
    }
    this.items.set(key, term);
    return true;
  }

  public addAll(terms: Iterable<GroundTerm>): void {
    for (const term of terms) {
      this.add(term);
    }
  }

  public values(): GroundTerm[] {
    return [ ...this.items.values() ];
  }
}

function flip(direction: PathDirection): PathDirection {
  return direction === 'forward' ? 'backward' : 'forward';
}

export class PathEvaluator {
  protected readonly logger = getLoggerFor(this);

  public constructor(
    private readonly dataset: Dataset,
    private readonly budget: EvaluationBudget,
  ) {}

  /**
   * Every (subject, object) pair connected by `path` in `graph`. Either end
   * may be fixed; with both ends open all valid start terms are enumerated.
   */
  public evaluate(path: PropertyPath, graph: GraphName, subject?: GroundTerm, object?: GroundTerm): PathMatch[] {
    const matches: PathMatch[] = [];
    if (subject) {
      for (const end of this.reachable(path, subject, graph, 'forward')) {
        if (!object || termKey(object) === termKey(end)) {
          matches.push({ subject, object: end });
        }
      }
    } else if (object) {
      for (const start of this.reachable(path, object, graph, 'backward')) {
        matches.push({ subject: start, object });
      }
    } else {
      for (const start of this.startTerms(path, graph, 'forward')) {
        for (const end of this.reachable(path, start, graph, 'forward')) {
          matches.push({ subject: start, object: end });
        }
      }
    }
    this.logger.debug(`Path ${formatPath(path)} produced ${matches.length} matches`);
    return matches;
  }

  /**
   * Terms reachable from `start` by following `path` in the given direction.
   */
  public reachable(path: PropertyPath, start: GroundTerm, graph: GraphName, direction: PathDirection): GroundTerm[] {
    switch (path.type) {
      case 'atomic':
        return this.followEdges(path.predicate, start, graph, direction);
      case 'inverse':
        return this.reachable(path.path, start, graph, flip(direction));
      case 'sequence': {
        const [ head, tail ] = direction === 'forward' ? [ path.first, path.rest ] : [ path.rest, path.first ];
        const result = new TermSet();
        for (const middle of this.reachable(head, start, graph, direction)) {
          result.addAll(this.reachable(tail, middle, graph, direction));
        }
        return result.values();
      }
      case 'alternation': {
        const result = new TermSet();
        result.addAll(this.reachable(path.left, start, graph, direction));
        result.addAll(this.reachable(path.right, start, graph, direction));
        return result.values();
      }
      case 'zeroOrMore':
        return this.closure(path.path, start, graph, direction, true);
      case 'oneOrMore':
        return this.closure(path.path, start, graph, direction, false);
      case 'zeroOrOne': {
        const result = new TermSet();
        result.add(start);
        result.addAll(this.reachable(path.path, start, graph, direction));
        return result.values();
      }
    }
  }

  private followEdges(predicate: NamedNode, node: GroundTerm, graph: GraphName, direction: PathDirection): GroundTerm[] {
    const result = new TermSet();
    if (direction === 'forward') {
      if (!isSubjectTerm(node)) {
        return [];
      }
      for (const triple of this.dataset.match(graph, { subject: node, predicate })) {
        this.budget.tick();
        result.add(triple.object);
      }
    } else {
      for (const triple of this.dataset.match(graph, { predicate, object: node })) {
        this.budget.tick();
        result.add(triple.subject);
      }
    }
    return result.values();
  }

  private closure(
    inner: PropertyPath,
    start: GroundTerm,
    graph: GraphName,
    direction: PathDirection,
    includeStart: boolean,
  ): GroundTerm[] {
    const result = new TermSet();
    const visited = new TermSet();
    if (includeStart) {
      result.add(start);
    }
    visited.add(start);
    const queue: GroundTerm[] = [ start ];
    for (let index = 0; index < queue.length; index++) {
      for (const next of this.reachable(inner, queue[index], graph, direction)) {
        result.add(next);
        if (visited.add(next)) {
          queue.push(next);
        }
      }
    }
    return result.values();
  }

  /**
   * Candidate start terms when neither end of the path is fixed: the terms
   * that can take the first step, or every node of the graph when the path
   * admits zero steps.
   */
  private startTerms(path: PropertyPath, graph: GraphName, direction: PathDirection): GroundTerm[] {
    const result = new TermSet();
    switch (path.type) {
      case 'atomic':
        for (const triple of this.dataset.match(graph, { predicate: path.predicate })) {
          this.budget.tick();
          result.add(direction === 'forward' ? triple.subject : triple.object);
        }
        break;
      case 'inverse':
        result.addAll(this.startTerms(path.path, graph, flip(direction)));
        break;
      case 'sequence':
        result.addAll(this.startTerms(direction === 'forward' ? path.first : path.rest, graph, direction));
        break;
      case 'alternation':
        result.addAll(this.startTerms(path.left, graph, direction));
        result.addAll(this.startTerms(path.right, graph, direction));
        break;
      case 'oneOrMore':
        result.addAll(this.startTerms(path.path, graph, direction));
        break;
      case 'zeroOrMore':
      case 'zeroOrOne':
        for (const triple of this.dataset.match(graph)) {
          this.budget.tick();
          result.add(triple.subject);
          result.add(triple.object);
        }
        break;
    }
    return result.values();
  }
}
