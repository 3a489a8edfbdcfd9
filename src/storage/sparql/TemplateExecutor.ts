/**
 * TemplateExecutor - instantiates CONSTRUCT / INSERT templates
 *
 * Each solution fills the template once. Template blank nodes are minted
 * fresh per (solution, label) so two solutions never share one. Template
 * triples that would be ill-formed (unbound variable, literal subject,
 * non-IRI predicate) are dropped for that solution only.
 */

import type { BlankNode, Term } from '@rdfjs/types';
import { getLoggerFor } from 'global-logger-factory';
import type { Algebra } from 'sparqlalgebrajs';

import {
  dataFactory,
  graphKey,
  isGround,
  isIRI,
  isSubjectTerm,
  tripleKey,
  type GraphName,
  type Triple,
} from '../../rdf/terms';
import type { Dataset, GraphTriple } from '../dataset/Dataset';
import type { Solution } from './Solution';

export interface MutationReport {
  /** Triples that were not present before the statement. */
  inserted: number;
  /** New triples per target graph; the default graph is keyed by ''. */
  graphs: Record<string, number>;
}

/**
 * Source of fresh blank nodes for one template execution. Labels already
 * used by the target dataset are skipped.
 */
export class BlankNodeArena {
  private readonly nodes = new Map<string, BlankNode>();
  private next = 0;

  public constructor(
    private readonly prefix: string,
    private readonly isTaken: (label: string) => boolean = () => false,
  ) {}

  public resolve(solutionIndex: number, label: string): BlankNode {
    const key = `${solutionIndex}\u0000${label}`;
    let node = this.nodes.get(key);
    if (!node) {
      node = dataFactory.blankNode(this.mint());
      this.nodes.set(key, node);
    }
    return node;
  }

  private mint(): string {
    let label: string;
    do {
      label = `${this.prefix}${this.next}`;
      this.next++;
    } while (this.isTaken(label));
    return label;
  }
}

export interface TemplateExecutorOptions {
  blankNodePrefix?: string;
}

export class TemplateExecutor {
  protected readonly logger = getLoggerFor(this);

  private executions = 0;

  public constructor(private readonly options: TemplateExecutorOptions = {}) {}

  /**
   * Well-formed template instances in solution order, duplicates included.
   * Minted blank nodes avoid every label `dataset` already holds.
   */
  public instantiate(template: readonly Algebra.Pattern[], solutions: readonly Solution[], dataset?: Dataset): GraphTriple[] {
    this.executions++;
    const arena = new BlankNodeArena(
      `${this.options.blankNodePrefix ?? 'b'}${this.executions}_`,
      dataset ? (label): boolean => dataset.hasBlankNode(label) : undefined,
    );
    const result: GraphTriple[] = [];
    let dropped = 0;
    solutions.forEach((solution, index) => {
      for (const pattern of template) {
        const subject = this.instantiateTerm(pattern.subject, solution, arena, index);
        const predicate = this.instantiateTerm(pattern.predicate, solution, arena, index);
        const object = this.instantiateTerm(pattern.object, solution, arena, index);
        const graph = this.instantiateGraph(pattern.graph, solution);
        if (isSubjectTerm(subject) && isIRI(predicate) && isGround(object) && graph) {
          result.push({ graph, triple: { subject, predicate, object }});
        } else {
          dropped++;
        }
      }
    });
    if (dropped > 0) {
      this.logger.debug(`Dropped ${dropped} template instances with unbound or invalid terms`);
    }
    return result;
  }

  /**
   * CONSTRUCT: the set of instantiated triples, first occurrence first.
   */
  public construct(template: readonly Algebra.Pattern[], solutions: readonly Solution[], dataset?: Dataset): Triple[] {
    const seen = new Set<string>();
    const triples: Triple[] = [];
    for (const { triple } of this.instantiate(template, solutions, dataset)) {
      const key = tripleKey(triple);
      if (!seen.has(key)) {
        seen.add(key);
        triples.push(triple);
      }
    }
    return triples;
  }

  /**
   * INSERT: commits every instance in one synchronous step. Callers hold the
   * dataset write lock.
   */
  public insert(dataset: Dataset, template: readonly Algebra.Pattern[], solutions: readonly Solution[]): MutationReport {
    const byGraph = new Map<string, GraphTriple[]>();
    for (const entry of this.instantiate(template, solutions, dataset)) {
      const key = graphKey(entry.graph);
      const entries = byGraph.get(key);
      if (entries) {
        entries.push(entry);
      } else {
        byGraph.set(key, [ entry ]);
      }
    }

    const report: MutationReport = { inserted: 0, graphs: {}};
    for (const [ key, entries ] of byGraph) {
      const added = dataset.addAll(entries);
      report.graphs[key] = added;
      report.inserted += added;
    }
    return report;
  }

  private instantiateTerm(term: Term, solution: Solution, arena: BlankNodeArena, index: number): Term | undefined {
    switch (term.termType) {
      case 'Variable':
        return solution.get(term.value);
      case 'BlankNode':
        return arena.resolve(index, term.value);
      default:
        return term;
    }
  }

  private instantiateGraph(term: Term, solution: Solution): GraphName | undefined {
    if (term.termType === 'DefaultGraph' || isIRI(term)) {
      return term;
    }
    if (term.termType === 'Variable') {
      const bound = solution.get(term.value);
      return isIRI(bound) ? bound : undefined;
    }
    return undefined;
  }
}
