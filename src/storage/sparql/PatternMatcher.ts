/**
 * PatternMatcher - evaluates a SPARQL algebra tree into solution sequences
 *
 * Evaluation is seeded: `evaluate(op, context, seed)` returns the solutions
 * of `op` that extend `seed`. Joins use this to push bindings from the left
 * operand into triple and path patterns on the right (bind join); other
 * operands are evaluated independently and hash-joined on their shared,
 * always-bound variables. Output order is deterministic for a fixed dataset.
 */

import type { NamedNode, Term } from '@rdfjs/types';
import { getLoggerFor } from 'global-logger-factory';
import { Algebra } from 'sparqlalgebrajs';

import { UnsupportedQueryError } from '../../errors/QueryErrors';
import {
  dataFactory,
  isGround,
  isIRI,
  stringLiteral,
  termsEqual,
  type GraphName,
  type GroundTerm,
} from '../../rdf/terms';
import type { Dataset } from '../dataset/Dataset';
import type { GraphControlBinding, GraphControlEntry } from '../dataset/GraphControlSource';
import { Aggregator } from './Aggregator';
import type { EvaluationBudget } from './EvaluationBudget';
import { ExpressionEvaluator } from './ExpressionEvaluator';
import { PathEvaluator } from './PathEvaluator';
import { compilePath, type PropertyPath } from './PropertyPath';
import {
  EMPTY_SOLUTION,
  bindVariable,
  certainVariables,
  dedupeSolutions,
  isCompatible,
  mergeSolutions,
  patternVariableName,
  projectSolution,
  solutionKey,
  type Solution,
} from './Solution';

/**
 * Per-query evaluation state. A derived context is created for every
 * `GRAPH` scope; the budget and the graph-control cache are shared.
 */
export interface MatchContext {
  readonly dataset: Dataset;
  readonly graph: GraphName;
  readonly budget: EvaluationBudget;
  readonly paths: PathEvaluator;
  readonly expressions: ExpressionEvaluator;
  readonly aggregator: Aggregator;
  readonly graphControl?: GraphControlBinding;
  readonly controlEntries: () => Promise<GraphControlEntry[]>;
}

export interface MatchContextOptions {
  budget: EvaluationBudget;
  graph?: GraphName;
  graphControl?: GraphControlBinding;
}

type ContextBase = Omit<MatchContext, 'expressions' | 'aggregator'>;

export class PatternMatcher {
  protected readonly logger = getLoggerFor(this);
  private readonly compiledPaths = new WeakMap<Algebra.PropertyPathSymbol, PropertyPath>();

  public createContext(dataset: Dataset, options: MatchContextOptions): MatchContext {
    let control: Promise<GraphControlEntry[]> | undefined;
    const graphControl = options.graphControl;
    return this.bindContext({
      dataset,
      graph: options.graph ?? dataFactory.defaultGraph(),
      budget: options.budget,
      paths: new PathEvaluator(dataset, options.budget),
      graphControl,
      controlEntries: async(): Promise<GraphControlEntry[]> => {
        if (!graphControl) {
          return [];
        }
        control ??= graphControl.source.listControlledGraphs();
        return control;
      },
    });
  }

  public async evaluate(op: Algebra.Operation, context: MatchContext, seed: Solution = EMPTY_SOLUTION): Promise<Solution[]> {
    switch (op.type) {
      case Algebra.types.BGP:
        return this.evaluateBgp(op.patterns, context, seed);
      case Algebra.types.PATTERN:
        return this.evaluateBgp([ op ], context, seed);
      case Algebra.types.PATH:
        return this.evaluatePath(op, context, seed);
      case Algebra.types.JOIN:
        return this.evaluateJoin(op.input, context, seed);
      case Algebra.types.LEFT_JOIN:
        return this.evaluateOptional(op, context, seed);
      case Algebra.types.UNION: {
        const branches = await Promise.all(op.input.map((input) => this.evaluate(input, context, seed)));
        return branches.flat();
      }
      case Algebra.types.MINUS:
        return this.evaluateMinus(op, context, seed);
      case Algebra.types.FILTER:
        return this.evaluateFilter(op, context, seed);
      case Algebra.types.EXTEND:
        return this.evaluateExtend(op, context, seed);
      case Algebra.types.GRAPH:
        return this.evaluateGraph(op, context, seed);
      case Algebra.types.GROUP:
        return context.aggregator.group(op, await this.evaluate(op.input, context, seed));
      case Algebra.types.ORDER_BY:
        return context.aggregator.orderBy(op.expressions, await this.evaluate(op.input, context, seed));
      case Algebra.types.PROJECT:
        return this.evaluateProject(op, context, seed);
      case Algebra.types.DISTINCT:
      case Algebra.types.REDUCED:
        return dedupeSolutions(await this.evaluate(op.input, context, seed));
      case Algebra.types.SLICE: {
        const solutions = await this.evaluate(op.input, context, seed);
        return solutions.slice(op.start, op.length === undefined ? undefined : op.start + op.length);
      }
      case Algebra.types.VALUES:
        return this.evaluateValues(op, seed);
      case Algebra.types.NOP:
        return [ seed ];
      default:
        throw new UnsupportedQueryError(`Cannot evaluate algebra operation '${op.type}'`);
    }
  }

  // ============================================
  // Triple and path patterns
  // ============================================

  private async evaluateBgp(patterns: readonly Algebra.Pattern[], context: MatchContext, seed: Solution): Promise<Solution[]> {
    let solutions: Solution[] = [ seed ];
    for (const pattern of patterns) {
      const next: Solution[] = [];
      for (const solution of solutions) {
        next.push(...await this.matchPattern(pattern, context, solution));
      }
      solutions = next;
      if (solutions.length === 0) {
        break;
      }
    }
    this.logger.debug(`BGP of ${patterns.length} patterns produced ${solutions.length} solutions`);
    return solutions;
  }

  private async matchPattern(pattern: Algebra.Pattern, context: MatchContext, solution: Solution): Promise<Solution[]> {
    const control = context.graphControl;
    if (control && termsEqual(pattern.predicate, control.predicate)) {
      return this.matchControl(pattern, context, solution);
    }

    const subject = resolve(pattern.subject, solution);
    const predicate = resolve(pattern.predicate, solution);
    const object = resolve(pattern.object, solution);
    const results: Solution[] = [];
    for (const graph of this.patternGraphs(pattern.graph, context, solution)) {
      for (const triple of context.dataset.match(graph, { subject, predicate, object })) {
        const pairs: [Term, GroundTerm][] = [
          [ pattern.subject, triple.subject ],
          [ pattern.predicate, triple.predicate ],
          [ pattern.object, triple.object ],
        ];
        if (pattern.graph.termType === 'Variable' && isIRI(graph)) {
          pairs.push([ pattern.graph, graph ]);
        }
        const bound = bindAll(solution, pairs);
        if (bound) {
          results.push(bound);
        }
      }
    }
    return results;
  }

  /**
   * Patterns on the control predicate are answered by the graph-control
   * source: subject is the graph IRI, object the tag as a plain literal.
   */
  private async matchControl(pattern: Algebra.Pattern, context: MatchContext, solution: Solution): Promise<Solution[]> {
    const results: Solution[] = [];
    for (const entry of await context.controlEntries()) {
      const bound = bindAll(solution, [
        [ pattern.subject, entry.graph ],
        [ pattern.object, stringLiteral(entry.tag) ],
      ]);
      if (bound) {
        results.push(bound);
      }
    }
    return results;
  }

  private async evaluatePath(op: Algebra.Path, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const path = this.compile(op.predicate);
    const subject = resolve(op.subject, seed);
    const object = resolve(op.object, seed);
    const start = isGround(subject) ? subject : undefined;
    const end = isGround(object) ? object : undefined;
    if ((subject && !start) || (object && !end)) {
      return [];
    }
    const results: Solution[] = [];
    for (const graph of this.patternGraphs(op.graph, context, seed)) {
      for (const match of context.paths.evaluate(path, graph, start, end)) {
        const pairs: [Term, GroundTerm][] = [
          [ op.subject, match.subject ],
          [ op.object, match.object ],
        ];
        if (op.graph.termType === 'Variable' && isIRI(graph)) {
          pairs.push([ op.graph, graph ]);
        }
        const bound = bindAll(seed, pairs);
        if (bound) {
          results.push(bound);
        }
      }
    }
    return results;
  }

  /**
   * Graphs a pattern reads. Updates are translated with the `GRAPH` scope
   * pushed into each pattern; the default graph stands for the current scope.
   */
  private patternGraphs(graph: Term, context: MatchContext, solution: Solution): GraphName[] {
    return graph.termType === 'DefaultGraph' ? [ context.graph ] : this.namedGraphs(graph, context, solution);
  }

  /**
   * A constant IRI that is not a graph of the dataset yields nothing; a
   * variable ranges over the named graphs in registration order.
   */
  private namedGraphs(name: Term, context: MatchContext, solution: Solution): NamedNode[] {
    if (isIRI(name)) {
      if (!context.dataset.hasGraph(name)) {
        this.logger.debug(`GRAPH ${name.value} is not in the dataset`);
        return [];
      }
      return [ name ];
    }
    if (name.termType !== 'Variable') {
      return [];
    }
    const bound = solution.get(name.value);
    if (bound) {
      return isIRI(bound) && context.dataset.hasGraph(bound) ? [ bound ] : [];
    }
    return context.dataset.listGraphs();
  }

  private compile(symbol: Algebra.PropertyPathSymbol): PropertyPath {
    let path = this.compiledPaths.get(symbol);
    if (!path) {
      path = compilePath(symbol);
      this.compiledPaths.set(symbol, path);
    }
    return path;
  }

  // ============================================
  // Combinators
  // ============================================

  private async evaluateJoin(inputs: readonly Algebra.Operation[], context: MatchContext, seed: Solution): Promise<Solution[]> {
    if (inputs.length === 0) {
      return [ seed ];
    }
    const [ first, ...rest ] = inputs;
    // Operands that cannot take bindings from the left are independent; run them together
    const independent = await Promise.all(rest.map(async(input) =>
      isBindJoinable(input) ? undefined : this.evaluate(input, context, seed)));

    let solutions = await this.evaluate(first, context, seed);
    for (const [ index, input ] of rest.entries()) {
      const right = independent[index];
      if (right) {
        solutions = hashJoin(solutions, right);
      } else {
        const next: Solution[] = [];
        for (const solution of solutions) {
          next.push(...await this.evaluate(input, context, solution));
        }
        solutions = next;
      }
      if (solutions.length === 0) {
        break;
      }
    }
    return solutions;
  }

  /**
   * OPTIONAL: every left solution survives; it is extended by each compatible
   * right solution that passes the optional filter, or kept unchanged when
   * none does.
   */
  private async evaluateOptional(op: Algebra.LeftJoin, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const [ leftOp, rightOp ] = op.input;
    const left = await this.evaluate(leftOp, context, seed);
    const shared = isBindJoinable(rightOp) ? undefined : await this.evaluate(rightOp, context, seed);
    const results: Solution[] = [];
    for (const solution of left) {
      let candidates: Solution[];
      if (shared) {
        candidates = [];
        for (const right of shared) {
          const merged = mergeSolutions(solution, right);
          if (merged) candidates.push(merged);
        }
      } else {
        candidates = await this.evaluate(rightOp, context, solution);
      }
      const extensions: Solution[] = [];
      for (const candidate of candidates) {
        if (!op.expression || await context.expressions.test(op.expression, candidate)) {
          extensions.push(candidate);
        }
      }
      results.push(...extensions.length > 0 ? extensions : [ solution ]);
    }
    return results;
  }

  private async evaluateMinus(op: Algebra.Minus, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const [ leftOp, rightOp ] = op.input;
    const [ left, right ] = await Promise.all([
      this.evaluate(leftOp, context, seed),
      this.evaluate(rightOp, context, EMPTY_SOLUTION),
    ]);
    return left.filter((solution) => !right.some((other) =>
      [ ...other.keys() ].some((name) => solution.has(name)) && isCompatible(solution, other)));
  }

  private async evaluateFilter(op: Algebra.Filter, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const input = await this.evaluate(op.input, context, seed);
    const results: Solution[] = [];
    for (const solution of input) {
      if (await context.expressions.test(op.expression, solution)) {
        results.push(solution);
      }
    }
    return results;
  }

  /**
   * BIND: an expression error leaves the variable unbound.
   */
  private async evaluateExtend(op: Algebra.Extend, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const input = await this.evaluate(op.input, context, seed);
    const results: Solution[] = [];
    for (const solution of input) {
      const value = await context.expressions.tryEvaluate(op.expression, solution);
      const extended = value ? bindVariable(solution, op.variable.value, value) : solution;
      if (extended) {
        results.push(extended);
      }
    }
    return results;
  }

  /**
   * GRAPH scoping over the graphs {@link namedGraphs} selects.
   */
  private async evaluateGraph(op: Algebra.Graph, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const name = op.name;
    const perGraph = await Promise.all(this.namedGraphs(name, context, seed).map(async(graph) => {
      const solutions = await this.evaluate(op.input, this.withGraph(context, graph), seed);
      if (name.termType !== 'Variable') {
        return solutions;
      }
      const results: Solution[] = [];
      for (const solution of solutions) {
        const extended = bindVariable(solution, name.value, graph);
        if (extended) results.push(extended);
      }
      return results;
    }));
    return perGraph.flat();
  }

  private async evaluateProject(op: Algebra.Project, context: MatchContext, seed: Solution): Promise<Solution[]> {
    const names = op.variables.map((variable) => variable.value);
    const solutions = await this.evaluate(op.input, context, seed);
    const results: Solution[] = [];
    for (const solution of solutions) {
      const merged = mergeSolutions(projectSolution(solution, names), seed);
      if (merged) results.push(merged);
    }
    return results;
  }

  private evaluateValues(op: Algebra.Values, seed: Solution): Solution[] {
    const results: Solution[] = [];
    for (const row of op.bindings) {
      let solution: Solution | undefined = seed;
      for (const [ key, term ] of Object.entries(row)) {
        if (!solution) break;
        solution = bindVariable(solution, key.startsWith('?') ? key.slice(1) : key, term);
      }
      if (solution) results.push(solution);
    }
    return results;
  }

  // ============================================
  // Contexts
  // ============================================

  private withGraph(context: MatchContext, graph: GraphName): MatchContext {
    return this.bindContext({ ...context, graph });
  }

  private bindContext(base: ContextBase): MatchContext {
    const expressions = new ExpressionEvaluator((input, solution) => this.exists(input, solution, context));
    const context: MatchContext = { ...base, expressions, aggregator: new Aggregator(expressions) };
    return context;
  }

  private async exists(input: Algebra.Operation, solution: Solution, context: MatchContext): Promise<boolean> {
    context.budget.tick();
    const solutions = await this.evaluate(input, context, solution);
    return solutions.length > 0;
  }
}

function isBindJoinable(op: Algebra.Operation): boolean {
  return op.type === Algebra.types.BGP || op.type === Algebra.types.PATTERN || op.type === Algebra.types.PATH;
}

/**
 * Substitutes bound variables; unbound variables and blank nodes become
 * wildcards (`null`).
 */
function resolve(term: Term, solution: Solution): Term | null {
  const name = patternVariableName(term);
  if (name === undefined) {
    return term;
  }
  return solution.get(name) ?? null;
}

/**
 * Extends `solution` with `pattern term -> value` pairs. Constant pattern
 * terms must equal their value; a variable seen twice must get the same value.
 */
function bindAll(solution: Solution, pairs: readonly [Term, GroundTerm][]): Solution | undefined {
  let result: Solution | undefined = solution;
  for (const [ pattern, value ] of pairs) {
    if (!result) {
      return undefined;
    }
    const name = patternVariableName(pattern);
    if (name === undefined) {
      if (!termsEqual(pattern, value)) return undefined;
    } else {
      result = bindVariable(result, name, value);
    }
  }
  return result;
}

/**
 * Joins two solution sequences on the variables bound in every solution of
 * both; remaining shared variables are checked per pair. Left-major order.
 */
export function hashJoin(left: readonly Solution[], right: readonly Solution[]): Solution[] {
  const rightCertain = certainVariables(right);
  const keys = [ ...certainVariables(left) ].filter((name) => rightCertain.has(name)).sort();
  const buckets = new Map<string, Solution[]>();
  for (const solution of right) {
    const key = solutionKey(solution, keys);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(solution);
    } else {
      buckets.set(key, [ solution ]);
    }
  }
  const results: Solution[] = [];
  for (const solution of left) {
    for (const candidate of buckets.get(solutionKey(solution, keys)) ?? []) {
      const merged = mergeSolutions(solution, candidate);
      if (merged) results.push(merged);
    }
  }
  return results;
}
