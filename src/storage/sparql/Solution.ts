/**
 * Solution mappings: partial functions from variable name to term.
 *
 * Unbound variables are simply absent. Solutions are immutable; every
 * extension returns a new map.
 */

import type { Term } from '@rdfjs/types';

import { termKey, termsEqual, type GroundTerm } from '../../rdf/terms';

export type Solution = ReadonlyMap<string, GroundTerm>;

export const EMPTY_SOLUTION: Solution = new Map();

/**
 * Blank nodes in query patterns behave like variables that are never
 * projected. They share the solution map under a name no SPARQL variable can
 * take.
 */
export function patternVariableName(term: Term): string | undefined {
  if (term.termType === 'Variable') {
    return term.value;
  }
  if (term.termType === 'BlankNode') {
    return `_:${term.value}`;
  }
  return undefined;
}

export function isCompatible(left: Solution, right: Solution): boolean {
  const [ small, large ] = left.size <= right.size ? [ left, right ] : [ right, left ];
  for (const [ name, term ] of small) {
    const other = large.get(name);
    if (other && !termsEqual(term, other)) {
      return false;
    }
  }
  return true;
}

/**
 * Union of two compatible solutions, or `undefined` if they disagree on a
 * shared variable.
 */
export function mergeSolutions(left: Solution, right: Solution): Solution | undefined {
  if (right.size === 0) return left;
  if (left.size === 0) return right;
  if (!isCompatible(left, right)) {
    return undefined;
  }
  const merged = new Map(left);
  for (const [ name, term ] of right) {
    merged.set(name, term);
  }
  return merged;
}

/**
 * Binds `name` to `term`; returns `undefined` when `name` is already bound to
 * a different term.
 */
export function bindVariable(solution: Solution, name: string, term: GroundTerm): Solution | undefined {
  const existing = solution.get(name);
  if (existing) {
    return termsEqual(existing, term) ? solution : undefined;
  }
  const extended = new Map(solution);
  extended.set(name, term);
  return extended;
}

export function projectSolution(solution: Solution, names: readonly string[]): Solution {
  const projected = new Map<string, GroundTerm>();
  for (const name of names) {
    const term = solution.get(name);
    if (term) {
      projected.set(name, term);
    }
  }
  return projected;
}

/**
 * Canonical key; solutions with equal keys bind the same variables to equal
 * terms.
 */
export function solutionKey(solution: Solution, names?: readonly string[]): string {
  const keys = names ?? [ ...solution.keys() ].sort();
  return keys.map((name) => {
    const term = solution.get(name);
    return `${name}\u0001${term ? termKey(term) : ''}`;
  }).join('\u0000');
}

export function dedupeSolutions(solutions: readonly Solution[]): Solution[] {
  const seen = new Set<string>();
  const result: Solution[] = [];
  for (const solution of solutions) {
    const key = solutionKey(solution);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(solution);
    }
  }
  return result;
}

/** Variables bound in every one of the given solutions. */
export function certainVariables(solutions: readonly Solution[]): Set<string> {
  if (solutions.length === 0) {
    return new Set();
  }
  const result = new Set(solutions[0].keys());
  for (const solution of solutions) {
    for (const name of result) {
      if (!solution.has(name)) {
        result.delete(name);
      }
    }
  }
  return result;
}
