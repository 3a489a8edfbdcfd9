/**
 * Property path AST
 *
 * sparqlalgebrajs hands us n-ary `seq`/`alt` nodes; they are folded into this
 * binary grammar once at bind time so the evaluator only deals with one shape.
 */

import type { NamedNode } from '@rdfjs/types';
import { Algebra } from 'sparqlalgebrajs';

import { UnsupportedQueryError } from '../../errors/QueryErrors';
import { formatTerm } from '../../rdf/terms';

export type PropertyPath =
  | { type: 'atomic'; predicate: NamedNode }
  | { type: 'sequence'; first: PropertyPath; rest: PropertyPath }
  | { type: 'alternation'; left: PropertyPath; right: PropertyPath }
  | { type: 'inverse'; path: PropertyPath }
  | { type: 'zeroOrMore'; path: PropertyPath }
  | { type: 'oneOrMore'; path: PropertyPath }
  | { type: 'zeroOrOne'; path: PropertyPath };

export function atomic(predicate: NamedNode): PropertyPath {
  return { type: 'atomic', predicate };
}

export function sequence(first: PropertyPath, rest: PropertyPath): PropertyPath {
  return { type: 'sequence', first, rest };
}

export function alternation(left: PropertyPath, right: PropertyPath): PropertyPath {
  return { type: 'alternation', left, right };
}

export function inverse(path: PropertyPath): PropertyPath {
  return { type: 'inverse', path };
}

export function zeroOrMore(path: PropertyPath): PropertyPath {
  return { type: 'zeroOrMore', path };
}

export function oneOrMore(path: PropertyPath): PropertyPath {
  return { type: 'oneOrMore', path };
}

export function zeroOrOne(path: PropertyPath): PropertyPath {
  return { type: 'zeroOrOne', path };
}

function foldRight(parts: PropertyPath[], join: (left: PropertyPath, right: PropertyPath) => PropertyPath): PropertyPath {
  if (parts.length === 0) {
    throw new UnsupportedQueryError('Empty property path');
  }
  return parts.reduceRight((acc, part) => join(part, acc));
}

export function compilePath(symbol: Algebra.PropertyPathSymbol): PropertyPath {
  switch (symbol.type) {
    case Algebra.types.LINK:
      return atomic(symbol.iri);
    case Algebra.types.SEQ:
      return foldRight(symbol.input.map(compilePath), sequence);
    case Algebra.types.ALT:
      return foldRight(symbol.input.map(compilePath), alternation);
    case Algebra.types.INV:
      return inverse(compilePath(symbol.path));
    case Algebra.types.ZERO_OR_MORE_PATH:
      return zeroOrMore(compilePath(symbol.path));
    case Algebra.types.ONE_OR_MORE_PATH:
      return oneOrMore(compilePath(symbol.path));
    case Algebra.types.ZERO_OR_ONE_PATH:
      return zeroOrOne(compilePath(symbol.path));
    case Algebra.types.NPS:
      throw new UnsupportedQueryError('Negated property sets are not supported');
  }
}

export function formatPath(path: PropertyPath): string {
  switch (path.type) {
    case 'atomic': return formatTerm(path.predicate);
    case 'sequence': return `(${formatPath(path.first)}/${formatPath(path.rest)})`;
    case 'alternation': return `(${formatPath(path.left)}|${formatPath(path.right)})`;
    case 'inverse': return `^${formatPath(path.path)}`;
    case 'zeroOrMore': return `${formatPath(path.path)}*`;
    case 'oneOrMore': return `${formatPath(path.path)}+`;
    case 'zeroOrOne': return `${formatPath(path.path)}?`;
  }
}
