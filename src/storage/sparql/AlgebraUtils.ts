/**
 * AlgebraUtils - SPARQL algebra tree traversal utilities
 *
 * Provides helper functions for working with SPARQL algebra trees:
 * - Variable extraction
 * - Child operation / expression enumeration
 * - Locating the projection of a SELECT
 */

import type { Term, Variable } from '@rdfjs/types';
import { Algebra } from 'sparqlalgebrajs';

import { UnsupportedQueryError } from '../../errors/QueryErrors';

/**
 * Extract variable name from an expression
 * Returns the variable name (without ?) if it's a variable, null otherwise
 */
export function extractVariable(expr: Algebra.Expression): string | null {
  if (expr.expressionType === Algebra.expressionTypes.TERM && expr.term.termType === 'Variable') {
    return expr.term.value;
  }
  return null;
}

/**
 * Extract all variables from a pattern
 */
export function extractVariables(pattern: { subject: Term; predicate: Term; object: Term; graph: Term }): Variable[] {
  const vars: Variable[] = [];
  const seen = new Set<string>();

  for (const pos of [ 'subject', 'predicate', 'object', 'graph' ] as const) {
    const term = pattern[pos];
    if (term.termType === 'Variable' && !seen.has(term.value)) {
      seen.add(term.value);
      vars.push(term);
    }
  }

  return vars;
}

/**
 * Direct sub-operations of `op`, in evaluation order. Unknown operation
 * types are rejected so evaluation never meets them.
 */
export function childOperations(op: Algebra.Operation): Algebra.Operation[] {
  switch (op.type) {
    case Algebra.types.BGP:
    case Algebra.types.PATTERN:
    case Algebra.types.PATH:
    case Algebra.types.VALUES:
    case Algebra.types.NOP:
      return [];
    case Algebra.types.JOIN:
    case Algebra.types.UNION:
      return op.input;
    case Algebra.types.LEFT_JOIN:
    case Algebra.types.MINUS:
      return [ ...op.input ];
    case Algebra.types.FILTER:
    case Algebra.types.EXTEND:
    case Algebra.types.GRAPH:
    case Algebra.types.GROUP:
    case Algebra.types.ORDER_BY:
    case Algebra.types.PROJECT:
    case Algebra.types.DISTINCT:
    case Algebra.types.REDUCED:
    case Algebra.types.SLICE:
    case Algebra.types.CONSTRUCT:
    case Algebra.types.ASK:
      return [ op.input ];
    case Algebra.types.SERVICE:
      throw new UnsupportedQueryError('Federated queries (SERVICE) are not supported');
    case Algebra.types.FROM:
      throw new UnsupportedQueryError('Dataset clauses (FROM, USING, WITH) are not supported');
    default:
      throw new UnsupportedQueryError(`Unsupported algebra operation '${op.type}'`);
  }
}

/**
 * Expressions attached directly to `op` (not those of its children).
 */
export function operationExpressions(op: Algebra.Operation): Algebra.Expression[] {
  switch (op.type) {
    case Algebra.types.FILTER:
    case Algebra.types.EXTEND:
      return [ op.expression ];
    case Algebra.types.LEFT_JOIN:
      return op.expression ? [ op.expression ] : [];
    case Algebra.types.ORDER_BY:
      return op.expressions.map(unwrapOrder);
    case Algebra.types.GROUP:
      return op.aggregates.map((aggregate) => aggregate.expression);
    default:
      return [];
  }
}

/**
 * The sort key inside an `ASC(...)` / `DESC(...)` wrapper.
 */
export function unwrapOrder(expr: Algebra.Expression): Algebra.Expression {
  if (expr.expressionType === Algebra.expressionTypes.OPERATOR && isOrderDirection(expr.operator)) {
    return expr.args[0];
  }
  return expr;
}

function isOrderDirection(operator: string): boolean {
  const name = operator.toLowerCase();
  return name === 'asc' || name === 'desc';
}

/**
 * Sub-expressions of `expr`. EXISTS inputs are reported separately through
 * `onOperation`.
 */
export function walkExpression(
  expr: Algebra.Expression,
  onExpression: (expr: Algebra.Expression) => void,
  onOperation: (op: Algebra.Operation) => void,
): void {
  onExpression(expr);
  switch (expr.expressionType) {
    case Algebra.expressionTypes.OPERATOR:
    case Algebra.expressionTypes.NAMED:
      for (const arg of expr.args) {
        walkExpression(arg, onExpression, onOperation);
      }
      break;
    case Algebra.expressionTypes.AGGREGATE:
      walkExpression(expr.expression, onExpression, onOperation);
      break;
    case Algebra.expressionTypes.EXISTENCE:
      onOperation(expr.input);
      break;
    default:
      break;
  }
}

/**
 * Finds the projection of a SELECT through its solution modifiers.
 */
export function findProjection(op: Algebra.Operation): Algebra.Project | undefined {
  switch (op.type) {
    case Algebra.types.PROJECT:
      return op;
    case Algebra.types.SLICE:
    case Algebra.types.DISTINCT:
    case Algebra.types.REDUCED:
    case Algebra.types.ORDER_BY:
      return findProjection(op.input);
    default:
      return undefined;
  }
}
