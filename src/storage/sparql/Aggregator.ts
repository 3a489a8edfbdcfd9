/**
 * Aggregator - GROUP BY / aggregate functions and ORDER BY
 */

import type { Literal } from '@rdfjs/types';
import { Algebra } from 'sparqlalgebrajs';

import {
  XSD_DECIMAL,
  XSD_DOUBLE,
  XSD_INTEGER,
  compareTerms,
  dataFactory,
  decimalLiteral,
  integerLiteral,
  isNumericLiteral,
  numericValue,
  stringLiteral,
  termKey,
  type GroundTerm,
} from '../../rdf/terms';
import { unwrapOrder } from './AlgebraUtils';
import type { ExpressionEvaluator } from './ExpressionEvaluator';
import { EMPTY_SOLUTION, dedupeSolutions, projectSolution, solutionKey, type Solution } from './Solution';

interface SolutionGroup {
  key: Solution;
  members: Solution[];
}

interface OrderKey {
  expression: Algebra.Expression;
  descending: boolean;
}

export class Aggregator {
  public constructor(private readonly expressions: ExpressionEvaluator) {}

  /**
   * Partitions `input` by the grouping variables (groups keep first-seen
   * order) and computes one row per group. Without grouping variables an
   * empty input still yields one group, so `COUNT(*)` gives 0.
   */
  public async group(op: Algebra.Group, input: readonly Solution[]): Promise<Solution[]> {
    const names = op.variables.map((variable) => variable.value);
    const groups = new Map<string, SolutionGroup>();
    for (const solution of input) {
      const key = projectSolution(solution, names);
      const id = solutionKey(key, names);
      let group = groups.get(id);
      if (!group) {
        group = { key, members: []};
        groups.set(id, group);
      }
      group.members.push(solution);
    }
    if (groups.size === 0 && names.length === 0) {
      groups.set('', { key: EMPTY_SOLUTION, members: []});
    }

    const rows: Solution[] = [];
    for (const { key, members } of groups.values()) {
      const row = new Map(key);
      for (const aggregate of op.aggregates) {
        const value = await this.aggregate(aggregate, members);
        if (value) {
          row.set(aggregate.variable.value, value);
        }
      }
      rows.push(row);
    }
    return rows;
  }

  /**
   * Stable sort by the given keys; `DESC(expr)` reverses one key. Keys that
   * fail to evaluate sort as unbound, before everything else.
   */
  public async orderBy(expressions: readonly Algebra.Expression[], input: readonly Solution[]): Promise<Solution[]> {
    const keys = expressions.map((expression) => this.orderKey(expression));
    const decorated: { solution: Solution; values: (GroundTerm | undefined)[] }[] = [];
    for (const solution of input) {
      const values: (GroundTerm | undefined)[] = [];
      for (const key of keys) {
        values.push(await this.expressions.tryEvaluate(key.expression, solution));
      }
      decorated.push({ solution, values });
    }
    decorated.sort((left, right) => {
      for (const [ index, key ] of keys.entries()) {
        const order = compareTerms(left.values[index], right.values[index]);
        if (order !== 0) {
          return key.descending ? -order : order;
        }
      }
      return 0;
    });
    return decorated.map(({ solution }) => solution);
  }

  private orderKey(expression: Algebra.Expression): OrderKey {
    const descending = expression.expressionType === Algebra.expressionTypes.OPERATOR &&
      expression.operator.toLowerCase() === 'desc';
    return { expression: unwrapOrder(expression), descending };
  }

  private async aggregate(aggregate: Algebra.BoundAggregate, members: readonly Solution[]): Promise<GroundTerm | undefined> {
    if (aggregate.expression.expressionType === Algebra.expressionTypes.WILDCARD) {
      const rows = aggregate.distinct ? dedupeSolutions(members) : members;
      return integerLiteral(rows.length);
    }

    let values: GroundTerm[] = [];
    for (const member of members) {
      const value = await this.expressions.tryEvaluate(aggregate.expression, member);
      if (value) {
        values.push(value);
      }
    }
    if (aggregate.distinct) {
      const seen = new Set<string>();
      values = values.filter((value) => {
        const key = termKey(value);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }

    switch (aggregate.aggregator) {
      case 'count':
        return integerLiteral(values.length);
      case 'sum':
        return sum(values);
      case 'avg': {
        if (values.length === 0) {
          return integerLiteral(0);
        }
        const total = sum(values);
        const amount = numericValue(total);
        return amount === undefined ? undefined : decimalLiteral(amount / values.length);
      }
      case 'min':
        return [ ...values ].sort(compareTerms)[0];
      case 'max':
        return [ ...values ].sort(compareTerms).at(-1);
      case 'sample':
        return values[0];
      case 'group_concat': {
        const separator = 'separator' in aggregate && typeof aggregate.separator === 'string' ? aggregate.separator : ' ';
        return stringLiteral(values.map((value) => value.value).join(separator));
      }
      default:
        return undefined;
    }
  }
}

/**
 * Numeric sum; `undefined` as soon as one value is not numeric. The result
 * keeps xsd:integer when every operand is an integer.
 */
function sum(values: readonly GroundTerm[]): Literal | undefined {
  let total = 0;
  let datatype = XSD_INTEGER;
  for (const value of values) {
    const amount = numericValue(value);
    if (amount === undefined || !isNumericLiteral(value)) {
      return undefined;
    }
    total += amount;
    if (value.datatype.value === XSD_DOUBLE) {
      datatype = XSD_DOUBLE;
    } else if (value.datatype.value === XSD_DECIMAL && datatype === XSD_INTEGER) {
      datatype = XSD_DECIMAL;
    }
  }
  if (datatype === XSD_INTEGER) {
    return integerLiteral(total);
  }
  return dataFactory.literal(String(total), dataFactory.namedNode(datatype));
}
