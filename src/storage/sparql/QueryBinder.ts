/**
 * QueryBinder - parses query text into algebra and checks it before evaluation
 *
 * All failures here are bind-time: nothing has been evaluated and the
 * dataset is untouched.
 */

import { getLoggerFor } from 'global-logger-factory';
import { Algebra, translate } from 'sparqlalgebrajs';
import { Parser as SparqlParser } from 'sparqljs';

import { QuerySyntaxError, UnknownPrefixError, UnsupportedQueryError, isQueryError } from '../../errors/QueryErrors';
import { PrefixMap } from '../../vocab/PrefixMap';
import { childOperations, findProjection, operationExpressions, walkExpression } from './AlgebraUtils';
import { SUPPORTED_CASTS, SUPPORTED_OPERATORS } from './ExpressionEvaluator';
import { compilePath } from './PropertyPath';

export type QueryForm = 'select' | 'construct' | 'insert' | 'ask';

export type PrefixTable = PrefixMap | Readonly<Record<string, string>>;

export interface BoundQuery {
  form: QueryForm;
  text: string;
  algebra: Algebra.Operation;
  /** Pattern to evaluate; absent for `INSERT DATA`. */
  where?: Algebra.Operation;
  /** CONSTRUCT / INSERT template. */
  template: Algebra.Pattern[];
  /** Projected variable names of a SELECT. */
  variables: string[];
}

const UNKNOWN_PREFIX = /Unknown prefix:\s*([^\s]*)/u;

export class QueryBinder {
  protected readonly logger = getLoggerFor(this);

  public bind(text: string, prefixes: PrefixTable = {}, baseIRI?: string): BoundQuery {
    const algebra = this.parse(text, prefixes instanceof PrefixMap ? prefixes.toRecord() : { ...prefixes }, baseIRI);
    const bound = this.detectForm(text, algebra);
    if (bound.where) {
      this.check(bound.where);
    }
    this.logger.debug(`Bound ${bound.form.toUpperCase()} query`);
    return bound;
  }

  /**
   * Updates only translate in quad mode, where `GRAPH` blocks become the
   * graph of each pattern; queries keep their `GRAPH` operators.
   */
  private parse(text: string, prefixes: Record<string, string>, baseIRI?: string): Algebra.Operation {
    try {
      const parsed = new SparqlParser({ prefixes, baseIRI }).parse(text);
      return translate(parsed, { quads: parsed.type === 'update' });
    } catch (error: unknown) {
      if (isQueryError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      const unknown = UNKNOWN_PREFIX.exec(message);
      if (unknown) {
        throw new UnknownPrefixError(unknown[1].replace(/:$/u, ''));
      }
      throw new QuerySyntaxError(message);
    }
  }

  private detectForm(text: string, algebra: Algebra.Operation): BoundQuery {
    const base = { text, algebra, template: [], variables: []};
    switch (algebra.type) {
      case Algebra.types.CONSTRUCT:
        return { ...base, form: 'construct', where: algebra.input, template: algebra.template };
      case Algebra.types.ASK:
        return { ...base, form: 'ask', where: algebra.input };
      case Algebra.types.DELETE_INSERT:
        if (algebra.delete && algebra.delete.length > 0) {
          throw new UnsupportedQueryError('DELETE templates are not supported');
        }
        return { ...base, form: 'insert', where: algebra.where, template: algebra.insert ?? []};
      case Algebra.types.COMPOSITE_UPDATE:
        throw new UnsupportedQueryError('Only single-statement updates are supported');
      case Algebra.types.DESCRIBE:
        throw new UnsupportedQueryError('DESCRIBE queries are not supported');
      default: {
        const projection = findProjection(algebra);
        if (!projection) {
          throw new UnsupportedQueryError(`Unsupported query form '${algebra.type}'`);
        }
        return {
          ...base,
          form: 'select',
          where: algebra,
          variables: projection.variables.map((variable) => variable.value),
        };
      }
    }
  }

  /**
   * Rejects operations, paths, functions and casts evaluation does not
   * implement.
   */
  private check(op: Algebra.Operation): void {
    if (op.type === Algebra.types.PATH) {
      compilePath(op.predicate);
    }
    for (const expression of operationExpressions(op)) {
      walkExpression(expression, (expr) => this.checkExpression(expr), (input) => this.check(input));
    }
    for (const child of childOperations(op)) {
      this.check(child);
    }
  }

  private checkExpression(expr: Algebra.Expression): void {
    switch (expr.expressionType) {
      case Algebra.expressionTypes.OPERATOR:
        if (!SUPPORTED_OPERATORS.has(expr.operator.toLowerCase())) {
          throw new UnsupportedQueryError(`Unsupported function '${expr.operator}'`);
        }
        break;
      case Algebra.expressionTypes.NAMED:
        if (!SUPPORTED_CASTS.has(expr.name.value)) {
          throw new UnsupportedQueryError(`Unsupported function <${expr.name.value}>`);
        }
        break;
      default:
        break;
    }
  }
}
