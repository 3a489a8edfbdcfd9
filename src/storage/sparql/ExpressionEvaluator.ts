/**
 * ExpressionEvaluator - SPARQL expression evaluation against one solution
 *
 * Evaluates FILTER, BIND, GROUP BY and ORDER BY expressions. Any type error
 * surfaces as an {@link ExpressionError}; callers decide what it means
 * (FILTER drops the solution, BIND leaves the variable unbound).
 */

import type { Literal, Term } from '@rdfjs/types';
import { Algebra } from 'sparqlalgebrajs';

import { ExpressionError } from '../../errors/QueryErrors';
import {
  NUMERIC_TYPES,
  XSD_BOOLEAN,
  XSD_DECIMAL,
  XSD_DOUBLE,
  XSD_INTEGER,
  XSD_STRING,
  booleanLiteral,
  compareTerms,
  dataFactory,
  integerLiteral,
  isBlankNode,
  isIRI,
  isLiteral,
  isNumericLiteral,
  isStringLiteral,
  numericValue,
  termsEqual,
  type GroundTerm,
} from '../../rdf/terms';
import { patternVariableName, type Solution } from './Solution';

/**
 * Callback evaluating an EXISTS sub-pattern under the bindings of `solution`.
 */
export type ExistsFn = (input: Algebra.Operation, solution: Solution) => Promise<boolean>;

/** Operators and functions the evaluator implements, lower-cased. */
export const SUPPORTED_OPERATORS = new Set([
  '&&', '||', '!', '=', '!=', '<', '>', '<=', '>=', '+', '-', '*', '/', 'uminus', 'uplus',
  'bound', 'if', 'coalesce', 'in', 'notin', 'sameterm',
  'str', 'lang', 'datatype', 'iri', 'uri', 'concat', 'strlen', 'ucase', 'lcase',
  'strstarts', 'strends', 'contains', 'strbefore', 'strafter', 'replace', 'regex', 'substr',
  'langmatches', 'isiri', 'isuri', 'isblank', 'isliteral', 'isnumeric',
  'abs', 'round', 'floor', 'ceil',
]);

/** XSD constructor functions usable as `xsd:integer(?x)`. */
export const SUPPORTED_CASTS = new Set([ XSD_STRING, XSD_INTEGER, XSD_DECIMAL, XSD_DOUBLE, XSD_BOOLEAN ]);

const INTEGER_TYPES = new Set([ ...NUMERIC_TYPES ].filter((type) =>
  type !== XSD_DECIMAL && type !== XSD_DOUBLE && !type.endsWith('#float')));

export class ExpressionEvaluator {
  public constructor(private readonly exists: ExistsFn) {}

  /**
   * FILTER semantics: true iff the effective boolean value is true.
   * Expression errors count as false; budget and other failures propagate.
   */
  public async test(expr: Algebra.Expression, solution: Solution): Promise<boolean> {
    try {
      return this.effectiveBooleanValue(await this.evaluate(expr, solution));
    } catch (error: unknown) {
      if (error instanceof ExpressionError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * BIND semantics: `undefined` when the expression cannot be computed.
   */
  public async tryEvaluate(expr: Algebra.Expression, solution: Solution): Promise<GroundTerm | undefined> {
    try {
      return await this.evaluate(expr, solution);
    } catch (error: unknown) {
      if (error instanceof ExpressionError) {
        return undefined;
      }
      throw error;
    }
  }

  public async evaluate(expr: Algebra.Expression, solution: Solution): Promise<GroundTerm> {
    switch (expr.expressionType) {
      case Algebra.expressionTypes.TERM:
        return this.evaluateTerm(expr.term, solution);
      case Algebra.expressionTypes.OPERATOR:
        return this.evaluateOperator(expr, solution);
      case Algebra.expressionTypes.EXISTENCE: {
        const exists = await this.exists(expr.input, solution);
        return booleanLiteral(expr.not ? !exists : exists);
      }
      case Algebra.expressionTypes.NAMED:
        return this.evaluateCast(expr, solution);
      default:
        throw new ExpressionError(`Cannot evaluate ${expr.expressionType} expression here`);
    }
  }

  public effectiveBooleanValue(term: GroundTerm): boolean {
    if (isLiteral(term)) {
      if (term.datatype.value === XSD_BOOLEAN) {
        return term.value === 'true' || term.value === '1';
      }
      if (isNumericLiteral(term)) {
        const value = numericValue(term);
        return value !== undefined && value !== 0;
      }
      if (isStringLiteral(term)) {
        return term.value.length > 0;
      }
    }
    throw new ExpressionError(`No effective boolean value for ${term.termType} ${term.value}`);
  }

  // ============================================================
  // Terms
  // ============================================================

  private evaluateTerm(term: Term, solution: Solution): GroundTerm {
    const name = patternVariableName(term);
    if (name !== undefined) {
      const bound = solution.get(name);
      if (!bound) {
        throw new ExpressionError(`Variable ?${name} is unbound`);
      }
      return bound;
    }
    if (isIRI(term) || isLiteral(term)) {
      return term;
    }
    throw new ExpressionError(`Unexpected ${term.termType} in expression`);
  }

  // ============================================================
  // Operators
  // ============================================================

  private async evaluateOperator(expr: Algebra.OperatorExpression, solution: Solution): Promise<GroundTerm> {
    const op = expr.operator.toLowerCase();
    const args = expr.args;

    // Functional forms that must not evaluate every argument up front
    switch (op) {
      case '&&':
        return booleanLiteral(await this.logicalAnd(args, solution));
      case '||':
        return booleanLiteral(await this.logicalOr(args, solution));
      case '!':
        return booleanLiteral(!this.effectiveBooleanValue(await this.evaluate(args[0], solution)));
      case 'bound': {
        const target = args[0];
        const name = target.expressionType === Algebra.expressionTypes.TERM ?
          patternVariableName(target.term) :
          undefined;
        if (name === undefined) {
          throw new ExpressionError('BOUND expects a variable');
        }
        return booleanLiteral(solution.has(name));
      }
      case 'if': {
        const condition = this.effectiveBooleanValue(await this.evaluate(args[0], solution));
        return this.evaluate(condition ? args[1] : args[2], solution);
      }
      case 'coalesce':
        for (const arg of args) {
          const value = await this.tryEvaluate(arg, solution);
          if (value) {
            return value;
          }
        }
        throw new ExpressionError('COALESCE found no bound argument');
      case 'in':
      case 'notin': {
        const needle = await this.evaluate(args[0], solution);
        let found = false;
        for (const candidate of args.slice(1)) {
          const value = await this.tryEvaluate(candidate, solution);
          if (value && this.equals(needle, value)) {
            found = true;
            break;
          }
        }
        return booleanLiteral(op === 'in' ? found : !found);
      }
    }

    const values = await Promise.all(args.map((arg) => this.evaluate(arg, solution)));
    return this.applyFunction(op, values);
  }

  private async logicalAnd(args: Algebra.Expression[], solution: Solution): Promise<boolean> {
    let failure: ExpressionError | undefined;
    for (const arg of args) {
      try {
        if (!this.effectiveBooleanValue(await this.evaluate(arg, solution))) {
          return false;
        }
      } catch (error: unknown) {
        if (!(error instanceof ExpressionError)) throw error;
        failure = error;
      }
    }
    if (failure) throw failure;
    return true;
  }

  private async logicalOr(args: Algebra.Expression[], solution: Solution): Promise<boolean> {
    let failure: ExpressionError | undefined;
    for (const arg of args) {
      try {
        if (this.effectiveBooleanValue(await this.evaluate(arg, solution))) {
          return true;
        }
      } catch (error: unknown) {
        if (!(error instanceof ExpressionError)) throw error;
        failure = error;
      }
    }
    if (failure) throw failure;
    return false;
  }

  private applyFunction(op: string, values: GroundTerm[]): GroundTerm {
    const [ first, second, third ] = values;
    switch (op) {
      // Comparison
      case '=': return booleanLiteral(this.equals(first, second));
      case '!=': return booleanLiteral(!this.equals(first, second));
      case '<': return booleanLiteral(this.order(first, second) < 0);
      case '>': return booleanLiteral(this.order(first, second) > 0);
      case '<=': return booleanLiteral(this.order(first, second) <= 0);
      case '>=': return booleanLiteral(this.order(first, second) >= 0);
      case 'sameterm': return booleanLiteral(termsEqual(first, second));

      // Arithmetic
      case '+':
      case '-':
      case '*':
      case '/':
        return this.arithmetic(op, first, second);
      case 'uminus': return this.numeric(-this.number(first), this.numericType([ first ]));
      case 'uplus': return this.numeric(this.number(first), this.numericType([ first ]));
      case 'abs': return this.numeric(Math.abs(this.number(first)), this.numericType([ first ]));
      case 'round': return this.numeric(Math.round(this.number(first)), this.numericType([ first ]));
      case 'floor': return this.numeric(Math.floor(this.number(first)), this.numericType([ first ]));
      case 'ceil': return this.numeric(Math.ceil(this.number(first)), this.numericType([ first ]));

      // Term accessors and constructors
      case 'str':
        if (isBlankNode(first)) throw new ExpressionError('STR is undefined for blank nodes');
        return dataFactory.literal(first.value);
      case 'lang':
        return dataFactory.literal(this.literal(first).language);
      case 'datatype':
        return this.literal(first).datatype;
      case 'iri':
      case 'uri':
        if (isIRI(first)) return first;
        return dataFactory.namedNode(this.literal(first).value);

      // Strings
      case 'concat':
        return this.concat(values);
      case 'strlen':
        return integerLiteral([ ...this.string(first) ].length);
      case 'ucase':
        return this.likeLiteral(first, this.string(first).toUpperCase());
      case 'lcase':
        return this.likeLiteral(first, this.string(first).toLowerCase());
      case 'strstarts':
        return booleanLiteral(this.string(first).startsWith(this.string(second)));
      case 'strends':
        return booleanLiteral(this.string(first).endsWith(this.string(second)));
      case 'contains':
        return booleanLiteral(this.string(first).includes(this.string(second)));
      case 'strbefore': {
        const value = this.string(first);
        const index = value.indexOf(this.string(second));
        return index < 0 ? dataFactory.literal('') : this.likeLiteral(first, value.slice(0, index));
      }
      case 'strafter': {
        const value = this.string(first);
        const separator = this.string(second);
        const index = value.indexOf(separator);
        return index < 0 ? dataFactory.literal('') : this.likeLiteral(first, value.slice(index + separator.length));
      }
      case 'substr': {
        const chars = [ ...this.string(first) ];
        const start = Math.round(this.number(second)) - 1;
        const end = third ? start + Math.round(this.number(third)) : chars.length;
        return this.likeLiteral(first, chars.slice(Math.max(start, 0), Math.max(end, 0)).join(''));
      }
      case 'regex':
        return booleanLiteral(this.regex(this.string(second), third ? this.string(third) : '').test(this.string(first)));
      case 'replace': {
        const [ , , , flags ] = values;
        const pattern = this.regex(this.string(second), `${flags ? this.string(flags) : ''}g`);
        return this.likeLiteral(first, this.string(first).replace(pattern, this.string(third)));
      }
      case 'langmatches': {
        const tag = this.string(first).toLowerCase();
        const range = this.string(second).toLowerCase();
        if (range === '*') return booleanLiteral(tag.length > 0);
        return booleanLiteral(tag === range || tag.startsWith(`${range}-`));
      }

      // Type tests
      case 'isiri':
      case 'isuri':
        return booleanLiteral(isIRI(first));
      case 'isblank':
        return booleanLiteral(isBlankNode(first));
      case 'isliteral':
        return booleanLiteral(isLiteral(first));
      case 'isnumeric':
        return booleanLiteral(isNumericLiteral(first));
    }
    throw new ExpressionError(`Unsupported function ${op}`);
  }

  private async evaluateCast(expr: Algebra.NamedExpression, solution: Solution): Promise<GroundTerm> {
    const value = await this.evaluate(expr.args[0], solution);
    const target = expr.name.value;
    if (isBlankNode(value)) {
      throw new ExpressionError('Cannot cast a blank node');
    }
    switch (target) {
      case XSD_STRING:
        return dataFactory.literal(value.value);
      case XSD_BOOLEAN: {
        const lexical = value.value.trim();
        if (isNumericLiteral(value)) return booleanLiteral(this.number(value) !== 0);
        if (lexical === 'true' || lexical === '1') return booleanLiteral(true);
        if (lexical === 'false' || lexical === '0') return booleanLiteral(false);
        throw new ExpressionError(`Cannot cast '${value.value}' to xsd:boolean`);
      }
      case XSD_INTEGER:
      case XSD_DECIMAL:
      case XSD_DOUBLE: {
        if (isIRI(value)) throw new ExpressionError('Cannot cast an IRI to a number');
        const parsed = value.datatype.value === XSD_BOOLEAN ?
          (value.value === 'true' ? 1 : 0) :
          Number(value.value.trim());
        if (value.value.trim() === '' || Number.isNaN(parsed)) {
          throw new ExpressionError(`Cannot cast '${value.value}' to a number`);
        }
        return target === XSD_INTEGER ?
          integerLiteral(parsed) :
          dataFactory.literal(parsed.toString(), dataFactory.namedNode(target));
      }
    }
    throw new ExpressionError(`Unsupported cast to ${target}`);
  }

  // ============================================================
  // Helpers
  // ============================================================

  private equals(left: GroundTerm, right: GroundTerm): boolean {
    if (isNumericLiteral(left) && isNumericLiteral(right)) {
      return this.number(left) === this.number(right);
    }
    return termsEqual(left, right);
  }

  /**
   * Ordering for `<`, `>`, `<=`, `>=`: numbers by value, literals of the same
   * datatype by lexical form. Anything else is a type error.
   */
  private order(left: GroundTerm, right: GroundTerm): number {
    if (isNumericLiteral(left) && isNumericLiteral(right)) {
      return compareTerms(left, right);
    }
    if (isLiteral(left) && isLiteral(right) &&
      (left.datatype.value === right.datatype.value || (isStringLiteral(left) && isStringLiteral(right)))) {
      if (left.value === right.value) return 0;
      return left.value < right.value ? -1 : 1;
    }
    throw new ExpressionError(`Cannot order ${left.termType} and ${right.termType}`);
  }

  private arithmetic(op: string, left: GroundTerm, right: GroundTerm): Literal {
    const l = this.number(left);
    const r = this.number(right);
    let type = this.numericType([ left, right ]);
    switch (op) {
      case '+': return this.numeric(l + r, type);
      case '-': return this.numeric(l - r, type);
      case '*': return this.numeric(l * r, type);
    }
    if (r === 0) {
      throw new ExpressionError('Division by zero');
    }
    if (type === XSD_INTEGER) {
      type = XSD_DECIMAL;
    }
    return this.numeric(l / r, type);
  }

  private numericType(terms: GroundTerm[]): string {
    const types = terms.map((term) => (isLiteral(term) ? term.datatype.value : ''));
    if (types.some((type) => type === XSD_DOUBLE || type.endsWith('#float'))) return XSD_DOUBLE;
    if (types.every((type) => INTEGER_TYPES.has(type))) return XSD_INTEGER;
    return XSD_DECIMAL;
  }

  private numeric(value: number, type: string): Literal {
    if (!Number.isFinite(value)) {
      throw new ExpressionError('Numeric result out of range');
    }
    return type === XSD_INTEGER ?
      integerLiteral(value) :
      dataFactory.literal(value.toString(), dataFactory.namedNode(type));
  }

  private number(term: GroundTerm | undefined): number {
    const value = numericValue(term);
    if (value === undefined) {
      throw new ExpressionError(`Expected a numeric literal, got ${term ? term.value : 'nothing'}`);
    }
    return value;
  }

  private literal(term: GroundTerm | undefined): Literal {
    if (!isLiteral(term)) {
      throw new ExpressionError(`Expected a literal, got ${term ? term.termType : 'nothing'}`);
    }
    return term;
  }

  /** Lexical form of a literal or IRI; blank nodes have none. */
  private string(term: GroundTerm | undefined): string {
    if (!term || isBlankNode(term)) {
      throw new ExpressionError('Expected a term with a string form');
    }
    return term.value;
  }

  private likeLiteral(source: GroundTerm, value: string): Literal {
    if (isLiteral(source) && source.language) {
      return dataFactory.literal(value, source.language);
    }
    return dataFactory.literal(value);
  }

  private concat(values: GroundTerm[]): Literal {
    const literals = values.map((value) => this.literal(value));
    const languages = new Set(literals.map((literal) => literal.language));
    const text = literals.map((literal) => literal.value).join('');
    const [ language ] = languages;
    if (languages.size === 1 && language) {
      return dataFactory.literal(text, language);
    }
    return dataFactory.literal(text);
  }

  /**
   * XPath flags: `x` drops whitespace outside character classes, `q` matches
   * the pattern literally. The rest pass to RegExp.
   */
  private regex(pattern: string, flags: string): RegExp {
    let source = pattern;
    if (flags.includes('q')) {
      source = source.replace(/[.*+?^${}()|[\]\\]/gu, '\\$&');
    } else if (flags.includes('x')) {
      source = stripExtendedSyntax(source);
    }
    const jsFlags = flags.replace(/[qx]/gu, '');
    try {
      return new RegExp(source, jsFlags);
    } catch {
      throw new ExpressionError(`Invalid regular expression /${pattern}/${flags}`);
    }
  }
}

function stripExtendedSyntax(pattern: string): string {
  let result = '';
  let inClass = false;
  for (let index = 0; index < pattern.length; index++) {
    const char = pattern[index];
    if (char === '\\') {
      result += pattern.slice(index, index + 2);
      index++;
    } else if (inClass) {
      result += char;
      inClass = char !== ']';
    } else if (char === '[') {
      result += char;
      inClass = true;
    } else if (!/\s/u.test(char)) {
      result += char;
    }
  }
  return result;
}
