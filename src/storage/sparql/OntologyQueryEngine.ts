import { getLoggerFor } from 'global-logger-factory';

import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from '../../config/EngineOptions';
import { UnsupportedQueryError } from '../../errors/QueryErrors';
import { logContext } from '../../logging/LogContext';
import { numericValue, type GroundTerm, type Triple } from '../../rdf/terms';
import type { Dataset } from '../dataset/Dataset';
import { DATASET_LOCK } from '../dataset/GraphLocker';
import { EvaluationBudget } from './EvaluationBudget';
import { PatternMatcher, type MatchContext } from './PatternMatcher';
import { QueryBinder, type BoundQuery, type PrefixTable, type QueryForm } from './QueryBinder';
import { EMPTY_SOLUTION, type Solution } from './Solution';
import { TemplateExecutor, type MutationReport } from './TemplateExecutor';

/**
 * Per-call settings. Budget values override the engine defaults.
 */
export interface QueryContext {
  prefixes?: PrefixTable;
  baseIRI?: string;
  maxSteps?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type SelectRow = Readonly<Record<string, GroundTerm>>;

export interface SelectResult {
  variables: string[];
  rows: SelectRow[];
}

export type QueryResult =
  | { type: 'select'; result: SelectResult }
  | { type: 'construct'; triples: Triple[] }
  | { type: 'insert'; report: MutationReport }
  | { type: 'ask'; value: boolean };

/**
 * SPARQL Engine interface - the four execution forms over one dataset
 */
export interface SparqlEngine {
  select(query: string, context?: QueryContext): Promise<SelectResult>;
  construct(query: string, context?: QueryContext): Promise<Triple[]>;
  insert(query: string, context?: QueryContext): Promise<MutationReport>;
  ask(query: string, context?: QueryContext): Promise<boolean>;
}

/**
 * Numeric value of a result cell such as a COUNT column.
 */
export function toNumber(term: GroundTerm | undefined): number | undefined {
  return numericValue(term);
}

/**
 * Binds query text to a dataset and dispatches it by form.
 *
 * Bind-time failures (syntax, unknown prefix, unsupported construct) are
 * thrown before evaluation starts. INSERT evaluates and commits under the
 * dataset write lock, so no reader sees a partial statement and a budget
 * failure leaves the dataset untouched.
 */
export class OntologyQueryEngine implements SparqlEngine {
  protected readonly logger = getLoggerFor(this);

  private readonly options: ResolvedEngineOptions;
  private readonly binder = new QueryBinder();
  private readonly matcher = new PatternMatcher();
  private readonly templates: TemplateExecutor;
  private sequence = 0;

  public constructor(private readonly dataset: Dataset, options: EngineOptions = {}) {
    this.options = resolveEngineOptions(options);
    this.templates = new TemplateExecutor({ blankNodePrefix: this.options.blankNodePrefix });
  }

  public getDataset(): Dataset {
    return this.dataset;
  }

  /** Parses and checks a query without evaluating it. */
  public prepare(query: string, context: QueryContext = {}): BoundQuery {
    return this.binder.bind(query, context.prefixes, context.baseIRI);
  }

  public async query(query: string, context: QueryContext = {}): Promise<QueryResult> {
    return this.run(query, context);
  }

  public async select(query: string, context?: QueryContext): Promise<SelectResult> {
    const result = await this.run(query, context, 'select');
    if (result.type !== 'select') {
      throw wrongForm('select', result.type);
    }
    return result.result;
  }

  public async construct(query: string, context?: QueryContext): Promise<Triple[]> {
    const result = await this.run(query, context, 'construct');
    if (result.type !== 'construct') {
      throw wrongForm('construct', result.type);
    }
    return result.triples;
  }

  public async insert(query: string, context?: QueryContext): Promise<MutationReport> {
    const result = await this.run(query, context, 'insert');
    if (result.type !== 'insert') {
      throw wrongForm('insert', result.type);
    }
    return result.report;
  }

  public async ask(query: string, context?: QueryContext): Promise<boolean> {
    const result = await this.run(query, context, 'ask');
    if (result.type !== 'ask') {
      throw wrongForm('ask', result.type);
    }
    return result.value;
  }

  private async run(query: string, context: QueryContext = {}, expected?: QueryForm): Promise<QueryResult> {
    this.sequence++;
    const queryId = `q${this.sequence}`;
    return logContext.run({ queryId }, async() => {
      const started = Date.now();
      let form: QueryForm | undefined;
      try {
        const bound = this.prepare(query, context);
        form = bound.form;
        if (expected && form !== expected) {
          throw wrongForm(expected, form);
        }
        const budget = new EvaluationBudget({
          maxSteps: context.maxSteps ?? this.options.maxSteps,
          timeoutMs: context.timeoutMs ?? this.options.timeoutMs,
          signal: context.signal,
        });
        const result = await this.execute(bound, budget);
        this.logger.info(`${form.toUpperCase()} ${describe(result)} in ${Date.now() - started}ms (${budget.steps} steps)`);
        return result;
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`${form ? form.toUpperCase() : 'Query'} failed: ${message}`);
        throw error;
      }
    });
  }

  /**
   * Queries evaluate under a shared lock on the dataset and INSERT under an
   * exclusive one, so a reader sees the dataset either before or after a
   * statement, never in between.
   */
  private async execute(bound: BoundQuery, budget: EvaluationBudget): Promise<QueryResult> {
    const context = this.matcher.createContext(this.dataset, { budget, graphControl: this.options.graphControl });
    const locker = this.dataset.locker;
    switch (bound.form) {
      case 'select':
        return locker.withReadLock<QueryResult>([ DATASET_LOCK ], async() => {
          const solutions = await this.solve(bound, context);
          return { type: 'select', result: { variables: bound.variables, rows: solutions.map((solution) => toRow(solution, bound.variables)) }};
        });
      case 'construct':
        return locker.withReadLock<QueryResult>([ DATASET_LOCK ], async() => ({
          type: 'construct',
          triples: this.templates.construct(bound.template, await this.solve(bound, context), this.dataset),
        }));
      case 'ask':
        return locker.withReadLock<QueryResult>([ DATASET_LOCK ], async() =>
          ({ type: 'ask', value: (await this.solve(bound, context)).length > 0 }));
      case 'insert':
        return locker.withWriteLock<QueryResult>([ DATASET_LOCK ], async() => ({
          type: 'insert',
          report: this.templates.insert(this.dataset, bound.template, await this.solve(bound, context)),
        }));
    }
  }

  private async solve(bound: BoundQuery, context: MatchContext): Promise<Solution[]> {
    return bound.where ? this.matcher.evaluate(bound.where, context) : [ EMPTY_SOLUTION ];
  }
}

function toRow(solution: Solution, variables: readonly string[]): SelectRow {
  const row: Record<string, GroundTerm> = {};
  for (const name of variables) {
    const term = solution.get(name);
    if (term) {
      row[name] = term;
    }
  }
  return row;
}

function describe(result: QueryResult): string {
  switch (result.type) {
    case 'select': return `returned ${result.result.rows.length} rows`;
    case 'construct': return `produced ${result.triples.length} triples`;
    case 'insert': return `inserted ${result.report.inserted} triples`;
    case 'ask': return `answered ${result.value}`;
  }
}

function wrongForm(expected: QueryForm, actual: QueryForm): UnsupportedQueryError {
  return new UnsupportedQueryError(`Expected a ${expected.toUpperCase()} query, got ${actual.toUpperCase()}`);
}
