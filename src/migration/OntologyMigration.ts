import { getLoggerFor } from 'global-logger-factory';

import type { Triple } from '../rdf/terms';
import type { QueryContext, SelectRow, SparqlEngine } from '../storage/sparql/OntologyQueryEngine';
import type { MutationReport } from '../storage/sparql/TemplateExecutor';
import type { MigrationQuery } from './SkosMigrationQueries';

export type MigrationStepReport =
  | { name: string; form: 'construct'; triples: Triple[] }
  | { name: string; form: 'insert'; report: MutationReport }
  | { name: string; form: 'select'; variables: string[]; rows: SelectRow[] }
  | { name: string; form: 'ask'; value: boolean };

export interface MigrationReport {
  steps: MigrationStepReport[];
  /** New triples across all INSERT steps. */
  inserted: number;
}

/**
 * Runs migration queries in order against one engine. Each step sees the
 * dataset as left by the previous ones; the first failing step stops the
 * run.
 */
export class OntologyMigration {
  protected readonly logger = getLoggerFor(this);
  private readonly steps: MigrationQuery[];

  public constructor(private readonly engine: SparqlEngine, steps: Iterable<MigrationQuery> = []) {
    this.steps = [ ...steps ];
  }

  public addStep(step: MigrationQuery): this {
    this.steps.push(step);
    return this;
  }

  public getSteps(): readonly MigrationQuery[] {
    return this.steps;
  }

  public async run(context: Omit<QueryContext, 'prefixes'> = {}): Promise<MigrationReport> {
    const report: MigrationReport = { steps: [], inserted: 0 };
    for (const [ index, step ] of this.steps.entries()) {
      this.logger.info(`Step ${index + 1}/${this.steps.length}: ${step.name}`);
      const stepReport = await this.runStep(step, { ...context, prefixes: step.prefixes });
      if (stepReport.form === 'insert') {
        report.inserted += stepReport.report.inserted;
      }
      report.steps.push(stepReport);
    }
    this.logger.info(`Migration finished: ${report.steps.length} steps, ${report.inserted} triples inserted`);
    return report;
  }

  private async runStep(step: MigrationQuery, context: QueryContext): Promise<MigrationStepReport> {
    const { name } = step;
    switch (step.form) {
      case 'construct':
        return { name, form: 'construct', triples: await this.engine.construct(step.query, context) };
      case 'insert':
        return { name, form: 'insert', report: await this.engine.insert(step.query, context) };
      case 'select': {
        const result = await this.engine.select(step.query, context);
        return { name, form: 'select', variables: result.variables, rows: result.rows };
      }
      case 'ask':
        return { name, form: 'ask', value: await this.engine.ask(step.query, context) };
    }
  }
}
