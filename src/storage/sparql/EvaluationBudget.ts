import { ResourceExceededError } from '../../errors/QueryErrors';

export interface EvaluationBudgetOptions {
  /** Maximum traversal steps (path edges followed, EXISTS checks). */
  maxSteps: number;
  /** Wall-clock limit in milliseconds; 0 disables it. */
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Cooperative cancellation for the unbounded parts of evaluation.
 *
 * Path traversal and EXISTS sub-pattern evaluation call {@link tick};
 * once the step or time budget is spent the query aborts with a
 * {@link ResourceExceededError}.
 */
export class EvaluationBudget {
  private spent = 0;
  private readonly deadline: number;

  public constructor(private readonly options: EvaluationBudgetOptions) {
    this.deadline = options.timeoutMs > 0 ? Date.now() + options.timeoutMs : Number.POSITIVE_INFINITY;
  }

  public get steps(): number {
    return this.spent;
  }

  public tick(cost = 1): void {
    this.spent += cost;
    if (this.spent > this.options.maxSteps) {
      throw new ResourceExceededError(
        `Evaluation exceeded the step budget of ${this.options.maxSteps}`,
        this.spent,
        this.options.maxSteps,
      );
    }
    if (this.options.signal?.aborted) {
      throw new ResourceExceededError('Evaluation was cancelled', this.spent, this.options.maxSteps);
    }
    if (Date.now() > this.deadline) {
      throw new ResourceExceededError(
        `Evaluation exceeded the time budget of ${this.options.timeoutMs}ms`,
        this.spent,
        this.options.maxSteps,
      );
    }
  }
}
