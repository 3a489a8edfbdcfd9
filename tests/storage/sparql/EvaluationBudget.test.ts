import { afterEach, describe, it, expect, vi } from 'vitest';

import { ResourceExceededError } from '../../../src/errors/QueryErrors';
import { EvaluationBudget } from '../../../src/storage/sparql/EvaluationBudget';

describe('EvaluationBudget', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should count steps up to the limit', () => {
    const budget = new EvaluationBudget({ maxSteps: 3, timeoutMs: 0 });
    budget.tick();
    budget.tick(2);
    expect(budget.steps).toBe(3);
    expect(() => budget.tick()).toThrow('Evaluation exceeded the step budget of 3');
  });

  it('should report spent and allowed steps', () => {
    const budget = new EvaluationBudget({ maxSteps: 1, timeoutMs: 0 });
    budget.tick();
    try {
      budget.tick();
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ResourceExceededError);
      expect(error).toMatchObject({ code: 'RESOURCE_EXCEEDED', steps: 2, limit: 1 });
    }
  });

  it('should stop once the signal is aborted', () => {
    const controller = new AbortController();
    const budget = new EvaluationBudget({ maxSteps: 10, timeoutMs: 0, signal: controller.signal });
    budget.tick();
    controller.abort();
    expect(() => budget.tick()).toThrow('Evaluation was cancelled');
  });

  it('should stop after the time budget', () => {
    vi.useFakeTimers();
    const budget = new EvaluationBudget({ maxSteps: 10, timeoutMs: 5 });
    budget.tick();
    vi.advanceTimersByTime(10);
    expect(() => budget.tick()).toThrow('Evaluation exceeded the time budget of 5ms');
  });
});
