import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  queryId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
