// apps/api/src/common/log-context.ts
import { AsyncLocalStorage } from 'async_hooks';

export interface LogContext {
  requestId?: string;
  userId?: string;
}

const storage = new AsyncLocalStorage<LogContext>();

export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** Attaches the authenticated user to the running request context. */
export function setLogContextUser(userId: string): void {
  const store = storage.getStore();
  if (store) store.userId = userId;
}
