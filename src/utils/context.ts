// ============================================================================
// REQUEST CONTEXT
// Async Local Storage for request-scoped data (correlation ID, timing)
// ============================================================================

import { AsyncLocalStorage } from "node:async_hooks";
import { v4 as uuidv4 } from "uuid";

export interface RequestContext {
  correlationId: string;
  transactionId: string;
  operation?: string;
  startTime: number;
  clientIp?: string;
  userAgent?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export const context = {
  /**
   * Run a function within a request context
   */
  run<T>(ctx: Partial<RequestContext>, fn: () => T): T {
    const fullContext: RequestContext = {
      correlationId: ctx.correlationId || uuidv4(),
      transactionId: ctx.transactionId || uuidv4(),
      startTime: ctx.startTime || Date.now(),
      operation: ctx.operation,
      clientIp: ctx.clientIp,
      userAgent: ctx.userAgent,
    };
    return asyncLocalStorage.run(fullContext, fn);
  },

  get(): RequestContext | undefined {
    return asyncLocalStorage.getStore();
  },

  update(updates: Partial<RequestContext>): void {
    const ctx = asyncLocalStorage.getStore();
    if (ctx) {
      Object.assign(ctx, updates);
    }
  },

  /**
   * Set the current operation name (shows up in logs and response meta)
   */
  setOperation(operation: string): void {
    this.update({ operation });
  },
};
