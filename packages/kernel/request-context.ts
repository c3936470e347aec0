import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries the request ID of the current HTTP call into every log line
* written while the call is being served.
*/

export interface RequestContext {
  requestId: string;
  startTime: number;
  path?: string | undefined;
  method?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Run function within a request context
*/
export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    startTime: options?.startTime ?? Date.now(),
    path: options?.path,
    method: options?.method,
  };
}
