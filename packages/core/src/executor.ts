import { CanceledError, WebError } from '#web-error';

import type { Endpoint } from '#contract';
import type { OAuthOperation } from '#operation';
import type { DispatchOptions, EndpointWorker } from '#worker';

/** runs an operation, wherever its engine lives */
export type Executor = <TItem>(
  operation: OAuthOperation<TItem>,
  options?: DispatchOptions,
) => Promise<TItem>;

/**
 * runs operations directly against an engine in the caller's task
 *
 * only the signal of the dispatch options applies: an aborted caller never starts the run
 * @param endpoint the engine
 * @returns executor for the engine
 */
export function runWith(endpoint: Endpoint): Executor {
  return async (operation, options) => {
    if (options?.signal?.aborted) {
      throw WebError.from(new CanceledError({ cause: options.signal.reason }));
    }

    return operation.run(endpoint);
  };
}

/**
 * runs operations by dispatching them to a worker that owns the engine
 * @param worker the worker to dispatch to
 * @param defaults dispatch options applied unless a call overrides them
 * @returns executor for the worker
 */
export function dispatchTo(
  worker: EndpointWorker,
  defaults: DispatchOptions = {},
): Executor {
  return async (operation, options) =>
    worker.send(operation.wrap(), { ...defaults, ...options });
}
