/**
 * default number of operations an endpoint worker queues before rejecting new ones
 * @description messages in flight do not count against the capacity.
 */
export const DEFAULT_MAILBOX_CAPACITY = 16;

/**
 * default time in milliseconds a caller waits for a dispatched operation
 * @example
 * ```typescript
 * await worker.send(new Token(request).wrap(), { timeout: DEFAULT_DISPATCH_TIMEOUT });
 * ```
 */
export const DEFAULT_DISPATCH_TIMEOUT = 30_000;
