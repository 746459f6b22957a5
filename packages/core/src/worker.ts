import {
  DEFAULT_DISPATCH_TIMEOUT,
  DEFAULT_MAILBOX_CAPACITY,
} from '#constants/defaults';
import { CanceledError, MailboxError, WebError } from '#web-error';

import type { Endpoint } from '#contract';
import type { Log } from '#logging';
import type { OAuthMessage } from '#operation';

/** options for an endpoint worker */
export interface EndpointWorkerOptions {
  /** number of messages that may wait in the mailbox, at least 1 (default: 16) */
  capacity?: number;
  /**
   * default time in milliseconds a sender waits for its reply (default: 30s);
   * zero, a negative value or `Infinity` waits without a time limit
   */
  timeout?: number;
  /** optional logger */
  log?: Log;
}

/** options for a single dispatch */
export interface DispatchOptions {
  /**
   * time in milliseconds to wait for the reply, overriding the worker default;
   * zero, a negative value or `Infinity` waits without a time limit
   */
  timeout?: number;
  /** aborts the wait, e.g. when the client connection drops */
  signal?: AbortSignal;
}

/** a message waiting in, or taken from, the mailbox */
interface MailboxEntry {
  settled: boolean;
  deliver: (endpoint: Endpoint) => Promise<void>;
  abandon: (error: Error) => void;
}

/**
 * single consumer owning a long-lived engine
 *
 * operations are run one at a time in the order they were sent; senders
 * wait for exactly one reply and never block on a full mailbox
 * @example
 * ```typescript
 * const worker = new EndpointWorker(endpoint, { capacity: 32 });
 * const response = await worker.send(new Token(request).wrap());
 * ```
 */
export class EndpointWorker {
  readonly #endpoint: Endpoint;
  readonly #capacity: number;
  readonly #timeout: number;
  readonly #log?: Log;
  #queue: MailboxEntry[] = [];
  #running = false;
  #closed = false;

  /**
   * @param endpoint engine exclusively owned by this worker
   * @param options mailbox configuration
   * @throws {RangeError} when the capacity is not a positive integer
   */
  constructor(endpoint: Endpoint, options: EndpointWorkerOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_MAILBOX_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Mailbox capacity must be a positive integer, got ${capacity}`,
      );
    }

    this.#endpoint = endpoint;
    this.#capacity = capacity;
    this.#timeout = options.timeout ?? DEFAULT_DISPATCH_TIMEOUT;
    this.#log = options.log;
  }

  /** number of messages waiting to be processed */
  public get pending(): number {
    return this.#queue.length;
  }

  /** whether the worker stopped accepting messages */
  public get closed(): boolean {
    return this.#closed;
  }

  /**
   * delivers an operation to the worker and waits for its reply
   * @param message operation wrapped for dispatch
   * @param options timeout and cancellation for this dispatch
   * @returns the operation's result
   * @throws {WebError} `mailbox` when the mailbox is full or closed, `canceled` on timeout or abort, or the operation's own error
   */
  public async send<TItem>(
    message: OAuthMessage<TItem>,
    options: DispatchOptions = {},
  ): Promise<TItem> {
    if (this.#closed) {
      throw WebError.from(new MailboxError('closed'));
    }

    if (this.#queue.length >= this.#capacity) {
      this.#log?.('warn', 'Endpoint worker mailbox is full', {
        capacity: this.#capacity,
      });

      throw WebError.from(new MailboxError('full'));
    }

    const { signal } = options;
    if (signal?.aborted) {
      throw WebError.from(new CanceledError({ cause: signal.reason }));
    }

    const timeout = options.timeout ?? this.#timeout;

    return new Promise<TItem>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const settle = (complete: () => void): void => {
        if (entry.settled) {
          return;
        }

        entry.settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        complete();
      };

      const entry: MailboxEntry = {
        settled: false,
        deliver: async (endpoint) => {
          try {
            const item = await message.intoInner().run(endpoint);
            settle(() => resolve(item));
          } catch (error) {
            settle(() => reject(WebError.from(error)));
          }
        },
        abandon: (error) => {
          this.#remove(entry);
          settle(() => reject(WebError.from(error)));
        },
      };

      const onAbort = (): void =>
        entry.abandon(new CanceledError({ cause: signal?.reason }));

      if (Number.isFinite(timeout) && timeout > 0) {
        timer = setTimeout(
          () => entry.abandon(new MailboxError('timeout')),
          timeout,
        );
      }

      signal?.addEventListener('abort', onAbort, { once: true });

      this.#queue.push(entry);
      this.#drain();
    });
  }

  /**
   * stops accepting messages and rejects those still waiting
   *
   * an operation already running completes and replies normally
   */
  public close(): void {
    if (this.#closed) {
      return;
    }

    this.#closed = true;

    const abandoned = this.#queue;
    this.#queue = [];
    for (const entry of abandoned) {
      entry.abandon(new MailboxError('closed'));
    }

    this.#log?.('info', 'Endpoint worker closed', {
      abandoned: abandoned.length,
    });
  }

  /** starts the consumer unless it is already running */
  #drain(): void {
    if (this.#running) {
      return;
    }

    this.#running = true;
    void this.#consume();
  }

  /** processes messages one at a time until the mailbox is empty */
  async #consume(): Promise<void> {
    try {
      for (
        let entry = this.#queue.shift();
        entry;
        entry = this.#queue.shift()
      ) {
        // skip messages whose sender already gave up
        if (!entry.settled) {
          await entry.deliver(this.#endpoint);
        }
      }
    } finally {
      this.#running = false;
    }
  }

  /**
   * takes an entry out of the mailbox if it is still waiting
   * @param entry the entry to remove
   */
  #remove(entry: MailboxEntry): void {
    const index = this.#queue.indexOf(entry);
    if (index !== -1) {
      this.#queue.splice(index, 1);
    }
  }
}
