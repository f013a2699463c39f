import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { MailResponse } from './mailResponse.js';

/** Settlement state of a {@link MailPromise}. */
export type MailPromiseState = 'pending' | 'fulfilled' | 'rejected';

/**
 * Deferred handle returned by asynchronous dispatch.
 *
 * Settles with a {@link MailResponse} once the transport's deferred resolves. A rejection of the
 * transport's deferred is passed through unchanged, so callers see the transport's own error.
 *
 * @typeParam T - Expected shape of the parsed body.
 */
export class MailPromise<T = unknown> implements PromiseLike<MailResponse<T>> {
  /** Wrapped transport deferred, mapped to a MailResponse */
  #promise: Promise<MailResponse<T>>;
  /** Current settlement state */
  #state: MailPromiseState = 'pending';

  /** Wraps the deferred handle returned by a transport's `sendAsync` */
  constructor(deferred: PromiseLike<Response>) {
    this.#promise = Promise.resolve(deferred).then(
      (response) => {
        this.#state = 'fulfilled';
        return new MailResponse<T>(response);
      },
      (reason: unknown) => {
        this.#state = 'rejected';
        throw reason;
      },
    );
  }

  /** Settlement state; `pending` until the transport settles the deferred */
  get state(): MailPromiseState {
    return this.#state;
  }

  then<Fulfilled = MailResponse<T>, Rejected = never>(
    onfulfilled?: ((value: MailResponse<T>) => Fulfilled | PromiseLike<Fulfilled>) | null,
    onrejected?: ((reason: unknown) => Rejected | PromiseLike<Rejected>) | null,
  ): Promise<Fulfilled | Rejected> {
    return this.#promise.then(onfulfilled, onrejected);
  }

  catch<Rejected = never>(
    onrejected?: ((reason: unknown) => Rejected | PromiseLike<Rejected>) | null,
  ): Promise<MailResponse<T> | Rejected> {
    return this.#promise.catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<MailResponse<T>> {
    return this.#promise.finally(onfinally);
  }

  /**
   * Waits for the deferred to settle.
   * @returns A promise resolving to `[error, response]`; the error is the transport's rejection reason as is.
   */
  wait(): SafeWrapAsync<Error, MailResponse<T>> {
    return safeWrapAsync(() => this.#promise);
  }
}
