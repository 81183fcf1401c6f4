/**
 * Native future/promise primitive.
 *
 * A NativePromise is the write-once producer side and a NativeFuture the
 * read-once consumer side of one asynchronously produced value. Completion
 * runs the attached continuation synchronously on whichever logical thread
 * completed the promise; nothing here touches the host event loop.
 */

import { type NativeException, toNativeException } from './exceptions.js';

/**
 * Thrown by get() while the future is still pending. The primitive never blocks.
 */
export class FutureNotReadyError extends Error {
  constructor() {
    super('Future is not ready');
    this.name = 'FutureNotReadyError';
  }
}

/**
 * Thrown when a future is read or given a continuation more than once.
 */
export class FutureConsumedError extends Error {
  constructor(operation: string) {
    super(`Future already consumed (attempted ${operation})`);
    this.name = 'FutureConsumedError';
  }
}

/**
 * Thrown when getFuture() is called twice on the same promise.
 */
export class FutureAlreadyRetrievedError extends Error {
  constructor() {
    super('Future already retrieved from this promise');
    this.name = 'FutureAlreadyRetrievedError';
  }
}

/**
 * Thrown on a second setValue()/setException() call.
 */
export class PromiseAlreadySatisfiedError extends Error {
  constructor() {
    super('Promise already satisfied');
    this.name = 'PromiseAlreadySatisfiedError';
  }
}

export type FutureState<T> =
  | { readonly status: 'pending' }
  | { readonly status: 'fulfilled'; readonly value: T }
  | { readonly status: 'rejected'; readonly error: NativeException };

/**
 * State shared between a promise and its future.
 * @internal
 */
export class SharedState<T> {
  state: FutureState<T> = { status: 'pending' };
  private continuation: (() => void) | null = null;
  private continuationAttached = false;

  get hasContinuation(): boolean {
    return this.continuationAttached;
  }

  complete(state: FutureState<T>): void {
    if (this.state.status !== 'pending') {
      throw new PromiseAlreadySatisfiedError();
    }
    this.state = state;

    const continuation = this.continuation;
    this.continuation = null;
    continuation?.();
  }

  attach(continuation: () => void): void {
    this.continuationAttached = true;
    if (this.state.status === 'pending') {
      this.continuation = continuation;
      return;
    }
    continuation();
  }
}

/**
 * Read-once handle to an eventually available value or native exception.
 */
export class NativeFuture<T> {
  private consumed = false;

  /** @internal */
  constructor(private readonly shared: SharedState<T>) {}

  /**
   * Whether the value or exception is available.
   */
  isReady(): boolean {
    return this.shared.state.status !== 'pending';
  }

  /**
   * Whether get() or then() can no longer be called on this future.
   */
  isConsumed(): boolean {
    return this.consumed || this.shared.hasContinuation;
  }

  /**
   * Take the value, or throw the native exception the future failed with.
   */
  get(): T {
    if (this.consumed) {
      throw new FutureConsumedError('get');
    }
    const state = this.shared.state;
    if (state.status === 'pending') {
      throw new FutureNotReadyError();
    }
    this.consumed = true;
    if (state.status === 'rejected') {
      throw state.error;
    }
    return state.value;
  }

  /**
   * Attach the single continuation.
   *
   * The continuation receives the completed future and runs on the thread
   * that completes it, or right away if the future is already complete.
   * Its return value (or thrown exception) completes the returned future.
   */
  then<R>(continuation: (completed: NativeFuture<T>) => R): NativeFuture<R> {
    if (this.isConsumed()) {
      throw new FutureConsumedError('then');
    }
    this.consumed = true;

    const next = new NativePromise<R>();
    const nextFuture = next.getFuture();
    const shared = this.shared;

    shared.attach(() => {
      let result: R;
      try {
        result = continuation(new NativeFuture<T>(shared));
      } catch (error) {
        next.setException(toNativeException(error));
        return;
      }
      next.setValue(result);
    });

    return nextFuture;
  }
}

/**
 * Write-once completion handle paired with one NativeFuture.
 *
 * @example
 * ```typescript
 * const promise = new NativePromise<number>();
 * const future = promise.getFuture();
 * promise.setValue(42);
 * future.get(); // 42
 * ```
 */
export class NativePromise<T> {
  private readonly shared = new SharedState<T>();
  private futureRetrieved = false;

  /**
   * Build a future that is already failed with the given exception.
   */
  static reject<T>(error: unknown): NativeFuture<T> {
    const promise = new NativePromise<T>();
    promise.setException(toNativeException(error));
    return promise.getFuture();
  }

  /**
   * Build a future that is already fulfilled with the given value.
   */
  static resolve<T>(value: T): NativeFuture<T> {
    const promise = new NativePromise<T>();
    promise.setValue(value);
    return promise.getFuture();
  }

  getFuture(): NativeFuture<T> {
    if (this.futureRetrieved) {
      throw new FutureAlreadyRetrievedError();
    }
    this.futureRetrieved = true;
    return new NativeFuture<T>(this.shared);
  }

  setValue(value: T): void {
    this.shared.complete({ status: 'fulfilled', value });
  }

  setException(error: NativeException): void {
    this.shared.complete({ status: 'rejected', error });
  }

  /**
   * Whether a terminal call has already been made.
   */
  isSatisfied(): boolean {
    return this.shared.state.status !== 'pending';
  }
}
