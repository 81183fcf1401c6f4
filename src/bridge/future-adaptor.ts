/**
 * Future adaptor: bridges NativeFuture<N> and host Promise<H> in both
 * directions for one result type.
 *
 * Host→Native (toNative): the pending NativePromise is registered in the
 * adaptor's handle table and the host promise's callbacks carry only its
 * token. Whichever callback fires releases the token and settles the
 * promise.
 *
 * Native→Host (toHost): a ResolveHandler is registered in the module's
 * resolve-handler table; the host promise builder initializes it with the
 * host resolve/reject callables. The future's continuation may fire on any
 * lane, so it only stores the completed future and dispatches the
 * trampoline, which settles the host promise on the host lane and releases
 * the token.
 */

import { type CorrelationToken, HandleTable, type HandleTableStats } from '../ffi/handle-table.js';
import type {
  FunctionToken,
  HostReject,
  NativeBridgeModule,
  ResolveHandlerBase,
} from '../ffi/native-module.js';
import type { HostRuntime } from '../host/runtime.js';
import { createLogger, errorMessage } from '../logging/index.js';
import {
  describeValue,
  type Marshaller,
  MarshallingError,
  type ValueMarshaller,
} from '../marshal/types.js';
import { NativeRuntimeError, toNativeException } from '../native/exceptions.js';
import { FutureConsumedError, type NativeFuture, NativePromise } from '../native/future.js';
import type { ThreadMarshaller } from '../threading/marshaller.js';
import { currentThread } from '../threading/thread.js';
import { BridgeRuntimeError } from './errors.js';

const log = createLogger({ component: 'future-adaptor' });

/** Message of the exception a non-error host rejection turns into */
export const NON_ERROR_REJECTION_MESSAGE = 'Host promise rejected with non-error type';

/**
 * Collaborators a FutureAdaptor needs.
 */
export interface FutureAdaptorDeps {
  native: NativeBridgeModule;
  host: HostRuntime;
  marshaller: ThreadMarshaller;
}

export interface FutureAdaptorStats {
  /** Host→Native contexts (pending native promises) */
  nativePromises: HandleTableStats;
  /** Trampolines run for this adaptor */
  trampolines: number;
}

/**
 * Native→Host bridge context: holds the host callables handed over by the
 * promise builder, and the future once it has completed.
 */
class ResolveHandler<N, H> implements ResolveHandlerBase {
  private resolveFn: ((value: H) => void) | null = null;
  private rejectFn: HostReject | null = null;
  private completed: NativeFuture<N> | null = null;

  init(resolve: (value: H) => void, reject: HostReject): void {
    this.resolveFn = resolve;
    this.rejectFn = reject;
  }

  complete(future: NativeFuture<N>): void {
    this.completed = future;
  }

  /**
   * Settle the host promise from the completed future. Runs on the host lane.
   */
  settle(result: Marshaller<N, H>, host: HostRuntime): 'resolved' | 'rejected' {
    const resolve = this.resolveFn;
    const reject = this.rejectFn;
    const future = this.completed;
    if (!resolve || !reject || !future) {
      throw new BridgeRuntimeError('Resolve handler settled before init() or completion');
    }

    let value: H;
    try {
      const native = future.get();
      value = result.isVoid ? result.emptyHost : result.toHost(native);
    } catch (error) {
      reject(host.nativeExceptionToHost(toNativeException(error)));
      return 'rejected';
    }
    resolve(value);
    return 'resolved';
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Bridge for one result type.
 *
 * The adaptor is itself a marshaller for NativeFuture<N> ↔ Promise<H>, so
 * futures can appear inside other marshalled values.
 *
 * @example
 * ```typescript
 * const adaptor = runtime.adaptor(I32Marshaller);
 * const hostPromise = adaptor.toHost(pool.submit(() => 6 * 7));
 * await hostPromise; // 42
 * ```
 */
export class FutureAdaptor<N, H> implements ValueMarshaller<NativeFuture<N>, Promise<H>> {
  readonly typeName: string;
  readonly isVoid = false as const;

  private readonly result: Marshaller<N, H>;
  private readonly deps: FutureAdaptorDeps;
  private readonly nativePromises = new HandleTable<NativePromise<N>>('native-promise');
  private readonly resolveFn: FunctionToken;
  private readonly rejectFn: FunctionToken;
  private trampolineCount = 0;

  constructor(result: Marshaller<N, H>, deps: FutureAdaptorDeps) {
    this.result = result;
    this.deps = deps;
    this.typeName = `future<${result.typeName}>`;
    this.resolveFn = deps.native.registerFunction((token, value) =>
      this.resolveNativePromise(token, value)
    );
    this.rejectFn = deps.native.registerFunction((token, reason) =>
      this.rejectNativePromise(token, reason)
    );
  }

  /**
   * Host→Native: a future that settles when the host promise settles.
   *
   * The future is returned before the host promise has necessarily settled.
   */
  toNative(host: unknown): NativeFuture<N> {
    if (!isPromiseLike(host)) {
      throw new MarshallingError(this.typeName, `expected a promise, got ${describeValue(host)}`);
    }

    const promise = new NativePromise<N>();
    const future = promise.getFuture();
    const token = this.nativePromises.allocate(promise);

    log.trace('Bridging host promise to native future', {
      operation: 'to_native',
      type: this.result.typeName,
      token,
    });

    const { host: runtime } = this.deps;
    runtime.subscribe(
      host,
      runtime.makeNativePromiseResolver(this.resolveFn, token),
      runtime.makeNativePromiseRejecter(this.rejectFn, token)
    );
    return future;
  }

  /**
   * Native→Host: a host promise that settles when the future completes.
   *
   * Must be called on the host lane. The promise is returned immediately;
   * settlement happens on the host lane once the future completes.
   *
   * @throws FutureConsumedError if the future was already read or given a
   * continuation
   */
  toHost(future: NativeFuture<N>): Promise<H> {
    // Nothing is allocated for a future that cannot take the continuation.
    if (future.isConsumed()) {
      throw new FutureConsumedError('then');
    }

    const handler = new ResolveHandler<N, H>();
    const { native, host, marshaller } = this.deps;
    const token = native.resolveHandlers.allocate(handler);

    let builderPromise: Promise<H>;
    try {
      builderPromise = host.createPromiseBuilder<H>(token).promise;
    } catch (error) {
      native.resolveHandlers.release(token);
      throw error;
    }

    log.trace('Bridging native future to host promise', {
      operation: 'to_host',
      type: this.result.typeName,
      token,
      ready: future.isReady(),
    });

    future.then((completed) => {
      handler.complete(completed);
      log.trace('Native future completed, dispatching trampoline', {
        operation: 'to_host',
        token,
        thread: currentThread().name,
      });
      marshaller.dispatch(() => this.trampoline(token, handler));
    });

    return builderPromise;
  }

  stats(): FutureAdaptorStats {
    return {
      nativePromises: this.nativePromises.stats(),
      trampolines: this.trampolineCount,
    };
  }

  /**
   * Runs once per Native→Host bridge, on the host lane.
   */
  private trampoline(token: CorrelationToken, handler: ResolveHandler<N, H>): void {
    this.trampolineCount++;
    try {
      const outcome = handler.settle(this.result, this.deps.host);
      log.debug('Host promise settled', {
        operation: 'trampoline',
        token,
        outcome,
        thread: currentThread().name,
      });
    } finally {
      this.deps.native.resolveHandlers.release(token);
    }
  }

  /**
   * Native function behind the host promise's fulfilment callback.
   */
  private resolveNativePromise(token: CorrelationToken, value: unknown): void {
    const promise = this.nativePromises.release(token);

    if (this.result.isVoid) {
      promise.setValue(this.result.emptyNative);
      return;
    }

    let native: N;
    try {
      native = this.result.toNative(value);
    } catch (error) {
      log.warn('Host value could not be marshalled', {
        operation: 'resolve_native_promise',
        type: this.result.typeName,
        token,
        error_message: errorMessage(error),
      });
      promise.setException(toNativeException(error));
      return;
    }
    promise.setValue(native);
  }

  /**
   * Native function behind the host promise's rejection callback.
   */
  private rejectNativePromise(token: CorrelationToken, reason: unknown): void {
    const promise = this.nativePromises.release(token);
    const { host } = this.deps;

    // instanceof is false for null and undefined as well.
    if (host.isHostError(reason)) {
      promise.setException(host.hostErrorToNative(reason));
      return;
    }

    // Arbitrary host values are not stringified.
    log.warn('Host promise rejected with a non-error value', {
      operation: 'reject_native_promise',
      token,
      value_type: describeValue(reason),
    });
    promise.setException(new NativeRuntimeError(NON_ERROR_REJECTION_MESSAGE));
  }
}
