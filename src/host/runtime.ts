/**
 * Host runtime collaborator.
 *
 * Everything that creates or settles a host promise lives here, and every
 * such operation checks that it runs on the host lane. Native code reaches
 * these operations only through integer tokens (see ffi/native-module.ts).
 */

import type { CorrelationToken } from '../ffi/handle-table.js';
import type { FunctionToken, NativeModule } from '../ffi/native-module.js';
import { errorMessage, logError } from '../logging/index.js';
import type { NativeException } from '../native/exceptions.js';
import { ThreadAffinityError, type ThreadMarshaller } from '../threading/marshaller.js';
import { currentThread } from '../threading/thread.js';
import { defaultExceptionTranslator, type ExceptionTranslator } from './exceptions.js';

/**
 * Host object wrapping a promise whose resolve/reject were handed to a
 * native resolve handler at construction.
 */
export interface PromiseBuilder<H> {
  readonly token: CorrelationToken;
  readonly promise: Promise<H>;
}

/** Host closure that forwards one value into native code */
export type HostCallback = (value: unknown) => void;

export interface HostRuntimeStats {
  buildersCreated: number;
  resolved: number;
  rejected: number;
  affinityViolations: number;
}

export class HostRuntime {
  private readonly native: NativeModule;
  private readonly marshaller: ThreadMarshaller;
  private readonly translator: ExceptionTranslator;

  private buildersCreated = 0;
  private resolvedCount = 0;
  private rejectedCount = 0;
  private affinityViolations = 0;

  constructor(
    native: NativeModule,
    marshaller: ThreadMarshaller,
    translator: ExceptionTranslator = defaultExceptionTranslator
  ) {
    this.native = native;
    this.marshaller = marshaller;
    this.translator = translator;
  }

  /**
   * Construct a promise builder for the resolve handler behind `token`.
   *
   * The handler's init() runs synchronously, before this returns.
   */
  createPromiseBuilder<H>(token: CorrelationToken): PromiseBuilder<H> {
    this.assertHostThread('createPromiseBuilder');

    let initFailed = false;
    let initError: unknown;
    const promise = new Promise<H>((resolve, reject) => {
      const resolveOnHost = (value: H): void => {
        this.assertHostThread('resolve');
        this.resolvedCount++;
        resolve(value);
      };
      const rejectOnHost = (reason: Error): void => {
        this.assertHostThread('reject');
        this.rejectedCount++;
        reject(reason);
      };

      try {
        this.native.initResolveHandler(token, resolveOnHost, rejectOnHost);
      } catch (error) {
        initFailed = true;
        initError = error;
      }
    });

    // init failures propagate to the caller, as from a throwing constructor.
    if (initFailed) {
      throw initError;
    }

    this.buildersCreated++;
    return { token, promise };
  }

  /**
   * Host closure that calls native function `fn` with (token, value).
   */
  makeNativePromiseResolver(fn: FunctionToken, token: CorrelationToken): HostCallback {
    return (value: unknown) => this.native.invoke(fn, token, value);
  }

  /**
   * Host closure that calls native function `fn` with (token, reason).
   */
  makeNativePromiseRejecter(fn: FunctionToken, token: CorrelationToken): HostCallback {
    return (reason: unknown) => this.native.invoke(fn, token, reason);
  }

  /**
   * Register fulfilment and rejection callbacks on a host promise-like.
   * Exactly one of them runs, on the host lane.
   */
  subscribe(
    promise: PromiseLike<unknown>,
    onFulfilled: HostCallback,
    onRejected: HostCallback
  ): void {
    Promise.resolve(promise)
      .then(onFulfilled, onRejected)
      .catch((error: unknown) => {
        logError('Native callback threw while settling a host promise', {
          component: 'host-runtime',
          error_message: errorMessage(error),
        });
      });
  }

  /**
   * Whether a rejection value is an instance of the host error type.
   */
  isHostError(value: unknown): value is Error {
    return value instanceof Error;
  }

  nativeExceptionToHost(exception: NativeException): Error {
    return this.translator.toHost(exception);
  }

  hostErrorToNative(error: Error): NativeException {
    return this.translator.toNative(error);
  }

  stats(): HostRuntimeStats {
    return {
      buildersCreated: this.buildersCreated,
      resolved: this.resolvedCount,
      rejected: this.rejectedCount,
      affinityViolations: this.affinityViolations,
    };
  }

  private assertHostThread(operation: string): void {
    if (this.marshaller.isHostThread()) {
      return;
    }
    this.affinityViolations++;
    throw new ThreadAffinityError(operation, currentThread().name);
  }
}
