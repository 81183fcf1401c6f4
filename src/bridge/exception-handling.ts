/**
 * Exception adaptation for Native→Host bridges.
 *
 * A native exception must never cross into host code raw. When native code
 * fails before (or while) producing its future, the failure is turned into
 * an already-failed future and sent through the regular Native→Host path,
 * so the host sees an ordinary rejected promise.
 */

import { logDebug } from '../logging/index.js';
import { toNativeException } from '../native/exceptions.js';
import { type NativeFuture, NativePromise } from '../native/future.js';
import type { FutureAdaptor } from './future-adaptor.js';

/**
 * Host promise already on its rejection path for the given native failure.
 *
 * Values that are not native exceptions are normalized first.
 */
export function handleNativeException<N, H>(
  adaptor: FutureAdaptor<N, H>,
  error: unknown
): Promise<H> {
  const exception = toNativeException(error);
  logDebug('Adapting native exception into a rejected host promise', {
    component: 'exception-handling',
    type: adaptor.typeName,
    native_type: exception.typeName,
    error_message: exception.message,
  });
  return adaptor.toHost(NativePromise.reject<N>(exception));
}

/**
 * Run a native producer of a future and bridge its result.
 *
 * A synchronous throw from the producer becomes a rejected host promise.
 *
 * @example
 * ```typescript
 * const promise = guardNative(adaptor, () => openDatabase(path));
 * ```
 */
export function guardNative<N, H>(
  adaptor: FutureAdaptor<N, H>,
  producer: () => NativeFuture<N>
): Promise<H> {
  let future: NativeFuture<N>;
  try {
    future = producer();
  } catch (error) {
    return handleNativeException(adaptor, error);
  }
  return adaptor.toHost(future);
}
