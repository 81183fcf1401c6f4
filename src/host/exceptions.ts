/**
 * Exception translation between the native and host error models.
 *
 * Native exceptions become host Error objects before they reach host code,
 * and host Error objects become native exceptions before native code sees
 * them. A host error that made a round trip through native code comes back
 * as the very same object.
 */

import { HostException, type NativeException } from '../native/exceptions.js';

/**
 * Host-side error produced from a native exception.
 */
export class NativeError extends Error {
  /** Type name of the native exception this error was produced from */
  readonly nativeType: string;

  constructor(message: string, nativeType: string) {
    super(message);
    this.name = 'NativeError';
    this.nativeType = nativeType;
  }
}

export interface ExceptionTranslator {
  /** Convert a native exception into a host error object */
  toHost(exception: NativeException): Error;

  /** Convert a host error object into a native exception */
  toNative(error: Error): NativeException;
}

export const defaultExceptionTranslator: ExceptionTranslator = {
  toHost(exception: NativeException): Error {
    if (exception instanceof HostException) {
      return exception.error;
    }
    return new NativeError(exception.message, exception.typeName);
  },

  toNative(error: Error): NativeException {
    return new HostException(error);
  },
};
