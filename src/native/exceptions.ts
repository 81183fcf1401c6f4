/**
 * Native exception taxonomy.
 *
 * Native code signals failure by throwing a NativeException. These never
 * reach host code directly: the bridges translate them into host errors
 * (see host/exceptions.ts) and translate host rejections back into them.
 */

/**
 * Base class for every exception raised by native code.
 */
export class NativeException extends Error {
  /** Native type name, preserved when the exception crosses to the host */
  readonly typeName: string;

  constructor(message: string, typeName = 'NativeException', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NativeException';
    this.typeName = typeName;
  }
}

/**
 * Generic native runtime failure.
 */
export class NativeRuntimeError extends NativeException {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'runtime_error', options);
    this.name = 'NativeRuntimeError';
  }
}

/**
 * A host error object carried through native code.
 *
 * Produced when a host promise rejects with an Error. The exact object is
 * kept so that sending it back to the host yields the same error.
 */
export class HostException extends NativeException {
  readonly error: Error;

  constructor(error: Error) {
    super(error.message, 'HostException');
    this.name = 'HostException';
    this.error = error;
  }
}

/**
 * Normalize any thrown value into a NativeException.
 */
export function toNativeException(thrown: unknown): NativeException {
  if (thrown instanceof NativeException) {
    return thrown;
  }
  if (thrown instanceof Error) {
    return new NativeRuntimeError(thrown.message, { cause: thrown });
  }
  return new NativeRuntimeError(`Native code threw a non-error value: ${typeof thrown}`);
}
