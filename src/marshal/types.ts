/**
 * Boxing collaborators.
 *
 * A Marshaller converts one concrete result type between its native
 * representation (N) and its host representation (H). Bridges receive the
 * marshaller for their result type instead of hard-coding conversions.
 */

interface MarshallerBase<N, H> {
  /** Type name used in logs and marshalling errors */
  readonly typeName: string;

  /**
   * Convert a host value into its native representation.
   *
   * Host values arrive untyped from the host runtime, so implementations
   * check the shape and throw MarshallingError on a mismatch.
   */
  toNative(host: unknown): N;

  /** Convert a native value into its host representation */
  toHost(native: N): H;
}

export interface ValueMarshaller<N, H> extends MarshallerBase<N, H> {
  readonly isVoid: false;
}

/**
 * The "no value" result type. Bridges never call its conversions; they use
 * the empty values directly.
 */
export interface VoidResultMarshaller<N, H> extends MarshallerBase<N, H> {
  readonly isVoid: true;
  readonly emptyNative: N;
  readonly emptyHost: H;
}

export type Marshaller<N, H> = ValueMarshaller<N, H> | VoidResultMarshaller<N, H>;

/** Native representation carried by a marshaller */
export type NativeOf<M> = M extends MarshallerBase<infer N, infer _H> ? N : never;

/** Host representation carried by a marshaller */
export type HostOf<M> = M extends MarshallerBase<infer _N, infer H> ? H : never;

/**
 * Thrown when a value does not have the shape its marshaller expects.
 */
export class MarshallingError extends Error {
  readonly typeName: string;

  constructor(typeName: string, message: string) {
    super(`Cannot marshal ${typeName}: ${message}`);
    this.name = 'MarshallingError';
    this.typeName = typeName;
  }
}

/**
 * Describe a value for an error message without stringifying its contents.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (value instanceof Map) return 'Map';
  return typeof value;
}
