/**
 * Marshallers for container types, built from the marshaller of their
 * element type(s).
 */

import { describeValue, type Marshaller, MarshallingError, type ValueMarshaller } from './types.js';

/**
 * Optional value: native `null` on one side, host `undefined` on the other.
 * A host `null` is accepted as absent as well.
 */
export function optional<N, H>(inner: Marshaller<N, H>): ValueMarshaller<N | null, H | undefined> {
  return {
    typeName: `optional<${inner.typeName}>`,
    isVoid: false,
    toNative(host: unknown): N | null {
      if (host === undefined || host === null) {
        return null;
      }
      return inner.toNative(host);
    },
    toHost(native: N | null): H | undefined {
      if (native === null) {
        return undefined;
      }
      return inner.toHost(native);
    },
  };
}

export function list<N, H>(inner: Marshaller<N, H>): ValueMarshaller<readonly N[], H[]> {
  const typeName = `list<${inner.typeName}>`;
  return {
    typeName,
    isVoid: false,
    toNative(host: unknown): readonly N[] {
      if (!Array.isArray(host)) {
        throw new MarshallingError(typeName, `expected array, got ${describeValue(host)}`);
      }
      return host.map((item: unknown) => inner.toNative(item));
    },
    toHost(native: readonly N[]): H[] {
      return native.map((item) => inner.toHost(item));
    },
  };
}

export function map<NK, NV, HK, HV>(
  key: Marshaller<NK, HK>,
  value: Marshaller<NV, HV>
): ValueMarshaller<ReadonlyMap<NK, NV>, Map<HK, HV>> {
  const typeName = `map<${key.typeName}, ${value.typeName}>`;
  return {
    typeName,
    isVoid: false,
    toNative(host: unknown): ReadonlyMap<NK, NV> {
      if (!(host instanceof Map)) {
        throw new MarshallingError(typeName, `expected Map, got ${describeValue(host)}`);
      }
      const result = new Map<NK, NV>();
      for (const [k, v] of host) {
        result.set(key.toNative(k), value.toNative(v));
      }
      return result;
    },
    toHost(native: ReadonlyMap<NK, NV>): Map<HK, HV> {
      const result = new Map<HK, HV>();
      for (const [k, v] of native) {
        result.set(key.toHost(k), value.toHost(v));
      }
      return result;
    },
  };
}
