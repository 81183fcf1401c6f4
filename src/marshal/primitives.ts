/**
 * Marshallers for scalar result types.
 */

import {
  describeValue,
  MarshallingError,
  type ValueMarshaller,
  type VoidResultMarshaller,
} from './types.js';

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

/**
 * The "no value" type. Both directions are no-ops.
 */
export const VoidMarshaller: VoidResultMarshaller<void, undefined> = {
  typeName: 'void',
  isVoid: true,
  emptyNative: undefined,
  emptyHost: undefined,
  toNative(_host: unknown): void {},
  toHost(_native: void): undefined {
    return undefined;
  },
};

export const BoolMarshaller: ValueMarshaller<boolean, boolean> = {
  typeName: 'bool',
  isVoid: false,
  toNative(host: unknown): boolean {
    if (typeof host !== 'boolean') {
      throw new MarshallingError('bool', `expected boolean, got ${describeValue(host)}`);
    }
    return host;
  },
  toHost(native: boolean): boolean {
    return native;
  },
};

function checkI32(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new MarshallingError('i32', `expected an integer, got ${describeValue(value)}`);
  }
  if (value < I32_MIN || value > I32_MAX) {
    throw new MarshallingError('i32', `${value} is outside the 32-bit range`);
  }
  return value;
}

export const I32Marshaller: ValueMarshaller<number, number> = {
  typeName: 'i32',
  isVoid: false,
  toNative: checkI32,
  toHost: checkI32,
};

export const F64Marshaller: ValueMarshaller<number, number> = {
  typeName: 'f64',
  isVoid: false,
  toNative(host: unknown): number {
    if (typeof host !== 'number') {
      throw new MarshallingError('f64', `expected number, got ${describeValue(host)}`);
    }
    return host;
  },
  toHost(native: number): number {
    return native;
  },
};

export const StringMarshaller: ValueMarshaller<string, string> = {
  typeName: 'string',
  isVoid: false,
  toNative(host: unknown): string {
    if (typeof host !== 'string') {
      throw new MarshallingError('string', `expected string, got ${describeValue(host)}`);
    }
    return host;
  },
  toHost(native: string): string {
    return native;
  },
};

/**
 * Byte buffers are copied in both directions; neither side keeps a view
 * into memory the other side owns.
 */
export const BinaryMarshaller: ValueMarshaller<Uint8Array, Uint8Array> = {
  typeName: 'binary',
  isVoid: false,
  toNative(host: unknown): Uint8Array {
    if (!(host instanceof Uint8Array)) {
      throw new MarshallingError('binary', `expected Uint8Array, got ${describeValue(host)}`);
    }
    return Uint8Array.from(host);
  },
  toHost(native: Uint8Array): Uint8Array {
    return Uint8Array.from(native);
  },
};

/**
 * Native dates are milliseconds since the Unix epoch; host dates are Date.
 */
export const DateMarshaller: ValueMarshaller<number, Date> = {
  typeName: 'date',
  isVoid: false,
  toNative(host: unknown): number {
    if (!(host instanceof Date)) {
      throw new MarshallingError('date', `expected Date, got ${describeValue(host)}`);
    }
    const millis = host.getTime();
    if (Number.isNaN(millis)) {
      throw new MarshallingError('date', 'invalid Date');
    }
    return millis;
  },
  toHost(native: number): Date {
    return new Date(native);
  },
};
