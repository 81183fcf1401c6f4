/**
 * Marshalling module: boxing collaborators for bridge result types.
 */

export { list, map, optional } from './containers.js';
export {
  BinaryMarshaller,
  BoolMarshaller,
  DateMarshaller,
  F64Marshaller,
  I32Marshaller,
  StringMarshaller,
  VoidMarshaller,
} from './primitives.js';
export {
  describeValue,
  type HostOf,
  type Marshaller,
  MarshallingError,
  type NativeOf,
  type ValueMarshaller,
  type VoidResultMarshaller,
} from './types.js';
