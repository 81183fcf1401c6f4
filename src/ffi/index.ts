/**
 * Native boundary: correlation tokens and the native function table.
 */

export {
  type CorrelationToken,
  HandleTable,
  type HandleTableStats,
  InvalidHandleError,
} from './handle-table.js';
export {
  type FunctionToken,
  type HostReject,
  type HostResolve,
  NativeBridgeModule,
  type NativeFunction,
  type NativeModule,
  type NativeModuleStats,
  type ResolveHandlerBase,
  UnknownNativeFunctionError,
} from './native-module.js';
