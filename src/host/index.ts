/**
 * Host side of the bridge: promise builders and exception translation.
 */

export { defaultExceptionTranslator, type ExceptionTranslator, NativeError } from './exceptions.js';
export { type HostCallback, HostRuntime, type HostRuntimeStats, type PromiseBuilder } from './runtime.js';
