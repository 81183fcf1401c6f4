/**
 * Future bridge
 *
 * Bridges native futures and host promises in both directions, with
 * exception translation and host-lane marshalling.
 *
 * @packageDocumentation
 */

// =============================================================================
// Bootstrap module - runtime lifecycle and configuration
// =============================================================================
export {
  BridgeRuntime,
  type BridgeRuntimeConfig,
  type BridgeRuntimeStatus,
  configFromEnv,
  createBridgeRuntime,
  type ResolvedRuntimeConfig,
  toRuntimeConfig,
} from './bootstrap/index.js';
// =============================================================================
// Bridge module - future adaptors and exception adaptation
// =============================================================================
export {
  BridgeRuntimeError,
  FutureAdaptor,
  type FutureAdaptorDeps,
  type FutureAdaptorStats,
  guardNative,
  handleNativeException,
  NON_ERROR_REJECTION_MESSAGE,
} from './bridge/index.js';
// =============================================================================
// FFI module - correlation tokens and the native function table
// =============================================================================
export * from './ffi/index.js';
// =============================================================================
// Host module - promise builders and exception translation
// =============================================================================
export * from './host/index.js';
// =============================================================================
// Logging module - structured logging through pino
// =============================================================================
export {
  type BoundLogger,
  clearLogger,
  createLogger,
  getLogger,
  type LogFields,
  type LogLevel,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setLogger,
  setLogLevel,
} from './logging/index.js';
// =============================================================================
// Marshal module - boxing for bridge result types
// =============================================================================
export * from './marshal/index.js';
// =============================================================================
// Native module - futures, promises, exceptions and the worker pool
// =============================================================================
export * from './native/index.js';
// =============================================================================
// Threading module - logical lanes and host-thread marshalling
// =============================================================================
export * from './threading/index.js';
