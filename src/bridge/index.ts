/**
 * Bridge module: future adaptors and exception adaptation.
 */

export { BridgeRuntimeError } from './errors.js';
export { guardNative, handleNativeException } from './exception-handling.js';
export {
  FutureAdaptor,
  type FutureAdaptorDeps,
  type FutureAdaptorStats,
  NON_ERROR_REJECTION_MESSAGE,
} from './future-adaptor.js';
