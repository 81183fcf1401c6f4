export {
  HostException,
  NativeException,
  NativeRuntimeError,
  toNativeException,
} from './exceptions.js';
export {
  FutureAlreadyRetrievedError,
  FutureConsumedError,
  FutureNotReadyError,
  type FutureState,
  NativeFuture,
  NativePromise,
  PromiseAlreadySatisfiedError,
  SharedState,
} from './future.js';
export { NativeWorkerPool, type NativeWorkerPoolConfig } from './worker-pool.js';
