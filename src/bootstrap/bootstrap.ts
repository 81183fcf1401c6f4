/**
 * Bootstrap API for the bridge runtime.
 *
 * Wires the native module, the thread marshaller, the host runtime and the
 * native worker pool together, and hands out future adaptors that share
 * them.
 */

import { BridgeRuntimeError } from '../bridge/errors.js';
import { guardNative, handleNativeException } from '../bridge/exception-handling.js';
import { FutureAdaptor, type FutureAdaptorStats } from '../bridge/future-adaptor.js';
import { NativeBridgeModule } from '../ffi/native-module.js';
import type { ExceptionTranslator } from '../host/exceptions.js';
import { HostRuntime } from '../host/runtime.js';
import { logInfo, setLogLevel } from '../logging/index.js';
import type { Marshaller } from '../marshal/types.js';
import type { NativeFuture } from '../native/future.js';
import { NativeWorkerPool } from '../native/worker-pool.js';
import { ThreadMarshaller } from '../threading/marshaller.js';
import {
  type BridgeRuntimeConfig,
  type BridgeRuntimeStatus,
  type ResolvedRuntimeConfig,
  sumAdaptorStats,
  toRuntimeConfig,
} from './types.js';

/**
 * A running bridge runtime.
 */
export class BridgeRuntime {
  readonly config: ResolvedRuntimeConfig;
  readonly native: NativeBridgeModule;
  readonly marshaller: ThreadMarshaller;
  readonly host: HostRuntime;
  readonly workers: NativeWorkerPool;

  private readonly adaptorStats: Array<() => FutureAdaptorStats> = [];
  private running = true;

  constructor(config: ResolvedRuntimeConfig, translator?: ExceptionTranslator) {
    this.config = config;
    this.native = new NativeBridgeModule();
    this.marshaller = new ThreadMarshaller(config.threading);
    this.host = new HostRuntime(this.native, this.marshaller, translator);
    this.workers = new NativeWorkerPool({ size: config.workerThreads });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Create the bridge for one result type.
   *
   * Create one adaptor per result type and reuse it; each adaptor registers
   * its own native functions.
   *
   * @throws BridgeRuntimeError after shutdown()
   */
  adaptor<N, H>(result: Marshaller<N, H>): FutureAdaptor<N, H> {
    this.assertRunning('adaptor');
    const adaptor = new FutureAdaptor(result, {
      native: this.native,
      host: this.host,
      marshaller: this.marshaller,
    });
    this.adaptorStats.push(() => adaptor.stats());
    return adaptor;
  }

  handleNativeException<N, H>(adaptor: FutureAdaptor<N, H>, error: unknown): Promise<H> {
    return handleNativeException(adaptor, error);
  }

  guardNative<N, H>(adaptor: FutureAdaptor<N, H>, producer: () => NativeFuture<N>): Promise<H> {
    return guardNative(adaptor, producer);
  }

  getStatus(): BridgeRuntimeStatus {
    const { nativePromises, trampolines } = sumAdaptorStats(
      this.adaptorStats.map((stats) => stats())
    );
    return {
      running: this.running,
      threading: this.config.threading,
      workerThreads: this.workers.size,
      adaptors: this.adaptorStats.length,
      resolveHandlers: this.native.resolveHandlers.stats(),
      nativePromises,
      trampolines,
      host: this.host.stats(),
      marshaller: this.marshaller.stats(),
    };
  }

  /**
   * Stop accepting work. Safe to call more than once.
   *
   * Bridges already in flight still settle.
   */
  shutdown(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.workers.shutdown();
    logInfo('Bridge runtime stopped', {
      component: 'bootstrap',
      adaptors: this.adaptorStats.length,
    });
  }

  private assertRunning(operation: string): void {
    if (!this.running) {
      throw new BridgeRuntimeError(`Cannot call ${operation}() after shutdown`);
    }
  }
}

/**
 * Create a bridge runtime.
 *
 * @throws BridgeRuntimeError if the configuration is invalid
 *
 * @example
 * ```typescript
 * const runtime = createBridgeRuntime({ threading: 'main-thread', workerThreads: 2 });
 * const adaptor = runtime.adaptor(StringMarshaller);
 * const greeting = await adaptor.toHost(runtime.workers.submit(() => 'hello'));
 * runtime.shutdown();
 * ```
 */
export function createBridgeRuntime(
  config?: BridgeRuntimeConfig,
  translator?: ExceptionTranslator
): BridgeRuntime {
  const resolved = toRuntimeConfig(config);
  if (resolved.logLevel !== undefined) {
    setLogLevel(resolved.logLevel);
  }

  const runtime = new BridgeRuntime(resolved, translator);
  logInfo('Bridge runtime started', {
    component: 'bootstrap',
    threading: resolved.threading,
    worker_threads: resolved.workerThreads,
  });
  return runtime;
}
