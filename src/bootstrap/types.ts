/**
 * Bridge runtime configuration and status types.
 */

import type { FutureAdaptorStats } from '../bridge/future-adaptor.js';
import { BridgeRuntimeError } from '../bridge/errors.js';
import type { HandleTableStats } from '../ffi/handle-table.js';
import type { HostRuntimeStats } from '../host/runtime.js';
import type { LogLevel } from '../logging/index.js';
import type { ThreadingMode, ThreadMarshallerStats } from '../threading/marshaller.js';

const THREADING_MODES: readonly ThreadingMode[] = ['inline', 'main-thread'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

/**
 * Configuration for a bridge runtime. Every field is optional.
 */
export interface BridgeRuntimeConfig {
  /**
   * How settlement work reaches the host lane (default: "main-thread").
   * Use "inline" when native and host code share one lane.
   */
  threading?: ThreadingMode;

  /** Number of native worker lanes (default: 4). */
  workerThreads?: number;

  /** Log level applied to the bridge logger. Left untouched when omitted. */
  logLevel?: LogLevel;
}

/**
 * Configuration with defaults applied.
 */
export interface ResolvedRuntimeConfig {
  threading: ThreadingMode;
  workerThreads: number;
  logLevel?: LogLevel;
}

/**
 * Snapshot of a bridge runtime.
 */
export interface BridgeRuntimeStatus {
  /** Whether the runtime still accepts work */
  running: boolean;

  threading: ThreadingMode;

  workerThreads: number;

  /** Adaptors created by this runtime */
  adaptors: number;

  /** Native→Host contexts (resolve handlers) */
  resolveHandlers: HandleTableStats;

  /** Host→Native contexts (pending native promises), summed over adaptors */
  nativePromises: HandleTableStats;

  /** Trampolines run, summed over adaptors */
  trampolines: number;

  host: HostRuntimeStats;

  marshaller: ThreadMarshallerStats;
}

function isThreadingMode(value: string): value is ThreadingMode {
  return THREADING_MODES.some((mode) => mode === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Apply defaults and validate.
 *
 * @throws BridgeRuntimeError for an unknown threading mode or a worker
 * count that is not a positive integer
 */
export function toRuntimeConfig(config?: BridgeRuntimeConfig): ResolvedRuntimeConfig {
  const threading = config?.threading ?? 'main-thread';
  if (!isThreadingMode(threading)) {
    throw new BridgeRuntimeError(`Unknown threading mode: ${String(threading)}`);
  }

  const workerThreads = config?.workerThreads ?? 4;
  if (!Number.isInteger(workerThreads) || workerThreads < 1) {
    throw new BridgeRuntimeError(
      `workerThreads must be a positive integer, got ${String(workerThreads)}`
    );
  }

  const result: ResolvedRuntimeConfig = { threading, workerThreads };
  if (config?.logLevel !== undefined) result.logLevel = config.logLevel;
  return result;
}

/**
 * Read configuration from environment variables.
 *
 * - FUTURE_BRIDGE_THREADING: "inline" or "main-thread"
 * - FUTURE_BRIDGE_WORKERS: positive integer
 * - FUTURE_BRIDGE_LOG_LEVEL: trace, debug, info, warn, error, silent
 *
 * Unset variables are left out of the result.
 *
 * @throws BridgeRuntimeError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): BridgeRuntimeConfig {
  const config: BridgeRuntimeConfig = {};

  const threading = env.FUTURE_BRIDGE_THREADING;
  if (threading !== undefined) {
    if (!isThreadingMode(threading)) {
      throw new BridgeRuntimeError(`FUTURE_BRIDGE_THREADING has invalid value "${threading}"`);
    }
    config.threading = threading;
  }

  const workers = env.FUTURE_BRIDGE_WORKERS;
  if (workers !== undefined) {
    const parsed = Number(workers);
    if (workers.trim() === '' || !Number.isInteger(parsed) || parsed < 1) {
      throw new BridgeRuntimeError(`FUTURE_BRIDGE_WORKERS has invalid value "${workers}"`);
    }
    config.workerThreads = parsed;
  }

  const logLevel = env.FUTURE_BRIDGE_LOG_LEVEL;
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new BridgeRuntimeError(`FUTURE_BRIDGE_LOG_LEVEL has invalid value "${logLevel}"`);
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Sum per-adaptor statistics.
 */
export function sumAdaptorStats(stats: readonly FutureAdaptorStats[]): {
  nativePromises: HandleTableStats;
  trampolines: number;
} {
  const nativePromises: HandleTableStats = { allocated: 0, released: 0, live: 0 };
  let trampolines = 0;
  for (const entry of stats) {
    nativePromises.allocated += entry.nativePromises.allocated;
    nativePromises.released += entry.nativePromises.released;
    nativePromises.live += entry.nativePromises.live;
    trampolines += entry.trampolines;
  }
  return { nativePromises, trampolines };
}
