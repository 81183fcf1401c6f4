/**
 * Bootstrap module: bridge runtime lifecycle and configuration.
 */

export { BridgeRuntime, createBridgeRuntime } from './bootstrap.js';
export {
  type BridgeRuntimeConfig,
  type BridgeRuntimeStatus,
  configFromEnv,
  type ResolvedRuntimeConfig,
  toRuntimeConfig,
} from './types.js';
