/**
 * Native side of the runtime boundary.
 *
 * The host runtime never holds native objects. It calls back into native
 * code through this module using only integers: a function token naming a
 * registered native function, and a correlation token naming the bridge
 * context the call is about.
 */

import { type CorrelationToken, HandleTable, type HandleTableStats } from './handle-table.js';

/** Integer handle naming a registered native function. */
export type FunctionToken = number;

/**
 * A native function callable from the host with (context, argument).
 * The argument is whatever host value the callback received.
 */
export type NativeFunction = (context: CorrelationToken, arg: unknown) => void;

/**
 * Host resolve callable as seen by the boundary. Its parameter type is
 * erased; the handler behind the token knows the real one.
 */
export type HostResolve = (value: never) => void;

/** Host reject callable; always receives a host Error. */
export type HostReject = (reason: Error) => void;

/**
 * Native object a host promise builder initializes with its resolve and
 * reject callables.
 */
export interface ResolveHandlerBase {
  init(resolve: HostResolve, reject: HostReject): void;
}

/**
 * Thrown when the host invokes a function token nobody registered.
 */
export class UnknownNativeFunctionError extends Error {
  readonly functionToken: FunctionToken;

  constructor(functionToken: FunctionToken) {
    super(`No native function registered for token ${functionToken}`);
    this.name = 'UnknownNativeFunctionError';
    this.functionToken = functionToken;
  }
}

/**
 * Interface the host runtime calls into.
 */
export interface NativeModule {
  /** Call a registered native function */
  invoke(fn: FunctionToken, context: CorrelationToken, arg: unknown): void;

  /** Hand a promise builder's callables to the resolve handler behind `context` */
  initResolveHandler(context: CorrelationToken, resolve: HostResolve, reject: HostReject): void;
}

export interface NativeModuleStats {
  functions: number;
  resolveHandlers: HandleTableStats;
}

/**
 * Owns the native function table and the resolve-handler table.
 *
 * @example
 * ```typescript
 * const module = new NativeBridgeModule();
 * const fn = module.registerFunction((context, value) => {
 *   // look up the context, settle it, release it
 * });
 * ```
 */
export class NativeBridgeModule implements NativeModule {
  private readonly functions = new Map<FunctionToken, NativeFunction>();
  private nextFunction: FunctionToken = 1;

  /** Native→Host contexts, keyed by the token the promise builder receives */
  readonly resolveHandlers = new HandleTable<ResolveHandlerBase>('resolve-handler');

  /**
   * Register a native function for the lifetime of the module.
   */
  registerFunction(fn: NativeFunction): FunctionToken {
    const token = this.nextFunction++;
    this.functions.set(token, fn);
    return token;
  }

  invoke(fn: FunctionToken, context: CorrelationToken, arg: unknown): void {
    const target = this.functions.get(fn);
    if (!target) {
      throw new UnknownNativeFunctionError(fn);
    }
    target(context, arg);
  }

  initResolveHandler(context: CorrelationToken, resolve: HostResolve, reject: HostReject): void {
    this.resolveHandlers.get(context).init(resolve, reject);
  }

  stats(): NativeModuleStats {
    return {
      functions: this.functions.size,
      resolveHandlers: this.resolveHandlers.stats(),
    };
  }
}
