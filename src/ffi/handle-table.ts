/**
 * Correlation tokens.
 *
 * The runtime boundary only carries primitive values, so native objects that
 * must be reachable from a host callback are registered here and referred to
 * by an integer token. A token is issued once, resolved any number of times
 * while live, and released exactly once.
 */

/** Integer handle standing in for a native object reference. */
export type CorrelationToken = number;

/**
 * Thrown when a token is unknown, already released, or not an integer.
 */
export class InvalidHandleError extends Error {
  readonly token: unknown;

  constructor(token: unknown, table: string) {
    super(`Invalid handle ${String(token)} for ${table} (unknown or already released)`);
    this.name = 'InvalidHandleError';
    this.token = token;
  }
}

/**
 * Allocation counters for one table.
 */
export interface HandleTableStats {
  /** Tokens issued over the table's lifetime */
  allocated: number;
  /** Tokens released over the table's lifetime */
  released: number;
  /** Tokens currently live */
  live: number;
}

/**
 * Maps correlation tokens to the resources they own.
 *
 * Tokens are strictly increasing and never reused, so a stale token can
 * never resolve to a newer resource.
 *
 * @example
 * ```typescript
 * const table = new HandleTable<NativePromise<number>>('native-promise');
 * const token = table.allocate(promise);
 * // ... token crosses the boundary ...
 * const owned = table.release(token);
 * ```
 */
export class HandleTable<T extends object> {
  private readonly entries = new Map<CorrelationToken, T>();
  private nextToken: CorrelationToken = 1;
  private allocatedCount = 0;
  private releasedCount = 0;

  constructor(readonly label: string) {}

  /**
   * Register a resource and return its token.
   */
  allocate(resource: T): CorrelationToken {
    const token = this.nextToken++;
    this.entries.set(token, resource);
    this.allocatedCount++;
    return token;
  }

  /**
   * Resolve a live token without releasing it.
   */
  get(token: CorrelationToken): T {
    const resource = this.entries.get(token);
    if (resource === undefined) {
      throw new InvalidHandleError(token, this.label);
    }
    return resource;
  }

  /**
   * Whether the token is currently live.
   */
  has(token: CorrelationToken): boolean {
    return this.entries.has(token);
  }

  /**
   * Remove the resource and hand ownership back to the caller.
   *
   * Releasing a token twice throws; a double free is never silent.
   */
  release(token: CorrelationToken): T {
    const resource = this.get(token);
    this.entries.delete(token);
    this.releasedCount++;
    return resource;
  }

  /**
   * Number of live tokens.
   */
  get size(): number {
    return this.entries.size;
  }

  stats(): HandleTableStats {
    return {
      allocated: this.allocatedCount,
      released: this.releasedCount,
      live: this.entries.size,
    };
  }
}
