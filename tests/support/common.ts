/**
 * Shared helpers for bridge tests.
 */

import pino, { type LevelWithSilent } from 'pino';
import { setLogger } from '../../src/logging/index.js';
import type { NativeFuture } from '../../src/native/future.js';

/**
 * Wait until every lane has drained the tasks queued so far.
 */
export function flushLanes(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Await a native future from host code without bridging it.
 */
export function settleNative<T>(future: NativeFuture<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    future.then((completed) => {
      try {
        resolve(completed.get());
      } catch (error) {
        reject(error);
      }
    });
  });
}

export interface CapturedRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function isCapturedRecord(value: unknown): value is CapturedRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'level' in value &&
    typeof value.level === 'number' &&
    'msg' in value &&
    typeof value.msg === 'string'
  );
}

/**
 * Install a pino logger that keeps every record in memory.
 */
export function captureLogs(level: LevelWithSilent = 'trace'): CapturedRecord[] {
  const records: CapturedRecord[] = [];
  const destination = {
    write(line: string): void {
      const parsed: unknown = JSON.parse(line);
      if (isCapturedRecord(parsed)) {
        records.push(parsed);
      }
    },
  };
  setLogger(pino({ level }, destination));
  return records;
}
