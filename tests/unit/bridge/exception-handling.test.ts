/**
 * Tests for native exception adaptation.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { type BridgeRuntime, createBridgeRuntime } from '../../../src/bootstrap/bootstrap.js';
import { guardNative, handleNativeException } from '../../../src/bridge/exception-handling.js';
import { NativeError } from '../../../src/host/exceptions.js';
import { I32Marshaller, StringMarshaller } from '../../../src/marshal/primitives.js';
import { HostException, NativeException } from '../../../src/native/exceptions.js';
import { NativePromise } from '../../../src/native/future.js';

let runtime: BridgeRuntime;

beforeEach(() => {
  runtime = createBridgeRuntime({ workerThreads: 1 });
});

afterEach(() => {
  runtime.shutdown();
});

function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected the promise to reject');
    },
    (error: unknown) => error
  );
}

describe('handleNativeException', () => {
  test('should return a rejected promise for a native exception', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);

    const error = await rejectionOf(
      handleNativeException(adaptor, new NativeException('no such table', 'sql_error'))
    );

    expect(error).toBeInstanceOf(NativeError);
    expect(error).toHaveProperty('message', 'no such table');
    expect(error).toHaveProperty('nativeType', 'sql_error');
  });

  test('should normalize plain errors to runtime errors', async () => {
    const adaptor = runtime.adaptor(StringMarshaller);

    const error = await rejectionOf(handleNativeException(adaptor, new Error('out of memory')));

    expect(error).toHaveProperty('message', 'out of memory');
    expect(error).toHaveProperty('nativeType', 'runtime_error');
  });

  test('should describe non-error values by type', async () => {
    const adaptor = runtime.adaptor(StringMarshaller);

    const error = await rejectionOf(handleNativeException(adaptor, 404));

    expect(error).toHaveProperty('message', 'Native code threw a non-error value: number');
  });

  test('should hand back a carried host error unchanged', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);
    const hostError = new Error('placeholder host failure');

    const error = await rejectionOf(handleNativeException(adaptor, new HostException(hostError)));

    expect(error).toBe(hostError);
  });

  test('should go through the regular bridge path and release its context', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);

    await rejectionOf(handleNativeException(adaptor, new NativeException('x')));

    const status = runtime.getStatus();
    expect(status.resolveHandlers).toEqual({ allocated: 1, released: 1, live: 0 });
    expect(status.trampolines).toBe(1);
    expect(status.host.rejected).toBe(1);
  });

  test('should be reachable from the runtime', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);
    const error = await rejectionOf(
      runtime.handleNativeException(adaptor, new Error('via runtime'))
    );
    expect(error).toHaveProperty('message', 'via runtime');
  });
});

describe('guardNative', () => {
  test('should bridge the future the producer returns', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);
    await expect(guardNative(adaptor, () => NativePromise.resolve(11))).resolves.toBe(11);
  });

  test('should turn a throwing producer into a rejected promise', async () => {
    const adaptor = runtime.adaptor(I32Marshaller);

    const error = await rejectionOf(
      guardNative(adaptor, () => {
        throw new NativeException('corrupt header', 'format_error');
      })
    );

    expect(error).toBeInstanceOf(NativeError);
    expect(error).toHaveProperty('nativeType', 'format_error');
  });

  test('should bridge worker results through the runtime', async () => {
    const adaptor = runtime.adaptor(StringMarshaller);
    await expect(
      runtime.guardNative(adaptor, () => runtime.workers.submit(() => 'from worker'))
    ).resolves.toBe('from worker');
  });
});
