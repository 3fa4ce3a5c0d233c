// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ethrpc/config-service';
import { AxiosHeaders } from 'axios';

import { methodRegistry } from '../src/lib/methods';
import type { RpcResponse } from '../src/lib/transport/httpTransport';
import type { ITransport } from '../src/lib/transport/interfaces/transport.interface';
import type { JsonRpcParams, JsonRpcRequest } from '../src/lib/types';

export const ADDRESS = '0xc8d6ce812a5824aa257ec33257bfd97dc9b78968';
export const OTHER_ADDRESS = '0x407d73d8a49eeb85d32cf465507dd71d507100c1';
export const BLOCK_HASH = '0xe670ec64341771606e55d6b4ca35a1a6b75ee3d5145a99d05921026d1527331a';
export const TX_HASH = '0xb903239f8543d04b5dc1ba6579132b143087c68db1b2168786408fcbce568238';

/**
 * Runs the parameter shaper of a registered method.
 */
export const shape = (name: string, ...args: unknown[]): JsonRpcParams => methodRegistry.shapeParams(name, args);

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export const defer = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/**
 * In-process transport: records every envelope and leaves each response pending until the
 * test settles it.
 */
export class RecordingTransport<R> implements ITransport<R> {
  public readonly requests: JsonRpcRequest[] = [];
  public readonly responses: Deferred<R>[] = [];
  public closed = false;

  public send(request: JsonRpcRequest): Promise<R> {
    const deferred = defer<R>();
    this.requests.push(request);
    this.responses.push(deferred);
    return deferred.promise;
  }

  public close(): void {
    this.closed = true;
  }
}

/**
 * A 200 response carrying `data`, as the HTTP transport would resolve it.
 */
export const okResponse = (data: unknown): RpcResponse => ({
  data,
  status: 200,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

/**
 * Lets every queued promise callback run.
 */
export const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * Sets environment variables for the enclosing `describe` block; `undefined` removes one.
 * The configuration is reloaded on the way in and out.
 */
export const overrideEnvsInMochaDescribe = (overrides: Record<string, string | undefined>): void => {
  const previous: Record<string, string | undefined> = {};

  const apply = (envs: Record<string, string | undefined>) => {
    for (const [name, value] of Object.entries(envs)) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    ConfigService.reload();
  };

  before(() => {
    for (const name of Object.keys(overrides)) {
      previous[name] = process.env[name];
    }
    apply(overrides);
  });

  after(() => apply(previous));
};
