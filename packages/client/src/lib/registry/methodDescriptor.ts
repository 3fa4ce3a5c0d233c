// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcParams } from '../types';

/**
 * What a parameter shaper sees as `this`: the registry dispatching it.
 */
export interface ShapeContext {
  resolveWireName(name: string): string;
  shapeParams(name: string, args: readonly unknown[]): JsonRpcParams;
}

/**
 * One JSON-RPC method: both of its names, the fixed id sent with it and the function turning
 * the caller's arguments into the positional `params` array.
 */
export interface MethodDescriptor<C extends string = string, W extends string = string, A extends unknown[] = unknown[]> {
  readonly clientName: C;
  readonly wireName: W;
  readonly requestId: number;
  readonly deprecated: boolean;
  shape(this: ShapeContext, ...args: A): JsonRpcParams;
}

export interface MethodOptions {
  deprecated?: boolean;
}

export const defineMethod = <C extends string, W extends string, A extends unknown[]>(
  clientName: C,
  wireName: W,
  requestId: number,
  shape: (this: ShapeContext, ...args: A) => JsonRpcParams,
  options: MethodOptions = {},
): MethodDescriptor<C, W, A> => {
  return Object.freeze({
    clientName,
    wireName,
    requestId,
    deprecated: options.deprecated ?? false,
    shape,
  });
};
