// SPDX-License-Identifier: Apache-2.0

import { InvalidArgumentError } from '../errors/InvalidArgumentError';
import type { JsonRpcParams } from '../types';
import type { MethodDescriptor, ShapeContext } from './methodDescriptor';

/**
 * Read-only table of the supported methods, indexed by client name and by wire name.
 */
export class MethodRegistry implements ShapeContext {
  private readonly byClientName = new Map<string, MethodDescriptor>();
  private readonly byWireName = new Map<string, MethodDescriptor>();

  /**
   * @throws Error when two descriptors share a client name or a wire name.
   */
  constructor(descriptors: Iterable<MethodDescriptor>) {
    for (const descriptor of descriptors) {
      if (this.byClientName.has(descriptor.clientName)) {
        throw new Error(`Method ${descriptor.clientName} is registered twice.`);
      }
      if (this.byWireName.has(descriptor.wireName)) {
        throw new Error(`Wire method ${descriptor.wireName} is registered twice.`);
      }
      this.byClientName.set(descriptor.clientName, descriptor);
      this.byWireName.set(descriptor.wireName, descriptor);
    }
  }

  get size(): number {
    return this.byClientName.size;
  }

  /**
   * Wire name for a client name; any other input comes back unchanged.
   */
  public resolveWireName(name: string): string {
    return this.byClientName.get(name)?.wireName ?? name;
  }

  /**
   * Client name for a wire name; any other input comes back unchanged.
   */
  public resolveClientName(name: string): string {
    return this.byWireName.get(name)?.clientName ?? name;
  }

  public get(name: string): MethodDescriptor | undefined {
    return this.byClientName.get(name) ?? this.byWireName.get(name);
  }

  public has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  public descriptors(): MethodDescriptor[] {
    return Array.from(this.byClientName.values());
  }

  /**
   * Runs the parameter shaper of a method, looked up by either of its names.
   *
   * @throws InvalidArgumentError if the method is unknown or the arguments are rejected.
   */
  public shapeParams(name: string, args: readonly unknown[]): JsonRpcParams {
    const descriptor = this.get(name);
    if (!descriptor) {
      throw InvalidArgumentError.unknownMethod(name);
    }
    return descriptor.shape.call(this, ...args);
  }
}
