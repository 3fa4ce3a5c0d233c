// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ethrpc/config-service';
import pino, { Logger } from 'pino';
import { Registry } from 'prom-client';

import { RequestDispatcher } from '../dispatcher/requestDispatcher';
import type { RpcMethods } from '../methods';
import { methodRegistry } from '../methods';
import type { MethodRegistry } from '../registry/methodRegistry';
import { ConcurrencyLimitedTransport } from '../transport/concurrencyLimitedTransport';
import type { ITransport } from '../transport/interfaces/transport.interface';

export interface ClientOptions<R> {
  /**
   * `host:port` or URL of the node, `ETH_RPC_ENDPOINT` when not given.
   */
  endpoint?: string;
  maxConcurrency?: number;
  logger?: Logger;
  /**
   * prom-client registry receiving the request duration histogram.
   */
  register?: Registry;
  transport?: ITransport<R>;
}

export const createLogger = (): Logger =>
  pino({
    name: 'ethrpc-client',
    level: ConfigService.get('LOG_LEVEL'),
  });

// Every registered method is defined on the instance under both of its names.
export interface AbstractClient<R> extends RpcMethods<R> {}

/**
 * Binds the method table to a transport. Subclasses decide which transport and how many
 * requests may be in flight at once.
 */
export abstract class AbstractClient<R> {
  protected readonly logger: Logger;
  protected readonly registry: MethodRegistry;
  protected readonly transport: ConcurrencyLimitedTransport<R>;
  private readonly dispatcher: RequestDispatcher<R>;

  protected constructor(transport: ITransport<R>, maxConcurrency: number, options: ClientOptions<R>) {
    this.logger = options.logger ?? createLogger();
    this.registry = methodRegistry;
    this.transport = new ConcurrencyLimitedTransport(transport, maxConcurrency);
    this.dispatcher = new RequestDispatcher(this.registry, this.transport, this.logger, options.register);

    for (const descriptor of this.registry.descriptors()) {
      const call = (...args: unknown[]): Promise<R> => this.dispatcher.dispatch(descriptor.clientName, args);
      Object.defineProperty(this, descriptor.clientName, { value: call, enumerable: true });
      Object.defineProperty(this, descriptor.wireName, { value: call, enumerable: true });
    }
  }

  /**
   * Requests currently awaiting the transport.
   */
  get inFlight(): number {
    return this.transport.inFlight;
  }

  /**
   * Requests waiting for a free slot.
   */
  get pending(): number {
    return this.transport.pending;
  }

  /**
   * Calls a method by either of its names with untyped arguments.
   */
  public request(name: string, ...args: unknown[]): Promise<R> {
    return this.dispatcher.dispatch(name, args);
  }

  public resolveWireName(name: string): string {
    return this.registry.resolveWireName(name);
  }

  public resolveClientName(name: string): string {
    return this.registry.resolveClientName(name);
  }

  /**
   * Releases the pooled connections of the transport.
   */
  public close(): void {
    this.transport.close();
  }
}
