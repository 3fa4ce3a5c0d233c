// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ethrpc/config-service';

import { HttpTransport, RpcResponse } from '../transport/httpTransport';
import { AbstractClient, ClientOptions, createLogger } from './abstractClient';

/**
 * Lets up to `maxConcurrency` requests (`ETH_RPC_MAX_CONCURRENCY` by default) share the
 * connection pool at once; further calls queue until a slot frees up.
 */
export class AsyncClient extends AbstractClient<RpcResponse> {
  constructor(options: ClientOptions<RpcResponse> = {}) {
    const logger = options.logger ?? createLogger();
    const transport =
      options.transport ?? new HttpTransport(options.endpoint ?? ConfigService.get('ETH_RPC_ENDPOINT'), logger);
    super(transport, options.maxConcurrency ?? ConfigService.get('ETH_RPC_MAX_CONCURRENCY'), { ...options, logger });
  }

  /**
   * Resolves with every result in call order, or rejects with the first failure.
   */
  static all<T>(calls: Iterable<T | PromiseLike<T>>): Promise<Awaited<T>[]> {
    return Promise.all(calls);
  }
}
