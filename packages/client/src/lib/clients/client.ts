// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ethrpc/config-service';

import { HttpTransport, RpcResponse } from '../transport/httpTransport';
import { AbstractClient, ClientOptions, createLogger } from './abstractClient';

export type BlockingClientOptions = Omit<ClientOptions<RpcResponse>, 'maxConcurrency'>;

/**
 * Sends one request at a time: a call is not sent before the previous one has been answered.
 */
export class Client extends AbstractClient<RpcResponse> {
  constructor(options: BlockingClientOptions = {}) {
    const logger = options.logger ?? createLogger();
    const transport =
      options.transport ?? new HttpTransport(options.endpoint ?? ConfigService.get('ETH_RPC_ENDPOINT'), logger);
    super(transport, 1, { ...options, logger });
  }
}
