// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ethrpc/config-service';
import Axios, { AxiosInstance, AxiosResponse } from 'axios';
import http from 'http';
import https from 'https';
import { Logger } from 'pino';

import constants from '../constants';
import type { JsonRpcRequest } from '../types';
import type { ITransport } from './interfaces/transport.interface';

/**
 * What the HTTP transport hands back: the axios response, whatever its status. `data` holds the
 * JSON-RPC response body, unparsed.
 */
export type RpcResponse = AxiosResponse<unknown>;

const SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * JSON-RPC over HTTP POST, on a keep-alive connection pool owned by this transport.
 */
export class HttpTransport implements ITransport<RpcResponse> {
  public readonly url: string;

  private readonly logger: Logger;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly client: AxiosInstance;

  /**
   * @param endpoint - `host:port` or a full URL; `http://` is assumed when there is no scheme
   * @param logger
   * @param client - preconfigured axios instance, replaces the one built from configuration
   */
  constructor(endpoint: string, logger: Logger, client?: AxiosInstance) {
    this.url = HttpTransport.buildUrl(endpoint);
    this.logger = logger.child({ name: 'http-transport' });

    const keepAlive = ConfigService.get('ETH_RPC_HTTP_KEEP_ALIVE');
    const keepAliveMsecs = ConfigService.get('ETH_RPC_HTTP_KEEP_ALIVE_MSECS');
    const maxSockets = ConfigService.get('ETH_RPC_HTTP_MAX_SOCKETS');
    this.httpAgent = new http.Agent({ keepAlive, keepAliveMsecs, maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive, keepAliveMsecs, maxSockets });

    this.client = client ?? this.createAxiosClient();
    this.logger.info(`HTTP transport configured for ${this.url}`);
  }

  static buildUrl(endpoint: string): string {
    return SCHEME_REGEX.test(endpoint) ? endpoint : `http://${endpoint}`;
  }

  protected createAxiosClient(): AxiosInstance {
    const axiosClient: AxiosInstance = Axios.create({
      responseType: 'json' as const,
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: ConfigService.get('ETH_RPC_HTTP_TIMEOUT'),
      maxRedirects: ConfigService.get('ETH_RPC_HTTP_MAX_REDIRECTS'),
      // every status is handed to the caller, JSON-RPC errors included
      validateStatus: () => true,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
    });

    const apiKey = ConfigService.get('ETH_RPC_HEADER_X_API_KEY');
    if (apiKey) {
      axiosClient.defaults.headers.common[constants.X_API_KEY] = apiKey;
    }

    return axiosClient;
  }

  public async send(request: JsonRpcRequest): Promise<RpcResponse> {
    const response = await this.client.post<unknown>(this.url, request);
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`[POST] ${request.method} (id ${request.id}) answered with status ${response.status}`);
    }
    return response;
  }

  /**
   * Destroys the pooled sockets. Requests sent afterwards open new ones.
   */
  public close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
