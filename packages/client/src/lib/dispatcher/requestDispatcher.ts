// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';
import { Histogram, Registry } from 'prom-client';
import { v4 as uuid } from 'uuid';

import { formatRequestIdMessage } from '../../formatters';
import constants from '../constants';
import { InvalidArgumentError } from '../errors/InvalidArgumentError';
import type { MethodRegistry } from '../registry/methodRegistry';
import type { ITransport } from '../transport/interfaces/transport.interface';
import type { JsonRpcParams, JsonRpcRequest } from '../types';
import type { IRequestDispatcher } from './interfaces/requestDispatcher.interface';

/**
 * Builds the JSON-RPC 2.0 envelope of one call. The envelope is frozen.
 */
export const createRequest = (method: string, params: JsonRpcParams, id: number): JsonRpcRequest => {
  return Object.freeze({ jsonrpc: constants.JSON_RPC_VERSION, method, params, id });
};

/**
 * Turns a named call into an envelope and hands it to the transport.
 * The transport's response, or its failure, is passed back as is.
 */
export class RequestDispatcher<R> implements IRequestDispatcher<R> {
  private readonly logger: Logger;
  private readonly requestDurationHistogram?: Histogram<'method' | 'outcome'>;

  /**
   * @param registry - methods this dispatcher knows
   * @param transport - where envelopes are sent
   * @param logger
   * @param register - when given, call durations are recorded in it
   */
  constructor(
    private readonly registry: MethodRegistry,
    private readonly transport: ITransport<R>,
    logger: Logger,
    register?: Registry,
  ) {
    this.logger = logger.child({ name: 'request-dispatcher' });

    if (register) {
      // dispatchers sharing a registry record into one histogram
      const existing = register.getSingleMetric(constants.METRIC_REQUEST_DURATION);
      this.requestDurationHistogram =
        existing instanceof Histogram
          ? existing
          : new Histogram({
              name: constants.METRIC_REQUEST_DURATION,
              help: 'JSON-RPC request duration by method and outcome',
              labelNames: ['method', 'outcome'],
              registers: [register],
              buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000], // ms (milliseconds)
            });
    }
  }

  /**
   * Shapes the arguments, wraps them into an envelope and sends it.
   *
   * @param name - client or wire name of the method
   * @param args - the caller's arguments
   * @returns the transport's promise
   * @throws InvalidArgumentError synchronously, before anything is sent, when the method is unknown
   * or the arguments are rejected
   */
  public dispatch(name: string, args: readonly unknown[]): Promise<R> {
    const descriptor = this.registry.get(name);
    if (!descriptor) {
      throw InvalidArgumentError.unknownMethod(name);
    }

    const params = this.registry.shapeParams(descriptor.clientName, args);
    const requestIdPrefix = formatRequestIdMessage(uuid());
    if (descriptor.deprecated) {
      this.logger.warn(`${requestIdPrefix} Calling deprecated method ${descriptor.clientName}`);
    }

    const request = createRequest(descriptor.wireName, params, descriptor.requestId);
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestIdPrefix} Sending ${request.method} (id ${request.id}) with ${params.length} params`);
    }

    const start = Date.now();
    return this.transport.send(request).then(
      (response) => {
        this.observe(request.method, 'success', start);
        return response;
      },
      (error: unknown) => {
        this.observe(request.method, 'failure', start);
        if (this.logger.isLevelEnabled('debug')) {
          this.logger.debug(`${requestIdPrefix} ${request.method} failed in transport: ${String(error)}`);
        }
        throw error;
      },
    );
  }

  private observe(method: string, outcome: 'success' | 'failure', start: number): void {
    this.requestDurationHistogram?.observe({ method, outcome }, Date.now() - start);
  }
}
