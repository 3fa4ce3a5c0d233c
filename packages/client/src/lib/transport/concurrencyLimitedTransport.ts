// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcRequest } from '../types';
import type { ITransport } from './interfaces/transport.interface';
import { Semaphore } from './semaphore';

/**
 * Lets at most `limit` requests into the wrapped transport at once; the rest wait their turn.
 */
export class ConcurrencyLimitedTransport<R> implements ITransport<R> {
  private readonly semaphore: Semaphore;

  constructor(
    private readonly transport: ITransport<R>,
    public readonly limit: number,
  ) {
    this.semaphore = new Semaphore(limit);
  }

  get inFlight(): number {
    return this.semaphore.inUse;
  }

  get pending(): number {
    return this.semaphore.pending;
  }

  public send(request: JsonRpcRequest): Promise<R> {
    return this.semaphore.use(() => this.transport.send(request));
  }

  public close(): void {
    this.transport.close();
  }
}
