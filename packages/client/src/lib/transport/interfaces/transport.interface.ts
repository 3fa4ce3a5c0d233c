// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcRequest } from '../../types';

export interface ITransport<R> {
  send(request: JsonRpcRequest): Promise<R>;
  close(): void;
}
