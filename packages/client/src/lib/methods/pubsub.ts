// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, required } from '../../formatters';
import type { ShapeContext } from '../registry/methodDescriptor';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric } from '../types';

export const pubsubMethods = [
  // subscribes to any registered method: its own shaper builds the inner params
  defineMethod('paritySubscribe', 'parity_subscribe', 1, function (this: ShapeContext, method: string, ...args: unknown[]) {
    required(method, 'method');
    return [this.resolveWireName(method), this.shapeParams(method, args)];
  }),
  defineMethod('parityUnsubscribe', 'parity_unsubscribe', 1, (subscriptionId: Numeric) => [
    formatQuantity(required(subscriptionId, 'subscriptionId'), 'subscriptionId'),
  ]),
] as const;
