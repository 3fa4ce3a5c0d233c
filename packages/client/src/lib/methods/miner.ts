// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric } from '../types';

export const minerMethods = [
  defineMethod('minerSetExtra', 'miner_setExtra', 1, (data: string) => [required(data, 'data')]),
  defineMethod('minerSetGasPrice', 'miner_setGasPrice', 1, (gasPrice: Numeric) => [
    formatQuantity(required(gasPrice, 'gasPrice'), 'gasPrice'),
  ]),
  defineMethod('minerStart', 'miner_start', 1, (threads: Numeric) => [
    formatQuantity(required(threads, 'threads'), 'threads'),
  ]),
  defineMethod('minerStop', 'miner_stop', 1, () => []),
  defineMethod('minerSetEtherBase', 'miner_setEtherBase', 1, (address: string) => [required(address, 'address')]),
] as const;
