// SPDX-License-Identifier: Apache-2.0

import { formatBlock, formatFilter, formatQuantity, formatTransaction, required } from '../../formatters';
import constants from '../constants';
import { defineMethod } from '../registry/methodDescriptor';
import type { BlockSelector, CallFields, FilterOptions, Numeric } from '../types';

export type TraceType = 'trace' | 'vmTrace' | 'stateDiff';

export const traceMethods = [
  defineMethod('traceBlock', 'trace_block', 1, (block: BlockSelector = constants.DEFAULT_BLOCK) => [
    formatBlock(block),
  ]),
  defineMethod('traceCall', 'trace_call', 1, (call: CallFields | null, block: BlockSelector) => [
    formatTransaction(call),
    formatBlock(required(block, 'block')),
  ]),
  defineMethod('traceFilter', 'trace_filter', 1, (filter?: FilterOptions | null) => [formatFilter(filter)]),
  defineMethod('traceGet', 'trace_get', 1, (hash: string, index: Numeric = 0) => [
    required(hash, 'hash'),
    formatQuantity(index, 'index'),
  ]),
  defineMethod('traceRawTransaction', 'trace_RawTransaction', 1, (data: string, traces: readonly TraceType[]) => [
    required(data, 'data'),
    [...required(traces, 'traces')],
  ]),
  defineMethod(
    'traceReplayTransaction',
    'trace_replayTransaction',
    1,
    (hash: string, traces: readonly TraceType[]) => [required(hash, 'hash'), [...required(traces, 'traces')]],
  ),
  defineMethod('traceTransaction', 'trace_transaction', 1, (hash: string) => [required(hash, 'hash')]),
] as const;
