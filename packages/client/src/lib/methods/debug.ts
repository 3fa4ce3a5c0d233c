// SPDX-License-Identifier: Apache-2.0

import { formatBlock, formatQuantity, required } from '../../formatters';
import constants from '../constants';
import { defineMethod } from '../registry/methodDescriptor';
import type { BlockSelector, JsonObject, Numeric } from '../types';

const DEFAULT_BLOCK = constants.DEFAULT_BLOCK;

/**
 * Tracer options passed through as given, e.g. `{ tracer: 'callTracer', timeout: '10s' }`.
 */
export type TraceConfig = JsonObject;

export const debugMethods = [
  defineMethod('debugBacktraceAt', 'debug_backtraceAt', 1, (filename: string, line: number) => [
    `${required(filename, 'filename')}:${required(line, 'line')}`,
  ]),
  defineMethod('debugBlockProfile', 'debug_blockProfile', 1, (path: string, seconds: Numeric) => [
    required(path, 'path'),
    formatQuantity(required(seconds, 'seconds'), 'seconds'),
  ]),
  defineMethod('debugCpuProfile', 'debug_cpuProfile', 1, (path: string, seconds: Numeric) => [
    required(path, 'path'),
    formatQuantity(required(seconds, 'seconds'), 'seconds'),
  ]),
  defineMethod('debugDumpBlock', 'debug_dumpBlock', 1, (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)]),
  defineMethod('debugGcStats', 'debug_gcStats', 1, () => []),
  defineMethod('debugGetBlockRlp', 'debug_getBlockRlp', 1, (block: BlockSelector = DEFAULT_BLOCK) => [
    formatBlock(block),
  ]),
  defineMethod('debugGoTrace', 'debug_goTrace', 1, (path: string, seconds: Numeric) => [
    required(path, 'path'),
    formatQuantity(required(seconds, 'seconds'), 'seconds'),
  ]),
  defineMethod('debugMemStats', 'debug_memStats', 1, () => []),
  defineMethod('debugSeedHash', 'debug_seedHash', 1, (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)]),
  defineMethod('debugSetHead', 'debug_setHead', 1, (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)]),
  defineMethod('debugSetBlockProfileRate', 'debug_setBlockProfileRate', 1, (rate: Numeric) => [
    formatQuantity(required(rate, 'rate'), 'rate'),
  ]),
  defineMethod('debugStacks', 'debug_stacks', 1, () => []),
  defineMethod('debugStartCpuProfile', 'debug_startCPUProfile', 1, (path: string) => [required(path, 'path')]),
  defineMethod('debugStartGoTrace', 'debug_startGoTrace', 1, (path: string) => [required(path, 'path')]),
  defineMethod('debugStopCpuProfile', 'debug_stopCPUProfile', 1, () => []),
  defineMethod('debugStopGoTrace', 'debug_stopGoTrace', 1, () => []),
  defineMethod(
    'debugTraceBlock',
    'debug_traceBlock',
    1,
    (block: BlockSelector = DEFAULT_BLOCK, config: TraceConfig = {}) => [formatBlock(block), config],
  ),
  defineMethod(
    'debugTraceBlockByNumber',
    'debug_traceBlockByNumber',
    1,
    (block: BlockSelector = DEFAULT_BLOCK, config: TraceConfig = {}) => [formatBlock(block), config],
  ),
  defineMethod('debugTraceBlockByHash', 'debug_traceBlockByHash', 1, (hash: string, config: TraceConfig = {}) => [
    required(hash, 'hash'),
    config,
  ]),
  defineMethod(
    'debugTraceBlockFromFile',
    'debug_traceBlockFromFile',
    1,
    (path: string, config: TraceConfig = {}) => [required(path, 'path'), config],
  ),
  defineMethod('debugTraceTransaction', 'debug_traceTransaction', 1, (hash: string, config: TraceConfig = {}) => [
    required(hash, 'hash'),
    config,
  ]),
  defineMethod('debugVerbosity', 'debug_verbosity', 1, (level: Numeric) => [
    formatQuantity(required(level, 'level'), 'level'),
  ]),
  defineMethod('debugVmodule', 'debug_vmodule', 1, (pattern: string) => [required(pattern, 'pattern')]),
  defineMethod('debugWriteBlockProfile', 'debug_writeBlockProfile', 1, (path: string) => [required(path, 'path')]),
  defineMethod('debugWriteMemProfile', 'debug_writeMemProfile', 1, (path: string) => [required(path, 'path')]),
] as const;
