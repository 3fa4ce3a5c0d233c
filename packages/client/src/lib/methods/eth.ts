// SPDX-License-Identifier: Apache-2.0

import {
  formatBlock,
  formatFilter,
  formatHashrate,
  formatNonce,
  formatQuantity,
  formatTransaction,
  required,
} from '../../formatters';
import constants from '../constants';
import { InvalidArgumentError } from '../errors/InvalidArgumentError';
import { defineMethod } from '../registry/methodDescriptor';
import type {
  BlockSelector,
  CallFields,
  FilterObject,
  FilterOptions,
  Numeric,
  SendTransactionFields,
  SignTransactionFields,
  SubscriptionKind,
} from '../types';

const DEFAULT_BLOCK = constants.DEFAULT_BLOCK;

export const ethMethods = [
  defineMethod('ethAccounts', 'eth_accounts', 1, () => []),
  defineMethod('ethBlockNumber', 'eth_blockNumber', 83, () => []),
  // unlike the state queries below, the block has no default here
  defineMethod('ethCall', 'eth_call', 1, (call: CallFields | null, block: BlockSelector) => [
    formatTransaction(call),
    formatBlock(required(block, 'block')),
  ]),
  defineMethod('ethCoinbase', 'eth_coinbase', 64, () => []),
  defineMethod('ethCompileLll', 'eth_compileLLL', 1, (code: string) => [required(code, 'code')]),
  defineMethod('ethCompileSerpent', 'eth_compileSerpent', 1, (code: string) => [required(code, 'code')]),
  defineMethod('ethCompileSolidity', 'eth_compileSolidity', 1, (code: string) => [required(code, 'code')]),
  defineMethod('ethEstimateGas', 'eth_estimateGas', 1, (call?: CallFields | null) => [formatTransaction(call)]),
  defineMethod('ethGasPrice', 'eth_gasPrice', 73, () => []),
  defineMethod('ethGetBalance', 'eth_getBalance', 1, (address: string, block: BlockSelector = DEFAULT_BLOCK) => [
    required(address, 'address'),
    formatBlock(block),
  ]),
  defineMethod('ethGetBlockByHash', 'eth_getBlockByHash', 1, (hash: string, useFull: boolean = false) => [
    required(hash, 'hash'),
    useFull,
  ]),
  defineMethod(
    'ethGetBlockByNumber',
    'eth_getBlockByNumber',
    1,
    (block: BlockSelector = DEFAULT_BLOCK, useFull: boolean = false) => [formatBlock(block), useFull],
  ),
  defineMethod('ethGetBlockTransactionCountByHash', 'eth_getBlockTransactionCountByHash', 1, (hash: string) => [
    required(hash, 'hash'),
  ]),
  defineMethod(
    'ethGetBlockTransactionCountByNumber',
    'eth_getBlockTransactionCountByNumber',
    1,
    (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)],
  ),
  defineMethod('ethGetCode', 'eth_getCode', 1, (address: string, block: BlockSelector = DEFAULT_BLOCK) => [
    required(address, 'address'),
    formatBlock(block),
  ]),
  defineMethod('ethGetCompilers', 'eth_getCompilers', 1, () => []),
  defineMethod('ethGetFilterChanges', 'eth_getFilterChanges', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),
  defineMethod('ethGetFilterLogs', 'eth_getFilterLogs', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),
  defineMethod('ethGetLogs', 'eth_getLogs', 73, (filter?: FilterOptions | null) => [formatFilter(filter)]),
  defineMethod(
    'ethGetStorageAt',
    'eth_getStorageAt',
    1,
    (address: string, position: Numeric, block: BlockSelector = DEFAULT_BLOCK) => [
      required(address, 'address'),
      formatQuantity(required(position, 'position'), 'position'),
      formatBlock(block),
    ],
  ),
  defineMethod(
    'ethGetTransactionByBlockHashAndIndex',
    'eth_getTransactionByBlockHashAndIndex',
    1,
    (hash: string, index: Numeric = 0) => [required(hash, 'hash'), formatQuantity(index, 'index')],
  ),
  defineMethod(
    'ethGetTransactionByBlockNumberAndIndex',
    'eth_getTransactionByBlockNumberAndIndex',
    1,
    (block: BlockSelector = DEFAULT_BLOCK, index: Numeric = 0) => [formatBlock(block), formatQuantity(index, 'index')],
  ),
  defineMethod('ethGetTransactionByHash', 'eth_getTransactionByHash', 1, (hash: string) => [required(hash, 'hash')]),
  defineMethod(
    'ethGetTransactionCount',
    'eth_getTransactionCount',
    1,
    (address: string, block: BlockSelector = DEFAULT_BLOCK) => [required(address, 'address'), formatBlock(block)],
  ),
  defineMethod('ethGetTransactionReceipt', 'eth_getTransactionReceipt', 1, (hash: string) => [
    required(hash, 'hash'),
  ]),
  defineMethod(
    'ethGetUncleByBlockHashAndIndex',
    'eth_getUncleByBlockHashAndIndex',
    1,
    (hash: string, index: Numeric = 0) => [required(hash, 'hash'), formatQuantity(index, 'index')],
  ),
  defineMethod(
    'ethGetUncleByBlockNumberAndIndex',
    'eth_getUncleByBlockNumberAndIndex',
    1,
    (block: BlockSelector = DEFAULT_BLOCK, index: Numeric = 0) => [formatBlock(block), formatQuantity(index, 'index')],
  ),
  defineMethod('ethGetUncleCountByBlockHash', 'eth_getUncleCountByBlockHash', 1, (hash: string) => [
    required(hash, 'hash'),
  ]),
  defineMethod(
    'ethGetUncleCountByBlockNumber',
    'eth_getUncleCountByBlockNumber',
    1,
    (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)],
  ),
  defineMethod('ethGetWork', 'eth_getWork', 73, () => []),
  defineMethod('ethHashrate', 'eth_hashrate', 71, () => []),
  defineMethod('ethMining', 'eth_mining', 71, () => []),
  defineMethod('ethNewBlockFilter', 'eth_newBlockFilter', 73, () => []),
  defineMethod('ethNewFilter', 'eth_newFilter', 73, (filter?: FilterOptions | null) => [formatFilter(filter)]),
  defineMethod('ethNewPendingTransactionFilter', 'eth_newPendingTransactionFilter', 73, () => []),
  defineMethod('ethProtocolVersion', 'eth_protocolVersion', 67, () => []),
  defineMethod('ethSendRawTransaction', 'eth_sendRawTransaction', 1, (data: string) => [required(data, 'data')]),
  defineMethod('ethSendTransaction', 'eth_sendTransaction', 1, (transaction: SendTransactionFields) => {
    required(required(transaction, 'transaction').from, 'from');
    return [formatTransaction(transaction)];
  }),
  defineMethod('ethSign', 'eth_sign', 1, (address: string, message: string) => [
    required(address, 'address'),
    required(message, 'message'),
  ]),
  defineMethod('ethSignTransaction', 'eth_signTransaction', 1, (transaction: SignTransactionFields) => {
    required(required(transaction, 'transaction').from, 'from');
    return [formatTransaction(transaction)];
  }),
  defineMethod('ethSubmitHashrate', 'eth_submitHashrate', 73, (hashrate: Numeric, clientId: string) => [
    formatHashrate(required(hashrate, 'hashrate')),
    required(clientId, 'clientId'),
  ]),
  defineMethod('ethSubmitWork', 'eth_submitWork', 73, (nonce: Numeric, powHash: string, mixDigest: string) => [
    formatNonce(required(nonce, 'nonce')),
    required(powHash, 'powHash'),
    required(mixDigest, 'mixDigest'),
  ]),
  defineMethod('ethSyncing', 'eth_syncing', 1, () => []),
  defineMethod('ethUninstallFilter', 'eth_uninstallFilter', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),

  // pub-sub
  defineMethod('ethSubscribe', 'eth_subscribe', 1, (kind: SubscriptionKind, filter?: FilterOptions | null) => {
    let obj: FilterObject;
    switch (required(kind, 'kind')) {
      case 'logs':
        obj = formatFilter(filter);
        break;
      case 'newHeads':
        obj = {};
        break;
      default:
        throw InvalidArgumentError.unsupportedSubscription(String(kind));
    }
    return [kind, obj];
  }),
  defineMethod('ethUnsubscribe', 'eth_unsubscribe', 1, (subscriptionId: Numeric) => [
    formatQuantity(required(subscriptionId, 'subscriptionId'), 'subscriptionId'),
  ]),
] as const;
