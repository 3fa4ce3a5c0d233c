// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric } from '../types';

export const paritySetMethods = [
  defineMethod('parityAcceptNonReservedPeers', 'parity_acceptNonReservedPeers', 1, () => []),
  defineMethod('parityAddReservedPeer', 'parity_addReservedPeer', 1, (enode: string) => [required(enode, 'enode')]),
  defineMethod('parityDappsList', 'parity_dappsList', 1, () => []),
  defineMethod('parityDropNonReservedPeers', 'parity_dropNonReservedPeers', 1, () => []),
  defineMethod('parityExecuteUpgrade', 'parity_executeUpgrade', 1, () => []),
  defineMethod('parityHashContent', 'parity_hashContent', 1, (uri: string) => [required(uri, 'uri')]),
  defineMethod('parityRemoveReservedPeer', 'parity_removeReservedPeer', 1, (enode: string) => [
    required(enode, 'enode'),
  ]),
  defineMethod('paritySetAuthor', 'parity_setAuthor', 1, (address: string) => [required(address, 'address')]),
  defineMethod('paritySetChain', 'parity_setChain', 1, (chain: string) => [required(chain, 'chain')]),
  defineMethod('paritySetEngineSigner', 'parity_setEngineSigner', 1, (address: string, password: string) => [
    required(address, 'address'),
    required(password, 'password'),
  ]),
  defineMethod('paritySetExtraData', 'parity_setExtraData', 1, (data: string) => [required(data, 'data')]),
  defineMethod('paritySetGasCeilTarget', 'parity_setGasCeilTarget', 1, (gas: Numeric = 0) => [
    formatQuantity(gas, 'gas'),
  ]),
  defineMethod('paritySetGasFloorTarget', 'parity_setGasFloorTarget', 1, (gas: Numeric = 0) => [
    formatQuantity(gas, 'gas'),
  ]),
  defineMethod('paritySetMaxTransactionGas', 'parity_setMaxTransactionGas', 1, (gas: Numeric) => [
    formatQuantity(required(gas, 'gas'), 'gas'),
  ]),
  defineMethod('paritySetMinGasPrice', 'parity_setMinGasPrice', 1, (gasPrice: Numeric) => [
    formatQuantity(required(gasPrice, 'gasPrice'), 'gasPrice'),
  ]),
  defineMethod('paritySetMode', 'parity_setMode', 1, (mode: string) => [required(mode, 'mode')]),
  defineMethod('paritySetTransactionsLimit', 'parity_setTransactionsLimit', 1, (limit: Numeric) => [
    formatQuantity(required(limit, 'limit'), 'limit'),
  ]),
  defineMethod('parityUpgradeReady', 'parity_upgradeReady', 1, () => []),
] as const;
