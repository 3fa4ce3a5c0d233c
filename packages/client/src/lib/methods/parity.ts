// SPDX-License-Identifier: Apache-2.0

import { formatBlock, formatQuantity, formatTransaction, required } from '../../formatters';
import constants from '../constants';
import { defineMethod } from '../registry/methodDescriptor';
import type { BlockSelector, JsonRpcParams, Numeric, SignTransactionFields } from '../types';

const DEFAULT_BLOCK = constants.DEFAULT_BLOCK;

export const parityMethods = [
  defineMethod('parityAccountsInfo', 'parity_accountsInfo', 1, () => []),
  defineMethod('parityChain', 'parity_chain', 1, () => []),
  defineMethod('parityChainStatus', 'parity_chainStatus', 1, () => []),
  defineMethod('parityChangeVault', 'parity_changeVault', 1, (address: string, vault: string) => [
    required(address, 'address'),
    required(vault, 'vault'),
  ]),
  defineMethod('parityChangeVaultPassword', 'parity_changeVaultPassword', 1, (vault: string, password: string) => [
    required(vault, 'vault'),
    required(password, 'password'),
  ]),
  defineMethod('parityCheckRequest', 'parity_checkRequest', 1, (requestId: Numeric) => [
    formatQuantity(required(requestId, 'requestId'), 'requestId'),
  ]),
  defineMethod('parityCidV0', 'parity_cidV0', 1, (data: string) => [required(data, 'data')]),
  defineMethod('parityCloseVault', 'parity_closeVault', 1, (vault: string) => [required(vault, 'vault')]),
  defineMethod('parityComposeTransaction', 'parity_composeTransaction', 1, (transaction: SignTransactionFields) => {
    required(required(transaction, 'transaction').from, 'from');
    return [formatTransaction(transaction)];
  }),
  defineMethod('parityConsensusCapability', 'parity_consensusCapability', 1, () => []),
  defineMethod('parityDappsUrl', 'parity_dappsUrl', 1, () => []),
  defineMethod('parityDecryptMessage', 'parity_decryptMessage', 1, (address: string, message: string) => [
    required(address, 'address'),
    required(message, 'message'),
  ]),
  defineMethod('parityDefaultAccount', 'parity_defaultAccount', 1, () => []),
  defineMethod('parityDefaultExtraData', 'parity_defaultExtraData', 1, () => []),
  defineMethod('parityDevLogs', 'parity_devLogs', 1, () => []),
  defineMethod('parityDevLogsLevels', 'parity_devLogsLevels', 1, () => []),
  defineMethod('parityEncryptMessage', 'parity_encryptMessage', 1, (hash: string, message: string) => [
    required(hash, 'hash'),
    required(message, 'message'),
  ]),
  defineMethod('parityEnode', 'parity_enode', 1, () => []),
  defineMethod('parityExtraData', 'parity_extraData', 1, () => []),
  defineMethod('parityFutureTransactions', 'parity_futureTransactions', 1, () => []),
  defineMethod('parityGasCeilTarget', 'parity_gasCeilTarget', 1, () => []),
  defineMethod('parityGasFloorTarget', 'parity_gasFloorTarget', 1, () => []),
  defineMethod('parityGasPriceHistogram', 'parity_gasPriceHistogram', 1, () => []),
  defineMethod('parityGenerateSecretPhrase', 'parity_generateSecretPhrase', 1, () => []),
  defineMethod(
    'parityGetBlockHeaderByNumber',
    'parity_getBlockHeaderByNumber',
    1,
    (block: BlockSelector = DEFAULT_BLOCK) => [formatBlock(block)],
  ),
  defineMethod('parityGetVaultMeta', 'parity_getVaultMeta', 1, (vault: string) => [required(vault, 'vault')]),
  defineMethod('parityHardwareAccountsInfo', 'parity_hardwareAccountsInfo', 1, () => []),
  // the address slot is positional (null when absent), the block is only appended when given
  defineMethod(
    'parityListAccounts',
    'parity_listAccounts',
    1,
    (quantity: Numeric, address?: string, block?: BlockSelector) => {
      const params: JsonRpcParams = [formatQuantity(required(quantity, 'quantity'), 'quantity'), address ?? null];
      if (block != null) {
        params.push(formatBlock(block));
      }
      return params;
    },
  ),
  defineMethod('parityListOpenedVaults', 'parity_listOpenedVaults', 1, () => []),
  defineMethod(
    'parityListStorageKeys',
    'parity_listStorageKeys',
    1,
    (address: string, quantity: Numeric, hash?: string, block?: BlockSelector) => {
      const params: JsonRpcParams = [
        required(address, 'address'),
        formatQuantity(required(quantity, 'quantity'), 'quantity'),
        hash ?? null,
      ];
      if (block != null) {
        params.push(formatBlock(block));
      }
      return params;
    },
  ),
  defineMethod('parityListVaults', 'parity_listVaults', 1, () => []),
  defineMethod('parityLocalTransactions', 'parity_localTransactions', 1, () => []),
  defineMethod('parityMinGasPrice', 'parity_minGasPrice', 1, () => []),
  defineMethod('parityMode', 'parity_mode', 1, () => []),
  defineMethod('parityNewVault', 'parity_newVault', 1, (vault: string, password: string) => [
    required(vault, 'vault'),
    required(password, 'password'),
  ]),
  // superseded by parity_chain
  defineMethod('parityNetChain', 'parity_netChain', 1, () => [], { deprecated: true }),
  defineMethod('parityNetPeers', 'parity_netPeers', 1, () => []),
  defineMethod('parityNetPort', 'parity_netPort', 1, () => []),
  defineMethod('parityNextNonce', 'parity_nextNonce', 1, (address: string) => [required(address, 'address')]),
  defineMethod('parityNodeKind', 'parity_nodeKind', 1, () => []),
  defineMethod('parityNodeName', 'parity_nodeName', 1, () => []),
  defineMethod('parityPendingTransactions', 'parity_pendingTransactions', 1, () => []),
  defineMethod('parityPendingTransactionsStats', 'parity_pendingTransactionsStats', 1, () => []),
  defineMethod('parityPhraseToAddress', 'parity_phraseToAddress', 1, (phrase: string) => [required(phrase, 'phrase')]),
  defineMethod('parityOpenVault', 'parity_openVault', 1, (vault: string, password: string) => [
    required(vault, 'vault'),
    required(password, 'password'),
  ]),
  defineMethod('parityPostSign', 'parity_postSign', 1, (address: string, message: string) => [
    required(address, 'address'),
    required(message, 'message'),
  ]),
  defineMethod('parityPostTransaction', 'parity_postTransaction', 1, (transaction: SignTransactionFields) => {
    required(required(transaction, 'transaction').from, 'from');
    return [formatTransaction(transaction)];
  }),
  defineMethod('parityRegistryAddress', 'parity_registryAddress', 1, () => []),
  defineMethod('parityReleasesInfo', 'parity_releasesInfo', 1, () => []),
  defineMethod('parityRemoveTransaction', 'parity_removeTransaction', 1, (hash: string) => [required(hash, 'hash')]),
  defineMethod('parityRpcSettings', 'parity_rpcSettings', 1, () => []),
  defineMethod('paritySetVaultMeta', 'parity_setVaultMeta', 1, (vault: string, metadata: string) => [
    required(vault, 'vault'),
    required(metadata, 'metadata'),
  ]),
  defineMethod('paritySignMessage', 'parity_signMessage', 1, (address: string, password: string, hash: string) => [
    required(address, 'address'),
    required(password, 'password'),
    required(hash, 'hash'),
  ]),
  defineMethod('parityTransactionsLimit', 'parity_transactionsLimit', 1, () => []),
  defineMethod('parityUnsignedTransactionsCount', 'parity_unsignedTransactionsCount', 1, () => []),
  defineMethod('parityVersionInfo', 'parity_versionInfo', 1, () => []),
  defineMethod('parityWsUrl', 'parity_wsUrl', 1, () => []),
] as const;
