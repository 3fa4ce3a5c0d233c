// SPDX-License-Identifier: Apache-2.0

import { required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { JsonObject } from '../types';

export type DerivationType = 'hard' | 'soft';

/**
 * One step of an index derivation path, e.g. `{ index: 1, type: 'soft' }`.
 */
export type DerivationStep = JsonObject & { index: number; type: DerivationType };

export const parityAccountsMethods = [
  defineMethod('parityAllAccountsInfo', 'parity_allAccountsInfo', 1, () => []),
  defineMethod(
    'parityChangePassword',
    'parity_changePassword',
    1,
    (address: string, oldPassword: string, newPassword: string) => [
      required(address, 'address'),
      required(oldPassword, 'oldPassword'),
      required(newPassword, 'newPassword'),
    ],
  ),
  defineMethod(
    'parityDeriveAddressHash',
    'parity_deriveAddressHash',
    1,
    (address: string, password: string, hash: string, type: DerivationType = 'hard', save: boolean = false) => [
      required(address, 'address'),
      required(password, 'password'),
      { hash: required(hash, 'hash'), type },
      save,
    ],
  ),
  defineMethod(
    'parityDeriveAddressIndex',
    'parity_deriveAddressIndex',
    1,
    (address: string, password: string, derivation: readonly DerivationStep[], save: boolean = false) => [
      required(address, 'address'),
      required(password, 'password'),
      [...required(derivation, 'derivation')],
      save,
    ],
  ),
  defineMethod('parityExportAccount', 'parity_exportAccount', 1, (address: string, password: string) => [
    required(address, 'address'),
    required(password, 'password'),
  ]),
  defineMethod('parityGetDappAddresses', 'parity_getDappAddresses', 1, (dapp: string) => [required(dapp, 'dapp')]),
  defineMethod('parityGetDappDefaultAddress', 'parity_getDappDefaultAddress', 1, (dapp: string) => [
    required(dapp, 'dapp'),
  ]),
  defineMethod('parityGetNewDappsAddresses', 'parity_getNewDappsAddresses', 1, () => []),
  defineMethod('parityGetNewDappsDefaultAddress', 'parity_getNewDappsDefaultAddress', 1, () => []),
  defineMethod('parityImportGethAccounts', 'parity_importGethAccounts', 1, (...addresses: string[]) => [addresses]),
  defineMethod('parityKillAccount', 'parity_killAccount', 1, (address: string, password: string) => [
    required(address, 'address'),
    required(password, 'password'),
  ]),
  defineMethod('parityListGethAccounts', 'parity_listGethAccounts', 1, () => []),
  defineMethod('parityListRecentDapps', 'parity_listRecentDapps', 1, () => []),
  defineMethod('parityNewAccountFromPhrase', 'parity_newAccountFromPhrase', 1, (phrase: string, password: string) => [
    required(phrase, 'phrase'),
    required(password, 'password'),
  ]),
  defineMethod('parityNewAccountFromSecret', 'parity_newAccountFromSecret', 1, (secret: string, password: string) => [
    required(secret, 'secret'),
    required(password, 'password'),
  ]),
  defineMethod('parityNewAccountFromWallet', 'parity_newAccountFromWallet', 1, (wallet: string, password: string) => [
    required(wallet, 'wallet'),
    required(password, 'password'),
  ]),
  defineMethod('parityRemoveAddress', 'parity_removeAddress', 1, (address: string) => [required(address, 'address')]),
  defineMethod('paritySetAccountMeta', 'parity_setAccountMeta', 1, (address: string, metadata: string) => [
    required(address, 'address'),
    required(metadata, 'metadata'),
  ]),
  defineMethod('paritySetAccountName', 'parity_setAccountName', 1, (address: string, name: string) => [
    required(address, 'address'),
    required(name, 'name'),
  ]),
  defineMethod('paritySetDappAddresses', 'parity_setDappAddresses', 1, (dapp: string, ...addresses: string[]) => [
    required(dapp, 'dapp'),
    addresses,
  ]),
  defineMethod('paritySetDappDefaultAddress', 'parity_setDappDefaultAddress', 1, (dapp: string, address: string) => [
    required(dapp, 'dapp'),
    required(address, 'address'),
  ]),
  defineMethod('paritySetNewDappsAddresses', 'parity_setNewDappsAddresses', 1, (...addresses: string[]) => [
    addresses,
  ]),
  defineMethod('paritySetNewDappsDefaultAddress', 'parity_setNewDappsDefaultAddress', 1, (address: string) => [
    required(address, 'address'),
  ]),
  defineMethod('parityTestPassword', 'parity_testPassword', 1, (address: string, password: string) => [
    required(address, 'address'),
    required(password, 'password'),
  ]),
] as const;
