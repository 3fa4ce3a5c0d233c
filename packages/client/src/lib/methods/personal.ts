// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, formatTransaction, required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric, SignTransactionFields } from '../types';

export const personalMethods = [
  defineMethod('personalEcRecover', 'personal_ecRecover', 1, (message: string, signature: string) => [
    required(message, 'message'),
    required(signature, 'signature'),
  ]),
  defineMethod('personalImportRawKey', 'personal_importRawKey', 1, (privateKey: string, password: string) => [
    required(privateKey, 'privateKey'),
    required(password, 'password'),
  ]),
  defineMethod('personalListAccounts', 'personal_listAccounts', 1, () => []),
  defineMethod('personalLockAccount', 'personal_lockAccount', 1, (address: string) => [required(address, 'address')]),
  defineMethod('personalNewAccount', 'personal_newAccount', 1, (password: string) => [required(password, 'password')]),
  defineMethod(
    'personalSendTransaction',
    'personal_sendTransaction',
    1,
    (transaction: SignTransactionFields, password: string) => {
      required(required(transaction, 'transaction').from, 'from');
      return [formatTransaction(transaction), required(password, 'password')];
    },
  ),
  defineMethod('personalSign', 'personal_sign', 1, (message: string, address: string, password: string) => [
    required(message, 'message'),
    required(address, 'address'),
    required(password, 'password'),
  ]),
  // the duration slot is positional: it stays in the list as null when not given
  defineMethod(
    'personalUnlockAccount',
    'personal_unlockAccount',
    1,
    (address: string, password: string, duration?: Numeric) => [
      required(address, 'address'),
      required(password, 'password'),
      duration == null ? null : formatQuantity(duration, 'duration'),
    ],
  ),
] as const;
