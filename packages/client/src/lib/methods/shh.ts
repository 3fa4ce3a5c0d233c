// SPDX-License-Identifier: Apache-2.0

import { formatMessageFilter, formatQuantity, formatShhMessage, required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric, ShhPostFields } from '../types';

type ShhFilterObject = { topics: string[]; to?: string };

export const shhMethods = [
  defineMethod('shhAddPrivateKey', 'shh_addPrivateKey', 1, (privateKey: string) => [
    required(privateKey, 'privateKey'),
  ]),
  defineMethod('shhAddSymKey', 'shh_addSymKey', 1, (symKey: string) => [required(symKey, 'symKey')]),
  defineMethod('shhAddToGroup', 'shh_addToGroup', 73, (address: string) => [required(address, 'address')]),
  defineMethod('shhDeleteKey', 'shh_deleteKey', 1, (keyId: string) => [required(keyId, 'keyId')]),
  // message filter ids are opaque strings, the legacy filter ids below are quantities
  defineMethod('shhDeleteMessageFilter', 'shh_deleteMessageFilter', 1, (filterId: string) => [
    required(filterId, 'filterId'),
  ]),
  defineMethod('shhGetFilterChanges', 'shh_getFilterChanges', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),
  defineMethod('shhGetFilterMessages', 'shh_getFilterMessages', 1, (filterId: string) => [
    required(filterId, 'filterId'),
  ]),
  defineMethod('shhGetMessages', 'shh_getMessages', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),
  defineMethod('shhGetPrivateKey', 'shh_getPrivateKey', 1, (keyId: string) => [required(keyId, 'keyId')]),
  defineMethod('shhGetPublicKey', 'shh_getPublicKey', 1, (keyId: string) => [required(keyId, 'keyId')]),
  defineMethod('shhGetSymKey', 'shh_getSymKey', 1, (keyId: string) => [required(keyId, 'keyId')]),
  defineMethod('shhHasIdentity', 'shh_hasIdentity', 73, (address: string) => [required(address, 'address')]),
  defineMethod('shhInfo', 'shh_info', 1, () => []),
  defineMethod('shhNewFilter', 'shh_newFilter', 73, (topics: readonly string[], to?: string) => {
    const obj: ShhFilterObject = { topics: [...required(topics, 'topics')] };
    if (to != null) {
      obj.to = to;
    }
    return [obj];
  }),
  defineMethod('shhNewGroup', 'shh_newGroup', 73, () => []),
  defineMethod('shhNewIdentity', 'shh_newIdentity', 73, () => []),
  defineMethod('shhNewKeyPair', 'shh_newKeyPair', 1, () => []),
  defineMethod(
    'shhNewMessageFilter',
    'shh_newMessageFilter',
    1,
    (topics: readonly string[], decryptWith?: string, from?: string) => [
      formatMessageFilter(topics, decryptWith, from),
    ],
  ),
  defineMethod('shhNewSymKey', 'shh_newSymKey', 1, () => []),
  defineMethod('shhPost', 'shh_post', 73, (message: ShhPostFields) => [
    formatShhMessage(required(message, 'message')),
  ]),
  defineMethod('shhSubscribe', 'shh_subscribe', 1, (topics: readonly string[], decryptWith?: string, from?: string) => [
    formatMessageFilter(topics, decryptWith, from),
  ]),
  defineMethod('shhUninstallFilter', 'shh_uninstallFilter', 73, (filterId: Numeric) => [
    formatQuantity(required(filterId, 'filterId'), 'filterId'),
  ]),
  defineMethod('shhUnsubscribe', 'shh_unsubscribe', 1, (subscriptionId: Numeric) => [
    formatQuantity(required(subscriptionId, 'subscriptionId'), 'subscriptionId'),
  ]),
  defineMethod('shhVersion', 'shh_version', 67, () => []),
] as const;
