// SPDX-License-Identifier: Apache-2.0

import type { MethodDescriptor } from '../registry/methodDescriptor';
import { MethodRegistry } from '../registry/methodRegistry';
import { adminMethods } from './admin';
import { debugMethods } from './debug';
import { ethMethods } from './eth';
import { minerMethods } from './miner';
import { netMethods } from './net';
import { parityMethods } from './parity';
import { parityAccountsMethods } from './parityAccounts';
import { paritySetMethods } from './paritySet';
import { personalMethods } from './personal';
import { pubsubMethods } from './pubsub';
import { shhMethods } from './shh';
import { signerMethods } from './signer';
import { traceMethods } from './trace';
import { txpoolMethods } from './txpool';
import { web3Methods } from './web3';

/**
 * Every supported method, in registration order.
 */
export const METHOD_DEFINITIONS = [
  ...web3Methods,
  ...netMethods,
  ...ethMethods,
  ...personalMethods,
  ...parityMethods,
  ...parityAccountsMethods,
  ...paritySetMethods,
  ...pubsubMethods,
  ...signerMethods,
  ...traceMethods,
  ...adminMethods,
  ...debugMethods,
  ...minerMethods,
  ...txpoolMethods,
  ...shhMethods,
] as const;

export type MethodDefinition = (typeof METHOD_DEFINITIONS)[number];

export type ClientMethodName = MethodDefinition['clientName'];

export type WireMethodName = MethodDefinition['wireName'];

/**
 * Arguments of a method's shaper, i.e. what the client method of the same name takes.
 */
export type ArgsOf<D extends MethodDescriptor> = Parameters<D['shape']>;

type MethodsByClientName<R> = {
  [D in MethodDefinition as D['clientName']]: (...args: ArgsOf<D>) => Promise<R>;
};

type MethodsByWireName<R> = {
  [D in MethodDefinition as D['wireName']]: (...args: ArgsOf<D>) => Promise<R>;
};

/**
 * One callable per method under each of its two names, resolving to the transport's raw response.
 */
export type RpcMethods<R> = MethodsByClientName<R> & MethodsByWireName<R>;

export const methodRegistry = new MethodRegistry(METHOD_DEFINITIONS);

export {
  adminMethods,
  debugMethods,
  ethMethods,
  minerMethods,
  netMethods,
  parityAccountsMethods,
  parityMethods,
  paritySetMethods,
  personalMethods,
  pubsubMethods,
  shhMethods,
  signerMethods,
  traceMethods,
  txpoolMethods,
  web3Methods,
};
