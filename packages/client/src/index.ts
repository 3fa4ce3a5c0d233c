// SPDX-License-Identifier: Apache-2.0

export {
  computeStoragePosition,
  formatBlock,
  formatFilter,
  formatHashrate,
  formatMessageFilter,
  formatNonce,
  formatQuantity,
  formatRequest,
  formatShhMessage,
  formatTransaction,
} from './formatters';
export { AbstractClient, createLogger } from './lib/clients/abstractClient';
export type { ClientOptions } from './lib/clients/abstractClient';
export { AsyncClient } from './lib/clients/asyncClient';
export { Client } from './lib/clients/client';
export type { BlockingClientOptions } from './lib/clients/client';
export { default as constants } from './lib/constants';
export { createRequest, RequestDispatcher } from './lib/dispatcher/requestDispatcher';
export { InvalidArgumentError } from './lib/errors/InvalidArgumentError';
export { METHOD_DEFINITIONS, methodRegistry } from './lib/methods';
export type { ArgsOf, ClientMethodName, MethodDefinition, RpcMethods, WireMethodName } from './lib/methods';
export type { DerivationStep, DerivationType } from './lib/methods/parityAccounts';
export type { TraceConfig } from './lib/methods/debug';
export type { TraceType } from './lib/methods/trace';
export { defineMethod } from './lib/registry/methodDescriptor';
export type { MethodDescriptor, MethodOptions, ShapeContext } from './lib/registry/methodDescriptor';
export { MethodRegistry } from './lib/registry/methodRegistry';
export { ConcurrencyLimitedTransport } from './lib/transport/concurrencyLimitedTransport';
export { HttpTransport } from './lib/transport/httpTransport';
export type { RpcResponse } from './lib/transport/httpTransport';
export type { ITransport } from './lib/transport/interfaces/transport.interface';
export { Semaphore } from './lib/transport/semaphore';
export type * from './lib/types';
