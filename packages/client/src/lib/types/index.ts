// SPDX-License-Identifier: Apache-2.0

/**
 * Any value that survives `JSON.stringify` unchanged. Object members may be `undefined`,
 * which serialization drops.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue | undefined };

/**
 * Positional parameter list of a JSON-RPC request.
 */
export type JsonRpcParams = JsonValue[];

export interface JsonRpcRequest {
  readonly jsonrpc: '2.0';
  readonly method: string;
  readonly params: JsonRpcParams;
  readonly id: number;
}

/**
 * A non-negative integer rendered as `0x`-prefixed hex without leading zeros.
 */
export type Quantity = string;

export type Numeric = number | bigint;

export type BlockTag = 'earliest' | 'latest' | 'pending';

/**
 * Block number, one of the well-known tags, or any other string (a block hash), which passes through untouched.
 */
export type BlockSelector = Numeric | BlockTag | (string & {});

/**
 * Parity's delayed-submission condition, e.g. `{ block: 100 }` or `{ time: 1520000000 }`.
 */
export type TransactionCondition = JsonObject;

export type TransactionFields = {
  from?: string;
  to?: string;
  gas?: Numeric;
  gasPrice?: Numeric;
  value?: Numeric;
  data?: string;
  nonce?: Numeric;
  condition?: TransactionCondition;
};

export type TransactionObject = {
  from?: string;
  to?: string;
  gas?: Quantity;
  gasPrice?: Quantity;
  value?: Quantity;
  data?: string;
  nonce?: Quantity;
  condition?: TransactionCondition;
};

/**
 * Fields accepted by `eth_call`, `eth_estimateGas` and `trace_call`.
 */
export type CallFields = Omit<TransactionFields, 'nonce' | 'condition'>;

/**
 * Fields of a transaction the node signs and submits; `from` is mandatory.
 */
export type SendTransactionFields = Omit<TransactionFields, 'condition'> & { from: string };

export type SignTransactionFields = TransactionFields & { from: string };

/**
 * A log topic: a single topic, alternatives for one position, or `null` for "anything".
 */
export type Topic = string | string[] | null;

export type FilterOptions = {
  fromBlock?: BlockSelector;
  toBlock?: BlockSelector;
  address?: string | string[];
  topics?: readonly Topic[];
};

export type FilterObject = {
  fromBlock?: string;
  toBlock?: string;
  address?: string | string[];
  topics?: Topic[];
};

export type SignerRequestFields = {
  gas?: Numeric;
  gasPrice?: Numeric;
  condition?: TransactionCondition;
};

export type SignerRequestObject = {
  gas?: Quantity;
  gasPrice?: Quantity;
  condition?: TransactionCondition;
};

export type ShhPostFields = {
  topics: readonly string[];
  payload: string;
  priority: Numeric;
  ttl: Numeric;
  from?: string;
  to?: string;
};

export type ShhMessageObject = {
  topics: string[];
  payload: string;
  priority: Quantity;
  ttl: Quantity;
  from?: string;
  to?: string;
};

export type ShhMessageFilterObject = {
  topics: string[];
  decryptWith: string | null;
  from?: string;
};

export type SubscriptionKind = 'logs' | 'newHeads';
