// SPDX-License-Identifier: Apache-2.0

import { keccak256 } from 'ethers';

import constants from './lib/constants';
import { InvalidArgumentError } from './lib/errors/InvalidArgumentError';
import type {
  BlockSelector,
  FilterObject,
  FilterOptions,
  Numeric,
  Quantity,
  ShhMessageFilterObject,
  ShhMessageObject,
  ShhPostFields,
  SignerRequestFields,
  SignerRequestObject,
  TransactionFields,
  TransactionObject,
} from './lib/types';

const EMPTY_HEX = '0x';
const HEX_DIGITS_REGEX = /^[0-9a-fA-F]*$/;

/**
 * Format message prefix for logger.
 */
const formatRequestIdMessage = (requestId?: string): string => {
  if (!requestId) {
    return '';
  }
  return requestId.includes(constants.REQUEST_ID_STRING) ? requestId : `[${constants.REQUEST_ID_STRING}${requestId}]`;
};

const strip0x = (input: string): string => {
  return input.startsWith(EMPTY_HEX) ? input.substring(2) : input;
};

/**
 * Returns the value of a mandatory positional parameter, or throws when the caller left it out.
 */
const required = <T>(value: T | null | undefined, name: string): T => {
  if (value == null) {
    throw InvalidArgumentError.missingParameter(name);
  }
  return value;
};

const toHexDigits = (input: Numeric, name: string): string => {
  if (typeof input === 'bigint') {
    if (input < 0n) {
      throw InvalidArgumentError.invalidQuantity(name, input);
    }
  } else if (typeof input !== 'number' || !Number.isSafeInteger(input) || input < 0) {
    throw InvalidArgumentError.invalidQuantity(name, input);
  }
  return input.toString(16);
};

/**
 * Hex-encodes a non-negative integer: `0` → `0x0`, `255` → `0xff`.
 */
const formatQuantity = (input: Numeric, name: string = 'quantity'): Quantity => {
  return EMPTY_HEX + toHexDigits(input, name);
};

/**
 * Hash rate as a 32-byte word, as `eth_submitHashrate` expects it.
 */
const formatHashrate = (hashrate: Numeric): string => {
  return EMPTY_HEX + toHexDigits(hashrate, 'hashrate').padStart(constants.HASHRATE_HEX_DIGITS, '0');
};

/**
 * Proof-of-work nonce as the 8-byte field of `eth_submitWork`.
 */
const formatNonce = (nonce: Numeric): string => {
  return EMPTY_HEX + toHexDigits(nonce, 'nonce').padStart(constants.NONCE_HEX_DIGITS, '0');
};

const formatBlock = (block: BlockSelector): string => {
  return typeof block === 'string' ? block : formatQuantity(block, 'block');
};

const formatFilter = (options?: FilterOptions | null): FilterObject => {
  const filter = options ?? {};
  const obj: FilterObject = {};
  if (filter.fromBlock != null) {
    obj.fromBlock = formatBlock(filter.fromBlock);
  }
  if (filter.toBlock != null) {
    obj.toBlock = formatBlock(filter.toBlock);
  }
  if (filter.address != null) {
    obj.address = filter.address;
  }
  if (filter.topics != null) {
    obj.topics = [...filter.topics];
  }
  return obj;
};

/**
 * Builds the transaction object of the wire format. Absent fields are left out, never sent as `null`; a `null` transaction is taken as empty.
 */
const formatTransaction = (transaction?: TransactionFields | null): TransactionObject => {
  const fields = transaction ?? {};
  const obj: TransactionObject = {};
  if (fields.from != null) {
    obj.from = fields.from;
  }
  if (fields.to != null) {
    obj.to = fields.to;
  }
  if (fields.gas != null) {
    obj.gas = formatQuantity(fields.gas, 'gas');
  }
  if (fields.gasPrice != null) {
    obj.gasPrice = formatQuantity(fields.gasPrice, 'gasPrice');
  }
  if (fields.value != null) {
    obj.value = formatQuantity(fields.value, 'value');
  }
  if (fields.data != null) {
    obj.data = fields.data;
  }
  if (fields.nonce != null) {
    obj.nonce = formatQuantity(fields.nonce, 'nonce');
  }
  if (fields.condition != null) {
    obj.condition = fields.condition;
  }
  return obj;
};

const formatRequest = (request?: SignerRequestFields | null): SignerRequestObject => {
  const fields = request ?? {};
  const obj: SignerRequestObject = {};
  if (fields.gas != null) {
    obj.gas = formatQuantity(fields.gas, 'gas');
  }
  if (fields.gasPrice != null) {
    obj.gasPrice = formatQuantity(fields.gasPrice, 'gasPrice');
  }
  if (fields.condition != null) {
    obj.condition = fields.condition;
  }
  return obj;
};

const formatShhMessage = (message: ShhPostFields): ShhMessageObject => {
  const obj: ShhMessageObject = {
    topics: [...required(message.topics, 'topics')],
    payload: required(message.payload, 'payload'),
    priority: formatQuantity(required(message.priority, 'priority'), 'priority'),
    ttl: formatQuantity(required(message.ttl, 'ttl'), 'ttl'),
  };
  if (message.from != null) {
    obj.from = message.from;
  }
  if (message.to != null) {
    obj.to = message.to;
  }
  return obj;
};

/**
 * Message filter of `shh_newMessageFilter`/`shh_subscribe`. `decryptWith` is sent as `null` when absent.
 */
const formatMessageFilter = (topics: readonly string[], decryptWith?: string, from?: string): ShhMessageFilterObject => {
  const obj: ShhMessageFilterObject = {
    topics: [...required(topics, 'topics')],
    decryptWith: decryptWith ?? null,
  };
  if (from != null) {
    obj.from = from;
  }
  return obj;
};

/**
 * Storage slot of a mapping entry: `keccak256(pad32(key) ++ pad32(slot))`.
 *
 * @param key - hex key of the mapping entry, with or without `0x`, at most 32 bytes
 * @param slot - storage slot of the mapping itself
 */
const computeStoragePosition = (key: string, slot: Numeric): string => {
  const keyDigits = strip0x(required(key, 'key'));
  if (!HEX_DIGITS_REGEX.test(keyDigits) || keyDigits.length > constants.STORAGE_WORD_HEX_DIGITS) {
    throw InvalidArgumentError.invalidHex('key', key);
  }
  const slotDigits = toHexDigits(required(slot, 'slot'), 'slot');
  if (slotDigits.length > constants.STORAGE_WORD_HEX_DIGITS) {
    throw InvalidArgumentError.invalidQuantity('slot', slot);
  }

  return keccak256(
    EMPTY_HEX +
      keyDigits.padStart(constants.STORAGE_WORD_HEX_DIGITS, '0') +
      slotDigits.padStart(constants.STORAGE_WORD_HEX_DIGITS, '0'),
  );
};

export {
  computeStoragePosition,
  formatBlock,
  formatFilter,
  formatHashrate,
  formatMessageFilter,
  formatNonce,
  formatQuantity,
  formatRequest,
  formatRequestIdMessage,
  formatShhMessage,
  formatTransaction,
  required,
  strip0x,
};
