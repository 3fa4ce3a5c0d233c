// SPDX-License-Identifier: Apache-2.0

import { required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';

export const web3Methods = [
  defineMethod('web3ClientVersion', 'web3_clientVersion', 67, () => []),
  defineMethod('web3Sha3', 'web3_sha3', 64, (data: string) => [required(data, 'data')]),
] as const;
