// SPDX-License-Identifier: Apache-2.0

import { defineMethod } from '../registry/methodDescriptor';

export const netMethods = [
  defineMethod('netListening', 'net_listening', 67, () => []),
  defineMethod('netPeerCount', 'net_peerCount', 74, () => []),
  defineMethod('netVersion', 'net_version', 67, () => []),
] as const;
