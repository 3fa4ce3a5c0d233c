// SPDX-License-Identifier: Apache-2.0

import { defineMethod } from '../registry/methodDescriptor';

export const txpoolMethods = [
  defineMethod('txpoolContent', 'txpool_content', 1, () => []),
  defineMethod('txpoolInspect', 'txpool_inspect', 1, () => []),
  defineMethod('txpoolStatus', 'txpool_status', 1, () => []),
] as const;
