// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, required } from '../../formatters';
import constants from '../constants';
import { defineMethod } from '../registry/methodDescriptor';

export const adminMethods = [
  defineMethod('adminAddPeer', 'admin_addPeer', 1, (enode: string) => [required(enode, 'enode')]),
  defineMethod('adminDatadir', 'admin_datadir', 1, () => []),
  defineMethod('adminNodeInfo', 'admin_nodeInfo', 1, () => []),
  defineMethod('adminPeers', 'admin_peers', 1, () => []),
  defineMethod('adminSetSolc', 'admin_setSolc', 1, (path: string) => [required(path, 'path')]),
  defineMethod(
    'adminStartRpc',
    'admin_startRPC',
    1,
    (
      host: string = constants.DEFAULT_HOST,
      port: number = constants.DEFAULT_HTTP_PORT,
      cors: string = constants.DEFAULT_CORS,
      apis: string = constants.DEFAULT_APIS,
    ) => [host, formatQuantity(port, 'port'), cors, apis],
  ),
  defineMethod(
    'adminStartWs',
    'admin_startWS',
    1,
    (
      host: string = constants.DEFAULT_HOST,
      port: number = constants.DEFAULT_WS_PORT,
      cors: string = constants.DEFAULT_CORS,
      apis: string = constants.DEFAULT_APIS,
    ) => [host, formatQuantity(port, 'port'), cors, apis],
  ),
  defineMethod('adminStopRpc', 'admin_stopRPC', 1, () => []),
  defineMethod('adminStopWs', 'admin_stopWS', 1, () => []),
] as const;
