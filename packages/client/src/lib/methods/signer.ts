// SPDX-License-Identifier: Apache-2.0

import { formatQuantity, formatRequest, required } from '../../formatters';
import { defineMethod } from '../registry/methodDescriptor';
import type { Numeric, SignerRequestFields } from '../types';

export const signerMethods = [
  defineMethod(
    'signerConfirmRequest',
    'signer_confirmRequest',
    1,
    (requestId: Numeric, request: SignerRequestFields | null, password: string) => [
      formatQuantity(required(requestId, 'requestId'), 'requestId'),
      formatRequest(request),
      required(password, 'password'),
    ],
  ),
  defineMethod('signerConfirmRequestRaw', 'signer_confirmRequestRaw', 1, (requestId: Numeric, data: string) => [
    formatQuantity(required(requestId, 'requestId'), 'requestId'),
    required(data, 'data'),
  ]),
  defineMethod(
    'signerConfirmRequestWithToken',
    'signer_confirmRequestWithToken',
    1,
    (requestId: Numeric, request: SignerRequestFields | null, passwordOrToken: string) => [
      formatQuantity(required(requestId, 'requestId'), 'requestId'),
      formatRequest(request),
      required(passwordOrToken, 'password or token'),
    ],
  ),
  defineMethod('signerGenerateAuthorizationToken', 'signer_generateAuthorizationToken', 1, () => []),
  defineMethod('signerGenerateWebProxyAccessToken', 'signer_generateWebProxyAccessToken', 1, (domain: string) => [
    required(domain, 'domain'),
  ]),
  defineMethod('signerRejectRequest', 'signer_rejectRequest', 1, (requestId: Numeric) => [
    formatQuantity(required(requestId, 'requestId'), 'requestId'),
  ]),
  defineMethod('signerRequestsToConfirm', 'signer_requestsToConfirm', 1, () => []),
  defineMethod('signerSubscribePending', 'signer_subscribePending', 1, () => []),
  defineMethod('signerUnsubscribePending', 'signer_unsubscribePending', 1, (subscriptionId: Numeric) => [
    formatQuantity(required(subscriptionId, 'subscriptionId'), 'subscriptionId'),
  ]),
] as const;
