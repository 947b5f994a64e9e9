// SPDX-License-Identifier: Apache-2.0

import type { AccountChannel } from '../service/subscriptionService';
import { jsonResp, type WsResponse } from '../utils/jsonResp';
import { validateAccountParams } from '../utils/validators';
import type { ISharedParams } from './index';

/**
 * Removes accounts from a channel of the connection. Without accounts the channel is dropped.
 */
export const handleUnsubscribe = (
  channel: AccountChannel,
  { connection, params, request, subscriptionService }: ISharedParams,
): WsResponse => {
  const accounts = validateAccountParams(params);
  const count = subscriptionService.unsubscribe(connection, channel, accounts);
  if (channel === 'mempool' && count === 0) {
    return jsonResp(request.id, null, 'success! you have unsubscribed from mempool');
  }
  return jsonResp(request.id, null, `success! ${count} accounts`);
};

export const handleUnsubscribeBlock = ({ connection, request, subscriptionService }: ISharedParams): WsResponse => {
  subscriptionService.unsubscribeFromBlocks(connection);
  return jsonResp(request.id, null, 'success! you have unsubscribed from blocks');
};
