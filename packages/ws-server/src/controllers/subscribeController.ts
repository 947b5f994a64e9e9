// SPDX-License-Identifier: Apache-2.0

import type { AccountChannel } from '../service/subscriptionService';
import { jsonResp, type WsResponse } from '../utils/jsonResp';
import { validateAccountParams, validateWorkchainParam } from '../utils/validators';
import type { ISharedParams } from './index';

/**
 * Subscribes the connection to the events of the given accounts on a channel.
 */
export const handleSubscribe = (
  channel: AccountChannel,
  { connection, params, request, subscriptionService }: ISharedParams,
): WsResponse => {
  const accounts = validateAccountParams(params);
  if (channel !== 'mempool' && accounts.length === 0) {
    return jsonResp(request.id, null, 'success! 0 accounts');
  }
  const count = subscriptionService.subscribe(connection, channel, accounts);
  if (channel === 'mempool' && count === 0) {
    return jsonResp(request.id, null, 'success! you have subscribed to mempool');
  }
  return jsonResp(request.id, null, `success! ${count} accounts`);
};

export const handleSubscribeBlock = ({ connection, params, request, subscriptionService }: ISharedParams): WsResponse => {
  const workchain = validateWorkchainParam(params);
  subscriptionService.subscribeToBlocks(connection, workchain);
  return jsonResp(request.id, null, 'success! you have subscribed to blocks');
};
