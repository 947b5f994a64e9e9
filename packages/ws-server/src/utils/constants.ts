// SPDX-License-Identifier: Apache-2.0

export const WS_CONSTANTS = {
  PATH: '/v2/websocket',
  METHODS: {
    SUBSCRIBE_ACCOUNT: 'subscribe_account',
    UNSUBSCRIBE_ACCOUNT: 'unsubscribe_account',
    SUBSCRIBE_TRACE: 'subscribe_trace',
    UNSUBSCRIBE_TRACE: 'unsubscribe_trace',
    SUBSCRIBE_MEMPOOL: 'subscribe_mempool',
    UNSUBSCRIBE_MEMPOOL: 'unsubscribe_mempool',
    SUBSCRIBE_BLOCK: 'subscribe_block',
    UNSUBSCRIBE_BLOCK: 'unsubscribe_block',
  },
  NOTIFICATIONS: {
    account: 'account_transaction',
    trace: 'trace',
    mempool: 'mempool_message',
    block: 'block',
  },
} as const;
