// SPDX-License-Identifier: Apache-2.0

export { attachWebSocketServer, type WebSocketServerOptions } from './webSocketServer';
export { type AccountChannel, SubscriptionService, type WsConnection } from './service/subscriptionService';
export { WS_CONSTANTS } from './utils/constants';
