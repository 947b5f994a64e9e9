// SPDX-License-Identifier: Apache-2.0

import type { FormattedTrace } from './formatters';
import { InformationSourceError } from './lib/errors/InformationSourceError';
import { JsonRpcError, predefined } from './lib/errors/JsonRpcError';
import type { RequestDetails } from './lib/types';

export { InformationSourceError, JsonRpcError, predefined };

export { TraceApi, type TraceApiOptions } from './lib/traceApi';
export { TonClientInformationSource } from './lib/clients';
export { EventHub } from './lib/hub';
export { TraceStore, type TraceStoreOptions } from './lib/store';
export * from './lib/trace';
export * from './lib/types';
export { default as constants, ContractInterface, JETTON_TRANSFER_MSG_OP } from './lib/constants';
export * from './formatters';
export { Utils } from './utils';

export interface Traces {
  getTrace(traceId: string, requestDetails: RequestDetails): Promise<FormattedTrace & { in_progress: boolean }>;

  inProgress(traceId: string, requestDetails: RequestDetails): boolean;

  getAccountTraces(accountId: string, limit: number | undefined, requestDetails: RequestDetails): string[];
}

export interface Status {
  monitoredAccounts(): string[];
}
