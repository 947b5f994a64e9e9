// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { type FormattedTrace, formatTrace, toAccountId } from '../formatters';
import type { Traces } from '../index';
import constants from './constants';
import { rpcMethod, rpcParamValidationRules } from './decorators';
import { predefined } from './errors/JsonRpcError';
import type { TraceStore } from './store';
import { collectAdditionalInfo, type InformationSource, inProgress as isInProgress, type Trace } from './trace';
import { ParamType, type RequestDetails } from './types';

export interface TraceImplOptions {
  // milliseconds granted to the information source per request
  enrichmentTimeout: number;
}

/**
 * Read side of the stored traces: lookup, completeness and per-account listing.
 */
export class TraceImpl implements Traces {
  constructor(
    private readonly store: TraceStore,
    private readonly infoSource: InformationSource | undefined,
    private readonly logger: Logger,
    private readonly options: TraceImplOptions,
  ) {}

  /**
   * Returns the trace rooted at the given transaction, enriched with additional information.
   * Enrichment runs on a copy, so the stored tree is never annotated.
   *
   * @rpcMethod Exposed as trace_getTrace RPC endpoint
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRACE_ID, required: true },
  })
  async getTrace(traceId: string, requestDetails: RequestDetails): Promise<FormattedTrace & { in_progress: boolean }> {
    const trace = structuredClone(this.find(traceId));

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`${requestDetails.formattedRequestId} Enriching trace ${trace.hash}`);
    }
    await collectAdditionalInfo(trace, this.infoSource, AbortSignal.timeout(this.options.enrichmentTimeout));

    return { ...formatTrace(trace), in_progress: isInProgress(trace) };
  }

  /**
   * @rpcMethod Exposed as trace_inProgress RPC endpoint
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRACE_ID, required: true },
  })
  inProgress(traceId: string, _requestDetails: RequestDetails): boolean {
    return isInProgress(this.find(traceId));
  }

  /**
   * Ids of the stored traces the account took part in, newest first.
   *
   * @rpcMethod Exposed as trace_getAccountTraces RPC endpoint
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.ACCOUNT_ID, required: true },
    1: { type: ParamType.LIMIT, required: false },
  })
  getAccountTraces(accountId: string, limit: number | undefined, requestDetails: RequestDetails): string[] {
    const account = toAccountId(accountId);
    const ids = this.store.idsForAccount(account, limit ?? constants.DEFAULT_ACCOUNT_TRACES_LIMIT);
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} Found ${ids.length} traces of ${account}`);
    }
    return ids;
  }

  private find(traceId: string): Trace {
    const trace = this.store.get(traceId);
    if (trace === undefined) {
      throw predefined.RESOURCE_NOT_FOUND(`Trace ${traceId} is unknown.`);
    }
    return trace;
  }
}
