// SPDX-License-Identifier: Apache-2.0

import { AccountsLoader, ConfigService } from '@ton-trace-api/config-service';
import { TonClient } from '@ton/ton';
import type { Logger } from 'pino';
import { Gauge, type Registry } from 'prom-client';

import { formatTraceEvent, formatTransactionEvent } from '../formatters';
import type { Status, Traces } from '../index';
import { TonClientInformationSource } from './clients';
import { RpcMethodDispatcher } from './dispatcher';
import { EventHub } from './hub';
import { registerRpcMethods } from './services/registryService/rpcMethodRegistryService';
import { StatusImpl } from './status';
import { TraceStore } from './store';
import { type InformationSource, inProgress, type Trace, visit } from './trace';
import { TraceImpl } from './traces';
import type { RequestDetails, RpcMethodRegistry, RpcNamespaceRegistry } from './types';

export interface TraceApiOptions {
  /**
   * Accounts whose events are published. Loaded from the configured allow-list when omitted.
   */
  monitoredAccounts?: string[];
  /**
   * Source of additional trace information. Built from the configuration when omitted;
   * null disables enrichment.
   */
  infoSource?: InformationSource | null;
}

/**
 * Entry point of the server packages: owns the trace store, the event hub and
 * the JSON-RPC method layer.
 */
export class TraceApi {
  private readonly store: TraceStore;
  private readonly eventHub: EventHub;
  private readonly traceImpl: TraceImpl;
  private readonly statusImpl: StatusImpl;

  /**
   * Registry for RPC methods that manages the mapping between RPC method names and their implementations.
   * It is populated with the methods of every namespace decorated with @rpcMethod.
   */
  public readonly rpcMethodRegistry: RpcMethodRegistry;

  private readonly rpcMethodDispatcher: RpcMethodDispatcher;

  constructor(
    private readonly logger: Logger,
    register: Registry,
    options: TraceApiOptions = {},
  ) {
    const monitoredAccounts =
      options.monitoredAccounts ?? new AccountsLoader(logger.child({ name: 'accounts-loader' })).load();
    const infoSource =
      options.infoSource === undefined ? TraceApi.createInformationSource(logger, register) : options.infoSource;

    this.store = new TraceStore(
      {
        max: ConfigService.get('TRACE_CACHE_MAX'),
        ttl: ConfigService.get('TRACE_CACHE_TTL'),
        maxDepth: ConfigService.get('TRACE_MAX_DEPTH'),
      },
      logger.child({ name: 'trace-store' }),
    );
    this.eventHub = new EventHub(monitoredAccounts, logger.child({ name: 'event-hub' }));

    this.traceImpl = new TraceImpl(this.store, infoSource ?? undefined, logger.child({ name: 'trace' }), {
      enrichmentTimeout: ConfigService.get('INFORMATION_SOURCE_TIMEOUT'),
    });
    this.statusImpl = new StatusImpl(this.eventHub);

    this.initStoreMetric(register);

    const rpcNamespaceRegistry: RpcNamespaceRegistry[] = [
      { namespace: 'trace', serviceImpl: this.traceImpl },
      { namespace: 'status', serviceImpl: this.statusImpl },
    ];
    this.rpcMethodRegistry = registerRpcMethods(rpcNamespaceRegistry);
    this.rpcMethodDispatcher = new RpcMethodDispatcher(this.rpcMethodRegistry, logger.child({ name: 'dispatcher' }));

    logger.info(
      `Trace API running with ${monitoredAccounts.length} monitored accounts, enrichment ${
        infoSource ? 'enabled' : 'disabled'
      }`,
    );
  }

  /**
   * The only entry point for the server packages (HTTP and WebSocket) to invoke RPC methods.
   *
   * @returns the result of the method, or the JsonRpcError it failed with
   */
  public async executeRpcMethod(
    rpcMethodName: string,
    rpcMethodParams: readonly unknown[] | undefined,
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    return this.rpcMethodDispatcher.dispatch(rpcMethodName, rpcMethodParams, requestDetails);
  }

  /**
   * Accepts a (possibly still growing) trace from the tree builder.
   *
   * Every transaction of the tree is published each time, so subscribers may see a
   * transaction again when a trace is republished; the trace itself is announced
   * once nothing is left in progress.
   *
   * @throws {JsonRpcError} if the tree is deeper than TRACE_MAX_DEPTH
   */
  public publishTrace(trace: Trace): void {
    this.store.put(trace);
    visit(trace, (node) => {
      this.eventHub.publishTransaction(formatTransactionEvent(node));
    });
    if (!inProgress(trace)) {
      this.eventHub.publishTrace(formatTraceEvent(trace));
    }
  }

  public hub(): EventHub {
    return this.eventHub;
  }

  public traces(): Traces {
    return this.traceImpl;
  }

  public status(): Status {
    return this.statusImpl;
  }

  private static createInformationSource(logger: Logger, register: Registry): InformationSource | undefined {
    if (!ConfigService.get('ENRICHMENT_ENABLED')) {
      return undefined;
    }
    const client = new TonClient({
      endpoint: ConfigService.getTonApiEndpoint(),
      apiKey: ConfigService.get('TON_API_KEY'),
      timeout: ConfigService.get('INFORMATION_SOURCE_TIMEOUT'),
    });
    return new TonClientInformationSource(client, logger.child({ name: 'information-source' }), register);
  }

  private initStoreMetric(register: Registry): Gauge {
    const store = this.store;
    const metricGaugeName = 'ton_trace_api_stored_traces';
    register.removeSingleMetric(metricGaugeName);
    return new Gauge({
      name: metricGaugeName,
      help: 'Number of traces held in memory',
      registers: [register],
      collect() {
        // Invoked when the registry collects its metrics' values.
        this.set(store.size);
      },
    });
  }
}
