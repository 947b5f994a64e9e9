// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@ton-trace-api/config-service';
import { Address, type TupleReader } from '@ton/core';
import type { TonClient } from '@ton/ton';
import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';
import { Counter, type Registry } from 'prom-client';

import constants from '../constants';
import { InformationSourceError } from '../errors/InformationSourceError';
import type { AccountId, InformationSource, NftSaleContract } from '../trace';

type CallResult = 'success' | 'exit_code' | 'error';

/**
 * Resolves additional trace information by running get-methods of the contracts
 * through the toncenter HTTP API.
 *
 * Addresses are de-duplicated and queried one after the other. A get-method that
 * exits with an error code, or whose stack cannot be decoded, leaves the address out
 * of the result; a transport failure rejects with an {@link InformationSourceError}.
 */
export class TonClientInformationSource implements InformationSource {
  /**
   * Jetton wallet → jetton master. The master of a wallet never changes.
   * @private
   */
  private readonly jettonMasters: LRUCache<AccountId, AccountId>;

  private readonly callsCounter: Counter;

  constructor(
    private readonly client: TonClient,
    private readonly logger: Logger,
    register: Registry,
  ) {
    this.jettonMasters = new LRUCache<AccountId, AccountId>({ max: ConfigService.get('JETTON_MASTER_CACHE_MAX') });

    const metricName = 'ton_trace_api_information_source_calls';
    register.removeSingleMetric(metricName);
    this.callsCounter = new Counter({
      name: metricName,
      help: 'Get-method calls issued to the information source, by method and result',
      labelNames: ['method', 'result'],
      registers: [register],
    });
  }

  public async resolveJettonMasters(wallets: AccountId[], signal?: AbortSignal): Promise<Map<AccountId, AccountId>> {
    const masters = new Map<AccountId, AccountId>();
    for (const wallet of new Set(wallets)) {
      const cached = this.jettonMasters.get(wallet);
      if (cached !== undefined) {
        masters.set(wallet, cached);
        continue;
      }
      const master = await this.callGetMethod(wallet, constants.GET_METHOD.GET_WALLET_DATA, signal, (stack) => {
        // balance, owner, jetton_master, jetton_wallet_code
        stack.skip(2);
        return stack.readAddress().toRawString();
      });
      if (master !== undefined) {
        this.jettonMasters.set(wallet, master);
        masters.set(wallet, master);
      }
    }
    return masters;
  }

  public async resolveMarketplaceSaleContracts(
    accounts: AccountId[],
    signal?: AbortSignal,
  ): Promise<Map<AccountId, NftSaleContract>> {
    // magic, is_complete, created_at, marketplace, nft, owner, full_price, ...
    return this.resolveSaleContracts(accounts, 5, signal);
  }

  public async resolveBasicSaleContracts(
    accounts: AccountId[],
    signal?: AbortSignal,
  ): Promise<Map<AccountId, NftSaleContract>> {
    // marketplace, nft, owner, full_price, ...
    return this.resolveSaleContracts(accounts, 2, signal);
  }

  private async resolveSaleContracts(
    accounts: AccountId[],
    ownerPosition: number,
    signal: AbortSignal | undefined,
  ): Promise<Map<AccountId, NftSaleContract>> {
    const contracts = new Map<AccountId, NftSaleContract>();
    for (const account of new Set(accounts)) {
      const contract = await this.callGetMethod(account, constants.GET_METHOD.GET_SALE_DATA, signal, (stack) => {
        stack.skip(ownerPosition);
        const owner = stack.readAddressOpt();
        const sale: NftSaleContract = { nftPrice: stack.readBigNumber() };
        if (owner !== null) {
          sale.owner = owner.toRawString();
        }
        return sale;
      });
      if (contract !== undefined) {
        contracts.set(account, contract);
      }
    }
    return contracts;
  }

  /**
   * Runs a get-method and decodes its stack.
   * Resolves to undefined when the method has no usable result for the account.
   */
  private async callGetMethod<T>(
    account: AccountId,
    method: string,
    signal: AbortSignal | undefined,
    decode: (stack: TupleReader) => T,
  ): Promise<T | undefined> {
    signal?.throwIfAborted();

    let address: Address;
    try {
      address = Address.parse(account);
    } catch (error: unknown) {
      this.logger.debug(`Skipping ${method} on invalid address ${account}: ${errorMessage(error)}`);
      return undefined;
    }

    let result: Awaited<ReturnType<TonClient['runMethodWithError']>>;
    try {
      result = await abortable(this.client.runMethodWithError(address, method), signal);
    } catch (error: unknown) {
      if (signal?.aborted && error === signal.reason) {
        throw error;
      }
      this.record(method, 'error');
      throw InformationSourceError.fromClientError(error, method);
    }

    if (!constants.SUCCESS_EXIT_CODES.includes(result.exit_code)) {
      this.record(method, 'exit_code');
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(`${method} on ${account} exited with code ${result.exit_code}`);
      }
      return undefined;
    }
    this.record(method, 'success');

    try {
      return decode(result.stack);
    } catch (error: unknown) {
      this.logger.debug(`Unable to decode ${method} result of ${account}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private record(method: string, result: CallResult): void {
    this.callsCounter.labels({ method, result }).inc();
  }
}

/**
 * Settles with the promise, or rejects with the abort reason as soon as the signal fires.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (signal === undefined) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
