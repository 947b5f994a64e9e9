// SPDX-License-Identifier: Apache-2.0

import { Address } from '@ton/core';
import { expect } from 'chai';
import pino from 'pino';
import { Registry } from 'prom-client';
import sinon from 'sinon';

import { InformationSourceError, JsonRpcError, TraceApi } from '../../src';
import { ContractInterface } from '../../src/lib/constants';
import {
  accountId,
  FakeInformationSource,
  jettonTransferTo,
  message,
  requestDetails,
  saleNode,
  traceNode,
  txHash,
} from '../helpers';

describe('TraceApi', () => {
  const logger = pino({ level: 'silent' });
  const WALLET = accountId(100);
  const MASTER = accountId(200);

  let register: Registry;
  let source: FakeInformationSource;
  let api: TraceApi;

  const call = (method: string, params: unknown[] = []) => api.executeRpcMethod(method, params, requestDetails);

  const callError = async (method: string, params: unknown[]): Promise<JsonRpcError> => {
    const result = await call(method, params);
    if (!(result instanceof JsonRpcError)) {
      throw new Error(`expected a JsonRpcError, got ${JSON.stringify(result)}`);
    }
    return result;
  };

  const completeTrace = () =>
    traceNode(1, {
      inMsg: jettonTransferTo(WALLET),
      children: [saleNode(2, ContractInterface.NftSale)],
    });

  beforeEach(() => {
    register = new Registry();
    source = new FakeInformationSource(
      new Map([[WALLET, MASTER]]),
      new Map(),
      new Map([[accountId(2), { nftPrice: 99n }]]),
    );
    api = new TraceApi(logger, register, { monitoredAccounts: [], infoSource: source });
  });

  afterEach(() => {
    sinon.restore();
  });

  it('should register the trace and status methods', () => {
    expect([...api.rpcMethodRegistry.keys()].sort()).to.deep.equal([
      'status_monitoredAccounts',
      'trace_getAccountTraces',
      'trace_getTrace',
      'trace_inProgress',
    ]);
  });

  describe('trace_getTrace', () => {
    it('should return the enriched trace', async () => {
      api.publishTrace(completeTrace());

      const result = await call('trace_getTrace', [txHash(1)]);

      expect(result).to.deep.include({ in_progress: false });
      expect(result).to.have.nested.property('additional_info.jetton_master', MASTER);
      expect(result).to.have.nested.property('children[0].additional_info.nft_sale_contract.nft_price', '99');
    });

    it('should accept an uppercase trace id', async () => {
      api.publishTrace(completeTrace());

      const result = await call('trace_getTrace', [txHash(1).toUpperCase()]);

      expect(result).to.have.nested.property('transaction.hash', txHash(1));
    });

    it('should not annotate the stored trace', async () => {
      const trace = completeTrace();
      api.publishTrace(trace);

      await call('trace_getTrace', [txHash(1)]);

      expect(trace.additionalInfo).to.be.undefined;
      expect(trace.children[0].additionalInfo).to.be.undefined;
    });

    it('should return the trace without additional info when enrichment is disabled', async () => {
      api = new TraceApi(logger, register, { monitoredAccounts: [], infoSource: null });
      api.publishTrace(completeTrace());

      const result = await call('trace_getTrace', [txHash(1)]);

      expect(result).to.not.have.property('additional_info');
      expect(result).to.have.property('in_progress', false);
    });

    it('should return RESOURCE_NOT_FOUND for an unknown trace', async () => {
      const error = await callError('trace_getTrace', [txHash(7)]);

      expect(error.code).to.equal(-32001);
      expect(error.message).to.equal(
        `[Request ID: ${requestDetails.requestId}] Requested resource not found. Trace ${txHash(7)} is unknown.`,
      );
    });

    it('should return UPSTREAM_FAIL when the information source fails', async () => {
      source.resolveJettonMasters = async () => {
        throw new InformationSourceError('Request failed with status code 502', 502);
      };
      api.publishTrace(completeTrace());

      const error = await callError('trace_getTrace', [txHash(1)]);

      expect(error.code).to.equal(-32020);
      expect(error.data).to.equal('502');
    });

    it('should reject an invalid trace id', async () => {
      const error = await callError('trace_getTrace', ['xyz']);

      expect(error.code).to.equal(-32602);
    });
  });

  describe('trace_inProgress', () => {
    it('should follow the unmatched outbound messages of the trace', async () => {
      api.publishTrace(traceNode(1, { outMsgs: [message()] }));
      expect(await call('trace_inProgress', [txHash(1)])).to.be.true;

      api.publishTrace(traceNode(1, { children: [traceNode(2)] }));
      expect(await call('trace_inProgress', [txHash(1)])).to.be.false;
    });
  });

  describe('trace_getAccountTraces', () => {
    it('should list the traces of an account given in any address form', async () => {
      api.publishTrace(traceNode(1, { children: [traceNode(5)] }));
      api.publishTrace(traceNode(2, { children: [traceNode(5)] }));

      const friendly = Address.parse(accountId(5)).toString();

      expect(await call('trace_getAccountTraces', [friendly])).to.deep.equal([txHash(2), txHash(1)]);
      expect(await call('trace_getAccountTraces', [accountId(5), 1])).to.deep.equal([txHash(2)]);
    });

    it('should reject a limit out of range', async () => {
      const error = await callError('trace_getAccountTraces', [accountId(5), 5000]);

      expect(error.code).to.equal(-32602);
    });
  });

  describe('status_monitoredAccounts', () => {
    it('should return the allow-list', async () => {
      api = new TraceApi(logger, register, { monitoredAccounts: [accountId(1)], infoSource: null });

      expect(await call('status_monitoredAccounts')).to.deep.equal([accountId(1)]);
    });
  });

  describe('publishTrace', () => {
    it('should publish every transaction and announce a finished trace', () => {
      const transactions = sinon.spy();
      const traces = sinon.spy();
      api.hub().subscribeToTransactions('ALL', transactions);
      api.hub().subscribeToTraces('ALL', traces);

      api.publishTrace(completeTrace());

      expect(transactions.args.map(([event]) => event.tx_hash)).to.deep.equal([txHash(1), txHash(2)]);
      expect(traces.calledOnce).to.be.true;
      expect(traces.firstCall.args[0]).to.deep.equal({ accounts: [accountId(1), accountId(2)], hash: txHash(1) });
    });

    it('should not announce a trace still in progress', () => {
      const traces = sinon.spy();
      api.hub().subscribeToTraces('ALL', traces);

      api.publishTrace(traceNode(1, { outMsgs: [message()] }));

      expect(traces.called).to.be.false;
    });

    it('should expose the number of stored traces', async () => {
      api.publishTrace(traceNode(1));
      api.publishTrace(traceNode(2));

      expect(await register.getSingleMetricAsString('ton_trace_api_stored_traces')).to.include(
        'ton_trace_api_stored_traces 2',
      );
    });
  });
});
