// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import pino from 'pino';
import sinon from 'sinon';

import { RpcMethodDispatcher } from '../../../src/lib/dispatcher/rpcMethodDispatcher';
import { InformationSourceError } from '../../../src/lib/errors/InformationSourceError';
import { JsonRpcError, predefined } from '../../../src/lib/errors/JsonRpcError';
import { ParamType, type RpcMethodRegistry } from '../../../src/lib/types';
import { txHash, requestDetails } from '../../helpers';

describe('RpcMethodDispatcher', () => {
  const TEST_METHOD_NAME = 'test_method';
  const TEST_RESULT = { success: true };
  const REQUEST_ID_PREFIX = `[Request ID: ${requestDetails.requestId}]`;
  const logger = pino({ level: 'silent' });

  let methodRegistry: RpcMethodRegistry;
  let handler: sinon.SinonStub;
  let dispatcher: RpcMethodDispatcher;

  const dispatchError = async (method: string, params: unknown[]): Promise<JsonRpcError> => {
    const result = await dispatcher.dispatch(method, params, requestDetails);
    if (!(result instanceof JsonRpcError)) {
      throw new Error(`expected a JsonRpcError, got ${JSON.stringify(result)}`);
    }
    return result;
  };

  beforeEach(() => {
    methodRegistry = new Map();
    handler = sinon.stub().resolves(TEST_RESULT);
    methodRegistry.set(TEST_METHOD_NAME, {
      handler,
      validationRules: {
        0: { type: ParamType.TRACE_ID, required: true },
        1: { type: ParamType.LIMIT, required: false },
      },
    });
    dispatcher = new RpcMethodDispatcher(methodRegistry, logger);
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('dispatch()', () => {
    it('should pass validated params padded to the declared positions, followed by the request details', async () => {
      const result = await dispatcher.dispatch(TEST_METHOD_NAME, [txHash(1)], requestDetails);

      expect(result).to.equal(TEST_RESULT);
      expect(handler.calledOnceWithExactly(txHash(1), undefined, requestDetails)).to.be.true;
    });

    it('should drop params beyond the declared positions', async () => {
      await dispatcher.dispatch(TEST_METHOD_NAME, [txHash(1), 5, 'extra'], requestDetails);

      expect(handler.calledOnceWithExactly(txHash(1), 5, requestDetails)).to.be.true;
    });

    it('should only pass the request details to methods without rules', async () => {
      const plain = sinon.stub().returns(['a']);
      methodRegistry.set('status_plain', { handler: plain });

      const result = await dispatcher.dispatch('status_plain', undefined, requestDetails);

      expect(result).to.deep.equal(['a']);
      expect(plain.calledOnceWithExactly(requestDetails)).to.be.true;
    });

    it('should return METHOD_NOT_FOUND for an unregistered method', async () => {
      const error = await dispatchError('trace_unknown', []);

      expect(error.code).to.equal(-32601);
      expect(error.message).to.equal(`${REQUEST_ID_PREFIX} Method trace_unknown not found`);
      expect(handler.called).to.be.false;
    });

    it('should return the validation error without calling the handler', async () => {
      const error = await dispatchError(TEST_METHOD_NAME, []);

      expect(error.code).to.equal(-32602);
      expect(error.message).to.equal(`${REQUEST_ID_PREFIX} Missing value for required parameter 0`);
      expect(handler.called).to.be.false;
    });

    it('should keep a JsonRpcError thrown by the handler', async () => {
      handler.rejects(predefined.RESOURCE_NOT_FOUND('Trace x is unknown.'));

      const error = await dispatchError(TEST_METHOD_NAME, [txHash(1)]);

      expect(error.code).to.equal(-32001);
      expect(error.message).to.equal(`${REQUEST_ID_PREFIX} Requested resource not found. Trace x is unknown.`);
    });

    it('should map an information source failure to UPSTREAM_FAIL', async () => {
      handler.rejects(new InformationSourceError('upstream down', 503, 'get_sale_data'));

      const error = await dispatchError(TEST_METHOD_NAME, [txHash(1)]);

      expect(error.code).to.equal(-32020);
      expect(error.data).to.equal('503');
      expect(error.message).to.equal(`${REQUEST_ID_PREFIX} upstream down`);
    });

    it('should map an information source timeout to REQUEST_TIMEOUT', async () => {
      handler.rejects(new InformationSourceError('timeout of 10000ms exceeded', 504));

      const error = await dispatchError(TEST_METHOD_NAME, [txHash(1)]);

      expect(error.code).to.equal(-32010);
    });

    it('should map an aborted or timed out enrichment to REQUEST_TIMEOUT', async () => {
      for (const name of ['AbortError', 'TimeoutError']) {
        const aborted = new Error('The operation was aborted');
        aborted.name = name;
        handler.rejects(aborted);

        const error = await dispatchError(TEST_METHOD_NAME, [txHash(1)]);

        expect(error.code).to.equal(-32010);
        expect(error.message).to.equal(`${REQUEST_ID_PREFIX} Request timeout. Please try again.`);
      }
    });

    it('should map any other failure to INTERNAL_ERROR', async () => {
      handler.throws(new Error('boom'));

      const error = await dispatchError(TEST_METHOD_NAME, [txHash(1)]);

      expect(error.code).to.equal(-32603);
      expect(error.message).to.equal(`${REQUEST_ID_PREFIX} Error invoking RPC: boom`);
    });
  });
});
