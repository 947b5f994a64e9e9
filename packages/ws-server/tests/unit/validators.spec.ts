// SPDX-License-Identifier: Apache-2.0

import { Address } from '@ton/core';
import { JsonRpcError } from '@ton-trace-api/core';
import { expect } from 'chai';

import { validateAccountParams, validateWorkchainParam } from '../../src/utils/validators';

describe('WebSocket parameter validators', () => {
  const RAW = '0:' + 'cd'.repeat(32);

  describe('validateAccountParams', () => {
    it('should normalize user-friendly addresses to raw ids', () => {
      const friendly = Address.parse(RAW).toString();

      expect(validateAccountParams([friendly, RAW])).to.deep.equal([RAW, RAW]);
    });

    it('should reject a parameter that is not a string', () => {
      expect(() => validateAccountParams([RAW, 42]))
        .to.throw(JsonRpcError)
        .with.property('message', 'Invalid parameter 1: Expected a raw or user-friendly account address');
    });

    it('should reject a malformed address', () => {
      expect(() => validateAccountParams(['0:xyz']))
        .to.throw(JsonRpcError)
        .with.property('message', 'Invalid parameter 0: 0:xyz is not a valid account address');
    });
  });

  describe('validateWorkchainParam', () => {
    it('should be undefined without params', () => {
      expect(validateWorkchainParam([])).to.equal(undefined);
    });

    it('should read workchain=N', () => {
      expect(validateWorkchainParam(['workchain=-1'])).to.equal(-1);
    });

    it('should reject anything else', () => {
      expect(() => validateWorkchainParam(['masterchain']))
        .to.throw(JsonRpcError)
        .with.property('code', -32602);
    });
  });
});
