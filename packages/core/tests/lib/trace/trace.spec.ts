// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { type Trace, traceDepth, visit } from '../../../src/lib/trace';
import { chain, traceNode } from '../../helpers';

describe('Trace', () => {
  // 0 ─┬─ 1 ─── 3
  //    └─ 2
  const tree = (): Trace =>
    traceNode(0, {
      children: [traceNode(1, { children: [traceNode(3)] }), traceNode(2)],
    });

  describe('visit', () => {
    it('should visit parents before children and children in order', () => {
      const order: bigint[] = [];
      visit(tree(), (node) => order.push(node.lt));
      expect(order).to.deep.equal([0n, 1n, 3n, 2n]);
    });

    it('should visit a single node once', () => {
      let count = 0;
      visit(traceNode(7), () => count++);
      expect(count).to.equal(1);
    });

    it('should walk a very deep tree without exhausting the call stack', () => {
      let count = 0;
      visit(chain(200_000), () => count++);
      expect(count).to.equal(200_000);
    });
  });

  describe('traceDepth', () => {
    it('should return 1 for a single node', () => {
      expect(traceDepth(traceNode(0))).to.equal(1);
    });

    it('should return the length of the longest branch', () => {
      expect(traceDepth(tree())).to.equal(3);
    });

    it('should measure a very deep tree', () => {
      expect(traceDepth(chain(100_000))).to.equal(100_000);
    });
  });
});
