// SPDX-License-Identifier: Apache-2.0

import { type Trace, visit } from './trace';

/**
 * Counts the outbound messages of the subtree that have not been matched to a child yet.
 *
 * Known limitation: a message leaving the monitored set of accounts will never get a child,
 * but it is counted exactly like one that has not been matched yet. A trace whose only
 * remaining work is such a message is therefore reported as in progress forever.
 */
export function countUncompleted(trace: Trace): number {
  let count = 0;
  visit(trace, (node) => {
    count += node.outMsgs.length;
  });
  return count;
}

/**
 * Whether the trace may still receive transactions, i.e. whether any node of the subtree
 * has an unmatched outbound message. See {@link countUncompleted} for the known over-count.
 */
export function inProgress(trace: Trace): boolean {
  return countUncompleted(trace) !== 0;
}
