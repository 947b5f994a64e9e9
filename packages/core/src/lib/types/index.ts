// SPDX-License-Identifier: Apache-2.0

export * from './events';
export * from './registry';
export * from './RequestDetails';
export * from './validation';
