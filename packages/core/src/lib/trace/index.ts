// SPDX-License-Identifier: Apache-2.0

export * from './additionalInfo';
export * from './candidates';
export * from './completeness';
export * from './trace';
