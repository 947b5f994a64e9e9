// SPDX-License-Identifier: Apache-2.0

/**
 * Capability tags recognised by the enrichment engine.
 * Accounts may carry other tags; those are kept on the trace but never classified.
 */
export enum ContractInterface {
  NftSale = 'nft_sale',
  NftSaleGetgems = 'nft_sale_getgems',
}

/**
 * Decoded operation name of a jetton transfer message body.
 */
export const JETTON_TRANSFER_MSG_OP = 'JettonTransfer';

export default {
  GET_METHOD: {
    GET_WALLET_DATA: 'get_wallet_data',
    GET_SALE_DATA: 'get_sale_data',
  },

  // exit codes of a get-method that completed successfully
  SUCCESS_EXIT_CODES: [0, 1],

  DEFAULT_ACCOUNT_TRACES_LIMIT: 100,
  MAX_ACCOUNT_TRACES_LIMIT: 1000,
  MAX_TRACES_PER_ACCOUNT: 1000,

  TRACE_ID_REGEX: /^[0-9a-f]{64}$/,
  RAW_ADDRESS_REGEX: /^-?\d+:[0-9a-fA-F]{64}$/,
};
