/**
 * Network parameters
 *
 * Address prefixes and policy assets for the supported Elements chains.
 */

import type { Network } from '../types/index';

export interface AddressParams {
  /** Base58 prefix of pay-to-pubkey-hash addresses */
  p2pkhPrefix: number;
  /** Base58 prefix of pay-to-script-hash addresses */
  p2shPrefix: number;
  /** Leading base58 byte of confidential addresses */
  blindedPrefix: number;
  /** HRP of unconfidential segwit addresses */
  bech32Hrp: string;
  /** HRP of confidential segwit addresses */
  blech32Hrp: string;
}

export interface NetworkParams {
  network: Network;
  /** Asset fees are paid in */
  policyAsset: string;
  address: AddressParams;
}

export const NETWORKS: Record<Network, NetworkParams> = {
  liquid: {
    network: 'liquid',
    policyAsset: '6f0279e9ed041c3d710a9f57d0c02928416460c4b722ae3457a11eec381c526d',
    address: {
      p2pkhPrefix: 57,
      p2shPrefix: 39,
      blindedPrefix: 12,
      bech32Hrp: 'ex',
      blech32Hrp: 'lq'
    }
  },
  'liquid-testnet': {
    network: 'liquid-testnet',
    policyAsset: '144c654344aa716d6f3abcc1ca90e5641e4e2a7f633bc09fe3baf64585819a49',
    address: {
      p2pkhPrefix: 36,
      p2shPrefix: 19,
      blindedPrefix: 23,
      bech32Hrp: 'tex',
      blech32Hrp: 'tlq'
    }
  },
  'elements-regtest': {
    network: 'elements-regtest',
    policyAsset: '5ac9f65c0efcc4775e0baec4ec03abdde22473cd3cf33c0419ca290e0751b225',
    address: {
      p2pkhPrefix: 235,
      p2shPrefix: 75,
      blindedPrefix: 4,
      bech32Hrp: 'ert',
      blech32Hrp: 'el'
    }
  }
};

export function isNetwork(value: string): value is Network {
  return Object.prototype.hasOwnProperty.call(NETWORKS, value);
}

export function getNetworkParams(network: Network): NetworkParams {
  return NETWORKS[network];
}
