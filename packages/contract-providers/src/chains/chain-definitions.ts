import type { ChainConfig } from './chain-config.schema.js';

/**
 * Chains known out of the box. Configuration can disable these or add more.
 */
export const BUILT_IN_CHAINS: readonly ChainConfig[] = [
  {
    aliases: ['ETH', 'UNI'],
    chainId: 1,
    enabled: true,
    name: 'Ethereum',
    providers: {
      moralis: { chain: 'eth', enabled: true },
      pinax: { enabled: true },
    },
    status: 'full',
  },
  {
    aliases: ['MATIC'],
    chainId: 137,
    enabled: true,
    name: 'Polygon',
    providers: {
      moralis: { chain: 'polygon', enabled: true },
      pinax: { enabled: true },
    },
    status: 'full',
  },
  {
    aliases: [],
    chainId: 8453,
    enabled: true,
    name: 'Base',
    providers: {
      moralis: { chain: 'base', enabled: true },
      pinax: { enabled: true },
    },
    status: 'full',
  },
  {
    aliases: ['AVAX'],
    chainId: 43114,
    enabled: true,
    name: 'Avalanche',
    providers: {
      moralis: { chain: 'avalanche', enabled: true },
      pinax: { enabled: true },
    },
    status: 'full',
  },
  {
    aliases: ['ARB'],
    chainId: 42161,
    enabled: true,
    name: 'Arbitrum',
    providers: {
      moralis: { chain: 'arbitrum', enabled: true },
      pinax: { enabled: true },
    },
    status: 'full',
  },
];
