import type { ProviderFactory } from '../core/types.js';

import { MORALIS_METADATA, MoralisApiClient } from './moralis/moralis.api-client.js';
import { PINAX_METADATA, PinaxApiClient } from './pinax/pinax.api-client.js';

export const moralisFactory: ProviderFactory = {
  create: (config, deps) => new MoralisApiClient(config.moralis, deps),
  metadata: MORALIS_METADATA,
};

export const pinaxFactory: ProviderFactory = {
  create: (config, deps) => new PinaxApiClient(config.pinax, deps),
  metadata: PINAX_METADATA,
};

export const BUILT_IN_PROVIDER_FACTORIES: readonly ProviderFactory[] = [moralisFactory, pinaxFactory];

export { MoralisApiClient, MORALIS_METADATA } from './moralis/moralis.api-client.js';
export { mapMoralisContractType, mapMoralisNftItem } from './moralis/moralis.mapper-utils.js';
export { basicAuthHeader, mapPinaxRow, PinaxApiClient, PINAX_METADATA } from './pinax/pinax.api-client.js';
export { buildContractMetadataQuery, PINAX_HEALTH_QUERY } from './pinax/pinax.query-builder.js';
