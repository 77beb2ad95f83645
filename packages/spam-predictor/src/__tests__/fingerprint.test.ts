import { describe, expect, it } from 'vitest';

import {
  canonicalJson,
  extractClassificationFeatures,
  fingerprintFeatures,
  fingerprintMetadata,
} from '../fingerprint.js';

import { createMetadata, TEST_ADDRESS } from './test-utils.js';

describe('extractClassificationFeatures', () => {
  it('keeps only provider-independent fields with nulls for gaps', () => {
    const features = extractClassificationFeatures(1, createMetadata({ description: 'ignored', name: '  Cool Cats ' }));

    expect(features).toEqual({
      address: TEST_ADDRESS,
      chainId: 1,
      contractType: 'ERC721',
      creationBlock: null,
      holderCount: null,
      isVerified: null,
      name: 'Cool Cats',
      symbol: 'COOL',
      totalSupply: null,
      transactionCount: null,
    });
  });

  it('treats blank names as missing', () => {
    expect(extractClassificationFeatures(1, createMetadata({ name: '   ' })).name).toBeNull();
  });
});

describe('fingerprint', () => {
  it('serializes features with sorted keys', () => {
    const features = extractClassificationFeatures(1, createMetadata());

    expect(canonicalJson(features)).toBe(
      '{"address":"0x00000000000000000000000000000000000000aa","chainId":1,"contractType":"ERC721","creationBlock":null,"holderCount":null,"isVerified":null,"name":"Cool Cats","symbol":"COOL","totalSupply":null,"transactionCount":null}'
    );
    expect(fingerprintFeatures(features)).toBe('0511701fbd3e3c800e4f4072453c58075eb7e3355d6f0ef6477f7b5425491bee');
  });

  it('is the same whichever provider described the contract', () => {
    const fromMoralis = createMetadata({ additionalData: { token_hash: 'abc' }, source: 'moralis' });
    const fromPinax = createMetadata({ description: 'x', source: 'pinax' });

    expect(fingerprintMetadata(1, fromMoralis)).toBe(fingerprintMetadata(1, fromPinax));
  });

  it('ignores address casing and surrounding whitespace', () => {
    const a = createMetadata({ address: TEST_ADDRESS.toUpperCase().replace('0X', '0x'), symbol: ' COOL ' });

    expect(fingerprintMetadata(1, a)).toBe(fingerprintMetadata(1, createMetadata()));
  });

  it('changes with any classification feature', () => {
    const base = fingerprintMetadata(1, createMetadata());

    expect(fingerprintMetadata(137, createMetadata())).not.toBe(base);
    expect(fingerprintMetadata(1, createMetadata({ name: 'Cool Cats Official' }))).not.toBe(base);
    expect(fingerprintMetadata(1, createMetadata({ contractType: 'ERC1155' }))).not.toBe(base);
  });
});
