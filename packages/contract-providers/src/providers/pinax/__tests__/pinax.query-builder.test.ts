import { describe, expect, it } from 'vitest';

import { buildContractMetadataQuery } from '../pinax.query-builder.js';

describe('buildContractMetadataQuery', () => {
  it('unions both NFT standards and joins the description', () => {
    const query = buildContractMetadataQuery(
      'mainnet:evm-nft-tokens@v0.6.2',
      '0x00000000000000000000000000000000000000AA'
    )._unsafeUnwrap();

    expect(query).toBe(
      [
        'WITH contract_metadata AS (',
        "  SELECT symbol, name, contract, 'ERC1155' AS standard FROM `mainnet:evm-nft-tokens@v0.6.2`.erc1155_metadata_by_contract WHERE contract = '0x00000000000000000000000000000000000000aa'",
        '  UNION ALL',
        "  SELECT symbol, name, contract, 'ERC721' AS standard FROM `mainnet:evm-nft-tokens@v0.6.2`.erc721_metadata_by_contract WHERE contract = '0x00000000000000000000000000000000000000aa'",
        ')',
        'SELECT cm.symbol, cm.name, cm.standard, nm.description',
        'FROM contract_metadata AS cm',
        'LEFT JOIN `mainnet:evm-nft-tokens@v0.6.2`.nft_metadata AS nm ON cm.contract = nm.contract',
        'LIMIT 1',
        'FORMAT JSON',
      ].join('\n')
    );
  });

  it('rejects database names that could escape the identifier', () => {
    const error = buildContractMetadataQuery('db`; DROP TABLE x', '0x00000000000000000000000000000000000000aa')._unsafeUnwrapErr();

    expect(error.message).toBe('Invalid Pinax database name: db`; DROP TABLE x');
  });

  it('rejects anything that is not a 20-byte hex address', () => {
    const error = buildContractMetadataQuery('mainnet:evm-nft-tokens@v0.6.2', "0xaa' OR 1=1")._unsafeUnwrapErr();

    expect(error.message).toBe("Invalid contract address for Pinax query: 0xaa' OR 1=1");
  });
});
