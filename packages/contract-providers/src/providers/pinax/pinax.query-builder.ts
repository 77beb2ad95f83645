import { ValidationError } from '@spamcheck/core';
import { err, ok, type Result } from 'neverthrow';

import { PINAX_DB_NAME_PATTERN } from '../../chains/chain-config.schema.js';

const LOWERCASE_ADDRESS = /^0x[0-9a-f]{40}$/;

export const PINAX_HEALTH_QUERY = 'SELECT 1 FORMAT JSON';

/**
 * Collection metadata for one contract, ERC-1155 first, joined with its description.
 *
 * Both inputs are interpolated into SQL, so each is checked against a strict pattern first.
 */
export function buildContractMetadataQuery(dbName: string, address: string): Result<string, ValidationError> {
  if (!PINAX_DB_NAME_PATTERN.test(dbName)) {
    return err(new ValidationError(`Invalid Pinax database name: ${dbName}`));
  }
  const contract = address.toLowerCase();
  if (!LOWERCASE_ADDRESS.test(contract)) {
    return err(new ValidationError(`Invalid contract address for Pinax query: ${address}`));
  }

  const db = `\`${dbName}\``;
  return ok(
    [
      'WITH contract_metadata AS (',
      `  SELECT symbol, name, contract, 'ERC1155' AS standard FROM ${db}.erc1155_metadata_by_contract WHERE contract = '${contract}'`,
      '  UNION ALL',
      `  SELECT symbol, name, contract, 'ERC721' AS standard FROM ${db}.erc721_metadata_by_contract WHERE contract = '${contract}'`,
      ')',
      'SELECT cm.symbol, cm.name, cm.standard, nm.description',
      'FROM contract_metadata AS cm',
      `LEFT JOIN ${db}.nft_metadata AS nm ON cm.contract = nm.contract`,
      'LIMIT 1',
      'FORMAT JSON',
    ].join('\n')
  );
}
