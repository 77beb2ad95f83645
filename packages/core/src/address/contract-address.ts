import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

const HEX_ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/**
 * Contract address schema: trims, checks `0x` + 40 hex digits, lowercases,
 * and refuses the zero address (never a deployed contract).
 */
export const ContractAddressSchema = z
  .string()
  .trim()
  .regex(HEX_ADDRESS_PATTERN, 'Address must be 0x followed by 40 hexadecimal characters')
  .transform((value) => value.toLowerCase())
  .refine((value) => value !== ZERO_ADDRESS, 'The zero address is not a contract');

export function normalizeContractAddress(input: string): Result<string, ValidationError> {
  const parsed = ContractAddressSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'Invalid address';
    return err(new ValidationError(`Invalid contract address '${input}': ${reason}`));
  }
  return ok(parsed.data);
}

/**
 * Normalize and deduplicate a batch, keeping first-seen order.
 * Every malformed entry is reported, not only the first.
 */
export function normalizeAddressBatch(inputs: readonly string[]): Result<string[], ValidationError> {
  const seen = new Set<string>();
  const invalid: string[] = [];

  for (const input of inputs) {
    const result = normalizeContractAddress(input);
    if (result.isErr()) {
      invalid.push(input);
      continue;
    }
    seen.add(result.value);
  }

  if (invalid.length > 0) {
    return err(
      new ValidationError(`Invalid contract address(es): ${invalid.join(', ')}`, {
        additionalContext: { invalidAddresses: invalid },
      })
    );
  }

  return ok(Array.from(seen));
}
