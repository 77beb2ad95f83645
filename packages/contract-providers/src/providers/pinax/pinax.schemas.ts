import { z } from 'zod';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

export const PinaxContractRowSchema = z.object({
  description: optionalText,
  name: optionalText,
  standard: optionalText,
  symbol: optionalText,
});

/**
 * ClickHouse `FORMAT JSON` envelope. SQL errors come back as `error` on a 200 response.
 */
export const PinaxSqlResponseSchema = z
  .object({
    data: z.array(PinaxContractRowSchema).optional(),
    error: z.string().optional(),
    rows: z.number().optional(),
  })
  .passthrough();

export type PinaxContractRow = z.infer<typeof PinaxContractRowSchema>;
export type PinaxSqlResponse = z.infer<typeof PinaxSqlResponseSchema>;
