import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const ConfigPathSchema = z.object({
  config: z.string().trim().min(1, '--config must not be empty').optional(),
});

export const CheckCommandOptionsSchema = JsonFlagSchema.merge(ConfigPathSchema).extend({
  chain: z.string().trim().min(1, '--chain is required'),
});

export const CheckAddressesSchema = z
  .array(z.string().trim().min(1))
  .min(1, 'At least one contract address is required');

export const HealthCommandOptionsSchema = JsonFlagSchema.merge(ConfigPathSchema);

export const ChainsCommandOptionsSchema = JsonFlagSchema.merge(ConfigPathSchema);

export type CheckCommandOptions = z.infer<typeof CheckCommandOptionsSchema>;
export type HealthCommandOptions = z.infer<typeof HealthCommandOptionsSchema>;
export type ChainsCommandOptions = z.infer<typeof ChainsCommandOptionsSchema>;
