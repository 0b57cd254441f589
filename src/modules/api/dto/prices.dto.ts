import { z } from 'zod';

import { ChainKey } from '../../../common/interfaces/chain-key.interfaces';
import { ChartHistoryPeriod } from '../../../common/interfaces/token-pricing/token-pricing.interfaces';

const MAX_TOKENS_PER_REQUEST = 1000;
const MAX_SYMBOL_LENGTH = 32;
const EVM_ADDRESS_PATTERN: RegExp = /^0x[a-fA-F0-9]{40}$/;

const contractAddressSchema = z
  .string()
  .trim()
  .regex(EVM_ADDRESS_PATTERN, 'must be a 0x-prefixed 20-byte hex address');

export const fetchPricesSchema = z.object({
  tokens: z
    .array(
      z.object({
        symbol: z.string().trim().min(1).max(MAX_SYMBOL_LENGTH),
        contractAddress: contractAddressSchema,
        chainKey: z.enum(ChainKey),
      }),
    )
    .max(MAX_TOKENS_PER_REQUEST),
});

export type FetchPricesDto = z.infer<typeof fetchPricesSchema>;

export const assetKeyParamsSchema = z.object({
  chainKey: z.enum(ChainKey),
  contractAddress: contractAddressSchema,
});

export type AssetKeyParamsDto = z.infer<typeof assetKeyParamsSchema>;

export const chartHistoryParamsSchema = assetKeyParamsSchema.extend({
  period: z.enum(ChartHistoryPeriod),
});

export type ChartHistoryParamsDto = z.infer<typeof chartHistoryParamsSchema>;

export const chartHistoryQuerySchema = z.object({
  force: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type ChartHistoryQueryDto = z.infer<typeof chartHistoryQuerySchema>;
