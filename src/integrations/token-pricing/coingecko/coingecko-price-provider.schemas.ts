import { z } from 'zod';

export const coinGeckoCatalogSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    platforms: z.record(z.string(), z.string().nullable()).nullish(),
  }),
);

export type CoinGeckoCatalogPayload = z.infer<typeof coinGeckoCatalogSchema>;

export const coinGeckoMarketsSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    image: z.string().nullish(),
    current_price: z.number().nullish(),
    price_change_percentage_24h: z.number().nullish(),
    price_change_24h: z.number().nullish(),
    market_cap: z.number().nullish(),
    total_volume: z.number().nullish(),
    high_24h: z.number().nullish(),
    low_24h: z.number().nullish(),
    last_updated: z.string().nullish(),
  }),
);

export type CoinGeckoMarketsPayload = z.infer<typeof coinGeckoMarketsSchema>;

export const coinGeckoMarketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])).nullish(),
});

export type CoinGeckoMarketChartPayload = z.infer<typeof coinGeckoMarketChartSchema>;
