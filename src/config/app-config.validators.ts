import type { ParsedEnv } from './app-config.schema';

export function assertPriceProviderConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.PRICE_PROVIDER_RETRY_DELAY_MS > parsedEnv.PRICE_PROVIDER_TIMEOUT_MS) {
    throw new Error('PRICE_PROVIDER_RETRY_DELAY_MS must be <= PRICE_PROVIDER_TIMEOUT_MS');
  }
}
