import type { PriceProviderEndpoint } from '../interfaces/token-pricing/price-provider.interfaces';

export class PriceProviderRequestError extends Error {
  public constructor(
    public readonly endpoint: PriceProviderEndpoint,
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'PriceProviderRequestError';
  }
}
