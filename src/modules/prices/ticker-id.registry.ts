import { Inject, Injectable, Logger } from '@nestjs/common';

import { resolveTickerPlatform } from './ticker-platform.constants';
import {
  type IPriceProviderClient,
  PRICE_PROVIDER_CLIENT,
} from '../../common/interfaces/token-pricing/price-provider.interfaces';
import type {
  ICatalogEntry,
  IRequestedAsset,
} from '../../common/interfaces/token-pricing/token-pricing.interfaces';
import { executeWithSoftFallback } from '../../common/utils/network/exponential-backoff.util';
import { AppConfigService } from '../../config/app-config.service';
import { EthereumAddressCodec } from '../../integrations/address/ethereum/ethereum-address.codec';

/**
 * Holds the provider catalog for the whole process.
 *
 * The first `getCatalog()` call starts the fetch; every later call, concurrent or not,
 * receives the same promise. A catalog that failed on every attempt resolves to `[]`
 * and stays that way until the registry is recreated.
 */
@Injectable()
export class TickerIdRegistry {
  private readonly logger: Logger = new Logger(TickerIdRegistry.name);
  private catalogPromise: Promise<readonly ICatalogEntry[]> | null = null;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly addressCodec: EthereumAddressCodec,
    @Inject(PRICE_PROVIDER_CLIENT) private readonly priceProviderClient: IPriceProviderClient,
  ) {}

  public async getCatalog(): Promise<readonly ICatalogEntry[]> {
    if (this.catalogPromise === null) {
      this.catalogPromise = this.loadCatalog();
    }

    return this.catalogPromise;
  }

  public resolve(asset: IRequestedAsset, catalog: readonly ICatalogEntry[]): string | null {
    const platform: string | null = resolveTickerPlatform(asset.chainKey);
    const entry: ICatalogEntry | undefined = catalog.find((candidate: ICatalogEntry): boolean =>
      this.matches(candidate, asset, platform),
    );

    return entry?.id ?? null;
  }

  private matches(
    entry: ICatalogEntry,
    asset: IRequestedAsset,
    platform: string | null,
  ): boolean {
    const platformAddress: string | undefined =
      platform === null ? undefined : entry.platforms[platform];

    if (platformAddress === undefined) {
      return this.isSameSymbol(entry.symbol, asset.symbol);
    }

    if (this.addressCodec.isNullAddress(platformAddress)) {
      return this.isSameSymbol(entry.symbol, asset.symbol);
    }

    return this.addressCodec.isSameAddress(platformAddress, asset.contractAddress);
  }

  private isSameSymbol(left: string, right: string): boolean {
    return left.toLowerCase() === right.toLowerCase();
  }

  private async loadCatalog(): Promise<readonly ICatalogEntry[]> {
    const catalog: readonly ICatalogEntry[] = await executeWithSoftFallback(
      async (): Promise<readonly ICatalogEntry[]> => this.priceProviderClient.fetchCatalog(),
      {
        maxAttempts: this.appConfigService.priceProviderRetryAttempts,
        baseDelayMs: this.appConfigService.priceProviderRetryDelayMs,
        onRetry: (error: unknown, attempt: number): void => {
          const errorMessage: string = error instanceof Error ? error.message : String(error);
          this.logger.warn(
            `ticker_catalog_retry attempt=${String(attempt)} reason=${errorMessage}`,
          );
        },
        fallback: (error: unknown): readonly ICatalogEntry[] => {
          const errorMessage: string = error instanceof Error ? error.message : String(error);
          this.logger.warn(`ticker_catalog_unavailable reason=${errorMessage}`);
          return [];
        },
      },
    );

    this.logger.log(`ticker_catalog_loaded entries=${String(catalog.length)}`);
    return catalog;
  }
}
