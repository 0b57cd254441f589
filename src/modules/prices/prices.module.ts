import { Module } from '@nestjs/common';

import { ChartHistoryCache } from './chart-history.cache';
import { CoinTickersFetcherService } from './coin-tickers-fetcher.service';
import { PriceCache } from './price.cache';
import { TickerIdRegistry } from './ticker-id.registry';
import { PRICE_PROVIDER_CLIENT } from '../../common/interfaces/token-pricing/price-provider.interfaces';
import { EthereumAddressCodec } from '../../integrations/address/ethereum/ethereum-address.codec';
import { CoinGeckoPriceProviderClient } from '../../integrations/token-pricing/coingecko/coingecko-price-provider.client';

@Module({
  providers: [
    EthereumAddressCodec,
    CoinGeckoPriceProviderClient,
    {
      provide: PRICE_PROVIDER_CLIENT,
      useExisting: CoinGeckoPriceProviderClient,
    },
    TickerIdRegistry,
    PriceCache,
    ChartHistoryCache,
    CoinTickersFetcherService,
  ],
  exports: [CoinTickersFetcherService, EthereumAddressCodec],
})
export class PricesModule {}
