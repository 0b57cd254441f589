import { ChainKey } from '../../common/interfaces/chain-key.interfaces';

// CoinGecko platform names as they appear in /coins/list?include_platform=true.
export const TICKER_PLATFORM_BY_CHAIN: Readonly<Record<ChainKey, string | null>> = {
  [ChainKey.ETHEREUM_MAINNET]: 'ethereum',
  [ChainKey.ETHEREUM_CLASSIC]: 'ethereum-classic',
  [ChainKey.GNOSIS]: 'xdai',
  [ChainKey.BSC_MAINNET]: 'binance-smart-chain',
  [ChainKey.AVALANCHE_MAINNET]: 'Avalanche',
  [ChainKey.POLYGON_MAINNET]: 'polygon-pos',
  [ChainKey.BSC_TESTNET]: null,
  [ChainKey.AVALANCHE_FUJI]: null,
  [ChainKey.POLYGON_MUMBAI]: null,
  [ChainKey.FANTOM_MAINNET]: null,
  [ChainKey.FANTOM_TESTNET]: null,
  [ChainKey.HECO_MAINNET]: null,
  [ChainKey.HECO_TESTNET]: null,
  [ChainKey.POA]: null,
  [ChainKey.SOKOL]: null,
  [ChainKey.CALLISTO]: null,
  [ChainKey.KOVAN]: null,
  [ChainKey.ROPSTEN]: null,
  [ChainKey.RINKEBY]: null,
  [ChainKey.GOERLI]: null,
  [ChainKey.ARTIS_SIGMA1]: null,
  [ChainKey.ARTIS_TAU1]: null,
  [ChainKey.CUSTOM]: null,
};

export const resolveTickerPlatform = (chainKey: ChainKey): string | null => {
  return TICKER_PLATFORM_BY_CHAIN[chainKey];
};
