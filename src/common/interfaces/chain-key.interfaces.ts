export enum ChainKey {
  ETHEREUM_MAINNET = 'ethereum_mainnet',
  ETHEREUM_CLASSIC = 'ethereum_classic',
  GNOSIS = 'gnosis',
  BSC_MAINNET = 'bsc_mainnet',
  BSC_TESTNET = 'bsc_testnet',
  AVALANCHE_MAINNET = 'avalanche_mainnet',
  AVALANCHE_FUJI = 'avalanche_fuji',
  POLYGON_MAINNET = 'polygon_mainnet',
  POLYGON_MUMBAI = 'polygon_mumbai',
  FANTOM_MAINNET = 'fantom_mainnet',
  FANTOM_TESTNET = 'fantom_testnet',
  HECO_MAINNET = 'heco_mainnet',
  HECO_TESTNET = 'heco_testnet',
  POA = 'poa',
  SOKOL = 'sokol',
  CALLISTO = 'callisto',
  KOVAN = 'kovan',
  ROPSTEN = 'ropsten',
  RINKEBY = 'rinkeby',
  GOERLI = 'goerli',
  ARTIS_SIGMA1 = 'artis_sigma1',
  ARTIS_TAU1 = 'artis_tau1',
  CUSTOM = 'custom',
}

export const CHAIN_KEYS: readonly ChainKey[] = Object.values(ChainKey);

export const isChainKey = (rawValue: string): rawValue is ChainKey => {
  return (CHAIN_KEYS as readonly string[]).includes(rawValue);
};
