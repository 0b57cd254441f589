export class AlreadyFetchingPricesError extends Error {
  public constructor() {
    super('A price refresh is already in progress.');
    this.name = 'AlreadyFetchingPricesError';
  }
}

export class AssetNotPricedError extends Error {
  public constructor(public readonly assetKeyId: string) {
    super(`No cached price for asset ${assetKeyId}.`);
    this.name = 'AssetNotPricedError';
  }
}

export class FetchChartHistoryError extends Error {
  public constructor() {
    super('Failed to fetch chart history.');
    this.name = 'FetchChartHistoryError';
  }
}
