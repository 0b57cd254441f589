import {
  BadGatewayException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';

import { CHAIN_KEYS, type ChainKey } from '../../../common/interfaces/chain-key.interfaces';
import {
  buildAssetKeyId,
  CHART_HISTORY_PERIODS,
  ChartHistoryPeriod,
  type ChartHistoryPoint,
  type IChartHistory,
  type ICoinTicker,
} from '../../../common/interfaces/token-pricing/token-pricing.interfaces';
import { CoinTickersFetcherService } from '../../prices/coin-tickers-fetcher.service';
import {
  AlreadyFetchingPricesError,
  AssetNotPricedError,
  FetchChartHistoryError,
} from '../../prices/prices.errors';
import {
  type AssetKeyParamsDto,
  assetKeyParamsSchema,
  type ChartHistoryParamsDto,
  chartHistoryParamsSchema,
  type ChartHistoryQueryDto,
  chartHistoryQuerySchema,
  type FetchPricesDto,
  fetchPricesSchema,
} from '../dto/prices.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  CHART_HISTORY_LIST_RESULT_SCHEMA,
  CHART_HISTORY_RESULT_SCHEMA,
  FETCH_PRICES_BODY_SCHEMA,
  FETCH_PRICES_RESULT_SCHEMA,
} from '../swagger/api-schemas';

export interface IPricedAssetItem {
  readonly chainKey: ChainKey;
  readonly contractAddress: string;
  readonly ticker: ICoinTicker;
}

export interface IFetchPricesResult {
  readonly items: readonly IPricedAssetItem[];
}

export interface IChartHistoryResult {
  readonly period: ChartHistoryPeriod;
  readonly prices: readonly ChartHistoryPoint[];
}

export interface IChartHistoryListResult {
  readonly items: readonly IChartHistoryResult[];
}

@ApiTags('Prices')
@Controller('api/prices')
export class PricesController {
  public constructor(private readonly coinTickersFetcherService: CoinTickersFetcherService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Resolve and fetch USD prices for wallet tokens' })
  @ApiBody({ schema: FETCH_PRICES_BODY_SCHEMA })
  @ApiResponse({ status: 200, description: 'Priced tokens', schema: FETCH_PRICES_RESULT_SCHEMA })
  @ApiResponse({ status: 409, description: 'A price fetch is already in progress' })
  public async fetchPrices(
    @Body(new ZodValidationPipe(fetchPricesSchema)) body: FetchPricesDto,
  ): Promise<IFetchPricesResult> {
    const tickers: ReadonlyMap<string, ICoinTicker> = await this.mapErrors(
      async (): Promise<ReadonlyMap<string, ICoinTicker>> =>
        this.coinTickersFetcherService.fetchPrices(body.tokens),
    );
    const items: IPricedAssetItem[] = [];

    for (const token of body.tokens) {
      const ticker: ICoinTicker | undefined = tickers.get(buildAssetKeyId(token));

      if (ticker !== undefined) {
        items.push({ chainKey: token.chainKey, contractAddress: token.contractAddress, ticker });
      }
    }

    return { items };
  }

  @Get(':chainKey/:contractAddress/history')
  @ApiOperation({ summary: 'Get chart history for every period' })
  @ApiParam({ name: 'chainKey', enum: [...CHAIN_KEYS] })
  @ApiParam({ name: 'contractAddress', type: 'string' })
  @ApiResponse({
    status: 200,
    description: 'Chart histories ordered by period',
    schema: CHART_HISTORY_LIST_RESULT_SCHEMA,
  })
  @ApiResponse({ status: 404, description: 'Asset has no cached price' })
  public async getChartHistories(
    @Param(new ZodValidationPipe(assetKeyParamsSchema)) params: AssetKeyParamsDto,
  ): Promise<IChartHistoryListResult> {
    const histories: readonly IChartHistory[] = await this.mapErrors(
      async (): Promise<readonly IChartHistory[]> =>
        this.coinTickersFetcherService.fetchChartHistories(params),
    );

    return {
      items: histories.map(
        (history: IChartHistory, index: number): IChartHistoryResult => ({
          period: CHART_HISTORY_PERIODS[index] ?? ChartHistoryPeriod.DAY,
          prices: history.prices,
        }),
      ),
    };
  }

  @Get(':chainKey/:contractAddress/history/:period')
  @ApiOperation({ summary: 'Get chart history for one period' })
  @ApiParam({ name: 'chainKey', enum: [...CHAIN_KEYS] })
  @ApiParam({ name: 'contractAddress', type: 'string' })
  @ApiParam({ name: 'period', enum: [...CHART_HISTORY_PERIODS] })
  @ApiQuery({ name: 'force', required: false, enum: ['true', 'false'] })
  @ApiResponse({ status: 200, description: 'Chart history', schema: CHART_HISTORY_RESULT_SCHEMA })
  @ApiResponse({ status: 404, description: 'Asset has no cached price' })
  @ApiResponse({ status: 502, description: 'Chart history could not be fetched' })
  public async getChartHistory(
    @Param(new ZodValidationPipe(chartHistoryParamsSchema)) params: ChartHistoryParamsDto,
    @Query(new ZodValidationPipe(chartHistoryQuerySchema)) query: ChartHistoryQueryDto,
  ): Promise<IChartHistoryResult> {
    const history: IChartHistory = await this.mapErrors(
      async (): Promise<IChartHistory> =>
        this.coinTickersFetcherService.fetchChartHistory(query.force, params.period, params),
    );

    return { period: params.period, prices: history.prices };
  }

  private async mapErrors<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error: unknown) {
      if (error instanceof AlreadyFetchingPricesError) {
        throw new ConflictException(error.message);
      }

      if (error instanceof AssetNotPricedError) {
        throw new NotFoundException(error.message);
      }

      if (error instanceof FetchChartHistoryError) {
        throw new BadGatewayException(error.message);
      }

      throw error;
    }
  }
}
