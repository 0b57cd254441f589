import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

import { CHAIN_KEYS } from '../../../common/interfaces/chain-key.interfaces';
import { CHART_HISTORY_PERIODS } from '../../../common/interfaces/token-pricing/token-pricing.interfaces';

// -- Prices --

const NULLABLE_NUMBER: SchemaObject = { type: 'number', nullable: true };

export const COIN_TICKER_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'string', example: 'ethereum' },
    symbol: { type: 'string', example: 'eth' },
    name: { type: 'string', example: 'Ethereum' },
    image: { type: 'string', nullable: true },
    priceUsd: { type: 'number', example: 2500.5 },
    percentChange24h: NULLABLE_NUMBER,
    priceChange24h: NULLABLE_NUMBER,
    marketCap: NULLABLE_NUMBER,
    totalVolume: NULLABLE_NUMBER,
    high24h: NULLABLE_NUMBER,
    low24h: NULLABLE_NUMBER,
    lastUpdated: { type: 'string', nullable: true, example: '2026-01-01T00:00:00.000Z' },
  },
  required: ['id', 'symbol', 'name', 'priceUsd'],
};

export const FETCH_PRICES_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    tokens: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          symbol: { type: 'string', example: 'USDT' },
          contractAddress: {
            type: 'string',
            example: '0xdAC17F958D2ee523a2206206994597C13D831ec7',
          },
          chainKey: { type: 'string', enum: [...CHAIN_KEYS], example: 'ethereum_mainnet' },
        },
        required: ['symbol', 'contractAddress', 'chainKey'],
      },
    },
  },
  required: ['tokens'],
};

export const FETCH_PRICES_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    items: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          chainKey: { type: 'string', enum: [...CHAIN_KEYS] },
          contractAddress: { type: 'string' },
          ticker: COIN_TICKER_SCHEMA,
        },
        required: ['chainKey', 'contractAddress', 'ticker'],
      },
    },
  },
  required: ['items'],
};

export const CHART_HISTORY_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    period: { type: 'string', enum: [...CHART_HISTORY_PERIODS] },
    prices: {
      type: 'array',
      description: '[timestampMs, priceUsd] pairs',
      items: { type: 'array', items: { type: 'number' }, minItems: 2, maxItems: 2 },
    },
  },
  required: ['period', 'prices'],
};

export const CHART_HISTORY_LIST_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    items: { type: 'array', items: CHART_HISTORY_RESULT_SCHEMA },
  },
  required: ['items'],
};

// -- Health --

export const HEALTH_RESULT_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok'] },
    version: { type: 'string', example: '0.1.0' },
    uptimeSec: { type: 'integer' },
    caches: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: {
          keys: { type: 'integer' },
          hits: { type: 'integer' },
          misses: { type: 'integer' },
        },
      },
    },
  },
  required: ['status', 'version', 'uptimeSec', 'caches'],
};
