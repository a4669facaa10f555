/**
 * 価格履歴クライアント
 *
 * @description 銘柄のティッカーごとに日足（または時間足）の終値系列を取得する
 * - 取得結果は 1時間キャッシュ（ティッカー・期間・足種ごと）
 * - 通信失敗・非2xx・想定外の本文は空配列（表では N/A になる）。リトライはしない
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { fetchWithTimeout, HttpStatusError } from '../utils/http';
import { DEFAULT_USER_AGENT } from '../macro/config';
import type { Clock } from '../macro/snapshot';
import type { InstrumentConfig } from './instruments';
import type { PriceBar } from './table';

const DEFAULT_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

/** 価格履歴のキャッシュ期間（1時間） */
export const PRICE_CACHE_TTL_MS = 60 * 60 * 1000;

export const PRICE_FETCH_TIMEOUT_MS = 10_000;

export const PRICE_PERIODS = ['3mo', '6mo', '1y'] as const;
export type PricePeriod = (typeof PRICE_PERIODS)[number];

export const PRICE_INTERVALS = ['1d', '1h'] as const;
export type PriceInterval = (typeof PRICE_INTERVALS)[number];

export interface PriceQuery {
  period?: PricePeriod;
  interval?: PriceInterval;
}

/**
 * チャートAPIのレスポンス（使うフィールドのみ）
 */
export const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                close: z.array(z.number().nullable()).optional(),
              })
            ),
          }),
        })
      )
      .nullable(),
  }),
});

/**
 * チャートAPIの本文を足の配列に変換（終値が欠損の足は除く）
 */
export function parseChartBars(body: unknown): PriceBar[] {
  const parsed = ChartResponseSchema.safeParse(body);
  if (!parsed.success) {
    return [];
  }

  const result = parsed.data.chart.result?.[0];
  const timestamps = result?.timestamp ?? [];
  const closes = result?.indicators.quote[0]?.close ?? [];

  const bars: PriceBar[] = [];
  timestamps.forEach((seconds, i) => {
    const close = closes[i];
    if (close !== null && close !== undefined && Number.isFinite(close)) {
      bars.push({ time: new Date(seconds * 1000), close });
    }
  });
  return bars;
}

export interface PriceHistoryClientOptions {
  baseUrl?: string;
  userAgent?: string;
  ttlMs?: number;
  clock?: Clock;
}

interface CachedBars {
  bars: PriceBar[];
  fetchedAt: number;
}

/**
 * 価格履歴クライアント
 *
 * @example
 * ```typescript
 * const client = new PriceHistoryClient();
 * const bars = await client.getPrices('EURUSD=X', { period: '6mo', interval: '1d' });
 * ```
 */
export class PriceHistoryClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger = createLogger({ module: 'price-client' });
  private readonly cache = new Map<string, CachedBars>();
  private readonly pending = new Map<string, Promise<PriceBar[]>>();

  constructor(options?: PriceHistoryClientOptions) {
    this.baseUrl = options?.baseUrl ?? DEFAULT_BASE_URL;
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    this.ttlMs = options?.ttlMs ?? PRICE_CACHE_TTL_MS;
    this.clock = options?.clock ?? (() => new Date());
  }

  /**
   * 終値系列を取得（失敗時は空配列、例外は投げない）
   */
  async getPrices(ticker: string, query?: PriceQuery): Promise<PriceBar[]> {
    const period = query?.period ?? '6mo';
    const interval = query?.interval ?? '1d';
    const key = `${ticker}|${period}|${interval}`;

    const cached = this.cache.get(key);
    if (cached && this.clock().getTime() - cached.fetchedAt < this.ttlMs) {
      return cached.bars;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const request = this.fetchBars(ticker, period, interval)
      .then((bars) => {
        this.cache.set(key, { bars, fetchedAt: this.clock().getTime() });
        return bars;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, request);
    return request;
  }

  /**
   * キャッシュを破棄
   */
  clear(): void {
    this.cache.clear();
  }

  private async fetchBars(
    ticker: string,
    period: PricePeriod,
    interval: PriceInterval
  ): Promise<PriceBar[]> {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(ticker)}`);
    url.searchParams.append('range', period);
    url.searchParams.append('interval', interval);

    try {
      const response = await fetchWithTimeout(
        url.toString(),
        {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
          },
        },
        PRICE_FETCH_TIMEOUT_MS
      );

      const bars = parseChartBars(await response.json());
      if (bars.length === 0) {
        this.logger.warn('Price history was empty', { ticker, period, interval });
      } else {
        this.logger.debug('Price history fetched', { ticker, rowCount: bars.length });
      }
      return bars;
    } catch (error) {
      this.logger.warn('Price history request failed', {
        ticker,
        statusCode: error instanceof HttpStatusError ? error.statusCode : undefined,
        error,
      });
      return [];
    }
  }
}

/**
 * 全銘柄の価格系列を順番に取得（シンボル → 足の配列）
 */
export async function fetchInstrumentPrices(
  client: PriceHistoryClient,
  instruments: readonly InstrumentConfig[],
  query?: PriceQuery
): Promise<Record<string, PriceBar[]>> {
  const prices: Record<string, PriceBar[]> = {};
  for (const instrument of instruments) {
    prices[instrument.symbol] = await client.getPrices(instrument.ticker, query);
  }
  return prices;
}
