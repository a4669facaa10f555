/**
 * 総合シグナル表
 *
 * @description トレンド + モメンタム + マクロ + COT（暫定 1）の合計 0〜12 で銘柄を順位付け
 */

import { toIsoDate } from '../utils/date';
import type { MacroSnapshot } from '../macro/types';
import { INSTRUMENTS, type InstrumentConfig } from './instruments';
import { scoreMomentum, scoreTrend } from './technical';

/** COT ポジションのスコア（データソース未接続のため中立固定） */
export const COT_PLACEHOLDER_SCORE = 1;

/** マクロ地域がスナップショットにない場合の中立値 */
const NEUTRAL_MACRO_SCORE = 1;

export type Recommendation = 'Strong Buy' | 'Buy' | 'Neutral' | 'Sell' | 'Strong Sell';

export interface PriceBar {
  time: Date;
  close: number;
}

export interface SignalRow {
  symbol: string;
  trend: number;
  momentum: number;
  macro: number;
  cot: number;
  total: number;
  recommendation: Recommendation;
  /** 最新終値（価格データなしは null） */
  lastPrice: number | null;
  /** 最新足の日付 YYYY-MM-DD（価格データなしは空文字） */
  updated: string;
}

export function overallRecommendation(total: number): Recommendation {
  if (total >= 7) return 'Strong Buy';
  if (total >= 5) return 'Buy';
  if (total >= 3) return 'Neutral';
  if (total >= 1) return 'Sell';
  return 'Strong Sell';
}

/**
 * 1銘柄分の行を作る
 */
export function buildSignalRow(
  instrument: InstrumentConfig,
  bars: readonly PriceBar[],
  snapshot: MacroSnapshot
): SignalRow {
  const validBars = bars.filter((bar) => Number.isFinite(bar.close));
  const closes = validBars.map((bar) => bar.close);

  const trend = scoreTrend(closes);
  const momentum = scoreMomentum(closes);
  const macro = snapshot.regions[instrument.macroRegion]?.score ?? NEUTRAL_MACRO_SCORE;
  const cot = COT_PLACEHOLDER_SCORE;
  const total = trend + momentum + macro + cot;

  // 終値と日付は同じ足から取る
  const lastBar = validBars.length > 0 ? validBars[validBars.length - 1] : undefined;

  return {
    symbol: instrument.symbol,
    trend,
    momentum,
    macro,
    cot,
    total,
    recommendation: overallRecommendation(total),
    lastPrice: lastBar ? lastBar.close : null,
    updated: lastBar ? toIsoDate(lastBar.time) : '',
  };
}

/**
 * 全銘柄の行を合計点の降順で返す（同点は銘柄定義順）
 *
 * @param prices シンボル → 価格系列（取得できなかった銘柄は省略可）
 */
export function buildSignalTable(
  prices: Readonly<Record<string, readonly PriceBar[] | undefined>>,
  snapshot: MacroSnapshot,
  instruments: readonly InstrumentConfig[] = INSTRUMENTS
): SignalRow[] {
  return instruments
    .map((instrument) => buildSignalRow(instrument, prices[instrument.symbol] ?? [], snapshot))
    .sort((a, b) => b.total - a.total);
}
