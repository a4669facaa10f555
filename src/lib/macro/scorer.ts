/**
 * 地域マクロスコア
 *
 * @description Retail Sales / PMI / CPI それぞれ最大 +1 の固定ルールで 0〜3 点を付ける
 */

import {
  BIAS_LABELS,
  type CpiReading,
  type MacroBias,
  type MacroScore,
  type PmiReading,
  type RegionMacro,
  type RetailReading,
} from './types';

/** PMI の拡大/縮小の境界 */
export const PMI_EXPANSION_THRESHOLD = 50.0;

/** 予想値がない CPI を「高め」とみなす前年比の下限 */
export const CPI_HOT_THRESHOLD = 2.0;

/**
 * Retail: actual が forecast または previous を上回れば +1
 */
function scoreRetail(retail: RetailReading | null): number {
  if (!retail || retail.actual === undefined) return 0;
  const { actual, forecast, previous } = retail;
  const beatsForecast = forecast !== undefined && actual > forecast;
  const beatsPrevious = previous !== undefined && actual > previous;
  return beatsForecast || beatsPrevious ? 1 : 0;
}

/**
 * PMI: 50 以上なら +1。50 未満でも前回より改善していれば +1
 */
function scorePmi(pmi: PmiReading | null): number {
  if (!pmi || pmi.current === undefined) return 0;
  if (pmi.current >= PMI_EXPANSION_THRESHOLD) return 1;
  return pmi.previous !== undefined && pmi.current > pmi.previous ? 1 : 0;
}

/**
 * CPI: 予想を上回れば +1。予想がない場合は前年比 2.0% 以上で +1
 */
function scoreCpi(cpi: CpiReading | null): number {
  if (!cpi || cpi.actual_yoy === undefined) return 0;
  if (cpi.forecast_yoy !== undefined) {
    return cpi.actual_yoy > cpi.forecast_yoy ? 1 : 0;
  }
  return cpi.actual_yoy >= CPI_HOT_THRESHOLD ? 1 : 0;
}

function clampScore(raw: number): MacroScore {
  if (raw >= 3) return 3;
  if (raw === 2) return 2;
  if (raw === 1) return 1;
  return 0;
}

/**
 * 3指標から 0〜3 のスコアを算出（純関数）
 */
export function scoreRegionMacro(
  retail: RetailReading | null,
  pmi: PmiReading | null,
  cpi: CpiReading | null
): MacroScore {
  return clampScore(scoreRetail(retail) + scorePmi(pmi) + scoreCpi(cpi));
}

export function summarizeBias(score: MacroScore): MacroBias {
  return BIAS_LABELS[score];
}

/**
 * 読み取り結果から RegionMacro を組み立てる
 */
export function toRegionMacro(
  retail: RetailReading | null,
  pmi: PmiReading | null,
  cpi: CpiReading | null
): RegionMacro {
  const score = scoreRegionMacro(retail, pmi, cpi);
  return { retail, pmi, cpi, score, bias: summarizeBias(score) };
}

/**
 * 取得先が未設定の地域の既定値（失敗ではない）
 */
export function unmappedRegionMacro(): RegionMacro {
  return { retail: null, pmi: null, cpi: null, score: 1, bias: BIAS_LABELS[1] };
}
