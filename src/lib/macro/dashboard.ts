/**
 * マクロダッシュボード表示用の行データ
 *
 * @description 描画は行わず、表のセル文字列とサマリー文を作る
 */

import { REGIONS } from './region-config';
import { BIAS_LABELS, type CpiReading, type MacroScore, type MacroSnapshot, type PmiReading, type RetailReading } from './types';

const NOT_AVAILABLE = 'N/A';

export interface MacroTableRow {
  region: string;
  retail: string;
  pmi: string;
  cpi: string;
  score: MacroScore;
  bias: string;
}

function fmtPercent(value: number | undefined): string {
  return value !== undefined ? `${value.toFixed(2)}%` : '?';
}

/**
 * 例: "0.70% vs 0.20% / 0.30% ✅"
 */
export function formatRetail(retail: RetailReading | null): string {
  if (!retail) return NOT_AVAILABLE;
  const { actual: a, forecast: f, previous: p } = retail;

  let status = '➖';
  if (a !== undefined && f !== undefined && a > f) {
    status = '✅';
  } else if (a !== undefined && p !== undefined && a > p) {
    status = '✅';
  } else if (a !== undefined && p !== undefined && a < p) {
    status = '❌';
  }

  return `${fmtPercent(a)} vs ${fmtPercent(f)} / ${fmtPercent(p)} ${status}`;
}

/**
 * 例: "51.2 ↑ ✅"
 */
export function formatPmi(pmi: PmiReading | null): string {
  if (!pmi || pmi.current === undefined) return NOT_AVAILABLE;
  const { current, previous } = pmi;

  let arrow = '↔';
  if (previous !== undefined) {
    if (current > previous) arrow = '↑';
    else if (current < previous) arrow = '↓';
  }
  const expansion = current >= 50 ? '✅' : '❌';

  return `${current.toFixed(1)} ${arrow} ${expansion}`;
}

/**
 * 例: "3.50% 🔥"（予想なしなら "3.50%"）
 */
export function formatCpi(cpi: CpiReading | null): string {
  if (!cpi || cpi.actual_yoy === undefined) return NOT_AVAILABLE;
  const { actual_yoy: a, forecast_yoy: f } = cpi;

  let marker = '';
  if (f !== undefined) {
    if (a > f) marker = '🔥';
    else if (a < f) marker = '🧊';
    else marker = '↔';
  }

  return `${a.toFixed(2)}% ${marker}`.trimEnd();
}

/**
 * 表示順に1地域1行を作る。スナップショットにない地域は中立扱い
 */
export function buildMacroTableRows(snapshot: MacroSnapshot): MacroTableRow[] {
  return REGIONS.map((region) => {
    const info = snapshot.regions[region.key];
    return {
      region: `${region.flag} ${region.label}`,
      retail: formatRetail(info?.retail ?? null),
      pmi: formatPmi(info?.pmi ?? null),
      cpi: formatCpi(info?.cpi ?? null),
      score: info?.score ?? 1,
      bias: info?.bias ?? BIAS_LABELS[1],
    };
  });
}

export interface MacroExtremes {
  strongest: MacroTableRow;
  weakest: MacroTableRow;
  summary: string;
}

/**
 * 最強・最弱地域（同点は表示順で先の地域）
 */
export function summarizeMacroExtremes(rows: readonly MacroTableRow[]): MacroExtremes | null {
  if (rows.length === 0) return null;

  let strongest = rows[0];
  let weakest = rows[0];
  for (const row of rows) {
    if (row.score > strongest.score) strongest = row;
    if (row.score < weakest.score) weakest = row;
  }

  return {
    strongest,
    weakest,
    summary:
      `Strongest macro right now is ${strongest.region} (${strongest.score}/3). ` +
      `Weakest is ${weakest.region} (${weakest.score}/3).`,
  };
}
