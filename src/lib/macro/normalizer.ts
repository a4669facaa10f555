/**
 * 指標正規化
 *
 * @description 候補行から指標ごとに1行を選び、数値の組に変換する
 * - 選択: キーワード部分一致 → タイムスタンプ降順（欠損・解釈不能は最古扱い、同値は出現順）
 * - 変換: "n/a"・空文字・数値でないテキストは欠損（undefined）。0 とは区別する
 * - 全フィールド欠損の読み取りは null に畳む
 */

import { parseTimestamp } from '../utils/date';
import { matchesKeyword } from './extractor';
import type { CpiReading, PmiReading, RawEvent, RetailReading } from './types';

/** 指標ごとのキーワード */
export const PILLAR_KEYWORDS = {
  retail: ['retail sales', 'retail sales (mom)', 'core retail sales', 'retail sales (qoq)'],
  pmi: ['pmi', 'manufacturing pmi', 'services pmi', 'composite pmi'],
  cpi: ['cpi', 'consumer price', 'inflation', 'inflation rate', 'cpi (yoy)'],
} as const;

/** [符号]数字.数字% の先頭一致 */
const PERCENT_TOKEN = /([-+]?\d+\.\d+)\s*%/;

/** [符号]数字.数字 の先頭一致（PMI など % なしの値） */
const PLAIN_TOKEN = /([-+]?\d+\.\d+)/;

/** 単位なしの数値全体（整数含む） */
const BARE_NUMBER = /^[-+]?\d+(?:\.\d+)?$/;

const NOT_AVAILABLE = 'n/a';

function toFiniteOrUndefined(value: number): number | undefined {
  return Number.isFinite(value) ? value : undefined;
}

function isBlank(text: string): boolean {
  return text === '' || text.toLowerCase() === NOT_AVAILABLE;
}

/**
 * パーセント値を数値化（"0.7%" → 0.7、"-0.5 %" → -0.5）
 *
 * % トークンがなければ末尾の % と空白を除いた単位なし数値を受け付ける（"0.7" → 0.7）
 */
export function coercePercent(raw: string | null | undefined): number | undefined {
  const text = (raw ?? '').trim();
  if (isBlank(text)) return undefined;

  const match = text.match(PERCENT_TOKEN);
  if (match) {
    return toFiniteOrUndefined(Number(match[1]));
  }

  const stripped = text.replace(/%$/, '').trim();
  return BARE_NUMBER.test(stripped) ? toFiniteOrUndefined(Number(stripped)) : undefined;
}

/**
 * % なしの数値を数値化（"51.2" → 51.2）
 */
export function coercePlain(raw: string | null | undefined): number | undefined {
  const text = (raw ?? '').trim();
  if (isBlank(text)) return undefined;

  const match = text.match(PLAIN_TOKEN);
  if (match) {
    return toFiniteOrUndefined(Number(match[1]));
  }

  return BARE_NUMBER.test(text) ? toFiniteOrUndefined(Number(text)) : undefined;
}

/**
 * キーワードに一致する候補行のうち最も新しいものを選ぶ
 */
export function selectEvent(rows: readonly RawEvent[], keywords: readonly string[]): RawEvent | null {
  const candidates = rows
    .map((row, index) => ({ row, index, time: parseTimestamp(row.timestamp) }))
    .filter(({ row }) => matchesKeyword(row.indicatorName, keywords));

  if (candidates.length === 0) {
    return null;
  }

  candidates.sort((a, b) => {
    if (a.time !== b.time) {
      return a.time > b.time ? -1 : 1;
    }
    return a.index - b.index;
  });

  return candidates[0].row;
}

/**
 * undefined のフィールドを落とす。全て undefined なら null
 */
function compactReading<K extends string>(
  keys: readonly K[],
  values: Record<K, number | undefined>
): Partial<Record<K, number>> | null {
  const reading: Partial<Record<K, number>> = {};
  let present = 0;

  for (const key of keys) {
    const value = values[key];
    if (value !== undefined) {
      reading[key] = value;
      present++;
    }
  }

  return present > 0 ? reading : null;
}

export function parseRetailSales(rows: readonly RawEvent[]): RetailReading | null {
  const row = selectEvent(rows, PILLAR_KEYWORDS.retail);
  if (!row) return null;

  return compactReading(['actual', 'forecast', 'previous'], {
    actual: coercePercent(row.actualRaw),
    forecast: coercePercent(row.forecastRaw),
    previous: coercePercent(row.previousRaw),
  });
}

/**
 * PMI は actual を current として扱い、forecast は使わない
 */
export function parsePmi(rows: readonly RawEvent[]): PmiReading | null {
  const row = selectEvent(rows, PILLAR_KEYWORDS.pmi);
  if (!row) return null;

  return compactReading(['current', 'previous'], {
    current: coercePlain(row.actualRaw),
    previous: coercePlain(row.previousRaw),
  });
}

/**
 * CPI 行は前年比として扱う
 */
export function parseCpi(rows: readonly RawEvent[]): CpiReading | null {
  const row = selectEvent(rows, PILLAR_KEYWORDS.cpi);
  if (!row) return null;

  return compactReading(['actual_yoy', 'forecast_yoy', 'previous_yoy'], {
    actual_yoy: coercePercent(row.actualRaw),
    forecast_yoy: coercePercent(row.forecastRaw),
    previous_yoy: coercePercent(row.previousRaw),
  });
}
