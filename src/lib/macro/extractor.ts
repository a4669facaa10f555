/**
 * 経済指標カレンダー抽出
 *
 * @description 取得ペイロードから候補行（RawEvent）を取り出す
 * - HTML: <tr> テーブル走査。0件ならブロック走査（劣化モード）にフォールバック
 * - JSON: 配列要素を検証し、通貨コード一致のものだけ残す
 *
 * どの経路でも例外は投げず、読めない部分は行を減らして返す
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { cellText } from '../utils/html';
import type { CalendarPayload, RawEvent, RegionConfig } from './types';

const logger = createLogger({ module: 'macro-extractor' });

/** テーブル走査で残す指標名キーワード（部分一致、大文字小文字無視） */
export const TABLE_KEYWORDS = ['retail sales', 'pmi', 'cpi', 'consumer price', 'inflation'] as const;

/** ブロック走査で探すキーワード（出現順に処理） */
export const BLOCK_SCAN_KEYWORDS = ['Retail Sales', 'PMI', 'CPI', 'Consumer Price', 'Inflation'] as const;

/** ブロック走査でキーワード直後に切り出す文字数 */
export const BLOCK_WINDOW_CHARS = 400;

/** パーセント表記トークン: 0.5% / -0.2 % など */
const PERCENT_TOKEN_GLOBAL = /[-+]?\d+\.\d+\s*%/g;

/**
 * 指標名がキーワードのいずれかを含むか
 */
export function matchesKeyword(name: string, keywords: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return keywords.some((kw) => lower.includes(kw.toLowerCase()));
}

/**
 * <tr> 単位でセルを抽出し、指標行のみ返す
 *
 * 列構成は [時刻, 指標名, actual, forecast, previous, ...] を想定（4セル未満の行は無視）
 */
export function parseCalendarTable(html: string, source: string): RawEvent[] {
  const rows: RawEvent[] = [];

  const rowPattern = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
  let rowMatch: RegExpExecArray | null;

  while ((rowMatch = rowPattern.exec(html)) !== null) {
    const cells: string[] = [];
    const cellPattern = /<td\b[^>]*>([\s\S]*?)<\/td>/gi;
    let cellMatch: RegExpExecArray | null;
    while ((cellMatch = cellPattern.exec(rowMatch[1])) !== null) {
      cells.push(cellText(cellMatch[1]));
    }

    if (cells.length < 4) continue;

    const indicatorName = cells[1];
    if (!matchesKeyword(indicatorName, TABLE_KEYWORDS)) continue;

    rows.push({
      currencyOrRegion: source,
      indicatorName,
      actualRaw: cells[2],
      forecastRaw: cells[3],
      previousRaw: cells[4] ?? '',
    });
  }

  return rows;
}

/**
 * 劣化モード: 生テキストからキーワード直後の窓を切り出して数値を拾う
 *
 * キーワードの最初の出現位置から BLOCK_WINDOW_CHARS 文字以内のパーセント値を
 * 先頭3つまで actual / forecast / previous の順に割り当てる。
 * 窓内の並び順がページ構造依存のため精度は保証しない。
 */
export function scanCalendarBlocks(html: string, source: string): RawEvent[] {
  const rows: RawEvent[] = [];
  const lowerHtml = html.toLowerCase();

  for (const keyword of BLOCK_SCAN_KEYWORDS) {
    const idx = lowerHtml.indexOf(keyword.toLowerCase());
    if (idx === -1) continue;

    const block = html.slice(idx, idx + BLOCK_WINDOW_CHARS);
    const percents = block.match(PERCENT_TOKEN_GLOBAL) ?? [];

    rows.push({
      currencyOrRegion: source,
      indicatorName: keyword,
      actualRaw: percents[0] ?? '',
      forecastRaw: percents[1] ?? '',
      previousRaw: percents[2] ?? '',
    });
  }

  return rows;
}

/**
 * HTMLページから候補行を抽出
 */
export function extractHtmlEvents(html: string | null, region: RegionConfig): RawEvent[] {
  if (!html) {
    return [];
  }

  const tableRows = parseCalendarTable(html, region.key);
  if (tableRows.length > 0) {
    logger.debug('Calendar table parsed', { region: region.key, rowCount: tableRows.length });
    return tableRows;
  }

  const blockRows = scanCalendarBlocks(html, region.key);
  logger.warn('Calendar table not found, using block scan', {
    region: region.key,
    rowCount: blockRows.length,
  });
  return blockRows;
}

/** 上流APIの値: 文字列 / 数値 / null */
const rawValueSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

/**
 * JSONイベント1件（フィールド名は上流APIの契約に従う）
 */
export const CalendarEventSchema = z.object({
  currency: z.string(),
  event: z.string(),
  actual: rawValueSchema,
  forecast: rawValueSchema,
  previous: rawValueSchema,
  timestamp: z.string().nullable().optional(),
});

export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

/**
 * JSON配列から指定通貨のイベントを抽出
 *
 * 形式が合わない要素は捨てる（件数のみ debug ログ）
 */
export function extractJsonEvents(events: readonly unknown[], currency: string): RawEvent[] {
  const rows: RawEvent[] = [];
  let rejected = 0;

  for (const item of events) {
    const parsed = CalendarEventSchema.safeParse(item);
    if (!parsed.success) {
      rejected++;
      continue;
    }

    const ev = parsed.data;
    if (ev.currency.toUpperCase() !== currency.toUpperCase()) continue;

    rows.push({
      currencyOrRegion: ev.currency,
      indicatorName: ev.event,
      actualRaw: ev.actual,
      forecastRaw: ev.forecast,
      previousRaw: ev.previous,
      timestamp: ev.timestamp ?? undefined,
    });
  }

  if (rejected > 0) {
    logger.debug('Rejected malformed calendar events', { currency, rejected });
  }

  return rows;
}

/**
 * 取得結果から候補行を抽出（トポロジーに応じて戦略を選択）
 */
export function extractEvents(payload: CalendarPayload, region: RegionConfig): RawEvent[] {
  switch (payload.kind) {
    case 'html':
      return extractHtmlEvents(payload.html, region);
    case 'json':
      return region.currency ? extractJsonEvents(payload.events, region.currency) : [];
  }
}
