/**
 * マクロスナップショット 共通型定義
 */

/** 取得トポロジー: 地域別HTML / 全地域共通のJSONエンドポイント */
export const SOURCE_TOPOLOGIES = ['html', 'json'] as const;
export type SourceTopology = (typeof SOURCE_TOPOLOGIES)[number];

/** 地域キー */
export const REGION_KEYS = [
  'us',
  'eurozone',
  'uk',
  'canada',
  'australia',
  'new_zealand',
  'switzerland',
  'japan',
] as const;
export type RegionKey = (typeof REGION_KEYS)[number];

/** 地域ごとの取得先設定 */
export interface RegionConfig {
  key: RegionKey;
  /** 表示名 */
  label: string;
  /** 国旗絵文字 */
  flag: string;
  /** HTMLトポロジーでの取得先URL（未設定なら未マッピング扱い） */
  url?: string;
  /** JSONトポロジーでの通貨コード（未設定なら未マッピング扱い） */
  currency?: string;
}

/**
 * 経済指標カレンダーの1行（抽出直後、未正規化）
 */
export interface RawEvent {
  /** 通貨コードまたは地域コード（HTMLでは取得先地域キー） */
  currencyOrRegion: string;
  /** 指標名（自由記述） */
  indicatorName: string;
  actualRaw: string;
  forecastRaw: string;
  previousRaw: string;
  /** ISO-8601 文字列（HTMLでは取得できないため undefined） */
  timestamp?: string;
}

/** Retail Sales（前月比 %） */
export interface RetailReading {
  actual?: number;
  forecast?: number;
  previous?: number;
}

/** PMI（指数値、単位変換なし） */
export interface PmiReading {
  current?: number;
  previous?: number;
}

/** CPI（前年比 %） */
export interface CpiReading {
  actual_yoy?: number;
  forecast_yoy?: number;
  previous_yoy?: number;
}

export const BIAS_LABELS = {
  3: 'Strong macro, bullish bias',
  2: 'Supportive macro, mild bullish bias',
  1: 'Neutral / mixed',
  0: 'Weak macro, bearish bias',
} as const;

export type MacroScore = keyof typeof BIAS_LABELS;
export type MacroBias = (typeof BIAS_LABELS)[MacroScore];

/**
 * 1地域のマクロ判定結果
 *
 * 読み取れなかった指標は null（ゼロ値オブジェクトにはしない）
 */
export interface RegionMacro {
  retail: RetailReading | null;
  pmi: PmiReading | null;
  cpi: CpiReading | null;
  score: MacroScore;
  bias: MacroBias;
}

/**
 * 全地域のスナップショット（キャッシュ単位）
 */
export interface MacroSnapshot {
  regions: Partial<Record<RegionKey, RegionMacro>>;
  /** `YYYY-MM-DD HH:MM UTC` */
  last_updated: string;
}

/**
 * 取得結果
 *
 * - html: ページ本文（取得失敗時は null）
 * - json: デコード済みイベント配列（取得失敗時は空配列）
 */
export type CalendarPayload =
  | { kind: 'html'; html: string | null }
  | { kind: 'json'; events: readonly unknown[] };
