/**
 * 採点対象の銘柄
 */

import type { RegionKey } from '../macro/types';

export interface InstrumentConfig {
  /** 表示シンボル */
  symbol: string;
  /** 価格データ提供元のティッカー */
  ticker: string;
  /** マクロスコアを参照する地域 */
  macroRegion: RegionKey;
}

/**
 * 通貨ペアと貴金属（USD建て金属・USDJPY は米国マクロを参照）
 */
export const INSTRUMENTS: readonly InstrumentConfig[] = [
  { symbol: 'EURUSD', ticker: 'EURUSD=X', macroRegion: 'eurozone' },
  { symbol: 'GBPUSD', ticker: 'GBPUSD=X', macroRegion: 'uk' },
  { symbol: 'USDJPY', ticker: 'JPY=X',    macroRegion: 'us' },
  { symbol: 'AUDUSD', ticker: 'AUDUSD=X', macroRegion: 'australia' },
  { symbol: 'NZDUSD', ticker: 'NZDUSD=X', macroRegion: 'new_zealand' },
  { symbol: 'USDCAD', ticker: 'CAD=X',    macroRegion: 'canada' },
  { symbol: 'USDCHF', ticker: 'CHF=X',    macroRegion: 'switzerland' },
  { symbol: 'XAUUSD', ticker: 'XAUUSD=X', macroRegion: 'us' },
  { symbol: 'XAGUSD', ticker: 'XAGUSD=X', macroRegion: 'us' },
] as const;
