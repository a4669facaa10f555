/**
 * 取得対象地域の定義
 *
 * @description 地域キー・表示名・モバイル版カレンダーURL・通貨コード
 */

import type { RegionConfig, RegionKey, SourceTopology } from './types';

/**
 * 8地域の定義（表示順）
 */
export const REGIONS: readonly RegionConfig[] = [
  { key: 'eurozone',    label: 'Eurozone',       flag: '🇪🇺', url: 'https://m.investing.com/economic-calendar/euro-zone',      currency: 'EUR' },
  { key: 'uk',          label: 'United Kingdom', flag: '🇬🇧', url: 'https://m.investing.com/economic-calendar/united-kingdom', currency: 'GBP' },
  { key: 'us',          label: 'United States',  flag: '🇺🇸', url: 'https://m.investing.com/economic-calendar/united-states',  currency: 'USD' },
  { key: 'canada',      label: 'Canada',         flag: '🇨🇦', url: 'https://m.investing.com/economic-calendar/canada',         currency: 'CAD' },
  { key: 'australia',   label: 'Australia',      flag: '🇦🇺', url: 'https://m.investing.com/economic-calendar/australia',      currency: 'AUD' },
  { key: 'new_zealand', label: 'New Zealand',    flag: '🇳🇿', url: 'https://m.investing.com/economic-calendar/new-zealand',    currency: 'NZD' },
  { key: 'switzerland', label: 'Switzerland',    flag: '🇨🇭', url: 'https://m.investing.com/economic-calendar/switzerland',    currency: 'CHF' },
  { key: 'japan',       label: 'Japan',          flag: '🇯🇵', url: 'https://m.investing.com/economic-calendar/japan',          currency: 'JPY' },
] as const;

export function findRegion(key: RegionKey, regions: readonly RegionConfig[] = REGIONS): RegionConfig | undefined {
  return regions.find((r) => r.key === key);
}

/**
 * トポロジーに必要な取得先（URL / 通貨コード）が設定されているか
 */
export function isRegionMapped(region: RegionConfig, topology: SourceTopology): boolean {
  return topology === 'html' ? Boolean(region.url) : Boolean(region.currency);
}
