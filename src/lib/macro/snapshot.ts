/**
 * マクロスナップショット構築とキャッシュ
 *
 * @description 全地域を 取得 → 抽出 → 正規化 → 採点 し、12時間キャッシュする
 * - キャッシュは1スロット（引数によるキー分けなし）
 * - 期限切れ時の再構築は同時に1本だけ。待機中の呼び出しは同じ結果を受け取る
 * - 1地域の失敗は他地域に影響しない（その地域は全指標欠損で採点）
 */

import { createLogger } from '../utils/logger';
import { formatUtcStamp } from '../utils/date';
import { loadMacroConfig, SNAPSHOT_TTL_MS } from './config';
import { extractEvents } from './extractor';
import { createCalendarFetcher, type CalendarFetcher, type CalendarSession } from './fetcher';
import { parseCpi, parsePmi, parseRetailSales } from './normalizer';
import { isRegionMapped, REGIONS } from './region-config';
import { toRegionMacro, unmappedRegionMacro } from './scorer';
import type { MacroSnapshot, RegionConfig, RegionMacro, SourceTopology } from './types';

const logger = createLogger({ module: 'macro-snapshot' });

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

/**
 * 1地域分を構築
 */
export async function buildRegionMacro(
  region: RegionConfig,
  session: CalendarSession,
  topology: SourceTopology
): Promise<RegionMacro> {
  if (!isRegionMapped(region, topology)) {
    logger.debug('Region has no source mapping, using neutral default', {
      region: region.key,
      topology,
    });
    return unmappedRegionMacro();
  }

  try {
    const payload = await session.fetchRegion(region);
    const rows = extractEvents(payload, region);

    return toRegionMacro(parseRetailSales(rows), parsePmi(rows), parseCpi(rows));
  } catch (error) {
    logger.error('Region macro build failed', { region: region.key, error });
    return toRegionMacro(null, null, null);
  }
}

export interface BuildSnapshotOptions {
  regions?: readonly RegionConfig[];
  clock?: Clock;
}

/**
 * 全地域のスナップショットを構築（地域は順番に取得）
 */
export async function buildMacroSnapshot(
  fetcher: CalendarFetcher,
  options?: BuildSnapshotOptions
): Promise<MacroSnapshot> {
  const regions = options?.regions ?? REGIONS;
  const clock = options?.clock ?? systemClock;
  const timer = logger.startTimer('Macro snapshot build');

  try {
    const session = fetcher.beginSession();
    const built: MacroSnapshot['regions'] = {};

    for (const region of regions) {
      built[region.key] = await buildRegionMacro(region, session, fetcher.topology);
    }

    const snapshot: MacroSnapshot = {
      regions: built,
      last_updated: formatUtcStamp(clock()),
    };

    timer.end({ topology: fetcher.topology, regionCount: regions.length });
    return snapshot;
  } catch (error) {
    timer.endWithError(error, { topology: fetcher.topology });
    throw error;
  }
}

export interface MacroSnapshotCacheOptions extends BuildSnapshotOptions {
  ttlMs?: number;
}

interface CachedSnapshot {
  value: MacroSnapshot;
  computedAt: number;
}

/**
 * スナップショットの TTL キャッシュ
 *
 * @example
 * ```typescript
 * const cache = new MacroSnapshotCache(createCalendarFetcher(loadMacroConfig()));
 * const snapshot = await cache.getSnapshot();
 * ```
 */
export class MacroSnapshotCache {
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly regions?: readonly RegionConfig[];
  private cached: CachedSnapshot | null = null;
  private rebuilding: Promise<MacroSnapshot> | null = null;
  /** invalidate() ごとに進める。古い世代の構築結果は保存しない */
  private generation = 0;

  constructor(
    private readonly fetcher: CalendarFetcher,
    options?: MacroSnapshotCacheOptions
  ) {
    this.ttlMs = options?.ttlMs ?? SNAPSHOT_TTL_MS;
    this.clock = options?.clock ?? systemClock;
    this.regions = options?.regions;
  }

  /**
   * 期限切れ（または未構築）か
   */
  isStale(now: Date = this.clock()): boolean {
    if (!this.cached) return true;
    return now.getTime() - this.cached.computedAt >= this.ttlMs;
  }

  /**
   * キャッシュ済みならそのまま返す（last_updated も構築時のまま）
   */
  async getSnapshot(): Promise<MacroSnapshot> {
    if (this.cached && !this.isStale()) {
      return this.cached.value;
    }

    if (!this.rebuilding) {
      const pending: Promise<MacroSnapshot> = this.rebuild().finally(() => {
        if (this.rebuilding === pending) {
          this.rebuilding = null;
        }
      });
      this.rebuilding = pending;
    }
    return this.rebuilding;
  }

  /**
   * キャッシュを破棄（次回呼び出しで再構築）
   *
   * 構築中の結果はキャッシュされない
   */
  invalidate(): void {
    this.generation++;
    this.cached = null;
    this.rebuilding = null;
  }

  private async rebuild(): Promise<MacroSnapshot> {
    const generation = this.generation;
    const value = await buildMacroSnapshot(this.fetcher, {
      regions: this.regions,
      clock: this.clock,
    });
    if (generation === this.generation) {
      this.cached = { value, computedAt: this.clock().getTime() };
    }
    return value;
  }
}

let defaultCache: MacroSnapshotCache | null = null;

/**
 * プロセス共通キャッシュからスナップショットを取得
 *
 * 初回呼び出し時に環境変数から設定を読み込む
 */
export function getMacroSnapshot(): Promise<MacroSnapshot> {
  if (!defaultCache) {
    defaultCache = new MacroSnapshotCache(createCalendarFetcher(loadMacroConfig()));
  }
  return defaultCache.getSnapshot();
}

/**
 * プロセス共通キャッシュを破棄（テスト・設定変更用）
 */
export function resetMacroSnapshotCache(): void {
  defaultCache = null;
}
