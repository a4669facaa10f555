/**
 * 公開API
 */

export type {
  CalendarPayload,
  CpiReading,
  MacroBias,
  MacroScore,
  MacroSnapshot,
  PmiReading,
  RawEvent,
  RegionConfig,
  RegionKey,
  RegionMacro,
  RetailReading,
  SourceTopology,
} from './lib/macro/types';
export { BIAS_LABELS, REGION_KEYS } from './lib/macro/types';
export { REGIONS, findRegion, isRegionMapped } from './lib/macro/region-config';
export { loadMacroConfig, MacroConfigError, type MacroConfig } from './lib/macro/config';
export {
  createCalendarFetcher,
  HtmlCalendarFetcher,
  JsonCalendarFetcher,
  type CalendarFetcher,
  type CalendarSession,
} from './lib/macro/fetcher';
export { extractEvents, parseCalendarTable, scanCalendarBlocks, extractJsonEvents } from './lib/macro/extractor';
export { coercePercent, coercePlain, selectEvent, parseRetailSales, parsePmi, parseCpi } from './lib/macro/normalizer';
export { scoreRegionMacro, summarizeBias } from './lib/macro/scorer';
export {
  buildMacroSnapshot,
  getMacroSnapshot,
  MacroSnapshotCache,
  resetMacroSnapshotCache,
  type Clock,
} from './lib/macro/snapshot';
export {
  buildMacroTableRows,
  formatCpi,
  formatPmi,
  formatRetail,
  summarizeMacroExtremes,
  type MacroTableRow,
} from './lib/macro/dashboard';
export { INSTRUMENTS, type InstrumentConfig } from './lib/signals/instruments';
export { scoreMomentum, scoreTrend } from './lib/signals/technical';
export {
  fetchInstrumentPrices,
  parseChartBars,
  PriceHistoryClient,
  type PriceInterval,
  type PricePeriod,
  type PriceQuery,
} from './lib/signals/price-client';
export {
  buildSignalTable,
  overallRecommendation,
  type PriceBar,
  type Recommendation,
  type SignalRow,
} from './lib/signals/table';
