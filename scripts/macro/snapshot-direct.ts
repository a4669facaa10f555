/**
 * マクロスナップショット 直接実行スクリプト（動作確認用）
 *
 * @description 設定中のトポロジーで1回だけスナップショットを構築し、マクロ表とシグナル表をJSONで出力
 * - .env.local があれば読み込む（MACRO_SOURCE / MACRO_JSON_ENDPOINT など）
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { createLogger } from '../../src/lib/utils/logger';
import { loadMacroConfig } from '../../src/lib/macro/config';
import { createCalendarFetcher } from '../../src/lib/macro/fetcher';
import { buildMacroSnapshot } from '../../src/lib/macro/snapshot';
import { buildMacroTableRows, summarizeMacroExtremes } from '../../src/lib/macro/dashboard';
import { INSTRUMENTS } from '../../src/lib/signals/instruments';
import { fetchInstrumentPrices, PriceHistoryClient } from '../../src/lib/signals/price-client';
import { buildSignalTable } from '../../src/lib/signals/table';

config({ path: resolve(process.cwd(), '.env.local') });

const logger = createLogger({ module: 'macro-snapshot-direct' });

async function main(): Promise<void> {
  const macroConfig = loadMacroConfig();
  logger.info('Building macro snapshot', { topology: macroConfig.topology });

  const snapshot = await buildMacroSnapshot(createCalendarFetcher(macroConfig));
  const rows = buildMacroTableRows(snapshot);

  const prices = await fetchInstrumentPrices(
    new PriceHistoryClient({ userAgent: macroConfig.userAgent }),
    INSTRUMENTS
  );

  const output = {
    lastUpdated: snapshot.last_updated,
    rows,
    summary: summarizeMacroExtremes(rows)?.summary ?? null,
    signals: buildSignalTable(prices, snapshot),
  };

  console.log(JSON.stringify(output, null, 2));
}

main()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    logger.error('Script failed', { error });
    process.exit(1);
  });
