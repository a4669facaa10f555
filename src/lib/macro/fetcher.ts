/**
 * 経済指標カレンダー取得
 *
 * @description 取得トポロジーごとの Fetcher
 * - html: 地域ごとにモバイル版ページを1リクエスト（タイムアウト6秒）
 * - json: 全地域共通のエンドポイントを構築1回につき1リクエスト（タイムアウト8秒）
 *
 * 呼び出し側に例外は投げない。通信失敗・非2xx・壊れた本文はすべて「データなし」に変換する。
 * リトライはしない
 */

import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { fetchWithTimeout, HttpStatusError } from '../utils/http';
import {
  DEFAULT_USER_AGENT,
  HTML_FETCH_TIMEOUT_MS,
  JSON_FETCH_TIMEOUT_MS,
  type MacroConfig,
} from './config';
import type { CalendarPayload, RegionConfig, SourceTopology } from './types';

/**
 * スナップショット1回分の取得セッション
 */
export interface CalendarSession {
  fetchRegion(region: RegionConfig): Promise<CalendarPayload>;
}

/**
 * トポロジーを隠蔽した取得口
 */
export interface CalendarFetcher {
  readonly topology: SourceTopology;
  /** 構築ごとに新しいセッションを開始する（JSONはセッション内で1回だけ取得） */
  beginSession(): CalendarSession;
}

const EMPTY_HTML: CalendarPayload = { kind: 'html', html: null };
const EMPTY_JSON: CalendarPayload = { kind: 'json', events: [] };

const fetcherLogger = createLogger({ module: 'macro-fetcher' });

function logFetchFailure(logger: Logger, error: unknown, context: LogContext): void {
  if (error instanceof HttpStatusError) {
    logger.warn('Calendar request returned non-success status', {
      ...context,
      statusCode: error.statusCode,
      error,
    });
    return;
  }
  logger.warn('Calendar request failed', { ...context, error });
}

/**
 * 地域別HTMLトポロジー
 */
export class HtmlCalendarFetcher implements CalendarFetcher {
  readonly topology = 'html' as const;
  private readonly userAgent: string;
  private readonly logger = fetcherLogger.child({ topology: 'html' });

  constructor(options?: { userAgent?: string }) {
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
  }

  beginSession(): CalendarSession {
    return {
      fetchRegion: (region) => this.fetchHtml(region),
    };
  }

  private async fetchHtml(region: RegionConfig): Promise<CalendarPayload> {
    if (!region.url) {
      return EMPTY_HTML;
    }

    try {
      const response = await fetchWithTimeout(
        region.url,
        {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            'Accept-Language': 'en-US,en;q=0.9',
            Accept: 'text/html',
          },
        },
        HTML_FETCH_TIMEOUT_MS
      );

      const html = await response.text();
      if (!html) {
        this.logger.warn('Calendar page was empty', { region: region.key, url: region.url });
        return EMPTY_HTML;
      }

      this.logger.debug('Calendar page fetched', { region: region.key, bytes: html.length });
      return { kind: 'html', html };
    } catch (error) {
      logFetchFailure(this.logger, error, { region: region.key, url: region.url });
      return EMPTY_HTML;
    }
  }
}

/**
 * 共通JSONエンドポイントトポロジー
 */
export class JsonCalendarFetcher implements CalendarFetcher {
  readonly topology = 'json' as const;
  private readonly logger = fetcherLogger.child({ topology: 'json' });

  constructor(private readonly endpoint: string) {}

  beginSession(): CalendarSession {
    let pending: Promise<CalendarPayload> | null = null;

    return {
      fetchRegion: () => {
        if (!pending) {
          pending = this.fetchAll();
        }
        return pending;
      },
    };
  }

  private async fetchAll(): Promise<CalendarPayload> {
    try {
      const response = await fetchWithTimeout(
        this.endpoint,
        {
          method: 'GET',
          headers: { Accept: 'application/json' },
        },
        JSON_FETCH_TIMEOUT_MS
      );

      const body: unknown = await response.json();
      if (!Array.isArray(body)) {
        this.logger.warn('Calendar endpoint did not return an array', { url: this.endpoint });
        return EMPTY_JSON;
      }

      this.logger.debug('Calendar events fetched', { url: this.endpoint, rowCount: body.length });
      return { kind: 'json', events: body };
    } catch (error) {
      logFetchFailure(this.logger, error, { url: this.endpoint });
      return EMPTY_JSON;
    }
  }
}

/**
 * 設定に応じた Fetcher を作成
 */
export function createCalendarFetcher(config: MacroConfig): CalendarFetcher {
  if (config.topology === 'json') {
    if (!config.jsonEndpoint) {
      throw new Error('JSON topology requires an endpoint URL');
    }
    return new JsonCalendarFetcher(config.jsonEndpoint);
  }
  return new HtmlCalendarFetcher({ userAgent: config.userAgent });
}
