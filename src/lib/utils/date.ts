/**
 * UTC 日付ユーティリティ
 *
 * @description スナップショットのタイムスタンプ表記とイベント時刻の解釈
 */

/**
 * 日時の各部分を取得するフォーマッター（UTC）
 */
const utcPartsFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: 'UTC',
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
});

/**
 * `YYYY-MM-DD HH:MM UTC` 形式に整形
 */
export function formatUtcStamp(date: Date = new Date()): string {
  const parts = utcPartsFormatter.formatToParts(date);
  const get = (type: string) => parts.find((p) => p.type === type)?.value ?? '00';

  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')} UTC`;
}

/**
 * イベント時刻をエポックミリ秒に変換
 *
 * 欠損・解釈不能は -Infinity（最も古い扱い）を返し、例外は投げない
 */
export function parseTimestamp(value: string | null | undefined): number {
  if (!value) {
    return Number.NEGATIVE_INFINITY;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Date から YYYY-MM-DD（UTC）を返す。不正な Date は空文字
 */
export function toIsoDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString().slice(0, 10);
}
