/**
 * 価格テクニカルスコア
 *
 * @description 終値系列からトレンド（移動平均）とモメンタム（RSI）を 0〜3 で採点
 * データ不足の場合はどちらも中立の 1 を返す
 */

/** トレンド判定に必要な最小本数 */
const MIN_TREND_BARS = 60;

/** モメンタム判定に必要な最小本数 */
const MIN_MOMENTUM_BARS = 15;

const RSI_EPSILON = 1e-9;

/**
 * 単純移動平均（窓が埋まらない位置は null）
 */
export function rollingMean(values: readonly number[], window: number): Array<number | null> {
  const out: Array<number | null> = [];
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) {
      sum -= values[i - window];
    }
    out.push(i >= window - 1 ? sum / window : null);
  }

  return out;
}

function lastOf<T>(values: readonly T[], offsetFromEnd = 0): T | undefined {
  return values[values.length - 1 - offsetFromEnd];
}

/**
 * トレンドスコア
 *
 * +1 終値 > MA50 / +1 MA50 > MA200 / +1 MA50 が直近5本で上昇
 * 200本未満のときは MA200 の代わりに MA50 を使う（その項目は加点されない）
 */
export function scoreTrend(closes: readonly number[]): number {
  if (closes.length < MIN_TREND_BARS) {
    return 1;
  }

  const ma50 = rollingMean(closes, 50);
  const ma200 = closes.length >= 200 ? rollingMean(closes, 200) : ma50;

  const lastClose = lastOf(closes);
  const lastMa50 = lastOf(ma50);
  const lastMa200 = lastOf(ma200);
  const earlierMa50 = lastOf(ma50, 5);

  let score = 0;
  if (lastClose != null && lastMa50 != null && lastClose > lastMa50) score += 1;
  if (lastMa50 != null && lastMa200 != null && lastMa50 > lastMa200) score += 1;
  if (lastMa50 != null && earlierMa50 != null && lastMa50 - earlierMa50 > 0) score += 1;

  return score;
}

/**
 * RSI（上昇幅・下落幅の単純移動平均）
 */
export function rsi(closes: readonly number[], period = 14): Array<number | null> {
  const ups: number[] = [];
  const downs: number[] = [];

  // 差分は2本目から。出力は closes と同じ長さに揃える（先頭は null）
  for (let i = 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    ups.push(delta > 0 ? delta : 0);
    downs.push(delta < 0 ? -delta : 0);
  }

  const rollUp = rollingMean(ups, period);
  const rollDown = rollingMean(downs, period);

  const out: Array<number | null> = closes.length > 0 ? [null] : [];
  for (let i = 0; i < rollUp.length; i++) {
    const up = rollUp[i];
    const down = rollDown[i];
    if (up === null || down === null) {
      out.push(null);
      continue;
    }
    const rs = up / (down + RSI_EPSILON);
    out.push(100 - 100 / (1 + rs));
  }

  return out;
}

/**
 * モメンタムスコア: RSI ≥60 → 3 / ≥50 → 2 / ≥40 → 1 / それ未満 → 0
 */
export function scoreMomentum(closes: readonly number[]): number {
  if (closes.length < MIN_MOMENTUM_BARS) {
    return 1;
  }

  const lastRsi = lastOf(rsi(closes));
  if (lastRsi == null || Number.isNaN(lastRsi)) {
    return 1;
  }

  if (lastRsi >= 60) return 3;
  if (lastRsi >= 50) return 2;
  if (lastRsi >= 40) return 1;
  return 0;
}
