/**
 * HTTP 取得ユーティリティ
 *
 * @description 固定タイムアウト付きの単発 fetch。リトライは行わない
 */

/**
 * 2xx 以外のレスポンス
 */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * タイムアウト付きで fetch し、2xx 以外は HttpStatusError を投げる
 *
 * ネットワークエラー・タイムアウト（AbortError / TimeoutError）はそのまま伝播する
 *
 * @example
 * ```typescript
 * const response = await fetchWithTimeout(url, { headers }, 6000);
 * const html = await response.text();
 * ```
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new HttpStatusError(
      `HTTP ${response.status}: ${response.statusText}`,
      response.status
    );
  }

  return response;
}
