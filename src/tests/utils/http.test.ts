import { vi, describe, it, expect } from 'vitest';
import { fetchWithTimeout, HttpStatusError } from '@/lib/utils/http';

describe('http.ts', () => {
  describe('HttpStatusError', () => {
    it('プロパティが正しく設定される', () => {
      const error = new HttpStatusError('HTTP 403: Forbidden', 403);
      expect(error.name).toBe('HttpStatusError');
      expect(error.message).toBe('HTTP 403: Forbidden');
      expect(error.statusCode).toBe(403);
    });
  });

  describe('fetchWithTimeout', () => {
    it('2xx はレスポンスをそのまま返す', async () => {
      const fetchMock = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);

      const response = await fetchWithTimeout(
        'https://calendar.example.com/page',
        { headers: { Accept: 'text/html' } },
        6000
      );

      expect(await response.text()).toBe('ok');
      expect(fetchMock).toHaveBeenCalledTimes(1);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://calendar.example.com/page');
      expect(init.headers).toEqual({ Accept: 'text/html' });
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('非2xx は HttpStatusError を投げる', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValue(
          new Response('', { status: 503, statusText: 'Service Unavailable' })
        )
      );

      const promise = fetchWithTimeout('https://calendar.example.com/page', {}, 6000);

      await expect(promise).rejects.toBeInstanceOf(HttpStatusError);
      await expect(promise).rejects.toMatchObject({
        statusCode: 503,
        message: 'HTTP 503: Service Unavailable',
      });
    });

    it('ネットワークエラーはそのまま伝播する', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

      await expect(
        fetchWithTimeout('https://calendar.example.com/page', {}, 6000)
      ).rejects.toThrow('fetch failed');
    });

    it('1回しか呼ばない（リトライなし）', async () => {
      const fetchMock = vi
        .fn()
        .mockResolvedValue(new Response('', { status: 500, statusText: 'Internal Server Error' }));
      vi.stubGlobal('fetch', fetchMock);

      await expect(fetchWithTimeout('https://calendar.example.com/page', {}, 6000)).rejects.toThrow(
        'HTTP 500'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
