import { vi, describe, it, expect } from 'vitest';
import { createLogger, serializeError } from '@/lib/utils/logger';

describe('logger.ts', () => {
  describe('serializeError', () => {
    it('Error を name / message / stack に変換する', () => {
      const serialized = serializeError(new TypeError('bad input'));
      expect(serialized.name).toBe('TypeError');
      expect(serialized.message).toBe('bad input');
      expect(typeof serialized.stack).toBe('string');
    });

    it('cause も再帰的に変換する', () => {
      const error = new Error('outer', { cause: new Error('inner') });
      const serialized = serializeError(error);
      expect(serialized.cause).toMatchObject({ name: 'Error', message: 'inner' });
    });

    it('Error 以外は value に文字列化する', () => {
      expect(serializeError('boom')).toEqual({ value: 'boom' });
    });
  });

  describe('createLogger', () => {
    it('error は console.error に1行JSONで出す', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createLogger({ module: 'macro-test' });

      logger.error('Region macro build failed', { region: 'uk', error: new Error('boom') });

      expect(spy).toHaveBeenCalledTimes(1);
      const payload = JSON.parse(String(spy.mock.calls[0][0]));
      expect(payload).toMatchObject({
        level: 'error',
        message: 'Region macro build failed',
        module: 'macro-test',
        region: 'uk',
        error: { name: 'Error', message: 'boom' },
      });
      expect(typeof payload.timestamp).toBe('string');
    });

    it('child はコンテキストを引き継いで追加する', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createLogger({ module: 'macro-test' }).child({ topology: 'json' });

      logger.error('Calendar request failed');

      const payload = JSON.parse(String(spy.mock.calls[0][0]));
      expect(payload.module).toBe('macro-test');
      expect(payload.topology).toBe('json');
    });

    it('startTimer は経過ミリ秒を返す', () => {
      const timer = createLogger().startTimer('Macro snapshot build');
      expect(timer.end()).toBeGreaterThanOrEqual(0);
    });

    it('endWithError は error レベルでエラー内容と所要時間を出す', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const timer = createLogger({ module: 'macro-test' }).startTimer('Macro snapshot build');

      timer.endWithError(new Error('session unavailable'), { topology: 'json' });

      const payload = JSON.parse(String(spy.mock.calls[0][0]));
      expect(payload).toMatchObject({
        level: 'error',
        message: 'Macro snapshot build failed',
        module: 'macro-test',
        topology: 'json',
        error: { name: 'Error', message: 'session unavailable' },
      });
      expect(typeof payload.durationMs).toBe('number');
    });

    it('Error 以外の値も error として出せる', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      createLogger().warn('Calendar request failed', { error: 'socket hang up' });

      const payload = JSON.parse(String(spy.mock.calls[0][0]));
      expect(payload.error).toEqual({ value: 'socket hang up' });
    });
  });
});
