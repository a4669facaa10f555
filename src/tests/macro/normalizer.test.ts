import { describe, it, expect } from 'vitest';
import {
  coercePercent,
  coercePlain,
  parseCpi,
  parsePmi,
  parseRetailSales,
  PILLAR_KEYWORDS,
  selectEvent,
} from '@/lib/macro/normalizer';
import type { RawEvent } from '@/lib/macro/types';

const ev = (
  indicatorName: string,
  actualRaw: string,
  forecastRaw = '',
  previousRaw = '',
  timestamp?: string
): RawEvent => ({
  currencyOrRegion: 'USD',
  indicatorName,
  actualRaw,
  forecastRaw,
  previousRaw,
  timestamp,
});

describe('coercePercent', () => {
  it('"0.7%" → 0.7', () => {
    expect(coercePercent('0.7%')).toBe(0.7);
  });

  it('"-0.5%" → -0.5', () => {
    expect(coercePercent('-0.5%')).toBe(-0.5);
  });

  it('前後の空白と % 前の空白を許容する', () => {
    expect(coercePercent('  0.3 % ')).toBe(0.3);
  });

  it('"N/A" と空文字は欠損', () => {
    expect(coercePercent('N/A')).toBeUndefined();
    expect(coercePercent('n/a')).toBeUndefined();
    expect(coercePercent('')).toBeUndefined();
    expect(coercePercent(undefined)).toBeUndefined();
  });

  it('"0.0%" は欠損ではなく 0', () => {
    expect(coercePercent('0.0%')).toBe(0);
  });

  it('単位なしの数値も受け付ける', () => {
    expect(coercePercent('0.7')).toBe(0.7);
    expect(coercePercent('1%')).toBe(1);
  });

  it('数値でないテキストは例外にせず欠損', () => {
    expect(coercePercent('tentative')).toBeUndefined();
    expect(coercePercent('1.2K')).toBeUndefined();
  });
});

describe('coercePlain', () => {
  it('"51.2" → 51.2', () => {
    expect(coercePlain('51.2')).toBe(51.2);
  });

  it('整数も受け付ける', () => {
    expect(coercePlain('50')).toBe(50);
  });

  it('"N/A" と空文字は欠損', () => {
    expect(coercePlain('N/A')).toBeUndefined();
    expect(coercePlain('')).toBeUndefined();
  });

  it('最初に現れた数値を使う', () => {
    expect(coercePlain('49.8 (rev. 50.1)')).toBe(49.8);
  });
});

describe('selectEvent', () => {
  it('タイムスタンプが新しい行を選ぶ', () => {
    const rows = [
      ev('Manufacturing PMI', '49.1', '', '', '2025-01-01'),
      ev('Manufacturing PMI', '50.4', '', '', '2025-02-01'),
    ];
    expect(selectEvent(rows, PILLAR_KEYWORDS.pmi)).toBe(rows[1]);
  });

  it('タイムスタンプがなければ出現順で先の行', () => {
    const rows = [ev('Services PMI', '52.0'), ev('Composite PMI', '51.0')];
    expect(selectEvent(rows, PILLAR_KEYWORDS.pmi)).toBe(rows[0]);
  });

  it('同じタイムスタンプは出現順で先の行', () => {
    const rows = [
      ev('Services PMI', '52.0', '', '', '2025-03-03T09:00:00Z'),
      ev('Composite PMI', '51.0', '', '', '2025-03-03T09:00:00Z'),
    ];
    expect(selectEvent(rows, PILLAR_KEYWORDS.pmi)).toBe(rows[0]);
  });

  it('解釈不能なタイムスタンプは最古扱い（行は捨てない）', () => {
    const rows = [
      ev('CPI (YoY)', '3.1%', '', '', 'not-a-date'),
      ev('CPI (YoY)', '2.9%', '', '', '2024-12-15'),
    ];
    expect(selectEvent(rows, PILLAR_KEYWORDS.cpi)).toBe(rows[1]);
    expect(selectEvent([rows[0]], PILLAR_KEYWORDS.cpi)).toBe(rows[0]);
  });

  it('キーワードに一致しない行は対象外', () => {
    const rows = [ev('Trade Balance', '1.2'), ev('Retail Sales (MoM)', '0.5%')];
    expect(selectEvent(rows, PILLAR_KEYWORDS.retail)).toBe(rows[1]);
    expect(selectEvent(rows, PILLAR_KEYWORDS.pmi)).toBeNull();
  });
});

describe('parseRetailSales', () => {
  it('actual / forecast / previous を数値化する', () => {
    const rows = [ev('Retail Sales (MoM)', '0.7%', '0.2%', '0.3%')];
    expect(parseRetailSales(rows)).toEqual({ actual: 0.7, forecast: 0.2, previous: 0.3 });
  });

  it('欠損フィールドはキーごと持たない', () => {
    const rows = [ev('Core Retail Sales (MoM)', '0.0%', 'N/A', '')];
    expect(parseRetailSales(rows)).toEqual({ actual: 0 });
  });

  it('全フィールド欠損なら null', () => {
    const rows = [ev('Retail Sales (MoM)', 'N/A', '', 'n/a')];
    expect(parseRetailSales(rows)).toBeNull();
  });

  it('該当行がなければ null', () => {
    expect(parseRetailSales([ev('CPI (YoY)', '2.0%')])).toBeNull();
  });
});

describe('parsePmi', () => {
  it('actual を current、previous を previous にする', () => {
    const rows = [ev('ISM Manufacturing PMI', '51.2', '50.5', '50.3')];
    expect(parsePmi(rows)).toEqual({ current: 51.2, previous: 50.3 });
  });

  it('current も previous もなければ null', () => {
    const rows = [ev('Services PMI', '', '52.0', '')];
    expect(parsePmi(rows)).toBeNull();
  });
});

describe('parseCpi', () => {
  it('前年比として数値化する', () => {
    const rows = [ev('CPI (YoY)', '3.5%', '3.0%', '3.2%')];
    expect(parseCpi(rows)).toEqual({ actual_yoy: 3.5, forecast_yoy: 3.0, previous_yoy: 3.2 });
  });

  it('"Inflation Rate" も CPI として扱う', () => {
    const rows = [ev('Inflation Rate (YoY)', '2.0%')];
    expect(parseCpi(rows)).toEqual({ actual_yoy: 2 });
  });
});
