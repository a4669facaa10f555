import { describe, it, expect } from 'vitest';
import {
  buildMacroTableRows,
  formatCpi,
  formatPmi,
  formatRetail,
  summarizeMacroExtremes,
  type MacroTableRow,
} from '@/lib/macro/dashboard';
import type { MacroSnapshot } from '@/lib/macro/types';

describe('formatRetail', () => {
  it('予想を上回れば ✅', () => {
    expect(formatRetail({ actual: 0.7, forecast: 0.2, previous: 0.3 })).toBe('0.70% vs 0.20% / 0.30% ✅');
  });

  it('予想なしでも前回を上回れば ✅', () => {
    expect(formatRetail({ actual: 0.5, previous: 0.3 })).toBe('0.50% vs ? / 0.30% ✅');
  });

  it('予想以下かつ前回を下回れば ❌', () => {
    expect(formatRetail({ actual: -0.2, forecast: 0.1, previous: 0.4 })).toBe('-0.20% vs 0.10% / 0.40% ❌');
  });

  it('判定できなければ ➖', () => {
    expect(formatRetail({ forecast: 0.1 })).toBe('? vs 0.10% / ? ➖');
  });

  it('null は N/A', () => {
    expect(formatRetail(null)).toBe('N/A');
  });
});

describe('formatPmi', () => {
  it('拡大かつ改善', () => {
    expect(formatPmi({ current: 51.2, previous: 50.1 })).toBe('51.2 ↑ ✅');
  });

  it('縮小かつ悪化', () => {
    expect(formatPmi({ current: 47.5, previous: 48 })).toBe('47.5 ↓ ❌');
  });

  it('前回なしは ↔', () => {
    expect(formatPmi({ current: 50 })).toBe('50.0 ↔ ✅');
  });

  it('current がなければ N/A', () => {
    expect(formatPmi({ previous: 49 })).toBe('N/A');
    expect(formatPmi(null)).toBe('N/A');
  });
});

describe('formatCpi', () => {
  it('予想超えは 🔥、下回りは 🧊、同値は ↔', () => {
    expect(formatCpi({ actual_yoy: 3.5, forecast_yoy: 3.0 })).toBe('3.50% 🔥');
    expect(formatCpi({ actual_yoy: 2.1, forecast_yoy: 2.4 })).toBe('2.10% 🧊');
    expect(formatCpi({ actual_yoy: 2.4, forecast_yoy: 2.4 })).toBe('2.40% ↔');
  });

  it('予想なしは値のみ', () => {
    expect(formatCpi({ actual_yoy: 2, previous_yoy: 1.8 })).toBe('2.00%');
  });

  it('actual がなければ N/A', () => {
    expect(formatCpi({ forecast_yoy: 2 })).toBe('N/A');
    expect(formatCpi(null)).toBe('N/A');
  });
});

describe('buildMacroTableRows', () => {
  const snapshot: MacroSnapshot = {
    regions: {
      eurozone: {
        retail: { actual: 0.7, forecast: 0.2, previous: 0.3 },
        pmi: { current: 55, previous: 52 },
        cpi: { actual_yoy: 3.5, forecast_yoy: 3.0, previous_yoy: 2.9 },
        score: 3,
        bias: 'Strong macro, bullish bias',
      },
      uk: { retail: null, pmi: null, cpi: null, score: 0, bias: 'Weak macro, bearish bias' },
    },
    last_updated: '2025-03-04 05:06 UTC',
  };

  it('表示順に8行を作る', () => {
    const rows = buildMacroTableRows(snapshot);

    expect(rows.map((r) => r.region)).toEqual([
      '🇪🇺 Eurozone',
      '🇬🇧 United Kingdom',
      '🇺🇸 United States',
      '🇨🇦 Canada',
      '🇦🇺 Australia',
      '🇳🇿 New Zealand',
      '🇨🇭 Switzerland',
      '🇯🇵 Japan',
    ]);
    expect(rows[0]).toEqual({
      region: '🇪🇺 Eurozone',
      retail: '0.70% vs 0.20% / 0.30% ✅',
      pmi: '55.0 ↑ ✅',
      cpi: '3.50% 🔥',
      score: 3,
      bias: 'Strong macro, bullish bias',
    });
    expect(rows[1]).toEqual({
      region: '🇬🇧 United Kingdom',
      retail: 'N/A',
      pmi: 'N/A',
      cpi: 'N/A',
      score: 0,
      bias: 'Weak macro, bearish bias',
    });
  });

  it('スナップショットにない地域は中立', () => {
    const rows = buildMacroTableRows(snapshot);

    expect(rows[2].score).toBe(1);
    expect(rows[2].bias).toBe('Neutral / mixed');
  });
});

describe('summarizeMacroExtremes', () => {
  const row = (region: string, score: MacroTableRow['score']): MacroTableRow => ({
    region,
    retail: 'N/A',
    pmi: 'N/A',
    cpi: 'N/A',
    score,
    bias: '',
  });

  it('最強・最弱の地域を要約する', () => {
    const result = summarizeMacroExtremes([row('A', 1), row('B', 3), row('C', 0), row('D', 2)]);

    expect(result?.strongest.region).toBe('B');
    expect(result?.weakest.region).toBe('C');
    expect(result?.summary).toBe('Strongest macro right now is B (3/3). Weakest is C (0/3).');
  });

  it('同点は先の地域', () => {
    const result = summarizeMacroExtremes([row('A', 2), row('B', 2), row('C', 2)]);

    expect(result?.strongest.region).toBe('A');
    expect(result?.weakest.region).toBe('A');
  });

  it('空なら null', () => {
    expect(summarizeMacroExtremes([])).toBeNull();
  });
});
