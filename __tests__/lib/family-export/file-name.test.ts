import { describe, it, expect } from 'vitest';
import { buildExportFileName, formatTimestamp } from '@/lib/family-export';

describe('formatTimestamp', () => {
  it('should pad every part to two digits', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('2024-01-02_03-04-05');
  });
});

describe('buildExportFileName', () => {
  const now = new Date(2024, 11, 31, 23, 59, 58);

  it('should drop the document extension', () => {
    expect(buildExportFileName('Дверь_однопольная.rfa', now)).toBe(
      'Дверь_однопольная_FamilyParameters_2024-12-31_23-59-58.csv'
    );
  });

  it('should keep titles without an extension', () => {
    expect(buildExportFileName('Family1', now)).toBe('Family1_FamilyParameters_2024-12-31_23-59-58.csv');
  });

  it('should only drop the last extension', () => {
    expect(buildExportFileName('Door.v2.rfa', now)).toBe('Door.v2_FamilyParameters_2024-12-31_23-59-58.csv');
  });
});
