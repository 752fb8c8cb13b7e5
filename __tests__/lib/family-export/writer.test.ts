import { readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  buildCsvLines,
  translateCsvGroups,
  writeCsvFile,
  writeParameterReport,
  type ParameterRecord,
} from '@/lib/family-export';
import { makeTempDir } from './helpers';

const HEADER = 'Group,Name,Value,DescriptionField,ImageField,IsInstance';

function record(overrides: Partial<ParameterRecord>): ParameterRecord {
  return {
    name: 'Width',
    value: '900',
    descriptionField: 'Добавить описание',
    imageField: 'Добавить картинку',
    group: 'PG_GEOMETRY',
    isInstance: false,
    ...overrides,
  };
}

describe('buildCsvLines', () => {
  it('should write the header and one escaped line per record', () => {
    const lines = buildCsvLines([
      record({}),
      record({ name: 'Mark', value: 'D-1, "basic"', group: 'PG_TEXT', isInstance: true, imageField: '' }),
    ]);

    expect(lines).toEqual([
      HEADER,
      'PG_GEOMETRY,Width,900,Добавить описание,Добавить картинку,False',
      'PG_TEXT,Mark,"D-1, ""basic""",Добавить описание,,True',
    ]);
  });

  it('should use mapped labels when given a mapping', () => {
    const lines = buildCsvLines([record({}), record({ group: 'PG_CUSTOM' })], new Map([['PG_GEOMETRY', 'Размеры']]));

    expect(lines.slice(1)).toEqual([
      'Размеры,Width,900,Добавить описание,Добавить картинку,False',
      'PG_CUSTOM,Width,900,Добавить описание,Добавить картинку,False',
    ]);
  });
});

describe('CSV files', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    cleanup();
  });

  describe('writeCsvFile', () => {
    it('should write a BOM and CRLF terminators', () => {
      const filePath = path.join(dir, 'out.csv');

      writeCsvFile(filePath, ['a,b', 'c,d'], { lineEnding: 'crlf', bom: true });

      const bytes = readFileSync(filePath);
      expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
      expect(bytes.subarray(3).toString('utf-8')).toBe('a,b\r\nc,d\r\n');
    });

    it('should write LF without a BOM when asked', () => {
      const filePath = path.join(dir, 'out.csv');

      writeCsvFile(filePath, ['a,b'], { lineEnding: 'lf', bom: false });

      expect(readFileSync(filePath, 'utf-8')).toBe('a,b\n');
    });
  });

  describe('translateCsvGroups', () => {
    const options = { lineEnding: 'lf' as const, bom: false };

    it('should replace mapped groups and leave other rows byte-identical', () => {
      const filePath = path.join(dir, 'report.csv');
      const untouched = 'PG_CUSTOM,"Name, with comma",1,,,False';
      writeFileSync(
        filePath,
        [HEADER, 'PG_TEXT,Note,x,desc,img,True', untouched, ''].join('\n'),
        'utf-8'
      );

      const translated = translateCsvGroups(filePath, new Map([['PG_TEXT', 'Текст']]), options);

      expect(translated).toBe(1);
      expect(readFileSync(filePath, 'utf-8')).toBe(
        [HEADER, 'Текст,Note,x,desc,img,True', untouched, ''].join('\n')
      );
    });

    it('should not treat the header as a data row', () => {
      const filePath = path.join(dir, 'report.csv');
      writeFileSync(filePath, `${HEADER}\n`, 'utf-8');

      const translated = translateCsvGroups(filePath, new Map([['Group', 'Группа']]), options);

      expect(translated).toBe(0);
      expect(readFileSync(filePath, 'utf-8')).toBe(`${HEADER}\n`);
    });

    it('should keep a quoted line break inside a translated row', () => {
      const filePath = path.join(dir, 'report.csv');
      writeFileSync(filePath, `${HEADER}\nPG_TEXT,Note,"first\nsecond",,,False\n`, 'utf-8');

      translateCsvGroups(filePath, new Map([['PG_TEXT', 'Текст']]), options);

      expect(readFileSync(filePath, 'utf-8')).toBe(
        `${HEADER}\nТекст,Note,"first\nsecond",,,False\n`
      );
    });

    it('should keep the BOM of the original file', () => {
      const filePath = path.join(dir, 'report.csv');
      writeCsvFile(filePath, [HEADER, 'PG_TEXT,Note,x,,,False'], { lineEnding: 'crlf', bom: true });

      translateCsvGroups(filePath, new Map([['PG_TEXT', 'Текст']]), { lineEnding: 'crlf', bom: true });

      expect(readFileSync(filePath, 'utf-8')).toBe(`\uFEFF${HEADER}\r\nТекст,Note,x,,,False\r\n`);
    });
  });

  describe('writeParameterReport', () => {
    const records = [
      record({}),
      record({ name: 'Mark', value: 'a "quoted", multi\nline value', group: 'PG_TEXT', isInstance: true }),
      record({ name: 'Custom', value: '', group: 'PG_CUSTOM' }),
    ];
    const mapping = new Map([
      ['PG_GEOMETRY', 'Размеры'],
      ['PG_TEXT', 'Текст, примечания'],
    ]);

    it('should produce the same bytes in single-pass and two-pass mode', () => {
      const single = path.join(dir, 'single.csv');
      const twoPass = path.join(dir, 'two-pass.csv');
      const options = { lineEnding: 'crlf' as const, bom: true };

      writeParameterReport(single, records, mapping, 'single-pass', options);
      writeParameterReport(twoPass, records, mapping, 'two-pass', options);

      expect(readFileSync(twoPass)).toEqual(readFileSync(single));
      expect(readFileSync(single, 'utf-8')).toBe(
        '\uFEFF' +
          `${HEADER}\r\n` +
          'Размеры,Width,900,Добавить описание,Добавить картинку,False\r\n' +
          '"Текст, примечания",Mark,"a ""quoted"", multi\nline value",Добавить описание,Добавить картинку,True\r\n' +
          'PG_CUSTOM,Custom,,Добавить описание,Добавить картинку,False\r\n'
      );
    });
  });
});
