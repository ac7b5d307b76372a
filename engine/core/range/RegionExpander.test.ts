/**
 * CellBridge - Region Expander Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { expandRegion, isEmptyCell } from './RegionExpander.js';
import { Region } from '../coordinates/index.js';
import { MemoryHost } from '../host/index.js';
import { CellValue, ExpandMode, MAX_ROWS, SheetHandle } from '../types/index.js';

function fill(host: MemoryHost, sheet: SheetHandle, top: number, left: number, rows: CellValue[][]): void {
  rows.forEach((cells, r) => {
    cells.forEach((value, c) => host.setCellValue(sheet, top + r, left + c, value));
  });
}

function sheetOf(host: MemoryHost): SheetHandle {
  const document = host.create(host.startInstance());
  const [sheet] = host.sheets(document);
  return sheet;
}

describe('RegionExpander', () => {
  describe('isEmptyCell()', () => {
    let host: MemoryHost;
    let sheet: SheetHandle;

    beforeEach(() => {
      host = new MemoryHost();
      sheet = sheetOf(host);
    });

    it('should see values as content and blanks as empty', () => {
      host.setCellValue(sheet, 1, 1, 0);
      host.setCellValue(sheet, 1, 2, false);

      expect(isEmptyCell(host, sheet, 1, 1, false)).toBe(false);
      expect(isEmptyCell(host, sheet, 1, 2, false)).toBe(false);
      expect(isEmptyCell(host, sheet, 1, 3, false)).toBe(true);
    });

    it('should count a blank formula as content unless strict', () => {
      host.setCellFormula(sheet, 2, 2, '=""');

      expect(isEmptyCell(host, sheet, 2, 2, false)).toBe(false);
      expect(isEmptyCell(host, sheet, 2, 2, true)).toBe(true);
    });

    it('should treat cells past the sheet edge as empty', () => {
      expect(isEmptyCell(host, sheet, MAX_ROWS + 1, 1, false)).toBe(true);
    });
  });

  // Every scenario runs against a host with the native jump and one without
  describe.each([
    ['native jump', true],
    ['cell scan', false],
  ])('expandRegion() with %s', (_label, nativeEnd) => {
    let host: MemoryHost;
    let sheet: SheetHandle;

    const expand = (address: string, mode: ExpandMode, strict: boolean = false): string =>
      expandRegion(host, sheet, Region.parse(address), mode, strict).toA1();

    beforeEach(() => {
      host = new MemoryHost({ nativeEnd });
      sheet = sheetOf(host);
    });

    it('should grow a 2x2 block from its corner', () => {
      fill(host, sheet, 1, 1, [[1, 2], [3, 4]]);

      expect(expand('A1', 'table')).toBe('A1:B2');
      expect(expand('A1', 'vertical')).toBe('A1:A2');
      expect(expand('A1', 'horizontal')).toBe('A1:B1');
    });

    it('should run through longer blocks', () => {
      fill(host, sheet, 3, 3, [[1, 2, 3], [4, 5, 6], [7, 8, 9]]);

      expect(expand('C3', 'table')).toBe('C3:E5');
      expect(expand('D4', 'table')).toBe('D4:E5');
    });

    it('should stop before a gap', () => {
      for (let row = 1; row <= 10; row++) {
        host.setCellValue(sheet, row, 1, row);
      }
      host.setCellValue(sheet, 13, 1, 'after');
      host.setCellValue(sheet, 14, 1, 'gap');

      expect(expand('A1', 'vertical')).toBe('A1:A10');
      expect(expand('A13', 'vertical')).toBe('A13:A14');
    });

    it('should take one or two cells when the run is that short', () => {
      fill(host, sheet, 1, 1, [['a'], ['b'], [null], ['d']]);
      host.setCellValue(sheet, 1, 3, 'x');

      expect(expand('A1', 'vertical')).toBe('A1:A2');
      expect(expand('A2', 'vertical')).toBe('A2');
      expect(expand('A1', 'horizontal')).toBe('A1');
    });

    it('should give back the anchor on an empty sheet', () => {
      expect(expand('B2', 'table')).toBe('B2');
      expect(expand('B2', 'vertical')).toBe('B2');
    });

    it('should read only the anchor row and column for a table', () => {
      fill(host, sheet, 1, 1, [['h1', 'h2'], ['v1', null]]);

      expect(expand('A1', 'table')).toBe('A1:B2');
    });

    it('should keep the width of a multi-column Range when expanding down', () => {
      fill(host, sheet, 1, 1, [[1], [2], [3]]);
      fill(host, sheet, 1, 2, [[10, 20]]);

      expect(expand('A1:C1', 'vertical')).toBe('A1:C3');
      expect(expand('A1:A2', 'horizontal')).toBe('A1:C2');
    });

    it('should pass over a blank formula unless strict', () => {
      host.setCellValue(sheet, 1, 7, 'a');
      host.setCellFormula(sheet, 2, 7, '=IF(FALSE,1,"")');
      host.setCellValue(sheet, 3, 7, 'b');

      expect(expand('G1', 'vertical')).toBe('G1:G3');
      expect(expand('G1', 'vertical', true)).toBe('G1');
    });

    it('should stop at the last row of the sheet', () => {
      host.setCellValue(sheet, MAX_ROWS - 1, 1, 'x');
      host.setCellValue(sheet, MAX_ROWS, 1, 'y');

      expect(expand(`A${MAX_ROWS}`, 'vertical')).toBe(`A${MAX_ROWS}`);
      expect(expand(`A${MAX_ROWS - 1}`, 'vertical')).toBe(`A${MAX_ROWS - 1}:A${MAX_ROWS}`);
    });
  });
});
