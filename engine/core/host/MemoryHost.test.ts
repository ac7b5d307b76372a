/**
 * CellBridge - MemoryHost Unit Tests
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryHost } from './MemoryHost.js';
import { InvalidArgumentsError, NotFoundError, StaleHandleError } from '../errors/index.js';
import { MAX_ROWS } from '../types/index.js';

describe('MemoryHost', () => {
  let host: MemoryHost;

  beforeEach(() => {
    host = new MemoryHost();
  });

  // ===========================================================================
  // Instances & Documents
  // ===========================================================================

  describe('instances', () => {
    it('should start with nothing running', () => {
      expect(host.listInstances()).toEqual([]);
      expect(host.activeInstance()).toBeNull();
    });

    it('should hand out increasing pids and focus the newest', () => {
      const a = host.startInstance();
      const b = host.startInstance();
      expect(a.pid).toBe(1000);
      expect(b.pid).toBe(1001);
      expect(host.activeInstance()).toBe(b);

      host.activate(a);
      expect(host.activeInstance()).toBe(a);
    });

    it('should forget an instance once it quits', () => {
      const a = host.startInstance();
      const b = host.startInstance();
      host.quit(b);
      expect(host.listInstances()).toEqual([a]);
      expect(host.isAlive(b)).toBe(false);
      expect(() => host.listDocuments(b)).toThrow(StaleHandleError);
    });
  });

  describe('documents', () => {
    it('should number untitled documents per instance', () => {
      const a = host.startInstance();
      const b = host.startInstance();
      expect(host.documentName(host.create(a))).toBe('Book1');
      expect(host.documentName(host.create(a))).toBe('Book2');
      expect(host.documentName(host.create(b))).toBe('Book1');
    });

    it('should report an unsaved document with an empty full name', () => {
      const doc = host.create(host.startInstance());
      expect(host.documentFullName(doc)).toBe('');
    });

    it('should track the most recently focused document', () => {
      const app = host.startInstance();
      const first = host.create(app);
      const second = host.create(app);
      expect(host.activeDocument(app)).toBe(second);

      host.activate(first);
      expect(host.activeDocument(app)).toBe(first);
    });

    it('should take name and path from saveAs', () => {
      const doc = host.create(host.startInstance());
      host.saveAs(doc, '/reports/q1/Sales.xml');
      expect(host.documentName(doc)).toBe('Sales.xml');
      expect(host.documentFullName(doc)).toBe('/reports/q1/Sales.xml');
    });

    it('should resolve windows paths for a win32 host', () => {
      const winHost = new MemoryHost({ pathStyle: 'win32' });
      const doc = winHost.create(winHost.startInstance());
      winHost.saveAs(doc, 'C:\\Reports\\Sales.xml');
      expect(winHost.documentName(doc)).toBe('Sales.xml');
      expect(winHost.documentFullName(doc)).toBe('C:\\Reports\\Sales.xml');
    });

    it('should make handles stale on close', () => {
      const app = host.startInstance();
      const doc = host.create(app);
      const [sheet] = host.sheets(doc);
      host.closeDocument(doc);

      expect(host.isAlive(doc)).toBe(false);
      expect(host.isAlive(sheet)).toBe(false);
      expect(host.activeDocument(app)).toBeNull();
      expect(() => host.cellValue(sheet, 1, 1)).toThrow(StaleHandleError);
    });
  });

  describe('sheets', () => {
    it('should create the configured number of sheets', () => {
      const multi = new MemoryHost({ sheetsPerDocument: 3 });
      const doc = multi.create(multi.startInstance());
      expect(multi.sheets(doc).map(s => multi.sheetName(s))).toEqual(['Sheet1', 'Sheet2', 'Sheet3']);
      expect(multi.activeSheet(doc)).toBe(multi.sheets(doc)[0]);
    });

    it('should reject a zero sheet count', () => {
      expect(() => new MemoryHost({ sheetsPerDocument: 0 })).toThrow(InvalidArgumentsError);
    });

    it('should keep sheet names unique regardless of case', () => {
      const doc = host.create(host.startInstance());
      expect(() => host.addSheet(doc, 'SHEET1')).toThrow(InvalidArgumentsError);
      expect(() => host.addSheet(doc, 'a:b')).toThrow(InvalidArgumentsError);
      expect(host.sheetName(host.addSheet(doc))).toBe('Sheet2');
    });

    it('should not revive a deleted sheet handle when the name is reused', () => {
      const doc = host.create(host.startInstance());
      const old = host.addSheet(doc, 'Data');
      host.deleteSheet(old);
      const fresh = host.addSheet(doc, 'Data');

      expect(host.isAlive(old)).toBe(false);
      expect(host.isAlive(fresh)).toBe(true);
      expect(fresh.key).not.toBe(old.key);
    });

    it('should place a new sheet before or after another', () => {
      const doc = host.create(host.startInstance());
      const [first] = host.sheets(doc);
      const last = host.addSheet(doc, 'Last');
      host.addSheet(doc, 'Front', { before: first });
      host.addSheet(doc, 'Middle', { after: first });

      expect(host.sheets(doc).map(s => host.sheetName(s))).toEqual(['Front', 'Sheet1', 'Middle', 'Last']);
      expect(host.sheets(doc)[3]).toBe(last);
    });

    it('should refuse to place a sheet next to one from another document', () => {
      const app = host.startInstance();
      const doc = host.create(app);
      const [foreign] = host.sheets(host.create(app));

      expect(() => host.addSheet(doc, 'Stray', { after: foreign })).toThrow(
        "Sheet 'Sheet1' is not in Book1."
      );
      expect(host.sheets(doc)).toHaveLength(1);
    });

    it('should drop the names pointing into a deleted sheet', () => {
      const doc = host.create(host.startInstance());
      const [first] = host.sheets(doc);
      const second = host.addSheet(doc);
      host.defineName(first, 'Kept', { row: 1, column: 1 });
      host.defineName(second, 'Dropped', { row: 1, column: 1 });

      host.deleteSheet(second);
      expect(host.names(doc).map(n => n.name)).toEqual(['Kept']);
    });

    it('should refuse to delete the last sheet', () => {
      const doc = host.create(host.startInstance());
      expect(() => host.deleteSheet(host.sheets(doc)[0])).toThrow(InvalidArgumentsError);
    });

    it('should move the active sheet when it is deleted', () => {
      const doc = host.create(host.startInstance());
      const second = host.addSheet(doc);
      host.activate(second);
      expect(host.activeSheet(doc)).toBe(second);

      host.deleteSheet(second);
      expect(host.activeSheet(doc)).toBe(host.sheets(doc)[0]);
    });
  });

  // ===========================================================================
  // Cells
  // ===========================================================================

  describe('cells', () => {
    it('should read back values and report the used extent', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      expect(host.rowCount(sheet)).toBe(0);

      host.setCellValue(sheet, 3, 2, 7);
      expect(host.cellValue(sheet, 3, 2)).toBe(7);
      expect(host.rowCount(sheet)).toBe(3);
      expect(host.columnCount(sheet)).toBe(2);
    });

    it('should clear a cell when given an empty string', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      host.setCellValue(sheet, 1, 1, 'x');
      host.setCellValue(sheet, 1, 1, '');
      expect(host.cellValue(sheet, 1, 1)).toBeNull();
      expect(host.rowCount(sheet)).toBe(0);
    });

    it('should keep formulas next to their computed value', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      host.setCellFormula(sheet, 1, 1, '=""');
      expect(host.cellValue(sheet, 1, 1)).toBeNull();
      expect(host.cellFormula(sheet, 1, 1)).toBe('=""');

      host.setCellValue(sheet, 1, 1, 5);
      expect(host.cellFormula(sheet, 1, 1)).toBeNull();
    });

    it('should jump like Ctrl+Arrow', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      host.setCellValue(sheet, 1, 1, 1);
      host.setCellValue(sheet, 2, 1, 2);
      expect(host.end?.(sheet, 1, 1, 'down')).toEqual({ row: 2, column: 1 });
      expect(host.end?.(sheet, 2, 1, 'down')).toEqual({ row: MAX_ROWS, column: 1 });
    });

    it('should store hyperlinks and show their text', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      host.addHyperlink(sheet, 2, 3, { address: 'https://example.com', textToDisplay: 'Example', screenTip: 'Go' });

      expect(host.cellHyperlink(sheet, 2, 3)).toEqual({
        address: 'https://example.com',
        textToDisplay: 'Example',
        screenTip: 'Go',
      });
      expect(host.cellValue(sheet, 2, 3)).toBe('Example');
      expect(host.cellHyperlink(sheet, 1, 1)).toBeNull();
    });

    it('should leave the jump out when asked to', () => {
      expect(new MemoryHost({ nativeEnd: false }).end).toBeUndefined();
    });
  });

  // ===========================================================================
  // Names & Shapes
  // ===========================================================================

  describe('names and shapes', () => {
    it('should replace a name defined twice, ignoring case', () => {
      const doc = host.create(host.startInstance());
      const [sheet] = host.sheets(doc);
      host.defineName(sheet, 'Totals', { row: 1, column: 1 });
      host.defineName(sheet, 'TOTALS', { row: 2, column: 2 }, { row: 1, column: 1 });

      expect(host.names(doc)).toEqual([
        { name: 'TOTALS', sheet, topLeft: { row: 1, column: 1 }, bottomRight: { row: 2, column: 2 } },
      ]);
      expect(() => host.defineName(sheet, 'has space', { row: 1, column: 1 })).toThrow(InvalidArgumentsError);
    });

    it('should delete a name ignoring case', () => {
      const doc = host.create(host.startInstance());
      const [sheet] = host.sheets(doc);
      host.defineName(sheet, 'Totals', { row: 1, column: 1 });

      host.deleteName(doc, 'TOTALS');
      expect(host.names(doc)).toEqual([]);
      expect(() => host.deleteName(doc, 'Totals')).toThrow("No name 'Totals' in Book1.");
      expect(() => host.deleteName(doc, 'Totals')).toThrow(NotFoundError);
    });

    it('should list shapes in insertion order', () => {
      const [sheet] = host.sheets(host.create(host.startInstance()));
      host.addShape(sheet, { kind: 'chart', name: 'Chart 1', left: 10, top: 20, width: 300, height: 200 });
      host.addShape(sheet, { kind: 'picture', name: 'Logo', left: 0, top: 0, width: 50, height: 50 });

      expect(host.shapes(sheet).map(s => s.name)).toEqual(['Chart 1', 'Logo']);
      expect(() => host.addShape(sheet, { kind: 'shape', name: 'logo', left: 0, top: 0, width: 1, height: 1 }))
        .toThrow(InvalidArgumentsError);
    });
  });

  // ===========================================================================
  // Opening files
  // ===========================================================================

  describe('open()', () => {
    const dir = mkdtempSync(join(tmpdir(), 'memory-host-'));

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load sheets, cells and names from a workbook file', () => {
      const path = join(dir, 'Budget.xml');
      writeFileSync(path, `<?xml version="1.0"?>
<Workbook xmlns="urn:schemas-microsoft-com:office:spreadsheet"
 xmlns:ss="urn:schemas-microsoft-com:office:spreadsheet">
 <Names><NamedRange ss:Name="Header" ss:RefersTo="=Plan!R1C1:R1C2"/></Names>
 <Worksheet ss:Name="Plan">
  <Table>
   <Row><Cell><Data ss:Type="String">item</Data></Cell><Cell><Data ss:Type="String">cost</Data></Cell></Row>
   <Row><Cell><Data ss:Type="String">rent</Data></Cell><Cell><Data ss:Type="Number">900</Data></Cell></Row>
  </Table>
 </Worksheet>
 <Worksheet ss:Name="Notes"/>
</Workbook>`, 'utf8');

      const app = host.startInstance();
      const doc = host.open(app, path);
      const [plan, notes] = host.sheets(doc);

      expect(host.documentName(doc)).toBe('Budget.xml');
      expect(host.documentFullName(doc)).toBe(path);
      expect(host.sheetName(notes)).toBe('Notes');
      expect(host.cellValue(plan, 2, 2)).toBe(900);
      expect(host.activeSheet(doc)).toBe(plan);
      expect(host.activeDocument(app)).toBe(doc);
      expect(host.names(doc)[0]).toEqual({
        name: 'Header', sheet: plan, topLeft: { row: 1, column: 1 }, bottomRight: { row: 1, column: 2 },
      });
    });

    it('should refuse names that point at a missing sheet', () => {
      const path = join(dir, 'Broken.xml');
      writeFileSync(path, `<Workbook><Names><NamedRange Name="X" RefersTo="=Gone!R1C1"/></Names>
<Worksheet Name="Here"/></Workbook>`, 'utf8');

      expect(() => host.open(host.startInstance(), path)).toThrow(NotFoundError);
    });
  });
});
