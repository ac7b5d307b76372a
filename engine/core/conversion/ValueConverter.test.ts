/**
 * CellBridge - BaseConverter Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BaseConverter, isValueConverter, transposeMatrix } from './ValueConverter.js';
import { InvalidArgumentsError } from '../errors/index.js';
import { Region } from '../coordinates/index.js';
import { MemoryHost } from '../host/index.js';
import { Range } from '../range/index.js';
import { SheetHandle } from '../types/index.js';

describe('BaseConverter', () => {
  const converter = new BaseConverter();

  describe('fromBlock()', () => {
    it('should collapse dimensions by shape', () => {
      expect(converter.fromBlock([[1]], {})).toBe(1);
      expect(converter.fromBlock([[1, 2, 3]], {})).toEqual([1, 2, 3]);
      expect(converter.fromBlock([[1], [2]], {})).toEqual([1, 2]);
      expect(converter.fromBlock([[1, 2], [3, 4]], {})).toEqual([[1, 2], [3, 4]]);
    });

    it('should honour ndim', () => {
      expect(converter.fromBlock([[1]], { ndim: 2 })).toEqual([[1]]);
      expect(converter.fromBlock([[1]], { ndim: 1 })).toEqual([1]);
      expect(converter.fromBlock([[1], [2]], { ndim: 2 })).toEqual([[1], [2]]);
      expect(() => converter.fromBlock([[1, 2], [3, 4]], { ndim: 1 })).toThrow(InvalidArgumentsError);
    });

    it('should transpose before shaping', () => {
      expect(converter.fromBlock([[1, 2], [3, 4]], { transpose: true })).toEqual([[1, 3], [2, 4]]);
      expect(converter.fromBlock([[1, 2]], { transpose: true, ndim: 2 })).toEqual([[1], [2]]);
    });

    it('should map numbers, dates and blanks', () => {
      const day = new Date(2024, 0, 31);
      const raw = [[1.5, day, null, 'x']];
      expect(converter.fromBlock(raw, {
        numberType: n => Math.round(n),
        dateType: d => d.getDate(),
        emptyValue: '',
      })).toEqual([2, 31, '', 'x']);
    });
  });

  describe('toBlock()', () => {
    it('should accept scalars, rows and blocks', () => {
      expect(converter.toBlock(5, {})).toEqual([[5]]);
      expect(converter.toBlock(['a', 'b'], {})).toEqual([['a', 'b']]);
      expect(converter.toBlock([[1, 2], [3, undefined]], {})).toEqual([[1, 2], [3, null]]);
    });

    it('should transpose on write', () => {
      expect(converter.toBlock(['a', 'b'], { transpose: true })).toEqual([['a'], ['b']]);
    });

    it('should reject ragged, empty and mixed arrays', () => {
      expect(() => converter.toBlock([[1, 2], [3]], {})).toThrow(
        'All rows must have the same length: row 1 has 1 cells, expected 2.'
      );
      expect(() => converter.toBlock([], {})).toThrow(InvalidArgumentsError);
      expect(() => converter.toBlock([[]], {})).toThrow(InvalidArgumentsError);
      expect(() => converter.toBlock([1, [2]], {})).toThrow(InvalidArgumentsError);
    });

    it('should reject values a cell cannot hold', () => {
      expect(() => converter.toBlock({ a: 1 }, {})).toThrow('Cannot write a value of type Object to a cell.');
      expect(() => converter.toBlock(Number.NaN, {})).toThrow(InvalidArgumentsError);
    });
  });
});

describe('BaseConverter through a Range', () => {
  const converter = new BaseConverter();
  let host: MemoryHost;
  let sheet: SheetHandle;

  const range = (address: string): Range =>
    new Range({ host, strictExpansion: false }, sheet, Region.parse(address));

  beforeEach(() => {
    host = new MemoryHost();
    [sheet] = host.sheets(host.create(host.startInstance()));
  });

  it('should read the cells of the Range it is given', () => {
    host.setCellValue(sheet, 2, 2, 'b2');
    host.setCellValue(sheet, 2, 3, 'c2');

    expect(converter.read(range('B2:C2'), {})).toEqual(['b2', 'c2']);
    expect(converter.read(range('B2'), { ndim: 2 })).toEqual([['b2']]);
  });

  it('should write from the top-left cell of the Range it is given', () => {
    converter.write([[1, 2], [3, 4]], range('C3'), {});

    expect(range('C3:D4').rawValue).toEqual([[1, 2], [3, 4]]);
  });

  it('should fill the Range with a scalar', () => {
    converter.write('x', range('A1:B1'), {});

    expect(range('A1:B1').rawValue).toEqual([['x', 'x']]);
  });
});

describe('conversion helpers', () => {
  it('should recognise converters', () => {
    expect(isValueConverter(new BaseConverter())).toBe(true);
    expect(isValueConverter({ read: () => null })).toBe(false);
    expect(isValueConverter(null)).toBe(false);
  });

  it('should transpose rectangular blocks', () => {
    expect(transposeMatrix([[1, 2, 3]])).toEqual([[1], [2], [3]]);
    expect(transposeMatrix([])).toEqual([]);
  });
});
