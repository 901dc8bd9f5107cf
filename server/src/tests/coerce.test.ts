import {
  parseDateValue,
  parseYearMonth,
  relativeChange,
  safeDivide,
  sanitizeNumber,
  sumNullable,
} from '../util/coerce';
import { headerKey, sanitizeHeader, sanitizeText } from '../util/textSanitizer';

describe('セル値の変換ユーティリティ', () => {
  test('金額表記の揺れを数値に変換する', () => {
    expect(sanitizeNumber('1,200円')).toBe(1200);
    expect(sanitizeNumber('¥3,000')).toBe(3000);
    expect(sanitizeNumber('１２３')).toBe(123);
    expect(sanitizeNumber('15%')).toBeCloseTo(0.15);
    expect(sanitizeNumber(42)).toBe(42);
  });

  test('数値として解釈できない値は null', () => {
    expect(sanitizeNumber('abc')).toBeNull();
    expect(sanitizeNumber('')).toBeNull();
    expect(sanitizeNumber(Number.NaN)).toBeNull();
    expect(sanitizeNumber(undefined)).toBeNull();
  });

  test('和暦以外の主な日付表記とExcelシリアル値を解釈する', () => {
    expect(parseDateValue('2024年3月5日')).toEqual(new Date(2024, 2, 5));
    expect(parseDateValue('2024/03/05')).toEqual(new Date(2024, 2, 5));
    expect(parseDateValue('20240305')).toEqual(new Date(2024, 2, 5));
    expect(parseDateValue(45292)).toEqual(new Date(2024, 0, 1));
    expect(parseDateValue('来月')).toBeNull();
    expect(parseDateValue(12)).toBeNull();
  });

  test('年月表記を YYYY-MM に揃える', () => {
    expect(parseYearMonth('2024/3')).toBe('2024-03');
    expect(parseYearMonth('2024年11月')).toBe('2024-11');
    expect(parseYearMonth(202405)).toBe('2024-05');
    expect(parseYearMonth('2024-02-15')).toBe('2024-02');
    expect(parseYearMonth('不明')).toBeNull();
  });

  test('分母が0やnullの割り算・増減率は null', () => {
    expect(safeDivide(1, 0)).toBeNull();
    expect(safeDivide(null, 5)).toBeNull();
    expect(safeDivide(10, 4)).toBe(2.5);
    expect(relativeChange(110, 0)).toBeNull();
    expect(relativeChange(110, null)).toBeNull();
    expect(sumNullable([null, null])).toBeNull();
    expect(sumNullable([1, null, 2])).toBe(3);
  });

  test('見出しのBOM・全角空白を除去し、空セルは null にする', () => {
    expect(sanitizeHeader('\uFEFF 注文日\u3000 ')).toBe('注文日');
    expect(headerKey(' Order  Date ')).toBe('order date');
    expect(sanitizeText('  nan ')).toBeNull();
    expect(sanitizeText('\u3000')).toBeNull();
    expect(sanitizeText(101)).toBe('101');
  });
});
