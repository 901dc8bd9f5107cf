import { format, isValid, parse, parseISO } from 'date-fns';
import type { YearMonth } from '../model/records';

const DATE_FORMATS = [
  'yyyy-M-d',
  'yyyy/M/d',
  'yyyy.M.d',
  'yyyy年M月d日',
  'yyyy-M-d H:mm:ss',
  'yyyy-M-d H:mm',
  'yyyy/M/d H:mm:ss',
  'yyyy/M/d H:mm',
  'yyyy年M月d日 H:mm',
  'yyyyMMdd',
  'M/d/yy',
  'M/d/yyyy',
];

const MONTH_FORMATS = ['yyyy-M', 'yyyy/M', 'yyyy.M', 'yyyy年M月', 'yyyyMM'];

// Excel stores dates as days since 1899-12-30.
const EXCEL_EPOCH_OFFSET = 25569;
const EXCEL_SERIAL_MIN = 20000; // 1954
const EXCEL_SERIAL_MAX = 80000; // 2119

/**
 * 数値セルの値を number に変換する。
 * 桁区切りカンマ・全角数字・円記号・末尾の%を許容し、解釈できなければ null。
 */
export const sanitizeNumber = (raw: unknown): number | null => {
  if (raw == null) return null;
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== 'string') return null;

  let normalized = raw
    .normalize('NFKC')
    .replace(/[,\s¥$]/g, '')
    .replace(/円$/, '')
    .trim();
  if (!normalized) return null;

  let divisor = 1;
  if (normalized.endsWith('%')) {
    normalized = normalized.slice(0, -1);
    divisor = 100;
  }
  if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(normalized)) return null;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed / divisor : null;
};

const fromExcelSerial = (serial: number): Date | null => {
  if (serial < EXCEL_SERIAL_MIN || serial > EXCEL_SERIAL_MAX) return null;
  const wholeDays = Math.floor(serial) - EXCEL_EPOCH_OFFSET;
  const utc = new Date(wholeDays * 86_400_000);
  return new Date(utc.getUTCFullYear(), utc.getUTCMonth(), utc.getUTCDate());
};

const parseWithFormats = (text: string, formats: string[]): Date | null => {
  const reference = new Date(2000, 0, 1);
  for (const pattern of formats) {
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) return parsed;
  }
  return null;
};

/** 日付セル → Date（ローカル時刻）。解釈できなければ null。 */
export const parseDateValue = (raw: unknown): Date | null => {
  if (raw == null) return null;
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? null : new Date(raw.getTime());
  }
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? fromExcelSerial(raw) : null;
  }
  if (typeof raw !== 'string') return null;

  const text = raw.normalize('NFKC').trim();
  if (!text) return null;

  const parsed = parseWithFormats(text, DATE_FORMATS);
  if (parsed) return parsed;

  const iso = parseISO(text);
  return isValid(iso) ? iso : null;
};

export const toYearMonth = (date: Date): YearMonth => format(date, 'yyyy-MM');

export const yearMonthToDate = (month: YearMonth): Date => {
  const [year, monthIndex] = month.split('-').map(Number);
  return new Date(year, monthIndex - 1, 1);
};

/** 月セル → "YYYY-MM"。年月表記のほか、日付そのものも受け付ける。 */
export const parseYearMonth = (raw: unknown): YearMonth | null => {
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 190001) {
    return parseYearMonth(String(raw));
  }
  if (typeof raw === 'string') {
    const text = raw.normalize('NFKC').trim();
    const parsed = parseWithFormats(text, MONTH_FORMATS);
    if (parsed) return toYearMonth(parsed);
  }
  const date = parseDateValue(raw);
  return date ? toYearMonth(date) : null;
};

/**
 * 分母が null/0、または分子が null のときは null を返す。
 * 0 を返すと「解約ゼロ」「粗利ゼロ」と誤読されるため。
 */
export const safeDivide = (
  numerator: number | null,
  denominator: number | null
): number | null => {
  if (numerator == null || denominator == null) return null;
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator)) return null;
  if (denominator === 0) return null;
  return numerator / denominator;
};

export const sumNullable = (values: Array<number | null>): number | null => {
  const present = values.filter((value): value is number => value != null);
  if (!present.length) return null;
  return present.reduce((acc, value) => acc + value, 0);
};

export const meanNullable = (values: Array<number | null>): number | null => {
  const total = sumNullable(values);
  if (total == null) return null;
  const count = values.filter((value) => value != null).length;
  return total / count;
};

export const differenceOrNull = (
  current: number | null,
  previous: number | null
): number | null => {
  if (current == null || previous == null) return null;
  return current - previous;
};

export const relativeChange = (
  current: number | null,
  previous: number | null
): number | null => {
  if (current == null || previous == null || previous === 0) return null;
  return (current - previous) / previous;
};
