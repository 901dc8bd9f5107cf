import type { RawRow } from '../model/records';
import {
  GRANULARITIES,
  type CashFlowPlanRow,
  type Granularity,
} from '../model/report';
import { parseDateValue, parseYearMonth } from '../util/coerce';

export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readJsonBody = async (req: Request): Promise<JsonObject> => {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new Error('リクエストボディのJSONを解析できません');
  }
  if (!isJsonObject(body)) {
    throw new Error('リクエストボディはオブジェクトで指定してください');
  }
  return body;
};

export const optionalNumber = (
  source: JsonObject,
  key: string,
  label = key
): number | undefined => {
  const value = source[key];
  if (value === undefined || value === null || value === '') return undefined;
  const parsed =
    typeof value === 'number' || typeof value === 'string'
      ? Number(value)
      : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new Error(`${label} は数値で指定してください`);
  }
  return parsed;
};

export const requiredNumber = (
  source: JsonObject,
  key: string,
  label = key
): number => {
  const value = optionalNumber(source, key, label);
  if (value === undefined) {
    throw new Error(`${label} は必須です`);
  }
  return value;
};

export const optionalObject = (
  source: JsonObject,
  key: string
): JsonObject | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!isJsonObject(value)) {
    throw new Error(`${key} はオブジェクトで指定してください`);
  }
  return value;
};

export const optionalString = (
  source: JsonObject,
  key: string
): string | undefined => {
  const value = source[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new Error(`${key} は文字列で指定してください`);
  }
  return value;
};

export const optionalStringList = (
  source: JsonObject,
  key: string
): string[] | undefined => {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new Error(`${key} は文字列の配列で指定してください`);
  }
  return value;
};

export const optionalDate = (
  source: JsonObject,
  key: string
): Date | undefined => {
  const value = source[key];
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = parseDateValue(value);
  if (!parsed) {
    throw new Error(`${key} は日付（YYYY-MM-DD）で指定してください`);
  }
  return parsed;
};

export const readRows = (value: unknown, label: string): RawRow[] => {
  if (!Array.isArray(value) || !value.every(isJsonObject)) {
    throw new Error(`${label} は行オブジェクトの配列で指定してください`);
  }
  return value;
};

export const parseGranularity = (value: unknown): Granularity => {
  if (value === undefined || value === null || value === '') return 'M';
  const matched = GRANULARITIES.find((granularity) => granularity === value);
  if (!matched) {
    throw new Error(
      `granularity は ${GRANULARITIES.join('/')} のいずれかで指定してください`
    );
  }
  return matched;
};

/** 数値キーの一部だけを指定するオブジェクト（しきい値・上書き値など）を読む。 */
export const parseNumberRecord = <K extends string>(
  source: JsonObject | undefined,
  keys: readonly K[],
  label: string
): Partial<Record<K, number>> => {
  const result: Partial<Record<K, number>> = {};
  if (!source) return result;
  for (const key of keys) {
    const value = optionalNumber(source, key, `${label}.${key}`);
    if (value !== undefined) result[key] = value;
  }
  return result;
};

export const parseCashflowPlan = (value: unknown): CashFlowPlanRow[] => {
  if (!Array.isArray(value)) {
    throw new Error('plan は配列で指定してください');
  }
  return value.map((row, index) => {
    const label = `plan[${index}]`;
    if (!isJsonObject(row)) {
      throw new Error(`${label} はオブジェクトで指定してください`);
    }
    const month = parseYearMonth(row.month);
    if (!month) {
      throw new Error(`${label}.month は年月（YYYY-MM）で指定してください`);
    }
    return {
      month,
      operating_cf: optionalNumber(row, 'operating_cf', `${label}.operating_cf`) ?? 0,
      investment_cf:
        optionalNumber(row, 'investment_cf', `${label}.investment_cf`) ?? 0,
      financing_cf: optionalNumber(row, 'financing_cf', `${label}.financing_cf`) ?? 0,
      loan_repayment:
        optionalNumber(row, 'loan_repayment', `${label}.loan_repayment`) ?? 0,
    };
  });
};

export const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;
