import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { logger } from '../../logger';
import {
  COST_FIELDS,
  SUBSCRIPTION_FIELDS,
  type CostRecord,
  type RawRow,
  type SalesRecord,
  type SubscriptionKpiRecord,
} from '../../model/records';
import {
  detectChannelFromFilename,
  normalizeCost,
  normalizeSales,
  normalizeSubscription,
} from '../schemaNormalizer';
import { describeError } from '../httpClient';
import { ValidationReport, reportNormalization } from '../validationReport';

// 先頭から順に試す。shift_jis は cp932 の範囲も読める。
export const CSV_ENCODINGS = ['utf-8', 'shift_jis'] as const;
export type CsvEncoding = (typeof CSV_ENCODINGS)[number];

const EXCEL_EXTENSIONS = ['.xlsx', '.xlsm', '.xls'];

export interface TableReadResult {
  rows: RawRow[];
  encoding?: CsvEncoding;
  error?: string;
}

export interface UploadedFile {
  name?: string;
  content: Uint8Array;
}

export interface LoadResult<T> {
  rows: T[];
  report: ValidationReport;
}

const isExcelFile = (filename: string) => {
  const lowered = filename.toLowerCase();
  return EXCEL_EXTENSIONS.some((ext) => lowered.endsWith(ext));
};

const isRawRow = (value: unknown): value is RawRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const decodeText = (
  content: Uint8Array
): { text: string; encoding: CsvEncoding } | null => {
  for (const encoding of CSV_ENCODINGS) {
    try {
      // fatal: 不正なバイト列は例外にして次の文字コードを試す（BOMは自動で除去される）
      const text = new TextDecoder(encoding, { fatal: true }).decode(content);
      return { text, encoding };
    } catch {
      continue;
    }
  }
  return null;
};

const readExcel = (content: Uint8Array): TableReadResult => {
  const workbook = XLSX.read(content, { type: 'array', cellDates: false });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return { rows: [], error: 'シートが見つかりません' };
  }
  const rows = XLSX.utils
    .sheet_to_json<unknown>(sheet, { defval: null, blankrows: false, raw: true })
    .filter(isRawRow);
  return { rows };
};

const readCsv = (content: Uint8Array): TableReadResult => {
  const decoded = decodeText(content);
  if (!decoded) {
    return {
      rows: [],
      error: `文字コードを判定できません (${CSV_ENCODINGS.join(', ')})`,
    };
  }
  const parsed = Papa.parse<unknown>(decoded.text, {
    header: true,
    skipEmptyLines: true,
  });
  return { rows: parsed.data.filter(isRawRow), encoding: decoded.encoding };
};

/**
 * Excel/CSV のバイト列を行オブジェクトの配列に変換する。
 * 読み込みに失敗しても例外は投げず、error に理由を入れて空の行を返す。
 */
export const readTabularFile = (
  content: Uint8Array,
  filename = ''
): TableReadResult => {
  try {
    return isExcelFile(filename) ? readExcel(content) : readCsv(content);
  } catch (error) {
    return { rows: [], error: describeError(error) };
  }
};

/** 売上の生データを正規化し、欠損列・除外行をレポートにまとめる。 */
export const normalizeSalesTable = (
  rawRows: RawRow[],
  source: string,
  channelHint?: string | null
): LoadResult<SalesRecord> => {
  const report = new ValidationReport();
  const normalized = normalizeSales(rawRows, channelHint);
  reportNormalization(normalized, source, report, {
    required: ['order_date', 'sales_amount'],
    optional: channelHint ? ['channel'] : [],
  });
  return { rows: normalized.rows, report };
};

export const normalizeCostTable = (
  rawRows: RawRow[],
  source: string
): LoadResult<CostRecord> => {
  const report = new ValidationReport();
  const normalized = normalizeCost(rawRows);
  reportNormalization(normalized, source, report, { optional: COST_FIELDS });
  const missing = new Set(normalized.missingColumns);
  if (missing.has('product_code') && missing.has('product_name')) {
    report.addMessage(
      'error',
      `${source}: 商品コード・商品名の列がどちらも見つかりません`
    );
  }
  if (missing.has('cost_rate') && (missing.has('cost') || missing.has('price'))) {
    report.addMessage(
      'warning',
      `${source}: 原価率を算出できる列が無いため、既定の原価率で計算します`
    );
  }
  return { rows: normalized.rows, report };
};

export const normalizeSubscriptionTable = (
  rawRows: RawRow[],
  source: string
): LoadResult<SubscriptionKpiRecord> => {
  const report = new ValidationReport();
  const normalized = normalizeSubscription(rawRows);
  // KPI列は任意（無い項目は null のまま）
  reportNormalization(normalized, source, report, {
    required: ['month'],
    optional: SUBSCRIPTION_FIELDS,
  });
  const undated = normalized.rows.filter((row) => row.month === null);
  if (normalized.presentColumns.includes('month') && undated.length) {
    report.addMessage(
      'warning',
      `${source}: 年月を解釈できない${undated.length}行はKPI計算の対象外です。`,
      { count: undated.length, sample: undated }
    );
  }
  return { rows: normalized.rows, report };
};

const readWithReport = (file: UploadedFile, source: string) => {
  const report = new ValidationReport();
  const result = readTabularFile(file.content, file.name);
  if (result.error) {
    logger.warn(`[ingestion] ${source} の読み込みに失敗しました`, result.error);
    report.addMessage(
      'error',
      `${source}: ファイルを読み込めませんでした (${result.error})`
    );
  }
  return { rows: result.rows, report };
};

/** アップロードされた売上ファイルを読み込み正規化する。 */
export const loadSalesWorkbook = (
  file: UploadedFile,
  channelHint?: string | null
): LoadResult<SalesRecord> => {
  const source = file.name || channelHint || '売上ファイル';
  const { rows, report } = readWithReport(file, source);
  if (report.hasErrors()) return { rows: [], report };

  const detected = channelHint || detectChannelFromFilename(file.name);
  const normalized = normalizeSalesTable(rows, source, detected);
  report.extend(normalized.report);
  return { rows: normalized.rows, report };
};

/** チャネルごとのファイル群を統合し、注文日の昇順に並べる。 */
export const loadSalesFiles = (
  filesByChannel: Record<string, UploadedFile[] | undefined>
): LoadResult<SalesRecord> => {
  const report = new ValidationReport();
  const combined: SalesRecord[] = [];

  for (const [channel, files] of Object.entries(filesByChannel)) {
    for (const file of files ?? []) {
      const loaded = loadSalesWorkbook(file, channel);
      report.extend(loaded.report);
      combined.push(...loaded.rows);
    }
  }

  combined.sort((a, b) => a.order_date.getTime() - b.order_date.getTime());
  logger.log(`[ingestion] 売上データを読み込みました`, {
    channels: Object.keys(filesByChannel).length,
    rows: combined.length,
  });
  return { rows: combined, report };
};

/** 原価率表ファイルを読み込む。 */
export const loadCostWorkbook = (file: UploadedFile): LoadResult<CostRecord> => {
  const source = file.name || '原価率表';
  const { rows, report } = readWithReport(file, source);
  if (report.hasErrors()) return { rows: [], report };

  const normalized = normalizeCostTable(rows, source);
  report.extend(normalized.report);
  return { rows: normalized.rows, report };
};

/** サブスク/KPIファイルを読み込む。 */
export const loadSubscriptionWorkbook = (
  file: UploadedFile
): LoadResult<SubscriptionKpiRecord> => {
  const source = file.name || 'サブスク/KPIデータ';
  const { rows, report } = readWithReport(file, source);
  if (report.hasErrors()) return { rows: [], report };

  const normalized = normalizeSubscriptionTable(rows, source);
  report.extend(normalized.report);
  return { rows: normalized.rows, report };
};
