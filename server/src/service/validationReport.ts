import type {
  EnrichedSalesRecord,
  NormalizeResult,
  SalesRecord,
} from '../model/records';
import type { ValidationLevel, ValidationMessage } from '../model/report';
import { rowIdentity } from '../util/hash';
import { hasChannelFeeRate } from './salesCostMerger';

export const SAMPLE_SIZE = 5;

interface MessageOptions {
  count?: number;
  sample?: unknown[];
}

/**
 * 取込時のエラー/警告と重複行を蓄積するレポート。
 * 複数ソース（ファイル・API）のレポートは extend で連結する。
 */
export class ValidationReport {
  private readonly entries: ValidationMessage[] = [];
  private readonly duplicates: SalesRecord[] = [];
  private readonly duplicateIds = new Set<string>();

  get messages(): readonly ValidationMessage[] {
    return this.entries;
  }

  get duplicateRows(): readonly SalesRecord[] {
    return this.duplicates;
  }

  addMessage(
    level: ValidationLevel,
    message: string,
    options: MessageOptions = {}
  ): void {
    const entry: ValidationMessage = { level, message };
    if (options.count !== undefined) entry.count = options.count;
    if (options.sample?.length) {
      entry.sample = options.sample.slice(0, SAMPLE_SIZE);
    }
    this.entries.push(entry);
  }

  /** 既に記録済みの行（内容が同一の行）は追加しない。 */
  addDuplicates(rows: readonly SalesRecord[]): number {
    let added = 0;
    for (const row of rows) {
      const id = rowIdentity(row);
      if (this.duplicateIds.has(id)) continue;
      this.duplicateIds.add(id);
      this.duplicates.push(row);
      added += 1;
    }
    return added;
  }

  hasErrors(): boolean {
    return this.entries.some((entry) => entry.level === 'error');
  }

  hasWarnings(): boolean {
    return this.entries.some((entry) => entry.level === 'warning');
  }

  extend(other: ValidationReport | null | undefined): void {
    if (!other) return;
    this.entries.push(...other.messages);
    this.addDuplicates(other.duplicateRows);
  }

  toJSON() {
    return {
      messages: [...this.entries],
      duplicate_rows: [...this.duplicates],
    };
  }
}

const duplicateKey = (row: SalesRecord) =>
  JSON.stringify([
    row.channel,
    row.product_code,
    row.order_date.getTime(),
    row.customer_id,
    row.sales_amount,
  ]);

/**
 * チャネル・商品・注文日・顧客・売上額が一致する行を重複とみなし、
 * 重複グループに属する行をすべて入力順で返す。
 */
export const detectDuplicateRows = (rows: SalesRecord[]): SalesRecord[] => {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const key = duplicateKey(row);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return rows.filter((row) => (counts.get(duplicateKey(row)) ?? 0) > 1);
};

/** 正規化結果の欠損列・除外行をレポートへ記録する。 */
export const reportNormalization = <T, F extends string>(
  result: NormalizeResult<T, F>,
  source: string,
  report: ValidationReport,
  options: { required?: readonly F[]; optional?: readonly F[] } = {}
): void => {
  const required = options.required ?? [];
  const optional = options.optional ?? [];

  const missingRequired = result.missingColumns.filter((column) =>
    required.includes(column)
  );
  const missingOther = result.missingColumns.filter(
    (column) => !required.includes(column) && !optional.includes(column)
  );

  if (missingRequired.length) {
    report.addMessage(
      'error',
      `${source}: 必須列が見つかりません (${missingRequired.join(', ')})`
    );
  }
  if (missingOther.length) {
    report.addMessage(
      'warning',
      `${source}: 列が見つからないため既定値で補完しました (${missingOther.join(', ')})`
    );
  }
  if (result.skipped.length) {
    report.addMessage(
      'warning',
      `${source}: 日付を解釈できない${result.skipped.length}行を除外しました。`,
      {
        count: result.skipped.length,
        sample: result.skipped.map((skipped) => skipped.raw),
      }
    );
  }
};

/** チャネル手数料・粗利の異常値をチェックする。 */
export const validateChannelFees = (
  rows: EnrichedSalesRecord[]
): ValidationReport => {
  const report = new ValidationReport();

  const unknownChannelRows = rows.filter(
    (row) => !hasChannelFeeRate(row.channel)
  );
  if (unknownChannelRows.length) {
    const channels = [...new Set(unknownChannelRows.map((row) => row.channel))];
    report.addMessage(
      'warning',
      `手数料率が未設定のチャネルがあります: ${channels.join(', ')}（手数料0%で計算しています）`,
      { count: unknownChannelRows.length, sample: unknownChannelRows }
    );
  }

  const negativeRows = rows.filter((row) => row.net_gross_profit < 0);
  if (negativeRows.length) {
    report.addMessage(
      'warning',
      `手数料控除後の粗利がマイナスの明細が${negativeRows.length}件あります。原価率・手数料率を確認してください。`,
      { count: negativeRows.length, sample: negativeRows }
    );
  }

  return report;
};
