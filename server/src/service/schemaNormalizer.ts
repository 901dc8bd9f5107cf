import columnAliases from '../data/columnAliases.json';
import {
  COST_FIELDS,
  SALES_FIELDS,
  SUBSCRIPTION_FIELDS,
  type CostField,
  type CostRecord,
  type NormalizeResult,
  type RawRow,
  type SalesField,
  type SalesRecord,
  type SkippedRow,
  type SubscriptionField,
  type SubscriptionKpiRecord,
} from '../model/records';
import {
  parseDateValue,
  parseYearMonth,
  sanitizeNumber,
  toYearMonth,
} from '../util/coerce';
import { headerKey, sanitizeText } from '../util/textSanitizer';

export type AliasTable<F extends string> = Record<F, string[]>;

export const SALES_COLUMN_ALIASES: AliasTable<SalesField> = columnAliases.sales;
export const COST_COLUMN_ALIASES: AliasTable<CostField> = columnAliases.cost;
export const SUBSCRIPTION_COLUMN_ALIASES: AliasTable<SubscriptionField> =
  columnAliases.subscription;

export const UNKNOWN_CHANNEL = '不明';
export const UNKNOWN_PRODUCT_CODE = 'NA';
export const UNKNOWN_PRODUCT_NAME = '不明商品';
export const UNCATEGORIZED = '未分類';
export const ANONYMOUS_CUSTOMER = 'anonymous';

/** ファイル名からチャネル名を推定する。 */
export const detectChannelFromFilename = (
  filename: string | null | undefined
): string | null => {
  if (!filename) return null;
  const name = filename.toLowerCase();
  if (name.includes('rakuten') || name.includes('楽天')) return '楽天市場';
  if (name.includes('amazon')) return 'Amazon';
  if (name.includes('yahoo')) return 'Yahoo!ショッピング';
  if (name.includes('shop') || name.includes('ec') || name.includes('自社')) {
    return '自社サイト';
  }
  return null;
};

const collectColumns = (rows: RawRow[]): string[] => {
  const seen = new Set<string>();
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
};

/**
 * 正規列 → 入力列の対応表を作る。
 * 正規列の宣言順に別名リストを先頭から照合し、最初に見つかった別名を採用する。
 * 一度採用された入力列は後続の正規列には割り当てない。
 */
export const buildRenameMap = <F extends string>(
  columns: string[],
  aliasTable: AliasTable<F>,
  fields: readonly F[]
): Map<F, string> => {
  const normalizedColumns = columns.map((column) => headerKey(column));
  const claimed = new Set<number>();
  const renameMap = new Map<F, string>();

  for (const field of fields) {
    for (const alias of aliasTable[field]) {
      const index = normalizedColumns.findIndex(
        (column, position) =>
          column === headerKey(alias) && !claimed.has(position)
      );
      if (index !== -1) {
        claimed.add(index);
        renameMap.set(field, columns[index]);
        break;
      }
    }
  }

  return renameMap;
};

const createAccessor = <F extends string>(renameMap: Map<F, string>) => {
  return (row: RawRow, field: F): unknown => {
    const source = renameMap.get(field);
    return source === undefined ? undefined : row[source];
  };
};

const splitColumns = <F extends string>(
  renameMap: Map<F, string>,
  fields: readonly F[]
) => ({
  presentColumns: fields.filter((field) => renameMap.has(field)),
  missingColumns: fields.filter((field) => !renameMap.has(field)),
});

/** 売上データを統一フォーマットに整形する。日付を解釈できない行は skipped に回す。 */
export const normalizeSales = (
  rawRows: RawRow[] | null | undefined,
  channelHint?: string | null
): NormalizeResult<SalesRecord, SalesField> => {
  const rows = rawRows ?? [];
  const renameMap = buildRenameMap(
    collectColumns(rows),
    SALES_COLUMN_ALIASES,
    SALES_FIELDS
  );
  const get = createAccessor(renameMap);
  const defaultChannel = channelHint || UNKNOWN_CHANNEL;

  const records: SalesRecord[] = [];
  const skipped: SkippedRow[] = [];

  rows.forEach((row, index) => {
    const orderDate = parseDateValue(get(row, 'order_date'));
    if (!orderDate) {
      skipped.push({
        index,
        reason: renameMap.has('order_date')
          ? '注文日を日付として解釈できません'
          : '注文日の列がありません',
        raw: row,
      });
      return;
    }

    const quantity = sanitizeNumber(get(row, 'quantity')) ?? 1;
    const salesAmount = sanitizeNumber(get(row, 'sales_amount')) ?? 0;

    records.push({
      order_date: orderDate,
      channel: sanitizeText(get(row, 'channel')) ?? defaultChannel,
      product_code:
        sanitizeText(get(row, 'product_code')) ?? UNKNOWN_PRODUCT_CODE,
      product_name:
        sanitizeText(get(row, 'product_name')) ?? UNKNOWN_PRODUCT_NAME,
      category: sanitizeText(get(row, 'category')) ?? UNCATEGORIZED,
      quantity,
      sales_amount: salesAmount,
      customer_id:
        sanitizeText(get(row, 'customer_id')) ?? ANONYMOUS_CUSTOMER,
      // 数量0の行は単価=売上とみなす
      unit_price: quantity ? salesAmount / quantity : salesAmount,
      order_month: toYearMonth(orderDate),
    });
  });

  return {
    rows: records,
    skipped,
    ...splitColumns(renameMap, SALES_FIELDS),
  };
};

/** 原価率表を正規化する。原価率が無い行は原価/売価から求める。 */
export const normalizeCost = (
  rawRows: RawRow[] | null | undefined
): NormalizeResult<CostRecord, CostField> => {
  const rows = rawRows ?? [];
  const renameMap = buildRenameMap(
    collectColumns(rows),
    COST_COLUMN_ALIASES,
    COST_FIELDS
  );
  const get = createAccessor(renameMap);

  const records = rows.map((row): CostRecord => {
    const price = sanitizeNumber(get(row, 'price'));
    const cost = sanitizeNumber(get(row, 'cost'));
    const explicitRate = sanitizeNumber(get(row, 'cost_rate'));
    const costRate =
      explicitRate ?? (cost != null && price ? cost / price : null);

    return {
      product_code:
        sanitizeText(get(row, 'product_code')) ?? UNKNOWN_PRODUCT_CODE,
      product_name:
        sanitizeText(get(row, 'product_name')) ?? UNKNOWN_PRODUCT_NAME,
      category: sanitizeText(get(row, 'category')) ?? UNCATEGORIZED,
      price,
      cost,
      cost_rate: costRate,
      gross_margin_rate: 1 - (costRate ?? 0),
    };
  });

  return {
    rows: records,
    skipped: [],
    ...splitColumns(renameMap, COST_FIELDS),
  };
};

/** サブスク/KPIデータを正規化する。欠損値は 0 ではなく null のまま残す。 */
export const normalizeSubscription = (
  rawRows: RawRow[] | null | undefined
): NormalizeResult<SubscriptionKpiRecord, SubscriptionField> => {
  const rows = rawRows ?? [];
  const renameMap = buildRenameMap(
    collectColumns(rows),
    SUBSCRIPTION_COLUMN_ALIASES,
    SUBSCRIPTION_FIELDS
  );
  const get = createAccessor(renameMap);
  const numeric = (row: RawRow, field: SubscriptionField) =>
    sanitizeNumber(get(row, field));

  const records = rows.map(
    (row): SubscriptionKpiRecord => ({
      month: parseYearMonth(get(row, 'month')),
      active_customers: numeric(row, 'active_customers'),
      previous_active_customers: numeric(row, 'previous_active_customers'),
      new_customers: numeric(row, 'new_customers'),
      repeat_customers: numeric(row, 'repeat_customers'),
      cancelled_subscriptions: numeric(row, 'cancelled_subscriptions'),
      marketing_cost: numeric(row, 'marketing_cost'),
      ltv: numeric(row, 'ltv'),
      total_sales: numeric(row, 'total_sales'),
      inventory_turnover_days: numeric(row, 'inventory_turnover_days'),
      stockout_rate: numeric(row, 'stockout_rate'),
      training_sessions: numeric(row, 'training_sessions'),
      new_product_count: numeric(row, 'new_product_count'),
    })
  );

  return {
    rows: records,
    skipped: [],
    ...splitColumns(renameMap, SUBSCRIPTION_FIELDS),
  };
};
