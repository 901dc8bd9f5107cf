import channelFeeRates from '../data/channelFeeRates.json';
import type {
  CostRecord,
  EnrichedSalesRecord,
  SalesRecord,
} from '../model/records';
import type { ShareRow } from '../model/report';
import { safeDivide } from '../util/coerce';
import { UNKNOWN_PRODUCT_CODE } from './schemaNormalizer';

// 原価表に該当が無い商品の原価率（実測値ではなく業務上の仮定）
export const DEFAULT_COST_RATE = 0.3;
export const MAX_COST_RATE = 0.95;

export const CHANNEL_FEE_RATES: Readonly<Record<string, number>> =
  channelFeeRates;

export const hasChannelFeeRate = (channel: string): boolean =>
  Object.prototype.hasOwnProperty.call(CHANNEL_FEE_RATES, channel);

export const channelFeeRate = (channel: string): number =>
  hasChannelFeeRate(channel) ? CHANNEL_FEE_RATES[channel] : 0;

export type CostJoinKey = 'product_code' | 'product_name';

/**
 * 結合キーの決定。原価表の商品コードがすべて "NA" なら商品名で結合する。
 * 部分的な結合はしない。
 */
export const selectJoinKey = (costs: CostRecord[]): CostJoinKey =>
  costs.length > 0 &&
  costs.every((cost) => cost.product_code === UNKNOWN_PRODUCT_CODE)
    ? 'product_name'
    : 'product_code';

const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max);

/** 売上データに原価情報を結合し、粗利・チャネル手数料・手数料控除後粗利を計算する。 */
export const mergeSalesAndCosts = (
  sales: SalesRecord[],
  costs: CostRecord[]
): EnrichedSalesRecord[] => {
  if (!sales.length) return [];

  const joinKey = selectJoinKey(costs);
  const costByKey = new Map<string, CostRecord>();
  for (const cost of costs) {
    const key = cost[joinKey];
    if (!costByKey.has(key)) costByKey.set(key, cost);
  }

  return sales.map((sale) => {
    const matched = costByKey.get(sale[joinKey]);
    const costRate = clamp(
      matched?.cost_rate ?? DEFAULT_COST_RATE,
      0,
      MAX_COST_RATE
    );
    const estimatedCost = sale.sales_amount * costRate;
    const grossProfit = sale.sales_amount - estimatedCost;
    const feeRate = channelFeeRate(sale.channel);
    const feeAmount = sale.sales_amount * feeRate;

    return {
      ...sale,
      price: matched?.price ?? null,
      cost: matched?.cost ?? null,
      cost_rate: costRate,
      gross_margin_rate:
        matched?.cost_rate != null ? matched.gross_margin_rate : 1 - costRate,
      estimated_cost: estimatedCost,
      gross_profit: grossProfit,
      channel_fee: feeRate,
      channel_fee_amount: feeAmount,
      net_gross_profit: grossProfit - feeAmount,
    } satisfies EnrichedSalesRecord;
  });
};

type GroupField = 'channel' | 'category' | 'product_code' | 'product_name' | 'order_month';

export interface SalesAggregate {
  keys: Partial<Record<GroupField, string>>;
  sales_amount: number;
}

/** 汎用的な売上集計処理。 */
export const aggregateSales = (
  rows: SalesRecord[],
  groupFields: GroupField[]
): SalesAggregate[] => {
  const groups = new Map<string, SalesAggregate>();
  for (const row of rows) {
    const keys: Partial<Record<GroupField, string>> = {};
    for (const field of groupFields) keys[field] = row[field];
    const id = JSON.stringify(groupFields.map((field) => row[field]));
    const current = groups.get(id);
    if (current) {
      current.sales_amount += row.sales_amount;
    } else {
      groups.set(id, { keys, sales_amount: row.sales_amount });
    }
  }
  return [...groups.values()];
};

const computeShare = (
  rows: SalesRecord[],
  field: 'channel' | 'category'
): ShareRow[] => {
  const aggregated = aggregateSales(rows, [field]);
  const total = aggregated.reduce((acc, row) => acc + row.sales_amount, 0);
  return aggregated
    .map((row) => ({
      key: row.keys[field] ?? '',
      sales_amount: row.sales_amount,
      share: safeDivide(row.sales_amount, total),
    }))
    .sort((a, b) => b.sales_amount - a.sales_amount);
};

/** チャネル別売上構成比 */
export const computeChannelShare = (rows: SalesRecord[]): ShareRow[] =>
  computeShare(rows, 'channel');

/** カテゴリ別売上構成比 */
export const computeCategoryShare = (rows: SalesRecord[]): ShareRow[] =>
  computeShare(rows, 'category');
