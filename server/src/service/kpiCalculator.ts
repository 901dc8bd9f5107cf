import type {
  EnrichedSalesRecord,
  SubscriptionKpiRecord,
  YearMonth,
} from '../model/records';
import type {
  Granularity,
  KpiOverrideKey,
  KpiOverrides,
  KpiPeriodRow,
  KpiSnapshot,
} from '../model/report';
import {
  differenceOrNull,
  meanNullable,
  safeDivide,
  sumNullable,
  yearMonthToDate,
} from '../util/coerce';
import { groupByPeriod } from './periodAggregation';

const latestMonth = (rows: EnrichedSalesRecord[]): YearMonth =>
  rows.reduce(
    (latest, row) => (row.order_month > latest ? row.order_month : latest),
    rows[0].order_month
  );

const findSubscriptionRow = (
  subscriptionRows: SubscriptionKpiRecord[] | null | undefined,
  month: YearMonth
): SubscriptionKpiRecord | null =>
  subscriptionRows?.find((row) => row.month === month) ?? null;

/**
 * 主要KPIを計算する。
 *
 * サブスク由来の値は「手入力の上書き → 該当月のサブスク行 → null」の順に決まる。
 * 比率は分母が null/0 のとき null（0 にはしない）。
 *
 * @param month - 省略時は売上データの最新月
 * @returns 売上データが空なら null
 */
export const calculateKpis = (
  rows: EnrichedSalesRecord[],
  subscriptionRows?: SubscriptionKpiRecord[] | null,
  month?: YearMonth | null,
  overrides: KpiOverrides = {}
): KpiSnapshot | null => {
  if (!rows.length) return null;

  const targetMonth = month ?? latestMonth(rows);
  const monthlyRows = rows.filter((row) => row.order_month === targetMonth);
  const sales = monthlyRows.reduce((acc, row) => acc + row.sales_amount, 0);
  const grossProfit = monthlyRows.reduce(
    (acc, row) => acc + row.net_gross_profit,
    0
  );

  const subscription = findSubscriptionRow(subscriptionRows, targetMonth);
  const resolve = (key: KpiOverrideKey): number | null =>
    overrides[key] ?? subscription?.[key] ?? null;

  const activeCustomers = resolve('active_customers');
  const newCustomers = resolve('new_customers');
  const repeatCustomers = resolve('repeat_customers');
  const cancelled = resolve('cancelled_subscriptions');
  const previousActive = resolve('previous_active_customers');
  const marketingCost = resolve('marketing_cost');

  return {
    month: targetMonth,
    sales,
    gross_profit: grossProfit,
    active_customers: activeCustomers,
    previous_active_customers: previousActive,
    new_customers: newCustomers,
    repeat_customers: repeatCustomers,
    cancelled_subscriptions: cancelled,
    marketing_cost: marketingCost,
    ltv: resolve('ltv'),
    inventory_turnover_days: resolve('inventory_turnover_days'),
    stockout_rate: resolve('stockout_rate'),
    training_sessions: resolve('training_sessions'),
    new_product_count: resolve('new_product_count'),
    arpu: safeDivide(sales, activeCustomers),
    repeat_rate: safeDivide(repeatCustomers, activeCustomers),
    churn_rate: safeDivide(cancelled, previousActive),
    roas: safeDivide(sales, marketingCost),
    adv_ratio: safeDivide(marketingCost, sales),
    gross_margin_rate: safeDivide(grossProfit, sales),
    cac: safeDivide(marketingCost, newCustomers),
  };
};

/** 売上データに含まれる全月について月次KPI履歴を作成する（月の昇順）。 */
export const buildKpiHistory = (
  rows: EnrichedSalesRecord[],
  subscriptionRows?: SubscriptionKpiRecord[] | null,
  overrides: KpiOverrides = {}
): KpiSnapshot[] => {
  const months = [...new Set(rows.map((row) => row.order_month))].sort();
  return months
    .map((month) => calculateKpis(rows, subscriptionRows, month, overrides))
    .filter((snapshot): snapshot is KpiSnapshot => snapshot !== null);
};

const sumOf = (items: KpiSnapshot[], pick: (item: KpiSnapshot) => number | null) =>
  sumNullable(items.map(pick));

const meanOf = (items: KpiSnapshot[], pick: (item: KpiSnapshot) => number | null) =>
  meanNullable(items.map(pick));

/**
 * 月次KPI履歴を指定粒度で再集計する。
 * 件数・金額は合計、顧客数やLTVは平均し、ARPU・解約率・リピート率・粗利率は
 * 月次比率の平均ではなく再集計後の合計値から計算し直す。
 */
export const aggregateKpiHistory = (
  history: KpiSnapshot[],
  granularity: Granularity
): KpiPeriodRow[] => {
  if (!history.length) return [];

  const groups = groupByPeriod(
    history,
    (snapshot) => yearMonthToDate(snapshot.month),
    granularity
  );

  const aggregated = groups.map(({ bucket, items }) => {
    const sales = sumOf(items, (item) => item.sales);
    const grossProfit = sumOf(items, (item) => item.gross_profit);
    const activeAvg = meanOf(items, (item) => item.active_customers);
    const repeatCustomers = sumOf(items, (item) => item.repeat_customers);
    const cancelled = sumOf(items, (item) => item.cancelled_subscriptions);
    const previousActive = sumOf(
      items,
      (item) => item.previous_active_customers
    );

    return {
      ...bucket,
      sales,
      gross_profit: grossProfit,
      marketing_cost: sumOf(items, (item) => item.marketing_cost),
      active_customers_avg: activeAvg,
      new_customers: sumOf(items, (item) => item.new_customers),
      repeat_customers: repeatCustomers,
      cancelled_subscriptions: cancelled,
      previous_active_customers: previousActive,
      ltv: meanOf(items, (item) => item.ltv),
      arpu: safeDivide(sales, activeAvg),
      churn_rate: safeDivide(cancelled, previousActive),
      repeat_rate: safeDivide(repeatCustomers, activeAvg),
      gross_margin_rate: safeDivide(grossProfit, sales),
      inventory_turnover_days: meanOf(
        items,
        (item) => item.inventory_turnover_days
      ),
      stockout_rate: meanOf(items, (item) => item.stockout_rate),
      training_sessions: sumOf(items, (item) => item.training_sessions),
      new_product_count: sumOf(items, (item) => item.new_product_count),
    };
  });

  return aggregated.map((row, index): KpiPeriodRow => {
    const prev = index > 0 ? aggregated[index - 1] : null;
    const ltvPrev = prev?.ltv ?? null;
    const arpuPrev = prev?.arpu ?? null;
    const churnPrev = prev?.churn_rate ?? null;
    const grossMarginPrev = prev?.gross_margin_rate ?? null;
    const repeatPrev = prev?.repeat_rate ?? null;
    const inventoryPrev = prev?.inventory_turnover_days ?? null;
    const stockoutPrev = prev?.stockout_rate ?? null;
    const trainingPrev = prev?.training_sessions ?? null;
    const newProductPrev = prev?.new_product_count ?? null;

    return {
      ...row,
      ltv_prev: ltvPrev,
      ltv_delta: differenceOrNull(row.ltv, ltvPrev),
      arpu_prev: arpuPrev,
      arpu_delta: differenceOrNull(row.arpu, arpuPrev),
      churn_prev: churnPrev,
      churn_delta: differenceOrNull(row.churn_rate, churnPrev),
      gross_margin_prev: grossMarginPrev,
      gross_margin_delta: differenceOrNull(
        row.gross_margin_rate,
        grossMarginPrev
      ),
      repeat_prev: repeatPrev,
      repeat_delta: differenceOrNull(row.repeat_rate, repeatPrev),
      inventory_turnover_prev: inventoryPrev,
      inventory_turnover_delta: differenceOrNull(
        row.inventory_turnover_days,
        inventoryPrev
      ),
      stockout_prev: stockoutPrev,
      stockout_delta: differenceOrNull(row.stockout_rate, stockoutPrev),
      training_prev: trainingPrev,
      training_delta: differenceOrNull(row.training_sessions, trainingPrev),
      new_product_prev: newProductPrev,
      new_product_delta: differenceOrNull(
        row.new_product_count,
        newProductPrev
      ),
    };
  });
};
