import {
  endOfMonth,
  endOfQuarter,
  endOfWeek,
  endOfYear,
  format,
  getQuarter,
  startOfMonth,
  startOfQuarter,
  startOfWeek,
  startOfYear,
} from 'date-fns';
import type { EnrichedSalesRecord } from '../model/records';
import type { Granularity, PeriodSummaryRow } from '../model/report';
import { relativeChange } from '../util/coerce';

/**
 * 前年比較に使うバケット数。暦で前年同期を探すのではなく、
 * 並べたバケット列を固定数だけずらして比較する（週次の52は近似）。
 */
export const PERIOD_YOY_LAG: Record<Granularity, number> = {
  M: 12,
  W: 52,
  Q: 4,
  Y: 1,
};

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;

export interface PeriodBucket {
  period: string;
  period_start: Date;
  period_end: Date;
  period_label: string;
}

export const formatPeriodLabel = (
  granularity: Granularity,
  start: Date,
  end: Date,
  period: string
): string => {
  if (granularity !== 'W') return period;
  return `${format(start, 'yyyy-MM-dd')}週 (${format(start, 'MM/dd')}〜${format(end, 'MM/dd')})`;
};

export const periodBucketOf = (
  date: Date,
  granularity: Granularity
): PeriodBucket => {
  let start: Date;
  let end: Date;
  let period: string;

  switch (granularity) {
    case 'W':
      start = startOfWeek(date, WEEK_OPTIONS);
      end = endOfWeek(date, WEEK_OPTIONS);
      period = format(start, 'yyyy-MM-dd');
      break;
    case 'Q':
      start = startOfQuarter(date);
      end = endOfQuarter(date);
      period = `${format(start, 'yyyy')}Q${getQuarter(start)}`;
      break;
    case 'Y':
      start = startOfYear(date);
      end = endOfYear(date);
      period = format(start, 'yyyy');
      break;
    case 'M':
    default:
      start = startOfMonth(date);
      end = endOfMonth(date);
      period = format(start, 'yyyy-MM');
      break;
  }

  return {
    period,
    period_start: start,
    period_end: end,
    period_label: formatPeriodLabel(granularity, start, end, period),
  };
};

/** 要素を期間バケットへ振り分け、期間開始日の昇順で返す。 */
export const groupByPeriod = <T>(
  items: readonly T[],
  dateOf: (item: T) => Date,
  granularity: Granularity
): Array<{ bucket: PeriodBucket; items: T[] }> => {
  const groups = new Map<string, { bucket: PeriodBucket; items: T[] }>();
  for (const item of items) {
    const bucket = periodBucketOf(dateOf(item), granularity);
    const group = groups.get(bucket.period);
    if (group) {
      group.items.push(item);
    } else {
      groups.set(bucket.period, { bucket, items: [item] });
    }
  }
  return [...groups.values()].sort(
    (a, b) => a.bucket.period_start.getTime() - b.bucket.period_start.getTime()
  );
};

const shifted = <T>(values: readonly T[], index: number, lag: number) =>
  index - lag >= 0 ? values[index - lag] : null;

/** 売上と粗利を指定粒度で集計し、前期比・前年比を付与する。 */
export const summarizeSalesByPeriod = (
  rows: EnrichedSalesRecord[],
  granularity: Granularity
): PeriodSummaryRow[] => {
  if (!rows.length) return [];

  const groups = groupByPeriod(rows, (row) => row.order_date, granularity);
  const totals = groups.map(({ bucket, items }) => ({
    bucket,
    sales_amount: items.reduce((acc, row) => acc + row.sales_amount, 0),
    gross_profit: items.reduce((acc, row) => acc + row.gross_profit, 0),
    net_gross_profit: items.reduce(
      (acc, row) => acc + row.net_gross_profit,
      0
    ),
  }));

  const sales = totals.map((total) => total.sales_amount);
  const gross = totals.map((total) => total.net_gross_profit);
  const yoyLag = PERIOD_YOY_LAG[granularity];

  return totals.map((total, index) => {
    const prevPeriodSales = shifted(sales, index, 1);
    const prevYearSales = shifted(sales, index, yoyLag);
    const prevPeriodGross = shifted(gross, index, 1);
    const prevYearGross = shifted(gross, index, yoyLag);

    return {
      ...total.bucket,
      sales_amount: total.sales_amount,
      gross_profit: total.gross_profit,
      net_gross_profit: total.net_gross_profit,
      prev_period_sales: prevPeriodSales,
      sales_mom: relativeChange(total.sales_amount, prevPeriodSales),
      prev_year_sales: prevYearSales,
      sales_yoy: relativeChange(total.sales_amount, prevYearSales),
      prev_period_gross: prevPeriodGross,
      gross_mom: relativeChange(total.net_gross_profit, prevPeriodGross),
      prev_year_gross: prevYearGross,
      gross_yoy: relativeChange(total.net_gross_profit, prevYearGross),
    };
  });
};

/** 月次の売上と粗利サマリ */
export const monthlySalesSummary = (
  rows: EnrichedSalesRecord[]
): PeriodSummaryRow[] => summarizeSalesByPeriod(rows, 'M');
