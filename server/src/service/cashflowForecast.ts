import { addMonths } from 'date-fns';
import { DEFAULT_LOAN_REPAYMENT } from '../config';
import type { EnrichedSalesRecord } from '../model/records';
import type { CashFlowForecastRow, CashFlowPlanRow } from '../model/report';
import { toYearMonth, yearMonthToDate } from '../util/coerce';
import { monthlySalesSummary } from './periodAggregation';

export const DEFAULT_PLAN_HORIZON = 6;
export const DEFAULT_INVESTMENT_OUTFLOW = 250_000;
// 手数料控除後粗利のうち営業CFとして残る割合の目安
export const OPERATING_CF_RATIO = 0.75;

export interface DefaultPlanOptions {
  horizonMonths?: number;
  loanRepayment?: number;
  /** 売上データが空のときの起点月 */
  referenceDate?: Date;
}

/** 簡易キャッシュフロー予測の初期値を生成する。 */
export const createDefaultCashflowPlan = (
  rows: EnrichedSalesRecord[],
  {
    horizonMonths = DEFAULT_PLAN_HORIZON,
    loanRepayment = DEFAULT_LOAN_REPAYMENT,
    referenceDate = new Date(),
  }: DefaultPlanOptions = {}
): CashFlowPlanRow[] => {
  const summary = monthlySalesSummary(rows);
  const latest = summary[summary.length - 1];

  if (!latest) {
    return Array.from({ length: horizonMonths }, (_, offset) => ({
      month: toYearMonth(addMonths(referenceDate, offset)),
      operating_cf: 0,
      investment_cf: 0,
      financing_cf: 0,
      loan_repayment: loanRepayment,
    }));
  }

  const recent = summary.slice(-6);
  const recentGross =
    recent.reduce((acc, row) => acc + row.net_gross_profit, 0) / recent.length;
  const firstMonth = addMonths(yearMonthToDate(latest.period), 1);

  return Array.from({ length: horizonMonths }, (_, offset) => ({
    month: toYearMonth(addMonths(firstMonth, offset)),
    operating_cf: recentGross * OPERATING_CF_RATIO,
    investment_cf: DEFAULT_INVESTMENT_OUTFLOW,
    financing_cf: 0,
    loan_repayment: loanRepayment,
  }));
};

/**
 * キャッシュ残高推移を計算する。
 * 計画行は与えられた順に累積する（並べ替えない）。
 */
export const forecastCashflow = (
  planRows: CashFlowPlanRow[],
  openingCash: number
): CashFlowForecastRow[] => {
  let cash = openingCash;
  return planRows.map((row) => {
    const netCf =
      row.operating_cf + row.financing_cf - row.investment_cf - row.loan_repayment;
    cash += netCf;
    return { month: row.month, net_cf: netCf, cash_balance: cash };
  });
};
