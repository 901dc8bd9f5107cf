import { endOfDay, startOfDay } from 'date-fns';
import { DEFAULT_ALERT_THRESHOLDS, DEFAULT_FIXED_COST, DEFAULT_LOAN_REPAYMENT } from '../config';
import { logger } from '../logger';
import type {
  CostRecord,
  EnrichedSalesRecord,
  RawRow,
  SalesRecord,
  SubscriptionKpiRecord,
  YearMonth,
} from '../model/records';
import type {
  AlertThresholds,
  CashFlowForecastRow,
  CashFlowPlanRow,
  Granularity,
  KpiOverrides,
  KpiPeriodRow,
  KpiSnapshot,
  PeriodSummaryRow,
  ScenarioRow,
  ShareRow,
  SimulationParams,
} from '../model/report';
import { buildAlerts } from './alertRules';
import { createDefaultCashflowPlan, forecastCashflow } from './cashflowForecast';
import {
  normalizeCostTable,
  normalizeSalesTable,
  normalizeSubscriptionTable,
} from './ingestion/tableReader';
import { aggregateKpiHistory, buildKpiHistory, calculateKpis } from './kpiCalculator';
import { monthlySalesSummary, summarizeSalesByPeriod } from './periodAggregation';
import { createCurrentPl, simulatePl, type CurrentPl } from './plSimulation';
import {
  computeCategoryShare,
  computeChannelShare,
  mergeSalesAndCosts,
} from './salesCostMerger';
import {
  ValidationReport,
  detectDuplicateRows,
  validateChannelFees,
} from './validationReport';

export const DEFAULT_OPENING_CASH = 3_000_000;

export interface SalesTable {
  /** ファイル名など、レポート上の出所表示 */
  source?: string;
  rows: RawRow[];
}

/**
 * 呼び出し側が保持するセッションの内容。
 * コアは状態を持たず、毎回このスナップショットから計算し直す。
 */
export interface ReportSession {
  salesTables?: Record<string, SalesTable[] | undefined>;
  costRows?: RawRow[] | null;
  subscriptionRows?: RawRow[] | null;
  /** API取得済み（正規化済み）の売上。キーはチャネル */
  automatedSales?: Record<string, SalesRecord[] | undefined>;
  automatedReports?: ValidationReport[];
}

export interface LoadedReportData {
  sales: SalesRecord[];
  cost: CostRecord[];
  subscription: SubscriptionKpiRecord[];
  validation: ValidationReport;
}

export interface SalesFilters {
  channels?: string[] | null;
  categories?: string[] | null;
  startDate?: Date | null;
  endDate?: Date | null;
}

export interface DashboardOptions {
  filters?: SalesFilters;
  granularity?: Granularity;
  kpiMonth?: YearMonth | null;
  overrides?: KpiOverrides;
  fixedCost?: number;
  loanRepayment?: number;
  openingCash?: number;
  /** 省略時は直近実績から既定プランを作る */
  cashflowPlan?: CashFlowPlanRow[] | null;
  simulation?: Partial<SimulationParams>;
  thresholds?: Partial<AlertThresholds>;
  referenceDate?: Date;
}

export interface DashboardReport {
  validation: ValidationReport;
  sales: EnrichedSalesRecord[];
  periodSummary: PeriodSummaryRow[];
  monthlySummary: PeriodSummaryRow[];
  channelShare: ShareRow[];
  categoryShare: ShareRow[];
  kpis: KpiSnapshot | null;
  kpiHistory: KpiSnapshot[];
  kpiByPeriod: KpiPeriodRow[];
  basePl: CurrentPl;
  simulation: ScenarioRow[];
  cashflowPlan: CashFlowPlanRow[];
  cashflowForecast: CashFlowForecastRow[];
  alerts: string[];
}

// 未指定（undefined を含む）のつまみは「変化なし」として扱う
const resolveSimulationParams = (
  simulation: Partial<SimulationParams>
): SimulationParams => ({
  salesGrowthRate: simulation.salesGrowthRate ?? 0,
  costRateAdjustment: simulation.costRateAdjustment ?? 0,
  sgaChangeRate: simulation.sgaChangeRate ?? 0,
  additionalAdCost: simulation.additionalAdCost ?? 0,
});

/** セッションの全テーブルを正規化・統合し、検証結果をひとつのレポートにまとめる。 */
export const loadReportData = (session: ReportSession): LoadedReportData => {
  const validation = new ValidationReport();
  const sales: SalesRecord[] = [];

  for (const [channel, tables] of Object.entries(session.salesTables ?? {})) {
    for (const table of tables ?? []) {
      const loaded = normalizeSalesTable(
        table.rows,
        table.source ?? channel,
        channel
      );
      validation.extend(loaded.report);
      sales.push(...loaded.rows);
    }
  }

  const cost = session.costRows
    ? normalizeCostTable(session.costRows, '原価率表')
    : null;
  if (cost) validation.extend(cost.report);

  const subscription = session.subscriptionRows
    ? normalizeSubscriptionTable(session.subscriptionRows, 'サブスク/KPIデータ')
    : null;
  if (subscription) validation.extend(subscription.report);

  for (const rows of Object.values(session.automatedSales ?? {})) {
    if (rows?.length) sales.push(...rows);
  }
  for (const report of session.automatedReports ?? []) {
    validation.extend(report);
  }

  sales.sort((a, b) => a.order_date.getTime() - b.order_date.getTime());

  const duplicates = detectDuplicateRows(sales);
  if (duplicates.length && validation.addDuplicates(duplicates) > 0) {
    validation.addMessage(
      'warning',
      `全チャネルの売上データで重複しているレコードが${duplicates.length}件検出されました。`,
      { count: duplicates.length }
    );
  }

  return {
    sales,
    cost: cost?.rows ?? [],
    subscription: subscription?.rows ?? [],
    validation,
  };
};

/** チャネル・カテゴリ・期間で売上を絞り込む。終了日はその日の終わりまで含む。 */
export const applyFilters = <T extends SalesRecord>(
  rows: T[],
  { channels, categories, startDate, endDate }: SalesFilters = {}
): T[] => {
  const start = startDate ? startOfDay(startDate).getTime() : null;
  const end = endDate ? endOfDay(endDate).getTime() : null;
  const channelSet = channels?.length ? new Set(channels) : null;
  const categorySet = categories?.length ? new Set(categories) : null;

  return rows.filter((row) => {
    if (channelSet && !channelSet.has(row.channel)) return false;
    if (categorySet && !categorySet.has(row.category)) return false;
    const time = row.order_date.getTime();
    if (start !== null && time < start) return false;
    if (end !== null && time > end) return false;
    return true;
  });
};

/** ダッシュボード1画面分の集計をまとめて計算する。 */
export const buildDashboardReport = (
  session: ReportSession,
  options: DashboardOptions = {}
): DashboardReport => {
  const {
    filters,
    granularity = 'M',
    kpiMonth = null,
    overrides = {},
    fixedCost = DEFAULT_FIXED_COST,
    loanRepayment = DEFAULT_LOAN_REPAYMENT,
    openingCash = DEFAULT_OPENING_CASH,
    cashflowPlan,
    simulation = {},
    thresholds = DEFAULT_ALERT_THRESHOLDS,
    referenceDate,
  } = options;

  const data = loadReportData(session);
  const validation = new ValidationReport();
  validation.extend(data.validation);
  // 手数料チェックは絞り込み前の全明細に対して行う
  validation.extend(
    validateChannelFees(mergeSalesAndCosts(data.sales, data.cost))
  );

  const merged = mergeSalesAndCosts(applyFilters(data.sales, filters), data.cost);
  const monthlySummary = monthlySalesSummary(merged);
  const kpis = calculateKpis(merged, data.subscription, kpiMonth, overrides);
  const kpiHistory = buildKpiHistory(merged, data.subscription, overrides);
  const basePl = createCurrentPl(merged, data.subscription, fixedCost);
  const plan =
    cashflowPlan ??
    createDefaultCashflowPlan(merged, { loanRepayment, referenceDate });
  const cashflowForecast = forecastCashflow(plan, openingCash);

  logger.debug('[report] ダッシュボードを計算しました', {
    rows: merged.length,
    granularity,
    messages: validation.messages.length,
  });

  return {
    validation,
    sales: merged,
    periodSummary: summarizeSalesByPeriod(merged, granularity),
    monthlySummary,
    channelShare: computeChannelShare(merged),
    categoryShare: computeCategoryShare(merged),
    kpis,
    kpiHistory,
    kpiByPeriod: aggregateKpiHistory(kpiHistory, granularity),
    basePl,
    simulation: simulatePl(basePl, resolveSimulationParams(simulation)),
    cashflowPlan: plan,
    cashflowForecast,
    alerts: buildAlerts(monthlySummary, kpis, cashflowForecast, thresholds),
  };
};
