import type {
  EnrichedSalesRecord,
  SubscriptionKpiRecord,
} from '../model/records';
import type {
  BasePl,
  PlItem,
  ScenarioRow,
  SimulationParams,
} from '../model/report';
import { monthlySalesSummary } from './periodAggregation';

const PL_LABELS: Record<PlItem, string> = {
  revenue: '売上高',
  cogs: '売上原価',
  gross_profit: '粗利',
  sga: '販管費',
  operating_profit: '営業利益',
};

export interface CurrentPl {
  month: string | null;
  sales: number;
  cogs: number;
  gross_profit: number;
  sga: number;
  operating_profit: number;
}

/**
 * 直近月の実績から現状のPLを作る。
 * 粗利は手数料控除後粗利、販管費は固定費＋当月広告費（不明なら0）。
 */
export const createCurrentPl = (
  rows: EnrichedSalesRecord[],
  subscriptionRows: SubscriptionKpiRecord[] | null | undefined,
  fixedCost: number
): CurrentPl => {
  const summary = monthlySalesSummary(rows);
  const latest = summary[summary.length - 1];
  if (!latest) {
    return {
      month: null,
      sales: 0,
      cogs: 0,
      gross_profit: 0,
      sga: fixedCost,
      operating_profit: -fixedCost,
    };
  }

  const marketingCost =
    subscriptionRows?.find((row) => row.month === latest.period)
      ?.marketing_cost ?? 0;
  const sga = fixedCost + marketingCost;
  const grossProfit = latest.net_gross_profit;

  return {
    month: latest.period,
    sales: latest.sales_amount,
    cogs: latest.sales_amount - grossProfit,
    gross_profit: grossProfit,
    sga,
    operating_profit: grossProfit - sga,
  };
};

/** PLシミュレーションを行い、現状・シナリオ・増減を項目ごとに返す。 */
export const simulatePl = (
  basePl: BasePl,
  {
    salesGrowthRate,
    costRateAdjustment,
    sgaChangeRate,
    additionalAdCost,
  }: SimulationParams
): ScenarioRow[] => {
  const currentSales = basePl.sales;
  const currentCogs = basePl.cogs;
  const currentSga = basePl.sga;
  const currentGross = basePl.gross_profit ?? currentSales - currentCogs;

  const baseCostRatio = currentSales ? currentCogs / currentSales : 0;
  const newSales = currentSales * (1 + salesGrowthRate);
  // 原価率は下限0でクリップ、上限は設けない
  const newCostRatio = Math.max(0, baseCostRatio + costRateAdjustment);
  const newCogs = newSales * newCostRatio;
  const newGross = newSales - newCogs;
  const newSga = currentSga * (1 + sgaChangeRate) + additionalAdCost;
  const newOperatingProfit = newGross - newSga;

  const values: Array<[PlItem, number, number]> = [
    ['revenue', currentSales, newSales],
    ['cogs', currentCogs, newCogs],
    ['gross_profit', currentGross, newGross],
    ['sga', currentSga, newSga],
    ['operating_profit', currentGross - currentSga, newOperatingProfit],
  ];

  return values.map(([item, baseline, scenario]) => ({
    item,
    label: PL_LABELS[item],
    baseline,
    scenario,
    delta: scenario - baseline,
  }));
};
