import { DEFAULT_ALERT_THRESHOLDS } from '../config';
import type {
  AlertThresholds,
  CashFlowForecastRow,
  KpiSnapshot,
  PeriodSummaryRow,
} from '../model/report';

const formatPercent = (value: number) => `${(value * 100).toFixed(1)}%`;

/**
 * しきい値に抵触した項目ごとにアラート文言を返す。
 * 判定順: 売上急減 → 解約率 → 粗利率 → 資金残高。データが無い項目は判定しない。
 */
export const buildAlerts = (
  periodSummary: PeriodSummaryRow[] | null | undefined,
  kpis: KpiSnapshot | null | undefined,
  cashForecast: CashFlowForecastRow[] | null | undefined,
  thresholds: Partial<AlertThresholds> = {}
): string[] => {
  const limits: AlertThresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...thresholds };
  const alerts: string[] = [];

  if (periodSummary && periodSummary.length >= 2) {
    const latest = periodSummary[periodSummary.length - 1];
    const prev = periodSummary[periodSummary.length - 2];
    if (
      prev.sales_amount &&
      latest.sales_amount < prev.sales_amount * (1 - limits.revenue_drop_pct)
    ) {
      const dropPct =
        (prev.sales_amount - latest.sales_amount) / prev.sales_amount;
      alerts.push(
        `売上が前月比で${formatPercent(dropPct)}減少しています。原因分析を行ってください。`
      );
    }
  }

  const churnRate = kpis?.churn_rate ?? null;
  if (churnRate != null && churnRate > limits.churn_rate) {
    alerts.push(
      `解約率が${formatPercent(churnRate)}と高水準です。定期顧客のフォローを見直してください。`
    );
  }

  const grossMarginRate = kpis?.gross_margin_rate ?? null;
  if (grossMarginRate != null && grossMarginRate < limits.gross_margin_rate) {
    alerts.push(
      `粗利率が${formatPercent(grossMarginRate)}と目標を下回っています。商品ミックスを確認しましょう。`
    );
  }

  if (cashForecast && cashForecast.length) {
    const minBalance = Math.min(...cashForecast.map((row) => row.cash_balance));
    if (minBalance < limits.cash_balance) {
      alerts.push(
        '将来の資金残高がマイナスに落ち込む見込みです。資金繰り対策を検討してください。'
      );
    }
  }

  return alerts;
};
