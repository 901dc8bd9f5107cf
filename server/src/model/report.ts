import type { YearMonth } from './records';

/** M: 月次, W: 週次（月曜始まり）, Q: 四半期, Y: 年次 */
export type Granularity = 'M' | 'W' | 'Q' | 'Y';

export const GRANULARITIES: readonly Granularity[] = ['M', 'W', 'Q', 'Y'];

export type ValidationLevel = 'error' | 'warning';

export interface ValidationMessage<Row = unknown> {
  level: ValidationLevel;
  message: string;
  count?: number;
  sample?: Row[];
}

export interface PeriodSummaryRow {
  period: string;
  period_start: Date;
  period_end: Date;
  period_label: string;
  sales_amount: number;
  gross_profit: number;
  net_gross_profit: number;
  prev_period_sales: number | null;
  sales_mom: number | null;
  prev_year_sales: number | null;
  sales_yoy: number | null;
  prev_period_gross: number | null;
  gross_mom: number | null;
  prev_year_gross: number | null;
  gross_yoy: number | null;
}

export interface KpiOverrides {
  active_customers?: number;
  previous_active_customers?: number;
  new_customers?: number;
  repeat_customers?: number;
  cancelled_subscriptions?: number;
  marketing_cost?: number;
  ltv?: number;
  inventory_turnover_days?: number;
  stockout_rate?: number;
  training_sessions?: number;
  new_product_count?: number;
}

export type KpiOverrideKey = keyof KpiOverrides;

export const KPI_OVERRIDE_KEYS: readonly KpiOverrideKey[] = [
  'active_customers',
  'previous_active_customers',
  'new_customers',
  'repeat_customers',
  'cancelled_subscriptions',
  'marketing_cost',
  'ltv',
  'inventory_turnover_days',
  'stockout_rate',
  'training_sessions',
  'new_product_count',
];

export interface KpiSnapshot {
  month: YearMonth;
  sales: number;
  gross_profit: number;
  active_customers: number | null;
  previous_active_customers: number | null;
  new_customers: number | null;
  repeat_customers: number | null;
  cancelled_subscriptions: number | null;
  marketing_cost: number | null;
  ltv: number | null;
  inventory_turnover_days: number | null;
  stockout_rate: number | null;
  training_sessions: number | null;
  new_product_count: number | null;
  arpu: number | null;
  repeat_rate: number | null;
  churn_rate: number | null;
  roas: number | null;
  adv_ratio: number | null;
  gross_margin_rate: number | null;
  cac: number | null;
}

export interface KpiPeriodRow {
  period: string;
  period_start: Date;
  period_end: Date;
  period_label: string;
  sales: number | null;
  gross_profit: number | null;
  marketing_cost: number | null;
  active_customers_avg: number | null;
  new_customers: number | null;
  repeat_customers: number | null;
  cancelled_subscriptions: number | null;
  previous_active_customers: number | null;
  ltv: number | null;
  arpu: number | null;
  churn_rate: number | null;
  repeat_rate: number | null;
  gross_margin_rate: number | null;
  inventory_turnover_days: number | null;
  stockout_rate: number | null;
  training_sessions: number | null;
  new_product_count: number | null;
  ltv_prev: number | null;
  ltv_delta: number | null;
  arpu_prev: number | null;
  arpu_delta: number | null;
  churn_prev: number | null;
  churn_delta: number | null;
  gross_margin_prev: number | null;
  gross_margin_delta: number | null;
  repeat_prev: number | null;
  repeat_delta: number | null;
  inventory_turnover_prev: number | null;
  inventory_turnover_delta: number | null;
  stockout_prev: number | null;
  stockout_delta: number | null;
  training_prev: number | null;
  training_delta: number | null;
  new_product_prev: number | null;
  new_product_delta: number | null;
}

export interface ShareRow {
  key: string;
  sales_amount: number;
  share: number | null;
}

export interface BasePl {
  sales: number;
  cogs: number;
  gross_profit?: number;
  sga: number;
  operating_profit?: number;
}

export type PlItem =
  | 'revenue'
  | 'cogs'
  | 'gross_profit'
  | 'sga'
  | 'operating_profit';

export interface ScenarioRow {
  item: PlItem;
  label: string;
  baseline: number;
  scenario: number;
  delta: number;
}

export interface SimulationParams {
  salesGrowthRate: number;
  costRateAdjustment: number;
  sgaChangeRate: number;
  additionalAdCost: number;
}

export interface CashFlowPlanRow {
  month: YearMonth;
  operating_cf: number;
  investment_cf: number;
  financing_cf: number;
  loan_repayment: number;
}

export interface CashFlowForecastRow {
  month: YearMonth;
  net_cf: number;
  cash_balance: number;
}

export const ALERT_THRESHOLD_KEYS = [
  'revenue_drop_pct',
  'churn_rate',
  'gross_margin_rate',
  'cash_balance',
] as const;

export interface AlertThresholds {
  revenue_drop_pct: number;
  churn_rate: number;
  gross_margin_rate: number;
  cash_balance: number;
}
