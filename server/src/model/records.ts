// 正規化後のレコード定義。
// 入力表の列名は columnAliases.json で正規化列へ寄せた上でこの形になる。

/** "YYYY-MM" 形式の年月 */
export type YearMonth = string;

/** アップロード/API取得した生の表の1行（列名は任意） */
export type RawRow = Record<string, unknown>;

export interface SalesRecord {
  order_date: Date;
  channel: string;
  product_code: string;
  product_name: string;
  category: string;
  quantity: number;
  sales_amount: number;
  customer_id: string;
  unit_price: number;
  order_month: YearMonth;
}

export interface CostRecord {
  product_code: string;
  product_name: string;
  category: string;
  price: number | null;
  cost: number | null;
  cost_rate: number | null;
  gross_margin_rate: number;
}

export interface SubscriptionKpiRecord {
  month: YearMonth | null;
  active_customers: number | null;
  previous_active_customers: number | null;
  new_customers: number | null;
  repeat_customers: number | null;
  cancelled_subscriptions: number | null;
  marketing_cost: number | null;
  ltv: number | null;
  total_sales: number | null;
  inventory_turnover_days: number | null;
  stockout_rate: number | null;
  training_sessions: number | null;
  new_product_count: number | null;
}

export interface EnrichedSalesRecord extends SalesRecord {
  price: number | null;
  cost: number | null;
  cost_rate: number;
  gross_margin_rate: number;
  estimated_cost: number;
  gross_profit: number;
  channel_fee: number;
  channel_fee_amount: number;
  net_gross_profit: number;
}

export const SALES_FIELDS = [
  'order_date',
  'channel',
  'product_code',
  'product_name',
  'category',
  'quantity',
  'sales_amount',
  'customer_id',
] as const;

export const COST_FIELDS = [
  'product_code',
  'product_name',
  'category',
  'price',
  'cost',
  'cost_rate',
] as const;

export const SUBSCRIPTION_FIELDS = [
  'month',
  'active_customers',
  'new_customers',
  'repeat_customers',
  'cancelled_subscriptions',
  'previous_active_customers',
  'marketing_cost',
  'ltv',
  'total_sales',
  'inventory_turnover_days',
  'stockout_rate',
  'training_sessions',
  'new_product_count',
] as const;

export type SalesField = (typeof SALES_FIELDS)[number];
export type CostField = (typeof COST_FIELDS)[number];
export type SubscriptionField = (typeof SUBSCRIPTION_FIELDS)[number];

export interface SkippedRow {
  index: number;
  reason: string;
  raw: RawRow;
}

/**
 * 正規化結果。行を黙って落とさず、落とした理由と
 * 入力に存在しなかった正規列も併せて返す。
 */
export interface NormalizeResult<T, F extends string> {
  rows: T[];
  skipped: SkippedRow[];
  presentColumns: F[];
  missingColumns: F[];
}
