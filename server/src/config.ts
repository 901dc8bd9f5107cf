import type { AlertThresholds } from './model/report';

export interface NotificationSettings {
  serverKey: string | null;
  deviceTokens: string[];
  topic: string | null;
  dryRun: boolean;
}

export interface AppConfig {
  port: number;
  fixedCost: number;
  loanRepayment: number;
  alertThresholds: AlertThresholds;
  notification: NotificationSettings;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_FIXED_COST = 2_500_000; // 人件費・管理費などの固定費（目安）
export const DEFAULT_LOAN_REPAYMENT = 600_000; // 月次の借入返済額の仮値

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  revenue_drop_pct: 0.3,
  churn_rate: 0.05,
  gross_margin_rate: 0.6,
  cash_balance: 0,
};

const readNumber = (raw: string | undefined, fallback: number): number => {
  if (raw == null || raw.trim() === '') return fallback;
  const parsed = Number(raw.trim());
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readFlag = (raw: string | undefined): boolean =>
  ['1', 'true', 'yes'].includes((raw ?? '').trim().toLowerCase());

const readList = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean);

/** 環境変数から設定を読む。.env の読み込みはエントリポイント側で行う。 */
export const loadAppConfig = (env: Env = process.env): AppConfig => ({
  port: readNumber(env.PORT, 3001),
  fixedCost: readNumber(env.DEFAULT_FIXED_COST, DEFAULT_FIXED_COST),
  loanRepayment: readNumber(env.DEFAULT_LOAN_REPAYMENT, DEFAULT_LOAN_REPAYMENT),
  alertThresholds: {
    revenue_drop_pct: readNumber(
      env.ALERT_REVENUE_DROP_PCT,
      DEFAULT_ALERT_THRESHOLDS.revenue_drop_pct
    ),
    churn_rate: readNumber(
      env.ALERT_CHURN_RATE,
      DEFAULT_ALERT_THRESHOLDS.churn_rate
    ),
    gross_margin_rate: readNumber(
      env.ALERT_GROSS_MARGIN_RATE,
      DEFAULT_ALERT_THRESHOLDS.gross_margin_rate
    ),
    cash_balance: readNumber(
      env.ALERT_CASH_BALANCE,
      DEFAULT_ALERT_THRESHOLDS.cash_balance
    ),
  },
  notification: {
    serverKey: env.FCM_SERVER_KEY?.trim() || null,
    deviceTokens: readList(env.FCM_DEVICE_TOKENS),
    topic: env.FCM_TOPIC?.trim() || null,
    dryRun: readFlag(env.FCM_DRY_RUN),
  },
});
