import { createHash } from 'node:crypto';
import type { NotificationSettings } from '../config';
import { logger } from '../logger';
import { defaultFetch, describeError, type FetchLike } from './httpClient';

export const FCM_SEND_URL = 'https://fcm.googleapis.com/fcm/send';
const SEND_TIMEOUT_MS = 10_000;

export type NotificationData = Record<string, string | number | boolean | null>;

export interface SendAlertsOptions {
  title: string;
  data?: NotificationData | null;
  /** 省略時は設定済みの端末トークンへ送る */
  tokens?: string[] | null;
}

export interface FcmPayload {
  notification: { title: string; body: string };
  data: Record<string, string>;
  to?: string;
  registration_ids?: string[];
  dry_run?: boolean;
}

export interface NotificationService {
  readonly isConfigured: boolean;
  computeDigest(payload: unknown): string;
  sendAlerts(alerts: string[], options: SendAlertsOptions): Promise<boolean>;
}

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => [key, sortKeys(item)])
    );
  }
  return value;
};

/** キーを整列したJSONのSHA-256。同一内容の再送判定に使う。 */
export const computeDigest = (payload: unknown): string =>
  createHash('sha256')
    .update(JSON.stringify(sortKeys(payload)), 'utf8')
    .digest('hex');

/**
 * KPIアラートをFirebase Cloud Messaging（レガシーHTTP API）で送る。
 * 直前に送信成功した内容と同じペイロードは送らない。
 */
export const createNotificationService = (
  settings: NotificationSettings,
  deps: { fetchImpl?: FetchLike } = {}
): NotificationService => {
  const fetchImpl = deps.fetchImpl ?? defaultFetch;
  const isConfigured = Boolean(
    settings.serverKey && (settings.deviceTokens.length || settings.topic)
  );
  let lastDigest: string | null = null;

  const buildPayload = (
    title: string,
    body: string,
    data: NotificationData | null | undefined,
    tokens: string[]
  ): FcmPayload => {
    const payload: FcmPayload = {
      notification: { title, body },
      data: Object.fromEntries(
        Object.entries(data ?? {}).map(([key, value]) => [key, String(value)])
      ),
    };
    if (tokens.length === 1) {
      payload.to = tokens[0];
    } else if (tokens.length > 1) {
      payload.registration_ids = [...tokens];
    } else if (settings.topic) {
      payload.to = `/topics/${settings.topic}`;
    }
    if (settings.dryRun) payload.dry_run = true;
    return payload;
  };

  const sendAlerts = async (
    alerts: string[],
    { title, data = null, tokens }: SendAlertsOptions
  ): Promise<boolean> => {
    if (!alerts.length) return false;
    if (!isConfigured || !settings.serverKey) {
      logger.debug('[notification] 通知設定が無いため送信をスキップします');
      return false;
    }

    const targetTokens = tokens?.length ? [...tokens] : settings.deviceTokens;
    const digest = computeDigest({
      alerts,
      title,
      data,
      tokens: targetTokens,
    });
    if (digest === lastDigest) {
      logger.debug('[notification] 同一内容の通知のため再送しません');
      return false;
    }

    const payload = buildPayload(title, alerts.join('\n'), data, targetTokens);
    try {
      const response = await fetchImpl(FCM_SEND_URL, {
        method: 'POST',
        headers: {
          Authorization: `key=${settings.serverKey}`,
          'Content-Type': 'application/json; charset=UTF-8',
        },
        body: JSON.stringify(payload),
        timeout: SEND_TIMEOUT_MS,
      });
      if (!response.ok) {
        logger.error(
          `[notification] FCMへの送信に失敗しました (HTTP ${response.status} ${response.statusText})`
        );
        return false;
      }
      lastDigest = digest;
      logger.log(`[notification] ${alerts.length}件のアラートを送信しました`);
      return true;
    } catch (error) {
      logger.error(
        `[notification] FCMへの送信に失敗しました: ${describeError(error)}`,
        error
      );
      return false;
    }
  };

  return {
    isConfigured,
    computeDigest,
    sendAlerts,
  };
};
