import type { Hono } from 'hono';
import { logger } from '../logger';
import type {
  NotificationData,
  NotificationService,
  SendAlertsOptions,
} from '../service/notificationService';
import {
  errorMessage,
  isJsonObject,
  optionalString,
  optionalStringList,
  readJsonBody,
} from './requestParsers';

interface RegisterNotificationRoutesOptions {
  notificationService: NotificationService;
}

const DEFAULT_TITLE = 'KPIアラート';

const parseData = (value: unknown): NotificationData | null => {
  if (value === undefined || value === null) return null;
  if (!isJsonObject(value)) {
    throw new Error('data はオブジェクトで指定してください');
  }
  const data: NotificationData = {};
  for (const [key, item] of Object.entries(value)) {
    if (
      item !== null &&
      typeof item !== 'string' &&
      typeof item !== 'number' &&
      typeof item !== 'boolean'
    ) {
      throw new Error(`data.${key} は文字列・数値・真偽値で指定してください`);
    }
    data[key] = item;
  }
  return data;
};

const parseSendRequest = async (
  req: Request
): Promise<{ alerts: string[]; options: SendAlertsOptions }> => {
  const body = await readJsonBody(req);
  const alerts = optionalStringList(body, 'alerts');
  if (!alerts) {
    throw new Error('alerts は文字列の配列で指定してください');
  }
  return {
    alerts,
    options: {
      title: optionalString(body, 'title') ?? DEFAULT_TITLE,
      data: parseData(body.data),
      tokens: optionalStringList(body, 'tokens') ?? null,
    },
  };
};

export const registerNotificationRoutes = (
  app: Hono,
  options: RegisterNotificationRoutesOptions
) => {
  app.post('/api/v1/notifications/alerts', async (c) => {
    let request: { alerts: string[]; options: SendAlertsOptions };
    try {
      request = await parseSendRequest(c.req.raw);
    } catch (error) {
      return c.json(
        { error: errorMessage(error, 'リクエストの解析に失敗しました') },
        400
      );
    }

    const sent = await options.notificationService.sendAlerts(
      request.alerts,
      request.options
    );
    logger.log('POST /api/v1/notifications/alerts', {
      alerts: request.alerts.length,
      sent,
      configured: options.notificationService.isConfigured,
    });
    return c.json({
      sent,
      configured: options.notificationService.isConfigured,
    });
  });
};
