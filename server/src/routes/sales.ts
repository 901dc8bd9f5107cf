import type { Hono } from 'hono';
import { logger } from '../logger';
import { fetchSalesFromEndpoint } from '../service/ingestion/salesEndpointFetcher';
import {
  errorMessage,
  isJsonObject,
  optionalNumber,
  optionalString,
  readJsonBody,
} from './requestParsers';

interface RegisterSalesRoutesOptions {
  fetchSales?: typeof fetchSalesFromEndpoint;
}

type QueryParams = Record<string, string | number | boolean | null>;

interface SalesFetchRequest {
  endpoint: string;
  token?: string;
  channel?: string;
  params: QueryParams;
  timeoutMs?: number;
}

const parseParams = (value: unknown): QueryParams => {
  if (value === undefined || value === null) return {};
  if (!isJsonObject(value)) {
    throw new Error('params はオブジェクトで指定してください');
  }
  const params: QueryParams = {};
  for (const [key, item] of Object.entries(value)) {
    if (
      item !== null &&
      typeof item !== 'string' &&
      typeof item !== 'number' &&
      typeof item !== 'boolean'
    ) {
      throw new Error(`params.${key} は文字列・数値・真偽値で指定してください`);
    }
    params[key] = item;
  }
  return params;
};

const parseFetchRequest = async (req: Request): Promise<SalesFetchRequest> => {
  const body = await readJsonBody(req);
  const endpoint = optionalString(body, 'endpoint');
  if (!endpoint) {
    throw new Error('endpoint は必須です');
  }
  return {
    endpoint,
    token: optionalString(body, 'token'),
    channel: optionalString(body, 'channel'),
    params: parseParams(body.params),
    timeoutMs: optionalNumber(body, 'timeoutMs'),
  };
};

export const registerSalesRoutes = (
  app: Hono,
  options: RegisterSalesRoutesOptions = {}
) => {
  const fetchSales = options.fetchSales ?? fetchSalesFromEndpoint;

  // 外部APIから売上明細を取得する。取得失敗は validation の error として返す。
  app.post('/api/v1/sales/fetch', async (c) => {
    let request: SalesFetchRequest;
    try {
      request = await parseFetchRequest(c.req.raw);
    } catch (error) {
      return c.json(
        { error: errorMessage(error, 'リクエストの解析に失敗しました') },
        400
      );
    }

    const { rows, report } = await fetchSales(request.endpoint, {
      token: request.token,
      params: request.params,
      channelHint: request.channel,
      timeoutMs: request.timeoutMs,
    });
    logger.log('POST /api/v1/sales/fetch', {
      channel: request.channel ?? null,
      rows: rows.length,
      errors: report.hasErrors(),
    });
    return c.json({
      fetchedAt: new Date().toISOString(),
      rows,
      validation: report,
    });
  });
};
