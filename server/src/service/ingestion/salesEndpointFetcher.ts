import { logger } from '../../logger';
import type { RawRow, SalesRecord } from '../../model/records';
import { defaultFetch, describeError, type FetchLike } from '../httpClient';
import { ValidationReport, detectDuplicateRows } from '../validationReport';
import { normalizeSalesTable } from './tableReader';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

// レスポンスがオブジェクトの場合に明細配列を探すキー（先頭優先）
const PAYLOAD_KEYS = ['data', 'records', 'items', 'orders'] as const;

export interface FetchSalesOptions {
  token?: string | null;
  params?: Record<string, string | number | boolean | null | undefined>;
  channelHint?: string | null;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

const isRawRow = (value: unknown): value is RawRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const buildUrl = (
  endpoint: string,
  params: FetchSalesOptions['params'] = {}
): string => {
  const url = new URL(endpoint);
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
};

/** レスポンスJSONから明細行を取り出す。形式が不明なら null。 */
export const extractSalesRows = (payload: unknown): RawRow[] | null => {
  if (Array.isArray(payload)) return payload.filter(isRawRow);
  if (!isRawRow(payload)) return null;
  for (const key of PAYLOAD_KEYS) {
    const candidate = payload[key];
    if (Array.isArray(candidate)) return candidate.filter(isRawRow);
  }
  return null;
};

/**
 * 外部APIから売上明細を取得して正規化する。
 * 通信・解析の失敗は例外にせず report の error として返す。
 */
export const fetchSalesFromEndpoint = async (
  endpoint: string,
  {
    token,
    params,
    channelHint,
    fetchImpl = defaultFetch,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
  }: FetchSalesOptions = {}
): Promise<{ rows: SalesRecord[]; report: ValidationReport }> => {
  const report = new ValidationReport();
  const source = channelHint ? `${channelHint} API` : 'API';

  let url: string;
  try {
    url = buildUrl(endpoint, params);
  } catch (error) {
    report.addMessage(
      'error',
      `${source}: エンドポイントのURLが不正です (${describeError(error)})`
    );
    return { rows: [], report };
  }

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (token) headers.Authorization = `Bearer ${token}`;

  let payload: unknown;
  try {
    logger.log(`[ingestion] GET ${url}`);
    const response = await fetchImpl(url, {
      method: 'GET',
      headers,
      timeout: timeoutMs,
    });
    if (!response.ok) {
      report.addMessage(
        'error',
        `${source}: データ取得に失敗しました (HTTP ${response.status})`
      );
      return { rows: [], report };
    }
    payload = await response.json();
  } catch (error) {
    logger.error(`[ingestion] ${source} の取得でエラーが発生しました`, error);
    report.addMessage(
      'error',
      `${source}: データ取得に失敗しました (${describeError(error)})`
    );
    return { rows: [], report };
  }

  const rawRows = extractSalesRows(payload);
  if (rawRows === null) {
    report.addMessage(
      'error',
      `${source}: レスポンスの形式を解釈できません（配列、または data/records/items/orders を含むオブジェクトが必要です）`
    );
    return { rows: [], report };
  }
  if (!rawRows.length) {
    report.addMessage('warning', `${source}: 取得したデータが0件でした。`);
    return { rows: [], report };
  }

  const normalized = normalizeSalesTable(rawRows, source, channelHint);
  report.extend(normalized.report);

  const duplicates = detectDuplicateRows(normalized.rows);
  if (duplicates.length) {
    report.addDuplicates(duplicates);
    report.addMessage(
      'warning',
      `${source}: 取得データ内で重複しているレコードが${duplicates.length}件あります。`,
      { count: duplicates.length, sample: duplicates }
    );
  }

  logger.log(`[ingestion] ${source} から${normalized.rows.length}件取得しました`);
  return { rows: normalized.rows, report };
};
