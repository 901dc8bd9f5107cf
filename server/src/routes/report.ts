import type { Hono } from 'hono';
import type { AppConfig } from '../config';
import { logger } from '../logger';
import type { SalesRecord } from '../model/records';
import {
  ALERT_THRESHOLD_KEYS,
  KPI_OVERRIDE_KEYS,
  type BasePl,
  type CashFlowPlanRow,
  type SimulationParams,
  type ValidationLevel,
} from '../model/report';
import { forecastCashflow } from '../service/cashflowForecast';
import { normalizeSalesTable } from '../service/ingestion/tableReader';
import { simulatePl } from '../service/plSimulation';
import {
  DEFAULT_OPENING_CASH,
  buildDashboardReport,
  type DashboardOptions,
  type DashboardReport,
  type ReportSession,
  type SalesTable,
} from '../service/reportPipeline';
import { normalizeSales } from '../service/schemaNormalizer';
import { ValidationReport } from '../service/validationReport';
import { parseYearMonth } from '../util/coerce';
import {
  errorMessage,
  isJsonObject,
  optionalDate,
  optionalNumber,
  optionalObject,
  optionalString,
  optionalStringList,
  parseCashflowPlan,
  parseGranularity,
  parseNumberRecord,
  readJsonBody,
  readRows,
  requiredNumber,
  type JsonObject,
} from './requestParsers';

interface RegisterReportRoutesOptions {
  config: AppConfig;
  buildReport?: (
    session: ReportSession,
    options: DashboardOptions
  ) => DashboardReport;
}

interface ReportRequest {
  session: ReportSession;
  options: DashboardOptions;
}

const SIMULATION_KEYS = [
  'salesGrowthRate',
  'costRateAdjustment',
  'sgaChangeRate',
  'additionalAdCost',
] as const satisfies readonly (keyof SimulationParams)[];

const isTableEntry = (item: unknown): item is JsonObject & { rows: unknown[] } =>
  isJsonObject(item) && Array.isArray(item.rows);

const parseSalesTables = (value: unknown): ReportSession['salesTables'] => {
  if (value === undefined || value === null) return {};
  if (!isJsonObject(value)) {
    throw new Error('salesTables はチャネル名をキーにしたオブジェクトで指定してください');
  }
  const tables: Record<string, SalesTable[]> = {};
  for (const [channel, entry] of Object.entries(value)) {
    const label = `salesTables.${channel}`;
    // 行配列をそのまま渡す形と、{ source, rows } の配列の両方を受け付ける
    if (Array.isArray(entry) && entry.length > 0 && entry.every(isTableEntry)) {
      tables[channel] = entry.map((item, index) => ({
        source: optionalString(item, 'source'),
        rows: readRows(item.rows, `${label}[${index}].rows`),
      }));
    } else {
      tables[channel] = [{ rows: readRows(entry, label) }];
    }
  }
  return tables;
};

const VALIDATION_LEVELS: readonly ValidationLevel[] = ['error', 'warning'];

const parseLevel = (value: unknown): ValidationLevel | undefined =>
  VALIDATION_LEVELS.find((level) => level === value);

/**
 * /api/v1/sales/fetch の rows をチャネルごとに受け取る。
 * JSON経由で注文日が文字列になっているため、正規化し直して Date に戻す。
 */
const parseAutomatedSales = (
  value: unknown
): { sales: Record<string, SalesRecord[]>; reports: ValidationReport[] } => {
  const sales: Record<string, SalesRecord[]> = {};
  const reports: ValidationReport[] = [];
  if (value === undefined || value === null) return { sales, reports };
  if (!isJsonObject(value)) {
    throw new Error(
      'automatedSales はチャネル名をキーにしたオブジェクトで指定してください'
    );
  }
  for (const [channel, entry] of Object.entries(value)) {
    const loaded = normalizeSalesTable(
      readRows(entry, `automatedSales.${channel}`),
      `${channel} API`,
      channel
    );
    sales[channel] = loaded.rows;
    reports.push(loaded.report);
  }
  return { sales, reports };
};

/** /api/v1/sales/fetch が返した validation（messages, duplicate_rows）を復元する。 */
const parseAutomatedReports = (value: unknown): ValidationReport[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new Error('automatedReports は配列で指定してください');
  }
  return value.map((item, index) => {
    const label = `automatedReports[${index}]`;
    if (!isJsonObject(item)) {
      throw new Error(`${label} はオブジェクトで指定してください`);
    }
    const report = new ValidationReport();
    const messages = item.messages ?? [];
    if (!Array.isArray(messages)) {
      throw new Error(`${label}.messages は配列で指定してください`);
    }
    messages.forEach((entry, position) => {
      const messageLabel = `${label}.messages[${position}]`;
      const level = isJsonObject(entry) ? parseLevel(entry.level) : undefined;
      if (!isJsonObject(entry) || !level || typeof entry.message !== 'string') {
        throw new Error(
          `${messageLabel} は level（error/warning）と message を持つオブジェクトで指定してください`
        );
      }
      const sample = entry.sample;
      if (sample !== undefined && sample !== null && !Array.isArray(sample)) {
        throw new Error(`${messageLabel}.sample は配列で指定してください`);
      }
      report.addMessage(level, entry.message, {
        count: optionalNumber(entry, 'count', `${messageLabel}.count`),
        sample: sample ?? undefined,
      });
    });
    if (item.duplicate_rows !== undefined && item.duplicate_rows !== null) {
      const rows = readRows(item.duplicate_rows, `${label}.duplicate_rows`);
      report.addDuplicates(normalizeSales(rows).rows);
    }
    return report;
  });
};

const parseOptionalRows = (body: JsonObject, key: string) =>
  body[key] === undefined || body[key] === null
    ? null
    : readRows(body[key], key);

const parseReportRequest = async (
  req: Request,
  config: AppConfig
): Promise<ReportRequest> => {
  const body = await readJsonBody(req);
  const options = optionalObject(body, 'options') ?? {};
  const filters = optionalObject(options, 'filters') ?? {};

  const kpiMonthRaw = options.kpiMonth;
  const kpiMonth =
    kpiMonthRaw === undefined || kpiMonthRaw === null
      ? null
      : parseYearMonth(kpiMonthRaw);
  if (kpiMonthRaw != null && !kpiMonth) {
    throw new Error('kpiMonth は年月（YYYY-MM）で指定してください');
  }

  const automated = parseAutomatedSales(body.automatedSales);

  return {
    session: {
      salesTables: parseSalesTables(body.salesTables),
      costRows: parseOptionalRows(body, 'costRows'),
      subscriptionRows: parseOptionalRows(body, 'subscriptionRows'),
      automatedSales: automated.sales,
      automatedReports: [
        ...parseAutomatedReports(body.automatedReports),
        ...automated.reports,
      ],
    },
    options: {
      granularity: parseGranularity(options.granularity),
      kpiMonth,
      filters: {
        channels: optionalStringList(filters, 'channels'),
        categories: optionalStringList(filters, 'categories'),
        startDate: optionalDate(filters, 'startDate'),
        endDate: optionalDate(filters, 'endDate'),
      },
      overrides: parseNumberRecord(
        optionalObject(options, 'overrides'),
        KPI_OVERRIDE_KEYS,
        'overrides'
      ),
      fixedCost: optionalNumber(options, 'fixedCost') ?? config.fixedCost,
      loanRepayment:
        optionalNumber(options, 'loanRepayment') ?? config.loanRepayment,
      openingCash: optionalNumber(options, 'openingCash') ?? DEFAULT_OPENING_CASH,
      cashflowPlan:
        options.cashflowPlan === undefined || options.cashflowPlan === null
          ? null
          : parseCashflowPlan(options.cashflowPlan),
      simulation: parseNumberRecord(
        optionalObject(options, 'simulation'),
        SIMULATION_KEYS,
        'simulation'
      ),
      thresholds: {
        ...config.alertThresholds,
        ...parseNumberRecord(
          optionalObject(options, 'thresholds'),
          ALERT_THRESHOLD_KEYS,
          'thresholds'
        ),
      },
    },
  };
};

const parseSimulationRequest = async (
  req: Request
): Promise<{ basePl: BasePl; params: SimulationParams }> => {
  const body = await readJsonBody(req);
  const basePlBody = optionalObject(body, 'basePl');
  if (!basePlBody) {
    throw new Error('basePl は必須です');
  }
  return {
    basePl: {
      sales: requiredNumber(basePlBody, 'sales', 'basePl.sales'),
      cogs: requiredNumber(basePlBody, 'cogs', 'basePl.cogs'),
      gross_profit: optionalNumber(basePlBody, 'gross_profit', 'basePl.gross_profit'),
      sga: requiredNumber(basePlBody, 'sga', 'basePl.sga'),
    },
    params: {
      salesGrowthRate: optionalNumber(body, 'salesGrowthRate') ?? 0,
      costRateAdjustment: optionalNumber(body, 'costRateAdjustment') ?? 0,
      sgaChangeRate: optionalNumber(body, 'sgaChangeRate') ?? 0,
      additionalAdCost: optionalNumber(body, 'additionalAdCost') ?? 0,
    },
  };
};

const badRequest = (error: unknown) => ({
  error: errorMessage(error, 'リクエストの解析に失敗しました'),
});

const internalError = (message: string, error: unknown) => ({
  error: message,
  details: error instanceof Error ? error.message : String(error),
});

export const registerReportRoutes = (
  app: Hono,
  options: RegisterReportRoutesOptions
) => {
  const buildReport = options.buildReport ?? buildDashboardReport;

  app.post('/api/v1/reports', async (c) => {
    let request: ReportRequest;
    try {
      request = await parseReportRequest(c.req.raw, options.config);
    } catch (error) {
      return c.json(badRequest(error), 400);
    }

    try {
      const report = buildReport(request.session, request.options);
      logger.log('POST /api/v1/reports - Success', {
        rows: report.sales.length,
        alerts: report.alerts.length,
      });
      return c.json(report);
    } catch (error) {
      logger.error('Error in /api/v1/reports:', error);
      return c.json(internalError('レポートの計算に失敗しました', error), 500);
    }
  });

  app.post('/api/v1/simulations/pl', async (c) => {
    let request: { basePl: BasePl; params: SimulationParams };
    try {
      request = await parseSimulationRequest(c.req.raw);
    } catch (error) {
      return c.json(badRequest(error), 400);
    }
    return c.json({ rows: simulatePl(request.basePl, request.params) });
  });

  app.post('/api/v1/cashflow/forecast', async (c) => {
    let request: { plan: CashFlowPlanRow[]; openingCash: number };
    try {
      const body = await readJsonBody(c.req.raw);
      request = {
        plan: parseCashflowPlan(body.plan),
        openingCash: optionalNumber(body, 'openingCash') ?? DEFAULT_OPENING_CASH,
      };
    } catch (error) {
      return c.json(badRequest(error), 400);
    }
    return c.json({ rows: forecastCashflow(request.plan, request.openingCash) });
  });
};
