#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { loadAppConfig } from '../config';
import type { RawRow } from '../model/records';
import {
  loadSalesFiles,
  readTabularFile,
  type UploadedFile,
} from '../service/ingestion/tableReader';
import { buildDashboardReport } from '../service/reportPipeline';
import { parseGranularity } from '../routes/requestParsers';

const getArgValue = (flag: string): string | undefined => {
  const index = process.argv.indexOf(flag);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const getArgValues = (flag: string): string[] =>
  process.argv.flatMap((arg, index) =>
    arg === flag && process.argv[index + 1] ? [process.argv[index + 1]] : []
  );

const printUsageAndExit = (message?: string, code = 1): never => {
  if (message) console.error(message);
  console.info(
    'Usage: npm run report:dump -- --sales <CHANNEL>=<FILE> [--sales ...] [--cost <FILE>] [--subscription <FILE>] [--granularity M|W|Q|Y] [--opening-cash <YEN>]'
  );
  process.exit(code);
};

const readUpload = (filePath: string): UploadedFile => ({
  name: path.basename(filePath),
  content: readFileSync(filePath),
});

const readRawRows = (filePath: string | undefined): RawRow[] | null => {
  if (!filePath) return null;
  const upload = readUpload(filePath);
  const result = readTabularFile(upload.content, upload.name);
  if (result.error) {
    throw new Error(`${upload.name} を読み込めませんでした: ${result.error}`);
  }
  return result.rows;
};

const main = async () => {
  const salesArgs = getArgValues('--sales');
  if (!salesArgs.length) {
    printUsageAndExit('--sales を1つ以上指定してください');
  }

  const filesByChannel: Record<string, UploadedFile[]> = {};
  for (const arg of salesArgs) {
    const separator = arg.indexOf('=');
    if (separator <= 0) {
      printUsageAndExit(`--sales の形式が不正です: ${arg}`);
    }
    const channel = arg.slice(0, separator);
    const file = readUpload(arg.slice(separator + 1));
    (filesByChannel[channel] ??= []).push(file);
  }

  const openingCashArg = getArgValue('--opening-cash');
  const openingCash =
    openingCashArg === undefined ? undefined : Number(openingCashArg);
  if (openingCash !== undefined && !Number.isFinite(openingCash)) {
    printUsageAndExit('--opening-cash は数値で指定してください');
  }

  const config = loadAppConfig();
  const sales = loadSalesFiles(filesByChannel);
  const report = buildDashboardReport(
    {
      automatedSales: { uploaded: sales.rows },
      automatedReports: [sales.report],
      costRows: readRawRows(getArgValue('--cost')),
      subscriptionRows: readRawRows(getArgValue('--subscription')),
    },
    {
      granularity: parseGranularity(getArgValue('--granularity')),
      fixedCost: config.fixedCost,
      loanRepayment: config.loanRepayment,
      openingCash,
      thresholds: config.alertThresholds,
    }
  );

  console.info('=== Dashboard Report ===');
  console.info(JSON.stringify(report, null, 2));
};

main().catch((error) => {
  console.error(
    '[report:dump] Failed:',
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
});
