import { jest } from '@jest/globals';
import {
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_FIXED_COST,
  DEFAULT_LOAN_REPAYMENT,
  loadAppConfig,
} from '../config';

describe('設定の読み込み', () => {
  test('環境変数が無ければ既定値', () => {
    expect(loadAppConfig({})).toEqual({
      port: 3001,
      fixedCost: DEFAULT_FIXED_COST,
      loanRepayment: DEFAULT_LOAN_REPAYMENT,
      alertThresholds: DEFAULT_ALERT_THRESHOLDS,
      notification: {
        serverKey: null,
        deviceTokens: [],
        topic: null,
        dryRun: false,
      },
    });
  });

  test('数値・一覧・フラグを解釈する', () => {
    const config = loadAppConfig({
      PORT: '8080',
      DEFAULT_FIXED_COST: '1800000',
      ALERT_CHURN_RATE: '0.08',
      FCM_SERVER_KEY: ' test-server-key ',
      FCM_DEVICE_TOKENS: 'device-a, device-b,,',
      FCM_TOPIC: '',
      FCM_DRY_RUN: 'TRUE',
    });

    expect(config.port).toBe(8080);
    expect(config.fixedCost).toBe(1_800_000);
    expect(config.alertThresholds).toEqual({
      ...DEFAULT_ALERT_THRESHOLDS,
      churn_rate: 0.08,
    });
    expect(config.notification).toEqual({
      serverKey: 'test-server-key',
      deviceTokens: ['device-a', 'device-b'],
      topic: null,
      dryRun: true,
    });
  });

  test('数値として読めない値は既定値に戻す', () => {
    const config = loadAppConfig({ PORT: 'abc', DEFAULT_LOAN_REPAYMENT: ' ' });
    expect(config.port).toBe(3001);
    expect(config.loanRepayment).toBe(DEFAULT_LOAN_REPAYMENT);
  });

  test('設定や計算モジュールを読み込んでも .env は読まない', async () => {
    const dotenvConfig = jest.fn();
    jest.doMock('dotenv', () => ({ config: dotenvConfig }));

    await jest.isolateModulesAsync(async () => {
      await import('../config');
      await import('../service/reportPipeline');
      await import('../service/alertRules');
      await import('../service/cashflowForecast');
    });

    expect(dotenvConfig).not.toHaveBeenCalled();
    jest.dontMock('dotenv');
  });
});
