import { formatLogLine, logger } from '../logger';

describe('ロガー', () => {
  test('テスト実行中はログファイルに書かない', () => {
    expect(logger.getLogFilePath()).toBeNull();
  });

  test('レベル・メッセージ・引数を1行にまとめる', () => {
    const line = formatLogLine(
      'WARN',
      '[ingestion] 読み込みに失敗しました',
      ['orders.csv', { rows: 0 }],
      new Date(Date.UTC(2024, 0, 5, 9, 30))
    );
    expect(line).toBe(
      '[2024-01-05T09:30:00.000Z] [WARN] [ingestion] 読み込みに失敗しました orders.csv {\n  "rows": 0\n}\n'
    );
  });

  test('Error はスタックトレースで出力する', () => {
    const error = new Error('boom');
    const line = formatLogLine('ERROR', 'failed', [error], new Date(0));
    expect(line).toBe(`[1970-01-01T00:00:00.000Z] [ERROR] failed ${error.stack}\n`);
  });
});
