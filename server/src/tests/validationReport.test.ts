import { mergeSalesAndCosts } from '../service/salesCostMerger';
import { normalizeSales } from '../service/schemaNormalizer';
import {
  ValidationReport,
  detectDuplicateRows,
  reportNormalization,
  validateChannelFees,
} from '../service/validationReport';
import { buildCost, buildSale } from './fixtures/salesFixtures';

describe('重複検出と検証レポート', () => {
  const orderDate = new Date(2024, 0, 10);

  test('チャネル・商品・注文日・顧客・金額が一致する行を重複グループごと返す', () => {
    const first = buildSale(orderDate, { quantity: 1 });
    const second = buildSale(orderDate, { quantity: 2 });
    const other = buildSale(orderDate, { customer_id: 'C999' });

    const duplicates = detectDuplicateRows([first, other, second]);
    expect(duplicates).toEqual([first, second]);
  });

  test('同じ重複行を二度追加しても件数は増えない', () => {
    const report = new ValidationReport();
    const duplicates = detectDuplicateRows([
      buildSale(orderDate, { quantity: 1 }),
      buildSale(orderDate, { quantity: 2 }),
    ]);

    expect(report.addDuplicates(duplicates)).toBe(2);
    expect(report.addDuplicates(duplicates)).toBe(0);
    expect(report.duplicateRows).toHaveLength(2);
  });

  test('内容が完全に同じ行は1件として記録する', () => {
    const report = new ValidationReport();
    const row = buildSale(orderDate);
    expect(report.addDuplicates([row, { ...row }])).toBe(1);
  });

  test('extend でメッセージを連結し、重複行は和集合にする', () => {
    const shared = buildSale(orderDate);
    const a = new ValidationReport();
    a.addMessage('warning', 'A');
    a.addDuplicates([shared]);
    const b = new ValidationReport();
    b.addMessage('error', 'B');
    b.addDuplicates([shared, buildSale(orderDate, { customer_id: 'C2' })]);

    a.extend(b);

    expect(a.messages.map((message) => message.message)).toEqual(['A', 'B']);
    expect(a.duplicateRows).toHaveLength(2);
    expect(a.hasErrors()).toBe(true);
    expect(a.hasWarnings()).toBe(true);
  });

  test('サンプル行は先頭5件までに絞る', () => {
    const report = new ValidationReport();
    report.addMessage('warning', 'many', {
      count: 8,
      sample: [1, 2, 3, 4, 5, 6, 7, 8],
    });
    expect(report.messages[0]).toEqual({
      level: 'warning',
      message: 'many',
      count: 8,
      sample: [1, 2, 3, 4, 5],
    });
  });

  test('必須列の欠損はエラー、その他の欠損と除外行は警告にする', () => {
    const report = new ValidationReport();
    const result = normalizeSales([{ 売上: '100' }], '自社サイト');

    reportNormalization(result, '売上.csv', report, {
      required: ['order_date', 'sales_amount'],
      optional: ['channel'],
    });

    expect(report.messages).toEqual([
      {
        level: 'error',
        message: '売上.csv: 必須列が見つかりません (order_date)',
      },
      {
        level: 'warning',
        message:
          '売上.csv: 列が見つからないため既定値で補完しました (product_code, product_name, category, quantity, customer_id)',
      },
      {
        level: 'warning',
        message: '売上.csv: 日付を解釈できない1行を除外しました。',
        count: 1,
        sample: [{ 売上: '100' }],
      },
    ]);
  });

  test('手数料未設定チャネルと手数料控除後の赤字明細を警告する', () => {
    const merged = mergeSalesAndCosts(
      [
        buildSale(orderDate, { channel: 'メルカリ', product_code: 'B001' }),
        buildSale(orderDate, { channel: 'Amazon' }),
      ],
      [buildCost({ cost_rate: 0.95 })]
    );

    const report = validateChannelFees(merged);

    expect(report.messages.map((message) => message.message)).toEqual([
      '手数料率が未設定のチャネルがあります: メルカリ（手数料0%で計算しています）',
      '手数料控除後の粗利がマイナスの明細が1件あります。原価率・手数料率を確認してください。',
    ]);
    expect(report.messages[1].count).toBe(1);
  });
});
