import {
  buildRenameMap,
  detectChannelFromFilename,
  normalizeCost,
  normalizeSales,
  normalizeSubscription,
  SALES_COLUMN_ALIASES,
} from '../service/schemaNormalizer';
import { SALES_FIELDS } from '../model/records';

describe('列名の正規化', () => {
  test('日本語の列名を正規列へ寄せ、欠損列は既定値で補完する', () => {
    const result = normalizeSales(
      [
        {
          注文日: '2024/01/15',
          商品コード: 'A001',
          商品名: '青汁',
          カテゴリ: '健康食品',
          数量: '2',
          売上: '1,000',
          顧客ID: 'C1',
        },
        { 注文日: '2024-02-01', 数量: 0, 売上: 800 },
      ],
      '楽天市場'
    );

    expect(result.rows).toHaveLength(2);
    expect(result.missingColumns).toEqual(['channel']);
    expect(result.rows[0]).toEqual({
      order_date: new Date(2024, 0, 15),
      channel: '楽天市場',
      product_code: 'A001',
      product_name: '青汁',
      category: '健康食品',
      quantity: 2,
      sales_amount: 1000,
      customer_id: 'C1',
      unit_price: 500,
      order_month: '2024-01',
    });
    expect(result.rows[1].product_code).toBe('NA');
    expect(result.rows[1].product_name).toBe('不明商品');
    expect(result.rows[1].category).toBe('未分類');
    expect(result.rows[1].customer_id).toBe('anonymous');
  });

  test('数量0の行は単価=売上とする', () => {
    const result = normalizeSales([{ 注文日: '2024-02-01', 数量: 0, 売上: 800 }]);
    expect(result.rows[0].quantity).toBe(0);
    expect(result.rows[0].unit_price).toBe(800);
  });

  test('チャネル列もヒントも無ければ「不明」になる', () => {
    const result = normalizeSales([{ 注文日: '2024-02-01', 売上: 800 }]);
    expect(result.rows[0].channel).toBe('不明');
  });

  test('日付を解釈できない行は理由付きで skipped に回す', () => {
    const result = normalizeSales([
      { 注文日: '不明', 売上: '500' },
      { 注文日: '2024-03-01', 売上: '300' },
    ]);
    expect(result.rows).toHaveLength(1);
    expect(result.skipped).toEqual([
      {
        index: 0,
        reason: '注文日を日付として解釈できません',
        raw: { 注文日: '不明', 売上: '500' },
      },
    ]);
  });

  test('注文日の列が無い場合は全行が skipped になる', () => {
    const result = normalizeSales([{ 売上: '500' }]);
    expect(result.rows).toHaveLength(0);
    expect(result.skipped[0].reason).toBe('注文日の列がありません');
    expect(result.missingColumns).toContain('order_date');
  });

  test('見出しのBOMや大文字小文字の違いを吸収する', () => {
    const result = normalizeSales([{ '\uFEFF注文日': '2024-03-01', SALES: '100' }]);
    expect(result.rows[0].sales_amount).toBe(100);
    expect(result.rows[0].order_date).toEqual(new Date(2024, 2, 1));
  });

  test('一度採用された入力列は別の正規列に割り当てない', () => {
    const renameMap = buildRenameMap(
      ['売上', '注文日'],
      SALES_COLUMN_ALIASES,
      SALES_FIELDS
    );
    expect(renameMap.get('sales_amount')).toBe('売上');
    expect(renameMap.get('order_date')).toBe('注文日');
    expect(renameMap.has('product_name')).toBe(false);
  });

  test('ファイル名からチャネルを推定する', () => {
    expect(detectChannelFromFilename('rakuten_2024.xlsx')).toBe('楽天市場');
    expect(detectChannelFromFilename('Amazon_orders.csv')).toBe('Amazon');
    expect(detectChannelFromFilename('yahoo.csv')).toBe('Yahoo!ショッピング');
    expect(detectChannelFromFilename('unknown.csv')).toBeNull();
    expect(detectChannelFromFilename(undefined)).toBeNull();
  });

  test('原価率が無い行は原価/売価から求め、粗利率は 1-原価率', () => {
    const result = normalizeCost([
      { 商品コード: 'A001', 商品名: '青汁', 売価: '1000', 原価: '250' },
      { 商品コード: 'A002', 商品名: '酵素', 原価率: '40%' },
    ]);
    expect(result.rows[0].cost_rate).toBeCloseTo(0.25);
    expect(result.rows[0].gross_margin_rate).toBeCloseTo(0.75);
    expect(result.rows[1].cost_rate).toBeCloseTo(0.4);
    expect(result.rows[1].gross_margin_rate).toBeCloseTo(0.6);
    expect(result.rows[1].price).toBeNull();
    expect(result.missingColumns).toEqual(['category']);
  });

  test('売価が0や欠損の行は原価率 null、粗利率は 1 とする', () => {
    const result = normalizeCost([{ 商品コード: 'A003', 売価: 0, 原価: 100 }]);
    expect(result.rows[0].cost_rate).toBeNull();
    expect(result.rows[0].gross_margin_rate).toBe(1);
  });

  test('サブスクKPIの欠損値は 0 ではなく null のまま残す', () => {
    const result = normalizeSubscription([
      { 年月: '2024-01', アクティブ顧客数: '1,200', 解約件数: '30' },
      { 年月: '??', アクティブ顧客数: '10' },
    ]);
    expect(result.rows[0].month).toBe('2024-01');
    expect(result.rows[0].active_customers).toBe(1200);
    expect(result.rows[0].cancelled_subscriptions).toBe(30);
    expect(result.rows[0].ltv).toBeNull();
    expect(result.rows[1].month).toBeNull();
    expect(result.rows[1].active_customers).toBe(10);
  });
});
