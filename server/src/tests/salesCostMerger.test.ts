import {
  DEFAULT_COST_RATE,
  channelFeeRate,
  computeCategoryShare,
  computeChannelShare,
  mergeSalesAndCosts,
  selectJoinKey,
} from '../service/salesCostMerger';
import { buildCost, buildSale } from './fixtures/salesFixtures';

describe('売上と原価の結合', () => {
  const orderDate = new Date(2024, 0, 10);

  test('原価表に該当が無い商品は原価率30%で粗利を計算する', () => {
    const [row] = mergeSalesAndCosts(
      [buildSale(orderDate, { product_code: 'X1', sales_amount: 10_000, channel: 'メルカリ' })],
      [buildCost()]
    );

    expect(DEFAULT_COST_RATE).toBe(0.3);
    expect(row.cost_rate).toBe(0.3);
    expect(row.estimated_cost).toBeCloseTo(3000);
    expect(row.gross_profit).toBeCloseTo(7000);
    expect(row.channel_fee).toBe(0);
    expect(row.net_gross_profit).toBeCloseTo(7000);
    expect(row.price).toBeNull();
  });

  test('商品コードで結合し、チャネル手数料を差し引いた粗利を求める', () => {
    const [row] = mergeSalesAndCosts(
      [buildSale(orderDate, { channel: '楽天市場', sales_amount: 2000 })],
      [buildCost({ cost_rate: 0.25, gross_margin_rate: 0.75 })]
    );

    expect(row.cost_rate).toBe(0.25);
    expect(row.gross_margin_rate).toBe(0.75);
    expect(row.gross_profit).toBeCloseTo(1500);
    expect(row.channel_fee).toBe(0.12);
    expect(row.channel_fee_amount).toBeCloseTo(240);
    expect(row.net_gross_profit).toBeCloseTo(1260);
  });

  test('原価表の商品コードがすべてNAなら商品名で結合する', () => {
    const costs = [
      buildCost({ product_code: 'NA', product_name: '青汁', cost_rate: 0.2 }),
      buildCost({ product_code: 'NA', product_name: '酵素', cost_rate: 0.5 }),
    ];
    expect(selectJoinKey(costs)).toBe('product_name');

    const merged = mergeSalesAndCosts(
      [
        buildSale(orderDate, { product_code: 'Z9', product_name: '酵素' }),
        buildSale(orderDate, { product_code: 'Z8', product_name: '乳酸菌' }),
      ],
      costs
    );
    expect(merged.map((row) => row.cost_rate)).toEqual([0.5, 0.3]);
  });

  test('商品コードが一部でも入っていれば商品コードで結合する', () => {
    expect(
      selectJoinKey([buildCost({ product_code: 'NA' }), buildCost({ product_code: 'A002' })])
    ).toBe('product_code');
    expect(selectJoinKey([])).toBe('product_code');
  });

  test('原価率は0〜95%に丸める', () => {
    const merged = mergeSalesAndCosts(
      [
        buildSale(orderDate, { product_code: 'A001' }),
        buildSale(orderDate, { product_code: 'A002' }),
      ],
      [
        buildCost({ product_code: 'A001', cost_rate: 1.4 }),
        buildCost({ product_code: 'A002', cost_rate: -0.1 }),
      ]
    );
    expect(merged.map((row) => row.cost_rate)).toEqual([0.95, 0]);
  });

  test('手数料率が未設定のチャネルは0%', () => {
    expect(channelFeeRate('自社サイト')).toBe(0.03);
    expect(channelFeeRate('Amazon')).toBe(0.15);
    expect(channelFeeRate('メルカリ')).toBe(0);
  });

  test('チャネル別・カテゴリ別の構成比を売上の降順で返す', () => {
    const rows = [
      buildSale(orderDate, { channel: '自社サイト', category: '健康食品', sales_amount: 300 }),
      buildSale(orderDate, { channel: '楽天市場', category: '健康食品', sales_amount: 500 }),
      buildSale(orderDate, { channel: '自社サイト', category: '化粧品', sales_amount: 200 }),
    ];

    expect(computeChannelShare(rows)).toEqual([
      { key: '自社サイト', sales_amount: 500, share: 0.5 },
      { key: '楽天市場', sales_amount: 500, share: 0.5 },
    ]);
    expect(computeCategoryShare(rows)).toEqual([
      { key: '健康食品', sales_amount: 800, share: 0.8 },
      { key: '化粧品', sales_amount: 200, share: 0.2 },
    ]);
  });

  test('売上が空なら構成比も空', () => {
    expect(computeChannelShare([])).toEqual([]);
    expect(mergeSalesAndCosts([], [buildCost()])).toEqual([]);
  });
});
