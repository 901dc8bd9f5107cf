import { buildAlerts } from '../service/alertRules';
import { monthlySalesSummary } from '../service/periodAggregation';
import { mergeSalesAndCosts } from '../service/salesCostMerger';
import { buildKpiSnapshot, buildSale } from './fixtures/salesFixtures';

const DROP_ALERT =
  '売上が前月比で40.0%減少しています。原因分析を行ってください。';
const CASH_ALERT =
  '将来の資金残高がマイナスに落ち込む見込みです。資金繰り対策を検討してください。';

const summaryOf = (januarySales: number, februarySales: number) =>
  monthlySalesSummary(
    mergeSalesAndCosts(
      [
        buildSale(new Date(2024, 0, 10), { sales_amount: januarySales }),
        buildSale(new Date(2024, 1, 10), { sales_amount: februarySales }),
      ],
      []
    )
  );

describe('アラート判定', () => {
  test('前月比で30%を超えて売上が落ちたら減少率を表示する', () => {
    expect(buildAlerts(summaryOf(1000, 600), null, null)).toEqual([DROP_ALERT]);
  });

  test('減少が30%以内ならアラートしない', () => {
    expect(buildAlerts(summaryOf(1000, 800), null, null)).toEqual([]);
  });

  test('解約率がしきい値を超えたらアラート', () => {
    const kpis = buildKpiSnapshot({ churn_rate: 0.08 });
    expect(buildAlerts([], kpis, [])).toEqual([
      '解約率が8.0%と高水準です。定期顧客のフォローを見直してください。',
    ]);
  });

  test('粗利率が目標未満ならアラート（0%も対象）', () => {
    expect(
      buildAlerts([], buildKpiSnapshot({ gross_margin_rate: 0.55 }), [])
    ).toEqual([
      '粗利率が55.0%と目標を下回っています。商品ミックスを確認しましょう。',
    ]);
    expect(
      buildAlerts([], buildKpiSnapshot({ gross_margin_rate: 0 }), [])
    ).toEqual([
      '粗利率が0.0%と目標を下回っています。商品ミックスを確認しましょう。',
    ]);
  });

  test('将来残高が一度でもマイナスになればアラート', () => {
    const forecast = [
      { month: '2024-03', net_cf: -2_000_000, cash_balance: 1_000_000 },
      { month: '2024-04', net_cf: -1_500_000, cash_balance: -500_000 },
    ];
    expect(buildAlerts(null, null, forecast)).toEqual([CASH_ALERT]);
  });

  test('複数該当時は 売上 → 解約率 → 粗利率 → 資金 の順', () => {
    const kpis = buildKpiSnapshot({ churn_rate: 0.1, gross_margin_rate: 0.5 });
    const alerts = buildAlerts(summaryOf(1000, 600), kpis, [
      { month: '2024-03', net_cf: -1, cash_balance: -1 },
    ]);
    expect(alerts).toEqual([
      DROP_ALERT,
      '解約率が10.0%と高水準です。定期顧客のフォローを見直してください。',
      '粗利率が50.0%と目標を下回っています。商品ミックスを確認しましょう。',
      CASH_ALERT,
    ]);
  });

  test('データが無ければアラートは空', () => {
    expect(buildAlerts(null, null, null)).toEqual([]);
    expect(buildAlerts([], buildKpiSnapshot(), [])).toEqual([]);
  });

  test('しきい値の一部指定は既定値に上書きされる', () => {
    const kpis = buildKpiSnapshot({ churn_rate: 0.08, gross_margin_rate: 0.55 });
    expect(buildAlerts([], kpis, [], { churn_rate: 0.1 })).toEqual([
      '粗利率が55.0%と目標を下回っています。商品ミックスを確認しましょう。',
    ]);
    expect(
      buildAlerts(summaryOf(1000, 800), null, null, { revenue_drop_pct: 0.1 })
    ).toEqual([
      '売上が前月比で20.0%減少しています。原因分析を行ってください。',
    ]);
  });
});
