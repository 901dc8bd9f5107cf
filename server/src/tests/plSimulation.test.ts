import { createCurrentPl, simulatePl } from '../service/plSimulation';
import { mergeSalesAndCosts } from '../service/salesCostMerger';
import { buildSale, buildSubscription } from './fixtures/salesFixtures';

const NO_CHANGE = {
  salesGrowthRate: 0,
  costRateAdjustment: 0,
  sgaChangeRate: 0,
  additionalAdCost: 0,
};

describe('PLシミュレーション', () => {
  test('売上10%増のシナリオで営業利益が7万円増える', () => {
    const rows = simulatePl(
      { sales: 1_000_000, cogs: 300_000, gross_profit: 700_000, sga: 500_000 },
      { ...NO_CHANGE, salesGrowthRate: 0.1 }
    );

    expect(rows.map((row) => [row.item, row.label])).toEqual([
      ['revenue', '売上高'],
      ['cogs', '売上原価'],
      ['gross_profit', '粗利'],
      ['sga', '販管費'],
      ['operating_profit', '営業利益'],
    ]);

    const [revenue, cogs, gross, sga, operating] = rows;
    expect(revenue.scenario).toBeCloseTo(1_100_000);
    expect(cogs.scenario).toBeCloseTo(330_000);
    expect(gross.scenario).toBeCloseTo(770_000);
    expect(sga.scenario).toBe(500_000);
    expect(operating.baseline).toBe(200_000);
    expect(operating.scenario).toBeCloseTo(270_000);
    expect(operating.delta).toBeCloseTo(70_000);
  });

  test('販管費の変動率と追加広告費を反映する', () => {
    const rows = simulatePl(
      { sales: 1_000_000, cogs: 300_000, sga: 500_000 },
      { ...NO_CHANGE, sgaChangeRate: 0.1, additionalAdCost: 50_000 }
    );
    const sga = rows.find((row) => row.item === 'sga');
    expect(sga?.scenario).toBeCloseTo(600_000);
    expect(sga?.delta).toBeCloseTo(100_000);
  });

  test('粗利の指定が無ければ売上-原価を現状値にする', () => {
    const rows = simulatePl(
      { sales: 800_000, cogs: 200_000, sga: 100_000 },
      NO_CHANGE
    );
    expect(rows[2].baseline).toBe(600_000);
    expect(rows[4].baseline).toBe(500_000);
    expect(rows.every((row) => row.delta === 0)).toBe(true);
  });

  test('原価率は0未満にならず、売上0なら基準原価率は0', () => {
    const rows = simulatePl(
      { sales: 1_000_000, cogs: 300_000, sga: 0 },
      { ...NO_CHANGE, costRateAdjustment: -0.5 }
    );
    expect(rows[1].scenario).toBe(0);

    const zeroSales = simulatePl(
      { sales: 0, cogs: 50_000, sga: 10_000 },
      { ...NO_CHANGE, salesGrowthRate: 0.2 }
    );
    expect(zeroSales[0].scenario).toBe(0);
    expect(zeroSales[1].scenario).toBe(0);
  });

  test('原価率の上振れには上限を設けない', () => {
    const rows = simulatePl(
      { sales: 1_000_000, cogs: 900_000, sga: 0 },
      { ...NO_CHANGE, costRateAdjustment: 0.2 }
    );
    expect(rows[1].scenario).toBeCloseTo(1_100_000);
    expect(rows[2].scenario).toBeCloseTo(-100_000);
  });

  test('直近月の実績と固定費・広告費から現状PLを作る', () => {
    const merged = mergeSalesAndCosts(
      [
        buildSale(new Date(2024, 0, 10), { sales_amount: 100_000 }),
        buildSale(new Date(2024, 1, 10), { sales_amount: 200_000 }),
      ],
      []
    );
    const pl = createCurrentPl(
      merged,
      [buildSubscription('2024-02', { marketing_cost: 50_000 })],
      2_500_000
    );

    expect(pl.month).toBe('2024-02');
    expect(pl.sales).toBe(200_000);
    expect(pl.gross_profit).toBeCloseTo(134_000);
    expect(pl.cogs).toBeCloseTo(66_000);
    expect(pl.sga).toBe(2_550_000);
    expect(pl.operating_profit).toBeCloseTo(-2_416_000);
  });

  test('売上が無い場合の現状PLは固定費だけの赤字', () => {
    expect(createCurrentPl([], null, 1_000)).toEqual({
      month: null,
      sales: 0,
      cogs: 0,
      gross_profit: 0,
      sga: 1_000,
      operating_profit: -1_000,
    });
  });
});
