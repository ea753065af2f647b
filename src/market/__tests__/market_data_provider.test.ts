import type { PricePoint } from "@src/market/db/timeseries_repository";
import {
  createDynamoMarketDataProvider,
  resolveDateRange,
} from "@src/market/market_data_provider";

type RangeQuery = { code: string; fromDate: string; toDate: string };

function createRepoStub(map: Record<string, PricePoint[] | Error>) {
  return {
    queryBySymbolDateRange: jest.fn(async ({ code }: RangeQuery) => {
      const entry = map[code];
      if (entry instanceof Error) throw entry;
      return entry ?? [];
    }),
  };
}

describe("createDynamoMarketDataProvider", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("returns a Result per symbol", async () => {
    const repository = createRepoStub({
      TSM: [{ date: "2024-05-01", close: 140 }],
      "005930.KS": new Error("throttled"),
    });
    const provider = createDynamoMarketDataProvider({
      tableName: "STOCK",
      repository,
    });

    const history = await provider.getPriceHistory(["TSM", "005930.KS"], {
      from: "2024-04-01",
      to: "2024-05-01",
    });

    expect(history).toEqual({
      TSM: { ok: true, data: [{ date: "2024-05-01", close: 140 }] },
      "005930.KS": { ok: false, error: "throttled" },
    });
    expect(repository.queryBySymbolDateRange).toHaveBeenCalledWith({
      code: "TSM",
      fromDate: "2024-04-01",
      toDate: "2024-05-01",
    });
  });

  it("caches successful lookups per range", async () => {
    const repository = createRepoStub({ TSM: [] });
    const provider = createDynamoMarketDataProvider({
      tableName: "STOCK",
      repository,
    });
    const range = { from: "2024-04-01", to: "2024-05-01" };

    await provider.getPriceHistory(["TSM"], range);
    await provider.getPriceHistory(["TSM"], range);
    await provider.getPriceHistory(["TSM"], { ...range, to: "2024-05-02" });

    expect(repository.queryBySymbolDateRange).toHaveBeenCalledTimes(2);
  });

  it("uses the default window ending today", async () => {
    jest.useFakeTimers().setSystemTime(new Date("2024-03-31T12:00:00Z"));
    const repository = createRepoStub({});
    const provider = createDynamoMarketDataProvider({
      tableName: "STOCK",
      defaultDays: 30,
      repository,
    });

    await provider.getPriceHistory(["AAPL"]);

    expect(repository.queryBySymbolDateRange).toHaveBeenCalledWith({
      code: "AAPL",
      fromDate: "2024-03-02",
      toDate: "2024-03-31",
    });
  });
});

describe("resolveDateRange", () => {
  it("keeps an explicit range", () => {
    expect(resolveDateRange("2024-01-01", "2024-01-31", 5)).toEqual({
      from: "2024-01-01",
      to: "2024-01-31",
    });
  });
});
