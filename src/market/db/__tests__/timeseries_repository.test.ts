import type { QueryCommand } from "@aws-sdk/lib-dynamodb";
import {
  TimeseriesRepository,
  toPricePoint,
  type QueryClient,
} from "@src/market/db/timeseries_repository";

function createStubClient(
  captured: QueryCommand[],
  items: Record<string, unknown>[] = []
): QueryClient {
  return {
    send: async cmd => {
      captured.push(cmd);
      return { Items: items };
    },
  };
}

describe("TimeseriesRepository.queryBySymbolDateRange", () => {
  it("queries the bySymbol index with aliased reserved attributes", async () => {
    const captured: QueryCommand[] = [];
    const repo = new TimeseriesRepository({
      tableName: "T",
      client: createStubClient(captured),
    });
    await repo.queryBySymbolDateRange({
      code: "TSM",
      fromDate: "2024-01-01",
      toDate: "2024-01-10",
    });

    expect(captured).toHaveLength(1);
    const input = captured[0].input;
    expect(input.TableName).toBe("T");
    expect(input.IndexName).toBe("bySymbol");
    expect(input.ExpressionAttributeValues).toEqual({
      ":pk": "SYMBOL#TSM",
      ":from": "ENTITY#QUOTE#2024-01-01",
      ":to": "ENTITY#QUOTE#2024-01-10",
    });
    expect(input.ExpressionAttributeNames).toMatchObject({
      "#open": "open",
      "#close": "close",
      "#adj_close": "adj_close",
      "#date": "date",
    });
    expect(input.ProjectionExpression).toContain("#close");
    expect(input.ProjectionExpression?.includes(" close,")).toBe(false);
    // 10 day window + 5 buffer
    expect(input.Limit).toBe(15);
    expect(input.ScanIndexForward).toBe(true);
  });

  it("maps items to price points", async () => {
    const repo = new TimeseriesRepository({
      tableName: "T",
      client: createStubClient(
        [],
        [
          { gsi1sk: "ENTITY#QUOTE#2024-01-02", close: "101.5", volume: 10 },
          { date: "2024-01-03", adj_close: 99 },
        ]
      ),
    });
    const points = await repo.queryBySymbolDateRange({
      code: "TSM",
      fromDate: "2024-01-01",
      toDate: "2024-01-03",
    });
    expect(points).toEqual([
      {
        date: "2024-01-02",
        open: undefined,
        high: undefined,
        low: undefined,
        close: 101.5,
        volume: 10,
      },
      {
        date: "2024-01-03",
        open: undefined,
        high: undefined,
        low: undefined,
        close: 99,
        volume: undefined,
      },
    ]);
  });
});

describe("toPricePoint", () => {
  it("ignores non-numeric values and unknown dates", () => {
    expect(toPricePoint({ close: "n/a", date: "yesterday" })).toEqual({
      date: "",
      open: undefined,
      high: undefined,
      low: undefined,
      close: undefined,
      volume: undefined,
    });
  });
});
