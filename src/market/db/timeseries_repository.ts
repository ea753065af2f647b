/**
 * DynamoDB daily price repository using GSI "bySymbol".
 *
 * Assumptions:
 * - GSI1: { hashKey: gsi1pk = "SYMBOL#<code>", rangeKey: gsi1sk = "ENTITY#QUOTE#<YYYY-MM-DD>" }
 * - Items may store a dedicated date attribute ("date" or "as_of_date");
 *   otherwise it is derived from gsi1sk.
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, QueryCommand } from "@aws-sdk/lib-dynamodb";
import { getLogger } from "@src/util/logger";

export interface PricePoint {
  date: string;
  open?: number;
  high?: number;
  low?: number;
  close?: number;
  volume?: number;
}

/** The slice of the document client the repository talks to. */
export interface QueryClient {
  send(command: QueryCommand): Promise<{ Items?: Record<string, unknown>[] }>;
}

export interface TimeseriesRepositoryOptions {
  tableName: string;
  client?: QueryClient;
}

const QUOTE_PREFIX = "ENTITY#QUOTE#";

export class TimeseriesRepository {
  private readonly table: string;
  private readonly doc: QueryClient;
  private readonly logger = getLogger("market/timeseries_repository");

  constructor(options: TimeseriesRepositoryOptions) {
    this.table = options.tableName;
    this.doc = options.client ?? createQueryClient();
  }

  /**
   * Points for a symbol between fromDate and toDate (inclusive), oldest first.
   */
  async queryBySymbolDateRange(params: {
    code: string;
    fromDate: string;
    toDate: string;
  }): Promise<PricePoint[]> {
    const { code, fromDate, toDate } = params;
    const cmd = new QueryCommand({
      TableName: this.table,
      IndexName: "bySymbol",
      KeyConditionExpression: "gsi1pk = :pk AND gsi1sk BETWEEN :from AND :to",
      ExpressionAttributeValues: {
        ":pk": `SYMBOL#${code}`,
        ":from": `${QUOTE_PREFIX}${fromDate}`,
        ":to": `${QUOTE_PREFIX}${toDate}`,
      },
      // "date", "open", "close" etc. are reserved words
      ExpressionAttributeNames: {
        "#date": "date",
        "#as_of_date": "as_of_date",
        "#open": "open",
        "#high": "high",
        "#low": "low",
        "#close": "close",
        "#adj_close": "adj_close",
        "#volume": "volume",
      },
      ProjectionExpression:
        "gsi1sk, #date, #as_of_date, #open, #high, #low, #close, #adj_close, #volume",
      Limit: inferWindowLimit(fromDate, toDate),
      ScanIndexForward: true,
    });
    const out = await this.doc.send(cmd);
    const points = (out.Items ?? []).map(toPricePoint);
    this.logger.debug(
      { table: this.table, code, fromDate, toDate, count: points.length },
      "timeseries query result"
    );
    return points;
  }
}

function createQueryClient(): QueryClient {
  const doc = DynamoDBDocumentClient.from(new DynamoDBClient({}));
  return { send: command => doc.send(command) };
}

function inferWindowLimit(from: string, to: string): number | undefined {
  const f = Date.parse(`${from}T00:00:00Z`);
  const t = Date.parse(`${to}T00:00:00Z`);
  if (Number.isNaN(f) || Number.isNaN(t)) return undefined;
  const days = Math.max(1, Math.floor((t - f) / (24 * 3600 * 1000)) + 1);
  return days + 5;
}

export function toPricePoint(item: Record<string, unknown>): PricePoint {
  return {
    date: extractDate(item),
    open: num(item["open"]),
    high: num(item["high"]),
    low: num(item["low"]),
    close: num(item["close"]) ?? num(item["adj_close"]),
    volume: num(item["volume"]),
  };
}

function extractDate(item: Record<string, unknown>): string {
  for (const key of ["date", "as_of_date"]) {
    const direct = item[key];
    if (typeof direct === "string" && /^\d{4}-\d{2}-\d{2}$/.test(direct))
      return direct;
  }
  const gsi1sk = item["gsi1sk"];
  if (typeof gsi1sk === "string" && gsi1sk.startsWith(QUOTE_PREFIX)) {
    return gsi1sk.slice(QUOTE_PREFIX.length, QUOTE_PREFIX.length + 10);
  }
  return "";
}

function num(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}
