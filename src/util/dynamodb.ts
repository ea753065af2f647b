import { getStage } from "./env";

export enum DynamoTable {
  StockData = "StockData",
  Company = "Company",
}

const TABLE_SUFFIX: Record<DynamoTable, string> = {
  [DynamoTable.StockData]: "StockDataTable",
  [DynamoTable.Company]: "CompanyTable",
};

interface GetDynamoTableNameOptions {
  appName?: string;
  stage?: string;
}

function resolveAppName(): string {
  return process.env.APP_NAME || "market-brief";
}

export function getDynamoTableName(
  table: DynamoTable,
  options: GetDynamoTableNameOptions = {}
): string {
  const appName = options.appName ?? resolveAppName();
  const stage = options.stage ?? getStage();
  return `${appName}-${stage}-${TABLE_SUFFIX[table]}`;
}
